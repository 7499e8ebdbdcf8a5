/**
 * Drawing surface abstraction and its ANSI terminal implementation
 */

import type { GameTerminal } from '../utils';
import type { Color, Point, Rect } from './engine';
import { toCellRect, type GridSize } from './viewport';

/**
 * Text-art image, drawn centered inside the target rectangle
 */
export interface Texture {
  readonly path: string;
  readonly lines: readonly string[];
  /** Widest line, in cells */
  readonly width: number;
  readonly height: number;
}

export interface Surface {
  clear(color: Color): void;
  fillRect(rect: Rect, color: Color): void;
  /** `null` target draws over the whole screen */
  drawTexture(texture: Texture, target: Rect | null): void;
  drawText(text: string, position: Point, color: Color): void;
  present(): void;
}

export function backgroundCode(color: Color): string {
  return `\x1b[48;2;${color.r};${color.g};${color.b}m`;
}

export function foregroundCode(color: Color): string {
  return `\x1b[38;2;${color.r};${color.g};${color.b}m`;
}

function moveTo(col: number, row: number): string {
  return `\x1b[${row + 1};${col + 1}H`;
}

/**
 * Batches a frame of ANSI output and writes it in one call on `present()`
 */
export class TerminalSurface implements Surface {
  private buffer = '';
  private background = '';

  constructor(
    private readonly terminal: Pick<GameTerminal, 'write' | 'cols' | 'rows'>,
    private readonly textColor: string,
  ) {}

  private get grid(): GridSize {
    return { cols: this.terminal.cols, rows: this.terminal.rows };
  }

  clear(color: Color): void {
    this.background = backgroundCode(color);
    this.buffer = `\x1b[0m${this.background}\x1b[2J\x1b[H`;
  }

  fillRect(rect: Rect, color: Color): void {
    const cells = toCellRect(rect, this.grid);
    if (!cells) return;
    const fill = ' '.repeat(cells.width);
    this.buffer += backgroundCode(color);
    for (let r = 0; r < cells.height; r++) {
      this.buffer += moveTo(cells.col, cells.row + r) + fill;
    }
    this.buffer += this.background;
  }

  drawTexture(texture: Texture, target: Rect | null): void {
    const { cols, rows } = this.grid;
    const area = target ? toCellRect(target, this.grid) : { col: 0, row: 0, width: cols, height: rows };
    if (!area) return;

    const top = area.row + Math.max(0, Math.floor((area.height - texture.height) / 2));
    const left = area.col + Math.max(0, Math.floor((area.width - texture.width) / 2));
    const visibleRows = Math.min(texture.height, area.row + area.height - top);
    const visibleCols = area.col + area.width - left;

    this.buffer += this.textColor;
    for (let i = 0; i < visibleRows; i++) {
      const line = [...texture.lines[i]].slice(0, visibleCols).join('');
      this.buffer += moveTo(left, top + i) + line;
    }
    this.buffer += `\x1b[0m${this.background}`;
  }

  drawText(text: string, position: Point, color: Color): void {
    const cells = toCellRect({ x: position.x, y: position.y, width: 1, height: 1 }, this.grid);
    if (!cells) return;
    const visible = [...text].slice(0, this.grid.cols - cells.col).join('');
    this.buffer += `${moveTo(cells.col, cells.row)}${foregroundCode(color)}${visible}\x1b[0m${this.background}`;
  }

  present(): void {
    if (!this.buffer) return;
    this.terminal.write(this.buffer);
    this.buffer = '';
  }
}
