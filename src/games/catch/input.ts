/**
 * Terminal input source
 *
 * Terminal callbacks push events onto a queue; the loop drains it once per
 * frame with `poll()`. Terminals never report key release, so a movement
 * key counts as held for KEY_RELEASE_MS after its last press or repeat.
 */

import type { Disposable, GameTerminal } from '../utils';
import type { FrameInput, HeldKeys, InputEvent } from './engine';
import { toWorldPoint, type GridSize } from './viewport';

export const KEY_RELEASE_MS = 80;

const CTRL_C = '\x03';
const SGR_MOUSE_REPORT = /\x1b\[<(\d+);(\d+);(\d+)([Mm])/g;

const MOTION_FLAG = 32;
const WHEEL_FLAG = 64;
const BUTTON_MASK = 3;
const LEFT_BUTTON = 0;

const LEFT_KEYS = new Set(['ArrowLeft', 'a', 'A']);
const RIGHT_KEYS = new Set(['ArrowRight', 'd', 'D']);

/**
 * Decode SGR (1006) mouse reports into pointer events in world units
 */
export function parseMouseReports(data: string, grid: GridSize): InputEvent[] {
  const events: InputEvent[] = [];
  for (const match of data.matchAll(SGR_MOUSE_REPORT)) {
    const code = Number(match[1]);
    const point = toWorldPoint(Number(match[2]) - 1, Number(match[3]) - 1, grid);
    const pressed = match[4] === 'M';

    if (code & MOTION_FLAG) {
      events.push({ type: 'pointerMove', ...point });
    } else if (pressed && !(code & WHEEL_FLAG) && (code & BUTTON_MASK) === LEFT_BUTTON) {
      events.push({ type: 'pointerDown', ...point });
    }
  }
  return events;
}

export class TerminalInput {
  private queue: InputEvent[] = [];
  private readonly heldUntil = { left: 0, right: 0 };
  private subscriptions: Disposable[] = [];

  constructor(
    private readonly terminal: Pick<GameTerminal, 'cols' | 'rows' | 'onKey' | 'onData'>,
    private readonly now: () => number = Date.now,
  ) {}

  attach(): void {
    if (this.subscriptions.length > 0) return;
    this.subscriptions = [
      this.terminal.onKey(({ domEvent }) => this.handleKey(domEvent.key)),
      this.terminal.onData((data) => this.handleData(data)),
    ];
  }

  poll(): FrameInput {
    const events = this.queue;
    this.queue = [];
    return { events, held: this.heldKeys() };
  }

  heldKeys(): HeldKeys {
    const t = this.now();
    return {
      left: this.heldUntil.left > t,
      right: this.heldUntil.right > t,
    };
  }

  /** Queue a close request from outside the terminal (signals, hang-up) */
  close(): void {
    this.queue.push({ type: 'close' });
  }

  dispose(): void {
    for (const subscription of this.subscriptions) subscription.dispose();
    this.subscriptions = [];
    this.queue = [];
  }

  private handleKey(key: string): void {
    if (key === 'Escape') {
      this.queue.push({ type: 'keyDown', key });
    } else if (LEFT_KEYS.has(key)) {
      this.heldUntil.left = this.now() + KEY_RELEASE_MS;
      this.queue.push({ type: 'keyDown', key: 'ArrowLeft' });
    } else if (RIGHT_KEYS.has(key)) {
      this.heldUntil.right = this.now() + KEY_RELEASE_MS;
      this.queue.push({ type: 'keyDown', key: 'ArrowRight' });
    }
  }

  private handleData(data: string): void {
    if (data === CTRL_C) {
      this.close();
      return;
    }
    const grid = { cols: this.terminal.cols, rows: this.terminal.rows };
    this.queue.push(...parseMouseReports(data, grid));
  }
}
