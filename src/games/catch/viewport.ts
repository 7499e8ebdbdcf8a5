/**
 * World ↔ terminal cell mapping.
 *
 * The world is SCREEN_WIDTH × SCREEN_HEIGHT units; the terminal is
 * cols × rows cells. Cell coordinates here are 0-based.
 */

import { SCREEN_HEIGHT, SCREEN_WIDTH, type Point, type Rect } from './engine';

export interface CellRect {
  col: number;
  row: number;
  width: number;
  height: number;
}

export interface GridSize {
  cols: number;
  rows: number;
}

/**
 * Cells covered by a world rect, at least one cell each way, clipped to
 * the grid. Returns null when nothing of the rect is on screen.
 */
export function toCellRect(rect: Rect, grid: GridSize): CellRect | null {
  const left = Math.floor((rect.x * grid.cols) / SCREEN_WIDTH);
  const top = Math.floor((rect.y * grid.rows) / SCREEN_HEIGHT);
  const right = Math.max(left + 1, Math.ceil(((rect.x + rect.width) * grid.cols) / SCREEN_WIDTH));
  const bottom = Math.max(top + 1, Math.ceil(((rect.y + rect.height) * grid.rows) / SCREEN_HEIGHT));

  const col = Math.max(0, left);
  const row = Math.max(0, top);
  const width = Math.min(grid.cols, right) - col;
  const height = Math.min(grid.rows, bottom) - row;
  if (width <= 0 || height <= 0) return null;
  return { col, row, width, height };
}

/**
 * World point at the center of a cell
 */
export function toWorldPoint(col: number, row: number, grid: GridSize): Point {
  return {
    x: Math.floor(((col + 0.5) * SCREEN_WIDTH) / grid.cols),
    y: Math.floor(((row + 0.5) * SCREEN_HEIGHT) / grid.rows),
  };
}
