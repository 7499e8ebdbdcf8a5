import { describe, it, expect } from 'vitest';
import { PLAY_BUTTON_RECT } from './engine';
import { toCellRect, toWorldPoint } from './viewport';

const grid = { cols: 80, rows: 24 };

describe('toCellRect', () => {
  it('maps the starting paddle to the bottom rows', () => {
    expect(toCellRect({ x: 350, y: 570, width: 100, height: 20 }, grid)).toEqual({ col: 35, row: 22, width: 10, height: 2 });
  });

  it('rounds partial cells outward', () => {
    expect(toCellRect({ x: 380, y: 0, width: 30, height: 30 }, grid)).toEqual({ col: 38, row: 0, width: 3, height: 2 });
    expect(toCellRect(PLAY_BUTTON_RECT, grid)).toEqual({ col: 27, row: 10, width: 26, height: 4 });
  });

  it('gives tiny rects at least one cell', () => {
    expect(toCellRect({ x: 0, y: 0, width: 1, height: 1 }, grid)).toEqual({ col: 0, row: 0, width: 1, height: 1 });
  });

  it('returns null for rects below the screen', () => {
    expect(toCellRect({ x: 100, y: 601, width: 30, height: 30 }, grid)).toBeNull();
  });

  it('clips rects that hang off the left edge', () => {
    expect(toCellRect({ x: -50, y: 0, width: 100, height: 25 }, grid)).toEqual({ col: 0, row: 0, width: 5, height: 1 });
  });
});

describe('toWorldPoint', () => {
  it('returns the center of the cell in world units', () => {
    expect(toWorldPoint(40, 12, grid)).toEqual({ x: 405, y: 312 });
    expect(toWorldPoint(0, 0, grid)).toEqual({ x: 5, y: 12 });
  });

  it('lands clicks on the play button cells inside the button rect', () => {
    const cells = toCellRect(PLAY_BUTTON_RECT, grid);
    expect(cells).not.toBeNull();
    if (!cells) return;
    const point = toWorldPoint(cells.col + 1, cells.row + 1, grid);
    expect(point.x).toBeGreaterThanOrEqual(PLAY_BUTTON_RECT.x);
    expect(point.y).toBeGreaterThanOrEqual(PLAY_BUTTON_RECT.y);
  });
});
