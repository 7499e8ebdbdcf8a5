/**
 * Game modules and their shared terminal utilities
 */

// Re-export utilities
export {
  setTheme,
  getTheme,
  getCurrentThemeColor,
  enterAlternateBuffer,
  exitAlternateBuffer,
  isInAlternateBuffer,
  enableMouseTracking,
  disableMouseTracking,
} from './utils';

export type { PhosphorMode, GameTerminal, TerminalKeyEvent, Disposable } from './utils';

// Catch the Block
export {
  runCatchGame,
  MIN_COLS,
  MIN_ROWS,
  type CatchController,
  type CatchGameOptions,
  type SessionSummary,
} from './catch';

export {
  createInitialState,
  stepFrame,
  intersects,
  pointInRect,
  clampPaddle,
  SCREEN_WIDTH,
  SCREEN_HEIGHT,
  MAX_MISTAKES,
  PLAY_BUTTON_RECT,
  type CatchState,
  type FrameInput,
  type FrameResult,
  type GameEffect,
  type InputEvent,
  type Phase,
  type Rect,
} from './catch/engine';

export { renderFrame, type GameTextures } from './catch/render';
export { TerminalSurface, type Surface, type Texture } from './catch/surface';
export { TerminalInput } from './catch/input';
export { SilentAudio, type AudioOutput } from './catch/audio';
export {
  ASSET_FILES,
  AssetLoadError,
  ResourceScope,
  parseTexture,
  sniffAudioFormat,
  type AudioFormat,
  type GameAssets,
  type MusicTrack,
} from './catch/assets';
