import {
  BACKGROUND_COLOR,
  BLOCK_COLOR,
  MAX_MISTAKES,
  PADDLE_COLOR,
  PLAY_BUTTON_RECT,
  type CatchState,
  type Color,
  type Point,
} from './engine';
import type { Surface, Texture } from './surface';

export interface GameTextures {
  playButton: Texture;
  gameOver: Texture;
}

export const HUD_POSITION: Readonly<Point> = { x: 8, y: 8 };
export const HUD_COLOR: Readonly<Color> = { r: 200, g: 200, b: 200 };

export function hudText(state: CatchState): string {
  return `MISSES ${state.mistakes}/${MAX_MISTAKES}  CAUGHT ${state.catches}  [ESC] QUIT`;
}

/**
 * Draw one frame. Depends only on the state and the textures.
 */
export function renderFrame(state: CatchState, surface: Surface, textures: GameTextures): void {
  surface.clear(BACKGROUND_COLOR);

  switch (state.phase) {
    case 'menu':
      surface.drawTexture(textures.playButton, PLAY_BUTTON_RECT);
      break;
    case 'playing':
      surface.fillRect(state.paddle, PADDLE_COLOR);
      surface.fillRect(state.block, BLOCK_COLOR);
      surface.drawText(hudText(state), HUD_POSITION, HUD_COLOR);
      break;
    case 'gameOver':
      surface.drawTexture(textures.gameOver, null);
      break;
  }

  surface.present();
}
