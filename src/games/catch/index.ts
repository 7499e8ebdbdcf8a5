/**
 * Catch the Block
 *
 * A paddle at the bottom catches blocks falling from the top. Click PLAY
 * to start; five missed blocks end the game. Mouse or ←/→ move the paddle,
 * ESC quits from anywhere.
 */

import { createLogger, type Logger } from '../../logger';
import {
  type GameTerminal,
  disableMouseTracking,
  enableMouseTracking,
  enterAlternateBuffer,
  exitAlternateBuffer,
  getCurrentThemeColor,
} from '../utils';
import type { AudioOutput } from './audio';
import type { MusicTrack } from './assets';
import {
  FRAME_DELAY_MS,
  createInitialState,
  stepFrame,
  type CatchState,
  type GameEffect,
  type Phase,
  type Random,
} from './engine';
import { TerminalInput } from './input';
import { renderFrame, type GameTextures } from './render';
import { TerminalSurface } from './surface';

export const MIN_COLS = 40;
export const MIN_ROWS = 15;

export interface SessionSummary {
  /** Phase the game was in when the loop ended */
  phase: Phase;
  catches: number;
  mistakes: number;
}

export interface CatchGameOptions {
  textures: GameTextures;
  music: MusicTrack;
  audio: AudioOutput;
  random?: Random;
  frameDelayMs?: number;
  logger?: Logger;
}

/**
 * Catch Game Controller
 */
export interface CatchController {
  /** End the loop as if the player closed the game */
  stop: () => void;
  readonly isRunning: boolean;
  readonly state: CatchState;
  /** Resolves once the loop has ended and the screen is restored */
  finished: Promise<SessionSummary>;
}

export function runCatchGame(terminal: GameTerminal, options: CatchGameOptions): CatchController {
  const random = options.random ?? Math.random;
  const frameDelay = options.frameDelayMs ?? FRAME_DELAY_MS;
  const log = options.logger ?? createLogger('Catch');
  const { audio, music, textures } = options;

  let state = createInitialState(random);
  let running = true;
  let resolveFinished: (summary: SessionSummary) => void = () => {};
  const finished = new Promise<SessionSummary>((resolve) => { resolveFinished = resolve; });

  const input = new TerminalInput(terminal);
  const surface = new TerminalSurface(terminal, getCurrentThemeColor());

  function applyEffect(effect: GameEffect) {
    switch (effect.type) {
      case 'startMusic':
        audio.play(music);
        break;
      case 'stopMusic':
        audio.stop();
        break;
      case 'caught':
        log.info('Caught it!');
        break;
      case 'missed':
        log.info(`Missed! Mistakes: ${effect.mistakes}`);
        break;
      case 'gameOver':
        log.info('GAME OVER!');
        break;
    }
  }

  function render() {
    const cols = terminal.cols, rows = terminal.rows;
    if (cols < MIN_COLS || rows < MIN_ROWS) {
      const themeColor = getCurrentThemeColor();
      const msg1 = 'Terminal too small!';
      const msg2 = `Need: ${MIN_COLS}×${MIN_ROWS}  Have: ${cols}×${rows}`;
      const cX = Math.floor(cols / 2), cY = Math.floor(rows / 2);
      let output = '\x1b[0m\x1b[2J\x1b[H';
      output += `\x1b[${Math.max(1, cY - 1)};${Math.max(1, cX - Math.floor(msg1.length / 2))}H${themeColor}${msg1}\x1b[0m`;
      output += `\x1b[${cY + 1};${Math.max(1, cX - Math.floor(msg2.length / 2))}H\x1b[2m${msg2}\x1b[0m`;
      terminal.write(output);
      return;
    }
    renderFrame(state, surface, textures);
  }

  function finish() {
    if (!running) return;
    running = false;
    clearInterval(frameInterval);
    input.dispose();
    audio.stop();
    disableMouseTracking(terminal);
    exitAlternateBuffer(terminal, 'catch');
    log.debug(`Loop ended in ${state.phase}`);
    resolveFinished({ phase: state.phase, catches: state.catches, mistakes: state.mistakes });
  }

  function frame() {
    if (!running) return;
    const result = stepFrame(state, input.poll(), random);
    state = result.state;
    for (const effect of result.effects) applyEffect(effect);
    if (result.exit) {
      finish();
      return;
    }
    render();
  }

  enterAlternateBuffer(terminal, 'catch');
  enableMouseTracking(terminal);
  input.attach();
  render();
  const frameInterval = setInterval(frame, frameDelay);

  return {
    stop: () => {
      if (!running) return;
      input.close();
      frame();
    },
    get isRunning() { return running; },
    get state() { return state; },
    finished,
  };
}
