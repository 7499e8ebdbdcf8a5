/**
 * catch-the-block
 *
 * Catch falling blocks with a paddle, in any xterm.js terminal or from the CLI.
 *
 * Library usage (xterm.js):
 *   import { runCatchGame, parseTexture, setTheme, SilentAudio } from 'catch-the-block';
 *   setTheme('amber');
 *   const textures = {
 *     playButton: parseTexture('play_button.txt', buttonArt),
 *     gameOver: parseTexture('game_over.txt', gameOverArt),
 *   };
 *   const controller = runCatchGame(terminal, { textures, music, audio: new SilentAudio() });
 *   const summary = await controller.finished;
 *
 * CLI usage:
 *   npx catch-the-block
 */

export * from './games';

export {
  configureLogging,
  createLogger,
  createMemorySink,
  consoleSink,
  type Logger,
  type LogLevel,
  type LogRecord,
  type LogSink,
} from './logger';

export { getThemeModes, isValidThemeMode, themes } from './themes';
