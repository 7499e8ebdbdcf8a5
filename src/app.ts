/**
 * The catch-the-block command: option handling, startup and shutdown
 * around one game session.
 */

import { fileURLToPath } from 'url';
import * as p from '@clack/prompts';
import { loadAssets } from './asset-files';
import { createAudioOutput } from './audio-player';
import { CliUsageError, parseCliOptions, type CliOptions } from './cli-options';
import { configureLogging, consoleSink, createMemorySink } from './logger';
import { getThemeModes } from './themes';
import {
  AssetLoadError,
  ResourceScope,
  runCatchGame,
  setTheme,
  type AudioOutput,
  type SessionSummary,
} from './games';
import { createNodeTerminal, type NodeTerminal } from './terminal';

export interface CliDependencies {
  createTerminal: () => NodeTerminal;
  createAudio: (options: { mute: boolean }) => AudioOutput;
  assetsDir: string;
}

function defaultAssetsDir(): string {
  return fileURLToPath(new URL('../assets', import.meta.url));
}

const defaultDependencies = (): CliDependencies => ({
  createTerminal: () => createNodeTerminal(),
  createAudio: (options) => createAudioOutput(options),
  assetsDir: defaultAssetsDir(),
});

function printHelp() {
  console.log(`
  catch-the-block: catch the falling blocks before five get past you

  Usage:
    catch-the-block                  Start the game
    catch-the-block --theme <theme>  Set color theme
    catch-the-block --assets <dir>   Load play_button.txt, game_over.txt and
                                     background_music.wav from <dir>
    catch-the-block --mute           No music
    catch-the-block --verbose        Print the game log after quitting
    catch-the-block --help           Show this help

  Themes:
    ${getThemeModes().join(', ')}

  Controls:
    Click PLAY           Start the game
    Mouse / ← →          Move the paddle
    ESC                  Quit
`);
}

export function summaryMessage(summary: SessionSummary): string {
  const caught = `${summary.catches} block${summary.catches === 1 ? '' : 's'} caught`;
  if (summary.phase === 'gameOver') return `Game over: ${caught}`;
  if (summary.phase === 'menu') return 'See you next time';
  return `Quit with ${caught}, ${summary.mistakes} missed`;
}

async function play(options: CliOptions, deps: CliDependencies): Promise<number> {
  const scope = new ResourceScope();
  try {
    const audio = scope.acquire('audio output', () => deps.createAudio({ mute: options.mute }), (output) => output.dispose());
    const assets = loadAssets(scope, options.assetsDir ?? deps.assetsDir);

    // The game owns the screen from here on; logs wait in memory
    scope.acquire(
      'log buffer',
      () => {
        const memory = createMemorySink();
        configureLogging({ sink: memory.sink });
        return memory;
      },
      (memory) => {
        configureLogging({ sink: consoleSink });
        memory.flush(consoleSink, options.verbose ? 'debug' : 'warn');
      },
    );
    const terminal = scope.acquire('terminal', deps.createTerminal, (t) => t.restore());

    const controller = runCatchGame(terminal, { textures: assets, music: assets.music, audio });
    const signals: NodeJS.Signals[] = ['SIGINT', 'SIGTERM', 'SIGHUP'];
    const onSignal = () => controller.stop();
    for (const signal of signals) process.on(signal, onSignal);

    const summary = await controller.finished;
    for (const signal of signals) process.off(signal, onSignal);
    scope.release();

    p.outro(summaryMessage(summary));
    return 0;
  } catch (error) {
    scope.release();
    if (error instanceof AssetLoadError) {
      p.log.error(error.message);
      p.cancel('Could not start the game.');
      return 1;
    }
    throw error;
  }
}

/**
 * Run the command with `args` (without the node and script paths) and
 * resolve to the process exit status
 */
export async function runCli(args: string[], deps: Partial<CliDependencies> = {}): Promise<number> {
  let options: CliOptions;
  try {
    options = parseCliOptions(args);
  } catch (error) {
    if (error instanceof CliUsageError) {
      console.error(error.message);
      console.error('Run `catch-the-block --help` for usage.');
      return 2;
    }
    throw error;
  }

  if (options.help) {
    printHelp();
    return 0;
  }

  setTheme(options.theme);
  configureLogging({ level: options.verbose ? 'debug' : 'info' });
  return play(options, { ...defaultDependencies(), ...deps });
}
