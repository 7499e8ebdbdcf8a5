/**
 * Command-line options for the catch-the-block CLI
 */

import { type PhosphorMode, getThemeModes, isValidThemeMode } from './themes';

export interface CliOptions {
  theme: PhosphorMode;
  /** Directory holding the game's assets; null means the bundled ones */
  assetsDir: string | null;
  mute: boolean;
  verbose: boolean;
  help: boolean;
}

export class CliUsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'CliUsageError';
  }
}

export function parseCliOptions(args: string[]): CliOptions {
  const options: CliOptions = {
    theme: 'cyan',
    assetsDir: null,
    mute: false,
    verbose: false,
    help: false,
  };

  const takeValue = (flag: string, index: number): string => {
    const value = args[index + 1];
    if (value === undefined || value.startsWith('-')) {
      throw new CliUsageError(`${flag} needs a value`);
    }
    return value;
  };

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    switch (arg) {
      case '--help':
      case '-h':
        options.help = true;
        break;
      case '--mute':
        options.mute = true;
        break;
      case '--verbose':
      case '-v':
        options.verbose = true;
        break;
      case '--theme': {
        const theme = takeValue(arg, i++);
        if (!isValidThemeMode(theme)) {
          throw new CliUsageError(`Unknown theme: ${theme} (available: ${getThemeModes().join(', ')})`);
        }
        options.theme = theme;
        break;
      }
      case '--assets':
        options.assetsDir = takeValue(arg, i++);
        break;
      default:
        throw new CliUsageError(`Unknown option: ${arg}`);
    }
  }

  return options;
}
