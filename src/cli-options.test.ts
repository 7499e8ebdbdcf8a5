import { describe, it, expect } from 'vitest';
import { CliUsageError, parseCliOptions } from './cli-options';

describe('parseCliOptions', () => {
  it('uses defaults without arguments', () => {
    expect(parseCliOptions([])).toEqual({
      theme: 'cyan',
      assetsDir: null,
      mute: false,
      verbose: false,
      help: false,
    });
  });

  it('reads every flag', () => {
    expect(parseCliOptions(['--theme', 'amber', '--assets', './art', '--mute', '-v', '-h'])).toEqual({
      theme: 'amber',
      assetsDir: './art',
      mute: true,
      verbose: true,
      help: true,
    });
  });

  it('rejects an unknown theme', () => {
    expect(() => parseCliOptions(['--theme', 'purple'])).toThrow(
      'Unknown theme: purple (available: cyan, amber, green, white, hotpink, blood, ice, oled)',
    );
  });

  it('rejects a flag missing its value', () => {
    expect(() => parseCliOptions(['--assets'])).toThrow('--assets needs a value');
    expect(() => parseCliOptions(['--theme', '--mute'])).toThrow('--theme needs a value');
  });

  it('rejects unknown options with a usage error', () => {
    expect(() => parseCliOptions(['--fast'])).toThrow(CliUsageError);
    expect(() => parseCliOptions(['--fast'])).toThrow('Unknown option: --fast');
  });
});
