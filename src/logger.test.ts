import { describe, it, expect, vi, afterEach } from 'vitest';
import {
  configureLogging,
  consoleSink,
  createLogger,
  createMemorySink,
  formatRecord,
  getLogLevel,
  type LogRecord,
} from './logger';

afterEach(() => {
  configureLogging({ level: 'info', sink: consoleSink });
  vi.restoreAllMocks();
});

describe('formatRecord', () => {
  it('prefixes the message with its tag', () => {
    expect(formatRecord({ level: 'info', tag: 'Catch', message: 'Caught it!', time: 0 })).toBe('[Catch] Caught it!');
  });
});

describe('createLogger', () => {
  it('drops records below the configured level', () => {
    const memory = createMemorySink();
    configureLogging({ level: 'warn', sink: memory.sink });
    const log = createLogger('Audio');
    log.debug('a');
    log.info('b');
    log.warn('c');
    log.error('d');
    expect(memory.records.map((r) => `${r.level}:${r.tag}:${r.message}`)).toEqual(['warn:Audio:c', 'error:Audio:d']);
  });

  it('defaults to info', () => {
    expect(getLogLevel()).toBe('info');
  });

  it('picks up a sink configured after the logger was created', () => {
    const log = createLogger('Late');
    const memory = createMemorySink();
    configureLogging({ sink: memory.sink });
    log.info('hello');
    expect(memory.records).toHaveLength(1);
    expect(memory.records[0].message).toBe('hello');
  });
});

describe('consoleSink', () => {
  it('writes through the console method matching the level', () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});
    const info = vi.spyOn(console, 'info').mockImplementation(() => {});
    consoleSink({ level: 'warn', tag: 'Resources', message: 'leak', time: 0 });
    expect(warn).toHaveBeenCalledWith('[Resources] leak');
    expect(info).not.toHaveBeenCalled();
  });
});

describe('createMemorySink', () => {
  it('replays records at or above the level and empties the buffer', () => {
    const memory = createMemorySink();
    configureLogging({ level: 'debug', sink: memory.sink });
    const log = createLogger('Catch');
    log.debug('loop ended');
    log.info('Caught it!');
    log.warn('Music disabled');

    const replayed: LogRecord[] = [];
    memory.flush((record) => { replayed.push(record); }, 'info');
    expect(replayed.map((r) => r.message)).toEqual(['Caught it!', 'Music disabled']);
    expect(memory.records).toEqual([]);
  });

  it('replays everything by default', () => {
    const memory = createMemorySink();
    memory.sink({ level: 'debug', tag: 'T', message: 'x', time: 1 });
    const replayed: LogRecord[] = [];
    memory.flush((record) => { replayed.push(record); });
    expect(replayed).toEqual([{ level: 'debug', tag: 'T', message: 'x', time: 1 }]);
  });
});
