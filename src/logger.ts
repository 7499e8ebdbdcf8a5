/**
 * Tagged logger
 *
 * Messages print as `[Tag] message`, the way the rest of the codebase
 * writes to the console. While the game owns the screen, the CLI swaps the
 * sink for a memory sink and replays it once the terminal is restored.
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface LogRecord {
  level: LogLevel;
  tag: string;
  message: string;
  time: number;
}

export type LogSink = (record: LogRecord) => void;

export interface Logger {
  debug: (message: string) => void;
  info: (message: string) => void;
  warn: (message: string) => void;
  error: (message: string) => void;
}

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

export function formatRecord(record: LogRecord): string {
  return `[${record.tag}] ${record.message}`;
}

/**
 * Writes each record through the matching console method
 */
export const consoleSink: LogSink = (record) => {
  const line = formatRecord(record);
  switch (record.level) {
    case 'debug': console.debug(line); break;
    case 'info': console.info(line); break;
    case 'warn': console.warn(line); break;
    case 'error': console.error(line); break;
  }
};

export interface MemorySink {
  sink: LogSink;
  records: LogRecord[];
  /** Replay buffered records at or above `minLevel` into another sink, then empty the buffer */
  flush: (target: LogSink, minLevel?: LogLevel) => void;
}

export function createMemorySink(): MemorySink {
  const records: LogRecord[] = [];
  return {
    sink: (record) => { records.push(record); },
    records,
    flush: (target, minLevel = 'debug') => {
      for (const record of records.splice(0)) {
        if (LEVEL_ORDER[record.level] >= LEVEL_ORDER[minLevel]) target(record);
      }
    },
  };
}

// ============================================================================
// Configuration
// ============================================================================

let minimumLevel: LogLevel = 'info';
let activeSink: LogSink = consoleSink;

export interface LoggingOptions {
  level?: LogLevel;
  sink?: LogSink;
}

/**
 * Set the minimum level and/or the sink for every logger
 */
export function configureLogging(options: LoggingOptions): void {
  if (options.level) minimumLevel = options.level;
  if (options.sink) activeSink = options.sink;
}

export function getLogLevel(): LogLevel {
  return minimumLevel;
}

export function createLogger(tag: string): Logger {
  const emit = (level: LogLevel, message: string) => {
    if (LEVEL_ORDER[level] < LEVEL_ORDER[minimumLevel]) return;
    activeSink({ level, tag, message, time: Date.now() });
  };
  return {
    debug: (message) => emit('debug', message),
    info: (message) => emit('info', message),
    warn: (message) => emit('warn', message),
    error: (message) => emit('error', message),
  };
}
