/**
 * Node terminal adapter
 *
 * Offers the same surface as an xterm.js Terminal on top of stdin/stdout,
 * so the game runs unchanged in the user's own terminal.
 */

import type { Disposable, GameTerminal, TerminalKeyEvent } from './games';
import { MOUSE_TRACKING_OFF } from './games/utils';

export interface NodeTerminal extends GameTerminal {
  /** Put stdin/stdout back the way they were; safe to call twice */
  restore: () => void;
}

export interface TerminalInputStream {
  isTTY?: boolean;
  setRawMode?: (mode: boolean) => unknown;
  resume(): unknown;
  pause(): unknown;
  setEncoding(encoding: BufferEncoding): unknown;
  on(event: 'data', listener: (data: string) => void): unknown;
  off(event: 'data', listener: (data: string) => void): unknown;
}

export interface TerminalOutputStream {
  write(data: string): unknown;
  readonly columns?: number;
  readonly rows?: number;
}

export interface TerminalStreams {
  input: TerminalInputStream;
  output: TerminalOutputStream;
}

// ---------------------------------------------------------------------------
// Input Decoding
// ---------------------------------------------------------------------------

const SGR_MOUSE = /^\x1b\[<\d+;\d+;\d+[Mm]/;
const CSI = /^\x1b\[[0-?]*[ -\/]*[@-~]/;
const SS3 = /^\x1bO[@-~]/;

/**
 * Split one read from stdin into the keys and reports it carries.
 * A busy mouse shares reads with key presses.
 */
export function tokenizeInput(data: string): string[] {
  const tokens: string[] = [];
  let rest = data;
  while (rest.length > 0) {
    const match = SGR_MOUSE.exec(rest) ?? CSI.exec(rest) ?? SS3.exec(rest);
    const token = match ? match[0] : String.fromCodePoint(rest.codePointAt(0) ?? 0);
    tokens.push(token);
    rest = rest.slice(token.length);
  }
  return tokens;
}

export function isMouseReport(token: string): boolean {
  return SGR_MOUSE.test(token);
}

/**
 * Parse raw stdin escape sequences into key names
 * compatible with DOM KeyboardEvent.key values
 */
export function parseKey(data: string): string {
  if (data === '\x1b[A' || data === '\x1bOA') return 'ArrowUp';
  if (data === '\x1b[B' || data === '\x1bOB') return 'ArrowDown';
  if (data === '\x1b[C' || data === '\x1bOC') return 'ArrowRight';
  if (data === '\x1b[D' || data === '\x1bOD') return 'ArrowLeft';
  if (data === '\r' || data === '\n') return 'Enter';
  if (data === '\x1b') return 'Escape';
  if (data === '\x7f' || data === '\b') return 'Backspace';
  if (data === '\t') return 'Tab';
  return data;
}

// ---------------------------------------------------------------------------
// Terminal
// ---------------------------------------------------------------------------

function listenerList<T>() {
  const listeners: ((value: T) => void)[] = [];
  return {
    add(listener: (value: T) => void): Disposable {
      listeners.push(listener);
      return {
        dispose: () => {
          const idx = listeners.indexOf(listener);
          if (idx !== -1) listeners.splice(idx, 1);
        },
      };
    },
    emit(value: T) {
      for (const listener of [...listeners]) listener(value);
    },
    get size() { return listeners.length; },
  };
}

// Synchronized output: wrap writes with DEC sync sequences so the
// terminal batches clear + redraw into a single atomic paint.
const SYNC_START = '\x1b[?2026h';
const SYNC_END = '\x1b[?2026l';

export function createNodeTerminal(
  streams: TerminalStreams = { input: process.stdin, output: process.stdout },
): NodeTerminal {
  const { input, output } = streams;
  const keyListeners = listenerList<TerminalKeyEvent>();
  const dataListeners = listenerList<string>();
  let restored = false;

  if (input.isTTY && input.setRawMode) {
    input.setRawMode(true);
  }
  input.resume();
  input.setEncoding('utf8');

  const onInput = (data: string) => {
    for (const token of tokenizeInput(data)) {
      // Nothing left to hand Ctrl+C to
      if (token === '\x03' && dataListeners.size === 0) {
        restore();
        process.exit(130);
      }
      if (!isMouseReport(token)) {
        const key = parseKey(token);
        keyListeners.emit({ key, domEvent: { key } });
      }
      dataListeners.emit(token);
    }
  };
  input.on('data', onInput);

  function restore() {
    if (restored) return;
    restored = true;
    process.off('exit', restore);
    input.off('data', onInput);
    if (input.isTTY && input.setRawMode) {
      input.setRawMode(false);
    }
    input.pause();
    output.write(MOUSE_TRACKING_OFF);
    output.write('\x1b[?1049l');
    output.write('\x1b[?25h');
    output.write('\x1b[0m');
  }

  process.on('exit', restore);

  return {
    write: (data: string) => {
      output.write(SYNC_START + data + SYNC_END);
    },
    get cols() { return output.columns || 80; },
    get rows() { return output.rows || 24; },
    onKey: (listener) => keyListeners.add(listener),
    onData: (listener) => dataListeners.add(listener),
    restore,
  };
}
