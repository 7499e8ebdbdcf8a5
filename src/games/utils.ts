/**
 * Shared utilities for games
 *
 * Theme selection and screen-mode management for any terminal that
 * speaks the xterm control sequences.
 */

import { type PhosphorMode, getAnsiColor } from '../themes';
import { createLogger } from '../logger';

const log = createLogger('Screen');

// ============================================================================
// Terminal Interface
// ============================================================================

export interface TerminalKeyEvent {
  key: string;
  domEvent: { key: string };
}

export interface Disposable {
  dispose: () => void;
}

/**
 * The part of an xterm.js `Terminal` the game drives. The Node CLI
 * adapter implements the same surface on top of stdin/stdout.
 */
export interface GameTerminal {
  readonly cols: number;
  readonly rows: number;
  write(data: string): void;
  onKey(listener: (event: TerminalKeyEvent) => void): Disposable;
  onData(listener: (data: string) => void): Disposable;
}

// ============================================================================
// Theme Configuration
// ============================================================================

let currentTheme: PhosphorMode = 'cyan';

/**
 * Set the current theme mode
 */
export function setTheme(mode: PhosphorMode): void {
  currentTheme = mode;
}

export function getTheme(): PhosphorMode {
  return currentTheme;
}

/**
 * Get current theme color code
 */
export function getCurrentThemeColor(): string {
  return getAnsiColor(currentTheme);
}

// ============================================================================
// Alternate Buffer Management
// ============================================================================

/**
 * Terminals currently in the alternate buffer, with the reason they
 * entered it.
 */
const alternateBufferState = new WeakMap<GameTerminal, { reason: string; enteredAt: number }>();

/**
 * Enter alternate screen buffer with state tracking.
 *
 * @returns true if the buffer was entered, false if already in it
 */
export function enterAlternateBuffer(terminal: GameTerminal, reason: string): boolean {
  const existing = alternateBufferState.get(terminal);
  if (existing) {
    log.warn(`Already in alternate buffer (entered by: ${existing.reason}), requested by: ${reason}`);
    return false;
  }

  terminal.write('\x1b[?1049h'); // Enter alternate screen buffer
  terminal.write('\x1b[?25l');   // Hide cursor
  terminal.write('\x1b[2J\x1b[H'); // Clear screen

  alternateBufferState.set(terminal, { reason, enteredAt: Date.now() });
  return true;
}

/**
 * Exit alternate screen buffer with state tracking.
 *
 * @returns true if the buffer was exited, false if not in it
 */
export function exitAlternateBuffer(terminal: GameTerminal, reason: string): boolean {
  if (!alternateBufferState.has(terminal)) {
    log.warn(`Not in alternate buffer, exit requested by: ${reason}`);
    return false;
  }

  terminal.write('\x1b[0m');
  terminal.write('\x1b[?1049l'); // Exit alternate screen buffer
  terminal.write('\x1b[?25h');   // Show cursor

  alternateBufferState.delete(terminal);
  return true;
}

export function isInAlternateBuffer(terminal: GameTerminal): boolean {
  return alternateBufferState.has(terminal);
}

// ============================================================================
// Mouse Reporting
// ============================================================================

// 1003: report all motion, 1006: SGR extended coordinates
export const MOUSE_TRACKING_ON = '\x1b[?1003h\x1b[?1006h';
export const MOUSE_TRACKING_OFF = '\x1b[?1003l\x1b[?1006l';

export function enableMouseTracking(terminal: GameTerminal): void {
  terminal.write(MOUSE_TRACKING_ON);
}

export function disableMouseTracking(terminal: GameTerminal): void {
  terminal.write(MOUSE_TRACKING_OFF);
}

// Re-export PhosphorMode type for convenience
export type { PhosphorMode } from '../themes';
