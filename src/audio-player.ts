/**
 * Music playback for the CLI
 *
 * Terminals have no audio of their own, so `ProcessAudio` runs the
 * platform's command-line player on the track file and starts it again
 * each time it finishes, for as long as playback is wanted.
 */

import { spawn } from 'child_process';
import { createLogger, type Logger } from './logger';
import { SilentAudio, type AudioFormat, type AudioOutput, type MusicTrack } from './games';

// ============================================================================
// Player Process
// ============================================================================

export interface PlayerProcess {
  onExit(listener: (code: number | null) => void): void;
  onError(listener: (error: Error) => void): void;
  kill(): void;
}

export type SpawnPlayer = (command: string, args: string[]) => PlayerProcess;

export interface PlayerCommand {
  command: string;
  args: (path: string) => string[];
}

export const spawnPlayer: SpawnPlayer = (command, args) => {
  const child = spawn(command, args, { stdio: 'ignore' });
  return {
    onExit: (listener) => { child.on('exit', (code) => listener(code)); },
    onError: (listener) => { child.on('error', listener); },
    kill: () => { child.kill(); },
  };
};

/**
 * Pick a command-line player for the platform and format
 */
export function resolvePlayer(platform: NodeJS.Platform, format: AudioFormat): PlayerCommand | null {
  if (platform === 'darwin') {
    return { command: 'afplay', args: (path) => [path] };
  }
  if (platform === 'linux') {
    if (format === 'wav') return { command: 'aplay', args: (path) => ['-q', path] };
    return { command: 'ffplay', args: (path) => ['-nodisp', '-autoexit', '-loglevel', 'quiet', path] };
  }
  return null;
}

export interface ProcessAudioOptions {
  platform?: NodeJS.Platform;
  spawn?: SpawnPlayer;
  logger?: Logger;
}

export class ProcessAudio implements AudioOutput {
  private readonly platform: NodeJS.Platform;
  private readonly spawn: SpawnPlayer;
  private readonly log: Logger;
  private track: MusicTrack | null = null;
  private child: PlayerProcess | null = null;
  private disabled = false;

  constructor(options: ProcessAudioOptions = {}) {
    this.platform = options.platform ?? process.platform;
    this.spawn = options.spawn ?? spawnPlayer;
    this.log = options.logger ?? createLogger('Audio');
  }

  get playing(): boolean {
    return this.child !== null;
  }

  play(track: MusicTrack): void {
    this.stop();
    if (this.disabled) return;
    this.track = track;
    this.startPlayer();
  }

  stop(): void {
    this.track = null;
    const child = this.child;
    this.child = null;
    child?.kill();
  }

  dispose(): void {
    this.stop();
    this.disabled = true;
  }

  private startPlayer(): void {
    const track = this.track;
    if (!track) return;

    const player = resolvePlayer(this.platform, track.format);
    if (!player) {
      this.disable(`no audio player for ${this.platform}`);
      return;
    }

    const child = this.spawn(player.command, player.args(track.path));
    this.child = child;

    child.onError((error) => {
      if (this.child !== child) return;
      this.disable(`${player.command} unavailable (${error.message})`);
    });
    child.onExit((code) => {
      if (this.child !== child) return;
      this.child = null;
      if (code !== 0) {
        this.disable(`${player.command} exited with code ${code ?? 'null'}`);
        return;
      }
      this.log.debug(`Looping ${track.path}`);
      this.startPlayer();
    });
  }

  private disable(reason: string): void {
    this.log.warn(`Music disabled: ${reason}`);
    this.disabled = true;
    this.track = null;
    this.child = null;
  }
}

export function createAudioOutput(options: ProcessAudioOptions & { mute?: boolean } = {}): AudioOutput {
  return options.mute ? new SilentAudio() : new ProcessAudio(options);
}
