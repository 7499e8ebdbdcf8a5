/**
 * Music output the game loop drives. Hosts supply their own; the CLI
 * plays through a command-line player.
 */

import type { MusicTrack } from './assets';

export interface AudioOutput {
  /** Start looping `track`; restarts it if something else was playing */
  play(track: MusicTrack): void;
  stop(): void;
  readonly playing: boolean;
  dispose(): void;
}

export class SilentAudio implements AudioOutput {
  private current: MusicTrack | null = null;

  play(track: MusicTrack): void {
    this.current = track;
  }

  stop(): void {
    this.current = null;
  }

  get playing(): boolean {
    return this.current !== null;
  }

  dispose(): void {
    this.current = null;
  }
}
