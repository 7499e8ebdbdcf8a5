/**
 * Asset validation and scoped resource release
 *
 * Textures are text art; music is an audio file the host's player reads.
 * Both are checked before the game takes over the screen.
 */

import { createLogger, type Logger } from '../../logger';
import type { Texture } from './surface';

export type AudioFormat = 'wav' | 'mp3' | 'ogg';

export interface MusicTrack {
  readonly path: string;
  readonly format: AudioFormat;
  readonly byteLength: number;
}

export const ASSET_FILES = {
  playButton: 'play_button.txt',
  gameOver: 'game_over.txt',
  music: 'background_music.wav',
} as const;

export class AssetLoadError extends Error {
  constructor(readonly assetPath: string, readonly reason: string) {
    super(`Unable to load ${assetPath}: ${reason}`);
    this.name = 'AssetLoadError';
  }
}

// ============================================================================
// Textures
// ============================================================================

export function parseTexture(path: string, text: string): Texture {
  if (text.includes('\u0000')) {
    throw new AssetLoadError(path, 'not a text image');
  }
  const lines = text.replace(/\r\n?/g, '\n').split('\n').map(line => line.trimEnd());
  while (lines.length > 0 && lines[lines.length - 1] === '') lines.pop();
  while (lines.length > 0 && lines[0] === '') lines.shift();
  if (lines.length === 0) {
    throw new AssetLoadError(path, 'image is empty');
  }
  const width = Math.max(...lines.map(line => [...line].length));
  return { path, lines, width, height: lines.length };
}

// ============================================================================
// Music
// ============================================================================

/**
 * Identify an audio file by its header bytes
 */
export function sniffAudioFormat(bytes: Uint8Array): AudioFormat | null {
  const ascii = (start: number, end: number) => String.fromCharCode(...bytes.subarray(start, end));

  if (bytes.length >= 12 && ascii(0, 4) === 'RIFF' && ascii(8, 12) === 'WAVE') return 'wav';
  if (bytes.length >= 4 && ascii(0, 4) === 'OggS') return 'ogg';
  if (bytes.length >= 3 && ascii(0, 3) === 'ID3') return 'mp3';
  if (bytes.length >= 2 && bytes[0] === 0xff && (bytes[1] & 0xe0) === 0xe0) return 'mp3';
  return null;
}

// ============================================================================
// Resource Scope
// ============================================================================

interface HeldResource {
  name: string;
  release: () => void;
}

/**
 * Acquires resources in order and releases them in reverse. A failed
 * acquisition leaves the earlier ones held until `release()` runs.
 */
export class ResourceScope {
  private held: HeldResource[] = [];

  constructor(private readonly log: Logger = createLogger('Resources')) {}

  acquire<T>(name: string, acquire: () => T, release: (resource: T) => void): T {
    const resource = acquire();
    this.held.push({ name, release: () => release(resource) });
    this.log.debug(`Acquired ${name}`);
    return resource;
  }

  get size(): number {
    return this.held.length;
  }

  release(): void {
    const held = this.held;
    this.held = [];
    for (const { name, release } of held.reverse()) {
      try {
        release();
        this.log.debug(`Released ${name}`);
      } catch (error) {
        this.log.warn(`Failed to release ${name}: ${error instanceof Error ? error.message : String(error)}`);
      }
    }
  }
}

export interface GameAssets {
  playButton: Texture;
  gameOver: Texture;
  music: MusicTrack;
}
