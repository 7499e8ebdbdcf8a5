/**
 * Reads the game's assets from a directory on disk
 */

import { readFileSync } from 'fs';
import { resolve } from 'path';
import {
  ASSET_FILES,
  AssetLoadError,
  parseTexture,
  sniffAudioFormat,
  type GameAssets,
  type MusicTrack,
  type ResourceScope,
  type Texture,
} from './games';

function describeReadError(error: unknown): string {
  if (error instanceof Error && 'code' in error) {
    if (error.code === 'ENOENT') return 'file not found';
    if (error.code === 'EACCES') return 'permission denied';
    if (error.code === 'EISDIR') return 'is a directory';
  }
  return error instanceof Error ? error.message : String(error);
}

function readAsset(path: string): Buffer {
  try {
    return readFileSync(path);
  } catch (error) {
    throw new AssetLoadError(path, describeReadError(error));
  }
}

export function loadTexture(path: string): Texture {
  return parseTexture(path, readAsset(path).toString('utf-8'));
}

export function loadMusic(path: string): MusicTrack {
  const bytes = readAsset(path);
  const format = sniffAudioFormat(bytes);
  if (!format) {
    throw new AssetLoadError(path, 'unsupported or corrupt audio data');
  }
  return { path, format, byteLength: bytes.length };
}

/**
 * Load every asset from `dir` into the scope. Textures and tracks hold no
 * handles of their own; their release entries only mark the order.
 */
export function loadAssets(scope: ResourceScope, dir: string): GameAssets {
  const noop = () => {};
  const playButton = scope.acquire('play button texture', () => loadTexture(resolve(dir, ASSET_FILES.playButton)), noop);
  const gameOver = scope.acquire('game over texture', () => loadTexture(resolve(dir, ASSET_FILES.gameOver)), noop);
  const music = scope.acquire('music track', () => loadMusic(resolve(dir, ASSET_FILES.music)), noop);
  return { playButton, gameOver, music };
}
