import { describe, it, expect } from 'vitest';
import { existsSync, readFileSync } from 'fs';
import { dirname, resolve } from 'path';
import { fileURLToPath } from 'url';
import * as library from './index';

const IMPORT = /^(?:import|export)\s[^;]*?from\s+'([^']+)'/gm;

function resolveSource(from: string, specifier: string): string {
  const base = resolve(dirname(from), specifier);
  const candidates = [`${base}.ts`, resolve(base, 'index.ts')];
  const found = candidates.find((candidate) => existsSync(candidate));
  if (!found) throw new Error(`Cannot resolve ${specifier} from ${from}`);
  return found;
}

/** Every bare module specifier reachable from `entry` through relative imports */
function externalImports(entry: string): Set<string> {
  const external = new Set<string>();
  const seen = new Set<string>();
  const pending = [entry];
  while (pending.length > 0) {
    const file = pending.pop();
    if (file === undefined || seen.has(file)) continue;
    seen.add(file);
    for (const match of readFileSync(file, 'utf-8').matchAll(IMPORT)) {
      const specifier = match[1];
      if (specifier.startsWith('.')) pending.push(resolveSource(file, specifier));
      else external.add(specifier);
    }
  }
  return external;
}

describe('library entry', () => {
  it('imports nothing that needs Node', () => {
    const entry = fileURLToPath(new URL('./index.ts', import.meta.url));
    expect([...externalImports(entry)]).toEqual([]);
  });

  it('exports what a browser host needs to run the game', () => {
    expect(typeof library.runCatchGame).toBe('function');
    expect(typeof library.parseTexture).toBe('function');
    expect(typeof library.SilentAudio).toBe('function');
    expect('createAudioOutput' in library).toBe(false);
    expect('loadAssets' in library).toBe(false);
  });
});
