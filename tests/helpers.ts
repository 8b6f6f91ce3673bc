import { mkdirSync, mkdtempSync, writeFileSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import { parseSettings } from '../src/core/settings.js';
import type { DispatchLog, DispatchRecord, StoredDispatch } from '../src/db/history-repository.js';
import type { HookEvent } from '../src/types/hook.js';
import { toHookEventName } from '../src/types/hook.js';
import type { Settings } from '../src/types/settings.js';

/** Far enough from zero that a fresh store's last stop time never debounces. */
export const T0 = 1_700_000_000;

export interface TestClock {
  (): number;
  set(seconds: number): void;
  advance(seconds: number): void;
}

export function testClock(start = T0): TestClock {
  let now = start;
  const clock = (): number => now;
  return Object.assign(clock, {
    set: (seconds: number) => {
      now = seconds;
    },
    advance: (seconds: number) => {
      now += seconds;
    },
  });
}

/** Random source that replays the given values, then keeps returning the last one. */
export function sequenceRandom(...values: number[]): () => number {
  let i = 0;
  return () => values[Math.min(i++, values.length - 1)] ?? 0;
}

export function tempDir(prefix = 'hookchime-'): string {
  return mkdtempSync(join(tmpdir(), prefix));
}

export function settingsWith(overrides: Partial<Settings> = {}): Settings {
  return { ...parseSettings({}), ...overrides };
}

export function hookEvent(name: string, overrides: Partial<Omit<HookEvent, 'name' | 'rawName'>> = {}): HookEvent {
  return {
    name: toHookEventName(name),
    rawName: name,
    sessionId: 's1',
    cwd: '/home/dev/projects/webapp',
    permissionMode: 'default',
    source: '',
    notificationType: '',
    toolName: '',
    error: '',
    bundleId: '',
    idePid: '',
    ...overrides,
  };
}

/**
 * Create `packs/<name>/` with a manifest and empty sound files for every
 * bare file reference in it.
 */
export function writePack(packsDir: string, name: string, manifest: Record<string, unknown>): string {
  const dir = join(packsDir, name);
  mkdirSync(join(dir, 'sounds'), { recursive: true });
  writeFileSync(join(dir, 'openpeon.json'), JSON.stringify(manifest));

  const categories = manifest['categories'];
  if (categories && typeof categories === 'object') {
    for (const category of Object.values(categories)) {
      const sounds: unknown = category && typeof category === 'object' && 'sounds' in category ? category.sounds : [];
      if (!Array.isArray(sounds)) continue;
      for (const sound of sounds) {
        if (sound && typeof sound === 'object' && 'file' in sound && typeof sound.file === 'string' && !sound.file.includes('/')) {
          writeFileSync(join(dir, 'sounds', sound.file), '');
        }
      }
    }
  }
  return dir;
}

/** A pack with one sound per listed category. */
export function simplePack(packsDir: string, name: string, categories: readonly string[] = ['task.complete']): string {
  return writePack(packsDir, name, {
    display_name: name.toUpperCase(),
    categories: Object.fromEntries(categories.map((c) => [c, { sounds: [{ file: `${name}-${c}.wav` }] }])),
  });
}

/** In-process stand-in for the SQLite dispatch log. */
export class MemoryDispatchLog implements DispatchLog {
  rows: StoredDispatch[] = [];

  record(entry: DispatchRecord): void {
    this.rows.push({ ...entry, id: this.rows.length + 1 });
  }

  recent(limit: number): StoredDispatch[] {
    return [...this.rows].reverse().slice(0, limit);
  }

  prune(before: number): number {
    const count = this.rows.length;
    this.rows = this.rows.filter((row) => row.createdAt >= before);
    return count - this.rows.length;
  }
}
