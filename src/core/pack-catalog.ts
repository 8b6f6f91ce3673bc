import { existsSync, readFileSync, readdirSync, statSync, type Dirent } from 'fs';
import { join, resolve, sep } from 'path';
import { z } from 'zod';
import { DEFAULT_ICON_FILE, MANIFEST_FILES } from '../constants.js';
import { pickIndex, systemRandom, type RandomSource } from '../types/runtime.js';
import { logger } from '../utils/logger.js';

export interface SoundEntry {
  readonly file: string;
  readonly label?: string | undefined;
  readonly icon?: string | undefined;
}

export interface PackCategory {
  readonly icon: string | null;
  readonly sounds: readonly SoundEntry[];
}

export interface PackManifest {
  readonly displayName: string | null;
  readonly icon: string | null;
  readonly categories: ReadonlyMap<string, PackCategory>;
}

export interface PackSummary {
  readonly name: string;
  readonly displayName: string;
  readonly soundCount: number;
}

export interface PickedSound {
  /** Absolute path of the sound file, inside the pack directory. */
  readonly path: string;
  /** The manifest's file reference, remembered for anti-repeat. */
  readonly file: string;
  readonly iconPath: string | null;
}

/** The slice of the catalog the pack resolver needs. */
export interface PackLookup {
  packExists(name: string): boolean;
}

const soundEntrySchema = z.object({
  file: z.string().min(1),
  label: z.string().optional().catch(undefined),
  icon: z.string().min(1).optional().catch(undefined),
});

const categorySchema = z.object({
  icon: z.string().min(1).optional().catch(undefined),
  sounds: z.array(z.unknown()).catch([]),
});

const manifestSchema = z.object({
  display_name: z.string().optional().catch(undefined),
  icon: z.string().min(1).optional().catch(undefined),
  categories: z.record(z.unknown()).catch({}),
});

function parseManifest(json: unknown): PackManifest | null {
  const parsed = manifestSchema.safeParse(json);
  if (!parsed.success) return null;

  const categories = new Map<string, PackCategory>();
  for (const [name, raw] of Object.entries(parsed.data.categories)) {
    const category = categorySchema.safeParse(raw);
    if (!category.success) continue;
    const sounds: SoundEntry[] = [];
    for (const entry of category.data.sounds) {
      const sound = soundEntrySchema.safeParse(entry);
      if (sound.success) sounds.push(sound.data);
    }
    categories.set(name, { icon: category.data.icon ?? null, sounds });
  }

  return {
    displayName: parsed.data.display_name ?? null,
    icon: parsed.data.icon ?? null,
    categories,
  };
}

export function isValidPackName(name: string): boolean {
  return name.length > 0 && name !== '.' && name !== '..' && !name.includes('/') && !name.includes('\\');
}

/**
 * Resolve `ref` against `root` and return the absolute path only if it
 * stays inside `root` after normalization.
 */
export function resolveInside(root: string, ref: string): string | null {
  const base = resolve(root);
  const full = resolve(base, ref);
  return full.startsWith(base + sep) ? full : null;
}

export class PackCatalog implements PackLookup {
  private readonly manifests = new Map<string, PackManifest>();

  constructor(
    readonly packsDir: string,
    private readonly random: RandomSource = systemRandom,
  ) {}

  packDir(name: string): string {
    return join(this.packsDir, name);
  }

  packExists(name: string): boolean {
    if (!isValidPackName(name)) return false;
    try {
      return statSync(this.packDir(name)).isDirectory();
    } catch {
      return false;
    }
  }

  /** Parsed manifest for a pack, cached until {@link clearCache}. */
  loadManifest(name: string): PackManifest | null {
    const cached = this.manifests.get(name);
    if (cached) return cached;
    if (!isValidPackName(name)) return null;

    for (const file of MANIFEST_FILES) {
      const path = join(this.packDir(name), file);
      if (!existsSync(path)) continue;
      try {
        const manifest = parseManifest(JSON.parse(readFileSync(path, 'utf-8')));
        if (manifest) {
          this.manifests.set(name, manifest);
          return manifest;
        }
      } catch (error) {
        logger.warn({ pack: name, path, error }, 'Failed to read pack manifest');
      }
    }
    return null;
  }

  clearCache(): void {
    this.manifests.clear();
  }

  listPacks(): PackSummary[] {
    let entries: Dirent[];
    try {
      entries = readdirSync(this.packsDir, { withFileTypes: true });
    } catch {
      return [];
    }

    return entries
      .filter((e) => e.isDirectory() && !e.name.startsWith('.'))
      .map((e) => e.name)
      .sort()
      .map((name) => {
        const manifest = this.loadManifest(name);
        const files = new Set<string>();
        for (const category of manifest?.categories.values() ?? []) {
          for (const sound of category.sounds) files.add(sound.file);
        }
        return { name, displayName: manifest?.displayName ?? name, soundCount: files.size };
      });
  }

  listCategories(pack: string): string[] {
    const manifest = this.loadManifest(pack);
    return manifest ? [...manifest.categories.keys()].sort() : [];
  }

  /**
   * Pick a sound for the category, avoiding the last-played file when an
   * alternative exists. Files and icons resolving outside the pack
   * directory are treated as missing.
   */
  pickSound(pack: string, category: string, lastPlayed: string | null): PickedSound | null {
    const manifest = this.loadManifest(pack);
    const entry = manifest?.categories.get(category);
    if (!manifest || !entry || entry.sounds.length === 0) return null;

    let candidates = entry.sounds;
    if (entry.sounds.length > 1 && lastPlayed !== null) {
      const others = entry.sounds.filter((s) => s.file !== lastPlayed);
      if (others.length > 0) candidates = others;
    }

    const pick = candidates[pickIndex(candidates.length, this.random)];
    if (!pick) return null;

    const packDir = this.packDir(pack);
    const ref = pick.file.includes('/') ? pick.file : join('sounds', pick.file);
    const path = resolveInside(packDir, ref);
    if (!path) {
      logger.warn({ pack, file: pick.file }, 'Sound reference escapes pack directory');
      return null;
    }
    if (!existsSync(path)) return null;

    return { path, file: pick.file, iconPath: this.resolveIcon(packDir, manifest, entry, pick) };
  }

  private resolveIcon(packDir: string, manifest: PackManifest, category: PackCategory, sound: SoundEntry): string | null {
    let icon = sound.icon ?? category.icon ?? manifest.icon;
    if (!icon && existsSync(join(packDir, DEFAULT_ICON_FILE))) icon = DEFAULT_ICON_FILE;
    if (!icon) return null;

    const resolved = resolveInside(packDir, icon);
    return resolved && existsSync(resolved) ? resolved : null;
  }
}
