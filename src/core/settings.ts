import { readFileSync, writeFileSync } from 'fs';
import { z } from 'zod';
import {
  CATEGORIES,
  NOTIFICATION_STYLES,
  ROTATION_MODES,
  type Category,
  type JsonValue,
  type NotificationStyle,
  type PathRule,
  type Rgb,
  type RotationMode,
  type Settings,
  type TabColorSettings,
} from '../types/settings.js';
import { logger } from '../utils/logger.js';

export const DEFAULT_PACK = 'peon';

export const DEFAULT_CATEGORIES: Readonly<Record<Category, boolean>> = {
  'session.start': true,
  'task.acknowledge': false,
  'task.complete': true,
  'task.error': true,
  'input.required': true,
  'resource.limit': true,
  'user.spam': true,
};

export const DEFAULT_TAB_COLORS: ReadonlyMap<string, Rgb> = new Map<string, Rgb>([
  ['ready', [65, 115, 80]],
  ['working', [130, 105, 50]],
  ['done', [65, 100, 140]],
  ['needs_approval', [150, 70, 70]],
]);

export function toRotationMode(raw: string): RotationMode {
  return ROTATION_MODES.find((mode) => mode === raw) ?? 'unrecognized';
}

export function toNotificationStyle(raw: string): NotificationStyle {
  return NOTIFICATION_STYLES.find((style) => style === raw) ?? 'unrecognized';
}

function clampVolume(value: number): number {
  return Math.max(0, Math.min(1, value));
}

const rgbSchema = z
  .tuple([z.number().int(), z.number().int(), z.number().int()])
  .rest(z.number())
  .transform(([red, green, blue]): Rgb => [red, green, blue]);

const pathRuleSchema = z.object({
  pattern: z.string().min(1),
  pack: z.string().min(1),
});

const looseObject = z.record(z.unknown());

// Each key falls back to its own default independently.
const documentSchema = z.object({
  enabled: z.boolean().catch(true),
  volume: z.number().catch(0.5).transform(clampVolume),
  desktop_notifications: z.boolean().catch(true),
  notification_style: z.string().catch('overlay').transform(toNotificationStyle),
  default_pack: z.string().min(1).optional().catch(undefined),
  active_pack: z.string().min(1).optional().catch(undefined),
  pack_rotation: z.array(z.string().min(1)).catch([]),
  pack_rotation_mode: z.string().catch('random').transform(toRotationMode),
  path_rules: z.array(z.unknown()).catch([]),
  session_ttl_days: z.number().int().nonnegative().catch(7),
  annoyed_threshold: z.number().int().positive().catch(3),
  annoyed_window_seconds: z.number().nonnegative().catch(10),
  silent_window_seconds: z.number().nonnegative().catch(0),
  suppress_subagent_complete: z.boolean().catch(false),
  categories: looseObject.catch({}),
  tab_color: looseObject.catch({}),
});

function parsePathRules(raw: readonly unknown[]): PathRule[] {
  const rules: PathRule[] = [];
  for (const entry of raw) {
    const rule = pathRuleSchema.safeParse(entry);
    if (rule.success) rules.push(rule.data);
  }
  return rules;
}

function parseColorMap(raw: unknown): Map<string, Rgb> {
  const colors = new Map<string, Rgb>();
  const object = looseObject.safeParse(raw);
  if (!object.success) return colors;
  for (const [key, value] of Object.entries(object.data)) {
    const rgb = rgbSchema.safeParse(value);
    if (rgb.success) colors.set(key, rgb.data);
  }
  return colors;
}

function parseCategories(raw: Record<string, unknown>): Record<Category, boolean> {
  const categories: Record<Category, boolean> = { ...DEFAULT_CATEGORIES };
  for (const category of CATEGORIES) {
    const value = raw[category];
    if (typeof value === 'boolean') categories[category] = value;
  }
  return categories;
}

function parseTabColor(raw: Record<string, unknown>): TabColorSettings {
  const enabled = raw['enabled'];
  const colors = new Map(DEFAULT_TAB_COLORS);
  for (const [key, rgb] of parseColorMap(raw['colors'])) {
    colors.set(key, rgb);
  }

  const profiles = new Map<string, ReadonlyMap<string, Rgb>>();
  const rawProfiles = looseObject.safeParse(raw['color_profiles']);
  if (rawProfiles.success) {
    for (const [project, value] of Object.entries(rawProfiles.data)) {
      profiles.set(project, parseColorMap(value));
    }
  }

  return {
    enabled: typeof enabled === 'boolean' ? enabled : true,
    colors,
    profiles,
  };
}

/** Build a settings snapshot from an already-parsed config document. */
export function parseSettings(raw: unknown): Settings {
  const parsed = documentSchema.safeParse(raw);
  const doc = parsed.success ? parsed.data : documentSchema.parse({});

  return {
    enabled: doc.enabled,
    volume: doc.volume,
    desktopNotifications: doc.desktop_notifications,
    notificationStyle: doc.notification_style,
    defaultPack: doc.default_pack ?? doc.active_pack ?? DEFAULT_PACK,
    packRotation: doc.pack_rotation,
    packRotationMode: doc.pack_rotation_mode,
    pathRules: parsePathRules(doc.path_rules),
    sessionTtlDays: doc.session_ttl_days,
    annoyedThreshold: doc.annoyed_threshold,
    annoyedWindowSeconds: doc.annoyed_window_seconds,
    silentWindowSeconds: doc.silent_window_seconds,
    suppressSubagentComplete: doc.suppress_subagent_complete,
    categories: parseCategories(doc.categories),
    tabColor: parseTabColor(doc.tab_color),
  };
}

function readDocument(path: string): Record<string, unknown> {
  let text: string;
  try {
    text = readFileSync(path, 'utf-8');
  } catch (error) {
    if (!(error instanceof Error && 'code' in error && error.code === 'ENOENT')) {
      logger.warn({ path, error }, 'Failed to read config, using defaults');
    }
    return {};
  }

  try {
    const json: unknown = JSON.parse(text);
    const object = looseObject.safeParse(json);
    return object.success ? object.data : {};
  } catch (error) {
    logger.warn({ path, error }, 'Config is not valid JSON, using defaults');
    return {};
  }
}

export function loadSettings(path: string): Settings {
  return parseSettings(readDocument(path));
}

function sortKeys(value: unknown): unknown {
  if (Array.isArray(value)) return value.map(sortKeys);
  if (value !== null && typeof value === 'object') {
    return Object.fromEntries(
      Object.entries(value)
        .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))
        .map(([key, nested]) => [key, sortKeys(nested)]),
    );
  }
  return value;
}

/**
 * Holds the current settings snapshot. Readers always see a complete
 * snapshot; reload and update swap it in one assignment.
 */
export class SettingsStore {
  private snapshot: Settings;

  constructor(readonly path: string) {
    this.snapshot = loadSettings(path);
  }

  get current(): Settings {
    return this.snapshot;
  }

  reload(): Settings {
    this.snapshot = loadSettings(this.path);
    logger.info({ path: this.path }, 'Config reloaded');
    return this.snapshot;
  }

  /**
   * Rewrite the given top-level keys of the config document, keeping every
   * other key (known or not) as it is on disk.
   */
  update(values: Record<string, JsonValue>): Settings {
    const document = readDocument(this.path);
    for (const [key, value] of Object.entries(values)) {
      document[key] = value;
    }

    try {
      writeFileSync(this.path, `${JSON.stringify(sortKeys(document), null, 2)}\n`);
    } catch (error) {
      logger.warn({ path: this.path, error }, 'Failed to write config');
    }

    this.snapshot = parseSettings(document);
    return this.snapshot;
  }
}
