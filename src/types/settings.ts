export const CATEGORIES = [
  'session.start',
  'task.acknowledge',
  'task.complete',
  'task.error',
  'input.required',
  'resource.limit',
  'user.spam',
] as const;

export type Category = (typeof CATEGORIES)[number];

export const ROTATION_MODES = ['random', 'round-robin', 'session_override', 'agentskill'] as const;
export type KnownRotationMode = (typeof ROTATION_MODES)[number];
export type RotationMode = KnownRotationMode | 'unrecognized';

export const NOTIFICATION_STYLES = ['overlay', 'standard'] as const;
export type KnownNotificationStyle = (typeof NOTIFICATION_STYLES)[number];
export type NotificationStyle = KnownNotificationStyle | 'unrecognized';

export type Rgb = readonly [number, number, number];

export interface PathRule {
  readonly pattern: string;
  readonly pack: string;
}

export interface TabColorSettings {
  readonly enabled: boolean;
  /** Status key (spaces replaced by underscores) → RGB. */
  readonly colors: ReadonlyMap<string, Rgb>;
  /** Project name → status key → RGB, layered over `colors`. */
  readonly profiles: ReadonlyMap<string, ReadonlyMap<string, Rgb>>;
}

export interface Settings {
  readonly enabled: boolean;
  readonly volume: number;
  readonly desktopNotifications: boolean;
  readonly notificationStyle: NotificationStyle;
  readonly defaultPack: string;
  readonly packRotation: readonly string[];
  readonly packRotationMode: RotationMode;
  readonly pathRules: readonly PathRule[];
  readonly sessionTtlDays: number;
  readonly annoyedThreshold: number;
  readonly annoyedWindowSeconds: number;
  readonly silentWindowSeconds: number;
  readonly suppressSubagentComplete: boolean;
  readonly categories: Readonly<Record<Category, boolean>>;
  readonly tabColor: TabColorSettings;
}

/** JSON value accepted by targeted config rewrites. */
export type JsonValue = string | number | boolean | null | JsonValue[] | { [key: string]: JsonValue };
