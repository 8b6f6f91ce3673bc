export const HOOK_EVENT_NAMES = [
  'SessionStart',
  'UserPromptSubmit',
  'Stop',
  'Notification',
  'PermissionRequest',
  'PostToolUseFailure',
  'SubagentStart',
  'PreCompact',
  'SessionEnd',
] as const;

export type KnownHookEventName = (typeof HOOK_EVENT_NAMES)[number];
export type HookEventName = KnownHookEventName | 'unknown';

/** A hook event after boundary decoding. Absent fields are empty strings. */
export interface HookEvent {
  readonly name: HookEventName;
  /** The name as sent, kept for history and last-active bookkeeping. */
  readonly rawName: string;
  readonly sessionId: string;
  readonly cwd: string;
  readonly permissionMode: string;
  readonly source: string;
  readonly notificationType: string;
  readonly toolName: string;
  readonly error: string;
  readonly bundleId: string;
  readonly idePid: string;
}

export function toHookEventName(raw: string): HookEventName {
  return HOOK_EVENT_NAMES.find((name) => name === raw) ?? 'unknown';
}
