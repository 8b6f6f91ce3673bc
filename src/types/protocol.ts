import { z } from 'zod';
import { toHookEventName, type HookEvent } from './hook.js';

/** Text fields accept strings, numbers (pids) or absence; absence reads as ''. */
const text = z
  .union([z.string(), z.number()])
  .nullish()
  .transform((value) => (value === null || value === undefined ? '' : String(value)));

const cliSchema = z.object({
  cli: z.string(),
  value: text,
  action: text,
  arg: text,
  arg2: text,
});

const hookSchema = z.object({
  hook_event_name: text,
  event: text,
  session_id: text,
  cwd: text,
  permission_mode: text,
  source: text,
  notification_type: text,
  tool_name: text,
  error: text,
  bundle_id: text,
  ide_pid: text,
});

export interface CliRequest {
  readonly kind: 'cli';
  readonly verb: string;
  readonly value: string;
  readonly action: string;
  readonly arg: string;
  readonly arg2: string;
}

export interface HookRequest {
  readonly kind: 'hook';
  readonly event: HookEvent;
}

export type DaemonRequest = CliRequest | HookRequest;

export type DecodeResult = { ok: true; request: DaemonRequest } | { ok: false; error: string };

export interface DaemonResponse {
  ok: boolean;
  tab_title?: string;
  tab_color?: string;
  stderr?: string;
  text?: string;
  error?: string;
  skipped?: string;
}

export const INVALID_INPUT = 'invalid input';

function describe(error: z.ZodError): string {
  const issue = error.issues[0];
  if (!issue) return INVALID_INPUT;
  const field = issue.path.join('.');
  return field ? `${INVALID_INPUT}: ${field}: ${issue.message}` : `${INVALID_INPUT}: ${issue.message}`;
}

/** Decode an already-parsed JSON value into a typed request. */
export function decodeRequest(json: unknown): DecodeResult {
  if (json === null || typeof json !== 'object' || Array.isArray(json)) {
    return { ok: false, error: INVALID_INPUT };
  }

  if ('cli' in json) {
    const parsed = cliSchema.safeParse(json);
    if (!parsed.success) return { ok: false, error: describe(parsed.error) };
    const { cli, value, action, arg, arg2 } = parsed.data;
    return { ok: true, request: { kind: 'cli', verb: cli, value, action, arg, arg2 } };
  }

  const parsed = hookSchema.safeParse(json);
  if (!parsed.success) return { ok: false, error: describe(parsed.error) };
  const data = parsed.data;
  const rawName = data.hook_event_name || data.event;
  return {
    ok: true,
    request: {
      kind: 'hook',
      event: {
        name: toHookEventName(rawName),
        rawName,
        sessionId: data.session_id,
        cwd: data.cwd,
        permissionMode: data.permission_mode,
        source: data.source,
        notificationType: data.notification_type,
        toolName: data.tool_name,
        error: data.error,
        bundleId: data.bundle_id,
        idePid: data.ide_pid,
      },
    },
  };
}

/** Decode one request line. */
export function decodeRequestLine(line: string): DecodeResult {
  let json: unknown;
  try {
    json = JSON.parse(line);
  } catch {
    return { ok: false, error: INVALID_INPUT };
  }
  return decodeRequest(json);
}

export function encodeResponse(response: DaemonResponse): string {
  return `${JSON.stringify(response)}\n`;
}
