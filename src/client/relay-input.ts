import { z } from 'zod';

export const HELP_TEXT = `hookchime: sound and desktop notifications for coding-agent hooks

Commands:
  status                  Show daemon status
  pause / resume / toggle Pause/resume sounds
  volume [0.0-1.0]        Get/set volume
  preview [category]      Play a sound (default: task.complete)
  preview --list          List available categories
  packs list              List installed packs
  packs use <name>        Set active pack
  packs next              Cycle to next pack
  packs rotation list     Show rotation list
  packs rotation add <n>  Add pack to rotation
  packs rotation remove <n>
                          Remove pack from rotation
  packs assign <session|default> <name>
                          Pin a session to a pack (session_override mode)
  notifications [on|off|overlay|standard]
  rotation [random|round-robin|session_override|agentskill]
  history [n]             Show recent dispatches
  ping                    Health check
  help                    This message`;

export type CliPayload = {
  cli: string;
  value?: string;
  action?: string;
  arg?: string;
  arg2?: string;
};

/** `hookchime <verb> [a] [b] [c]` → request object. */
export function cliPayloadFromArgs(argv: readonly string[]): CliPayload {
  const [verb = '', first = '', second = '', third = ''] = argv;
  if (verb === 'packs') {
    return { cli: verb, action: first || 'list', arg: second, arg2: third };
  }
  return { cli: verb, value: first };
}

export function isHelp(argv: readonly string[]): boolean {
  const verb = argv[0];
  return verb === 'help' || verb === '--help' || verb === '-h';
}

const hookObject = z.record(z.unknown());

/**
 * Parse the hook's stdin JSON and attach the terminal context the daemon
 * uses for focus detection. Returns null when stdin is not a JSON object.
 */
export function enrichHookPayload(
  input: string,
  context: { bundleId: string; idePid: string },
): Record<string, unknown> | null {
  let json: unknown;
  try {
    json = JSON.parse(input);
  } catch {
    return null;
  }
  const parsed = hookObject.safeParse(json);
  if (!parsed.success) return null;
  return { ...parsed.data, bundle_id: context.bundleId, ide_pid: context.idePid };
}
