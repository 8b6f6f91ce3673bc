import { homedir } from 'os';
import { join } from 'path';
import { z } from 'zod';
import { config as loadDotenv } from 'dotenv';
import {
  CONFIG_FILE,
  DEFAULT_FLUSH_INTERVAL_SECONDS,
  HISTORY_DB_FILE,
  SOCKET_FILE,
  STATE_FILE,
} from './constants.js';

loadDotenv();

const optionalPath = z
  .string()
  .optional()
  .transform((val) => (val && val.trim() ? val.trim() : undefined));

const configSchema = z.object({
  HOOKCHIME_WORK_DIR: optionalPath,
  HOOKCHIME_SOCKET: optionalPath,
  HOOKCHIME_CONFIG: optionalPath,
  HOOKCHIME_STATE: optionalPath,
  HOOKCHIME_HISTORY_DB: optionalPath,
  LOG_LEVEL: z.enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal']).default('info'),
  FLUSH_INTERVAL_SECONDS: z
    .string()
    .default(String(DEFAULT_FLUSH_INTERVAL_SECONDS))
    .transform((val) => parseInt(val, 10))
    .pipe(z.number().int().positive()),
});

const parsed = configSchema.safeParse(process.env);

if (!parsed.success) {
  console.error('Invalid environment configuration:');
  for (const issue of parsed.error.issues) {
    console.error(`  ${issue.path.join('.')}: ${issue.message}`);
  }
  process.exit(1);
}

export const config = parsed.data;

export interface DaemonPaths {
  readonly workDir: string;
  readonly socketPath: string;
  readonly configPath: string;
  readonly statePath: string;
  readonly historyDbPath: string;
}

/**
 * Resolve every file the daemon touches. Explicit overrides (command-line
 * flags) win over the environment, which wins over the work-dir defaults.
 */
export function resolvePaths(overrides: Partial<Pick<DaemonPaths, 'workDir' | 'socketPath' | 'configPath'>> = {}): DaemonPaths {
  const workDir =
    overrides.workDir ?? config.HOOKCHIME_WORK_DIR ?? join(homedir(), '.claude', 'hooks', 'hookchime');
  return {
    workDir,
    socketPath: overrides.socketPath ?? config.HOOKCHIME_SOCKET ?? join(workDir, SOCKET_FILE),
    configPath: overrides.configPath ?? config.HOOKCHIME_CONFIG ?? join(workDir, CONFIG_FILE),
    statePath: config.HOOKCHIME_STATE ?? join(workDir, STATE_FILE),
    historyDbPath: config.HOOKCHIME_HISTORY_DB ?? join(workDir, HISTORY_DB_FILE),
  };
}
