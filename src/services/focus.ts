import { execFile } from 'child_process';
import { logger } from '../utils/logger.js';

export interface FrontmostApp {
  readonly bundleId: string;
  readonly name: string;
}

export type FrontmostProbe = () => Promise<FrontmostApp | null>;

// Apps that host the coding tool's terminal.
const TERMINAL_APP_NAMES = [
  'Terminal',
  'iTerm2',
  'Warp',
  'Alacritty',
  'kitty',
  'WezTerm',
  'Ghostty',
  'Cursor',
  'Code',
  'Windsurf',
  'Zed',
];

const PROBE_TIMEOUT_MS = 1000;

const FRONTMOST_SCRIPT = [
  'tell application "System Events"',
  'set p to first application process whose frontmost is true',
  'return (bundle identifier of p) & linefeed & (name of p)',
  'end tell',
];

/**
 * True when the frontmost app is the one that sent the event, or any
 * known terminal/IDE. Unknown focus counts as not focused.
 */
export function isTerminalFocused(frontmost: FrontmostApp | null, requestBundleId: string): boolean {
  if (!frontmost) return false;
  if (requestBundleId !== '' && frontmost.bundleId === requestBundleId) return true;
  return TERMINAL_APP_NAMES.some((name) => frontmost.name.includes(name));
}

export function parseFrontmost(output: string): FrontmostApp | null {
  const [bundleId = '', name = ''] = output.trim().split('\n');
  if (bundleId === '' && name === '') return null;
  return { bundleId: bundleId.trim(), name: name.trim() };
}

/** macOS only; elsewhere focus is unknown. */
export const probeFrontmostApp: FrontmostProbe = () => {
  if (process.platform !== 'darwin') return Promise.resolve(null);

  const args = FRONTMOST_SCRIPT.flatMap((line) => ['-e', line]);
  return new Promise((resolve) => {
    execFile('osascript', args, { timeout: PROBE_TIMEOUT_MS }, (error, stdout) => {
      if (error) {
        logger.debug({ error: error.message }, 'Frontmost app probe failed');
        resolve(null);
        return;
      }
      resolve(parseFrontmost(stdout));
    });
  });
};
