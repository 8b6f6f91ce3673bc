#!/usr/bin/env node
import { execFile } from 'child_process';
import { existsSync, writeFileSync } from 'fs';
import { text } from 'stream/consumers';
import { sendToDaemon } from './client/daemon-client.js';
import { cliPayloadFromArgs, enrichHookPayload, HELP_TEXT, isHelp } from './client/relay-input.js';
import { resolvePaths } from './config.js';
import { PRODUCT_NAME } from './constants.js';
import { errorMessage } from './utils/errors.js';

/**
 * The hook/CLI relay. Hook mode forwards stdin to the daemon and writes the
 * returned escapes to the terminal; CLI mode prints the daemon's text. A
 * missing daemon is a silent no-op and the exit status is always 0.
 */
async function main(): Promise<void> {
  const argv = process.argv.slice(2);
  const { socketPath } = resolvePaths();

  if (argv.length > 0) {
    if (isHelp(argv)) {
      console.log(HELP_TEXT);
      return;
    }
    const response = await sendToDaemon(socketPath, cliPayloadFromArgs(argv));
    if (!response) {
      console.error(`${PRODUCT_NAME}: daemon not running`);
      return;
    }
    const output = response.text ?? response.error;
    if (output) console.log(output);
    return;
  }

  if (process.stdin.isTTY) {
    console.log(`Usage: ${PRODUCT_NAME} <command>. Run '${PRODUCT_NAME} help' for details`);
    return;
  }

  const payload = enrichHookPayload(await text(process.stdin), {
    bundleId: process.env['__CFBundleIdentifier'] ?? '',
    idePid: await embeddedTerminalHostPid(),
  });
  if (!payload || !existsSync(socketPath)) return;

  const response = await sendToDaemon(socketPath, payload);
  if (!response) return;

  const tty = process.env['CLAUDE_TERM_TTY'] || '/dev/tty';
  for (const escape of [response.tab_title, response.tab_color]) {
    if (!escape) continue;
    try {
      writeFileSync(tty, escape);
    } catch {
      break; // no controlling terminal
    }
  }
  if (response.stderr) console.error(response.stderr);
}

/** For terminals embedded in an IDE, the IDE is the grandparent process. */
function embeddedTerminalHostPid(): Promise<string> {
  if (!process.env['TERM_PROGRAM_VERSION'] || process.platform === 'win32') {
    return Promise.resolve('');
  }
  return new Promise((resolve) => {
    execFile('ps', ['-o', 'ppid=', '-p', String(process.ppid)], { timeout: 500 }, (error, stdout) => {
      resolve(error ? '' : stdout.trim());
    });
  });
}

main()
  .catch((error: unknown) => {
    console.error(`${PRODUCT_NAME}: ${errorMessage(error)}`);
  })
  .finally(() => process.exit(0));
