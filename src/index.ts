#!/usr/bin/env node
import { parseArgs } from 'util';
import { config, resolvePaths } from './config.js';
import { Daemon } from './daemon.js';
import { DaemonError } from './utils/errors.js';
import { logger } from './utils/logger.js';

const USAGE = `hookchimed, the hookchime daemon
Usage: hookchimed [--socket <path>] [--config <path>] [--work-dir <path>]`;

async function main(): Promise<void> {
  const { values } = parseArgs({
    options: {
      socket: { type: 'string' },
      config: { type: 'string' },
      'work-dir': { type: 'string' },
      help: { type: 'boolean', short: 'h' },
    },
    strict: true,
  });

  if (values.help) {
    console.log(USAGE);
    return;
  }

  const paths = resolvePaths({
    socketPath: values.socket,
    configPath: values.config,
    workDir: values['work-dir'],
  });

  const daemon = new Daemon({ paths, flushIntervalSeconds: config.FLUSH_INTERVAL_SECONDS });
  await daemon.start();

  let stopping = false;
  const shutdown = (signal: NodeJS.Signals): void => {
    if (stopping) return;
    stopping = true;
    logger.info({ signal }, 'Shutting down...');
    daemon
      .stop()
      .then(() => process.exit(0))
      .catch((error: unknown) => {
        logger.error({ error }, 'Shutdown failed');
        process.exit(1);
      });
  };

  process.on('SIGINT', shutdown);
  process.on('SIGTERM', shutdown);
}

main().catch((error: unknown) => {
  if (error instanceof DaemonError) {
    logger.fatal({ code: error.code, error: error.message }, 'Failed to start daemon');
  } else {
    logger.fatal({ error }, 'Failed to start daemon');
  }
  process.exit(1);
});
