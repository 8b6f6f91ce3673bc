import pino from 'pino';
import { config } from '../config.js';

// stdout is reserved for relay output, so logs go to stderr.
export const logger = pino(
  {
    name: 'hookchimed',
    level: config.LOG_LEVEL,
    base: { pid: process.pid },
  },
  pino.destination(2),
);
