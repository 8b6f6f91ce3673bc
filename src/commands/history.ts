import { HISTORY_DEFAULT_LIMIT, HISTORY_MAX_LIMIT } from '../constants.js';
import type { StoredDispatch } from '../db/history-repository.js';
import { logger } from '../utils/logger.js';
import { fail, ok, type CommandHandler } from './context.js';

export function parseLimit(value: string): number {
  const n = parseInt(value, 10);
  if (!Number.isFinite(n) || n < 1) return HISTORY_DEFAULT_LIMIT;
  return Math.min(n, HISTORY_MAX_LIMIT);
}

export function formatDispatch(d: StoredDispatch): string {
  const when = new Date(d.createdAt * 1000).toISOString();
  return `  ${when}  ${d.event}  ${d.pack}  ${d.category ?? '-'}  ${d.status}  ${d.sessionId}`;
}

export const historyCommand: CommandHandler = (ctx, { value }) => {
  let rows: StoredDispatch[];
  try {
    rows = ctx.history.recent(parseLimit(value));
  } catch (error) {
    logger.warn({ error }, 'Failed to read dispatch history');
    return fail('History unavailable');
  }

  if (rows.length === 0) return ok('No dispatches recorded');
  return ok(['Recent dispatches:', ...rows.map(formatDispatch)].join('\n'));
};
