import { getDb, withRetry } from './database.js';

export interface DispatchRecord {
  readonly sessionId: string;
  readonly event: string;
  readonly pack: string;
  readonly category: string | null;
  /** Manifest file reference of the sound played, if any. */
  readonly sound: string | null;
  readonly status: string;
  /** Epoch seconds. */
  readonly createdAt: number;
}

export interface StoredDispatch extends DispatchRecord {
  readonly id: number;
}

/** Where the event processor writes what it dispatched. */
export interface DispatchLog {
  record(entry: DispatchRecord): void;
  recent(limit: number): StoredDispatch[];
  prune(before: number): number;
}

interface DispatchRow {
  id: number;
  session_id: string;
  event: string;
  pack: string;
  category: string | null;
  sound: string | null;
  status: string;
  created_at: number;
}

function rowToDispatch(row: DispatchRow): StoredDispatch {
  return {
    id: row.id,
    sessionId: row.session_id,
    event: row.event,
    pack: row.pack,
    category: row.category,
    sound: row.sound,
    status: row.status,
    createdAt: row.created_at,
  };
}

export function recordDispatch(entry: DispatchRecord): number {
  const result = withRetry(() =>
    getDb()
      .prepare(
        `INSERT INTO dispatches (session_id, event, pack, category, sound, status, created_at)
         VALUES (?, ?, ?, ?, ?, ?, ?)`,
      )
      .run(entry.sessionId, entry.event, entry.pack, entry.category, entry.sound, entry.status, entry.createdAt),
  );
  return Number(result.lastInsertRowid);
}

/** Newest first. */
export function getRecentDispatches(limit: number): StoredDispatch[] {
  const rows = getDb()
    .prepare<[number], DispatchRow>('SELECT * FROM dispatches ORDER BY created_at DESC, id DESC LIMIT ?')
    .all(limit);
  return rows.map(rowToDispatch);
}

/** Delete rows created before `before` (epoch seconds); returns how many went. */
export function pruneDispatches(before: number): number {
  const result = withRetry(() => getDb().prepare('DELETE FROM dispatches WHERE created_at < ?').run(before));
  return result.changes;
}

export const sqliteDispatchLog: DispatchLog = {
  record: (entry) => {
    recordDispatch(entry);
  },
  recent: getRecentDispatches,
  prune: pruneDispatches,
};
