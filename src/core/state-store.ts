import { mkdirSync, readFileSync, renameSync, writeFileSync } from 'fs';
import { dirname } from 'path';
import { z } from 'zod';
import {
  PENDING_SUBAGENT_MAX_AGE_SECONDS,
  SECONDS_PER_DAY,
  SUBAGENT_RETENTION_SECONDS,
} from '../constants.js';
import type { Clock } from '../types/runtime.js';
import { logger } from '../utils/logger.js';

export interface LastActive {
  readonly sessionId: string;
  readonly pack: string;
  readonly timestamp: number;
  readonly event: string;
  readonly cwd: string;
}

export interface SessionPackEntry {
  readonly pack: string;
  readonly lastUsed: number;
}

export interface PendingSubagentPack {
  readonly ts: number;
  readonly pack: string;
}

const lastActiveSchema = z.object({
  session_id: z.string(),
  pack: z.string(),
  timestamp: z.number(),
  event: z.string().catch(''),
  cwd: z.string().catch(''),
});

const sessionPackSchema = z.union([
  z.object({ pack: z.string(), last_used: z.number().catch(0) }),
  z.string(),
]);

const stateDocumentSchema = z.object({
  last_active: lastActiveSchema.nullable().catch(null),
  last_stop_time: z.number().catch(0),
  last_played: z.record(z.string()).catch({}),
  prompt_timestamps: z.record(z.array(z.number())).catch({}),
  prompt_start_times: z.record(z.number()).catch({}),
  session_start_times: z.record(z.number()).catch({}),
  session_packs: z.record(sessionPackSchema.nullable().catch(null)).catch({}),
  subagent_sessions: z.record(z.number()).catch({}),
  agent_sessions: z.array(z.string()).catch([]),
  pending_subagent_pack: z.object({ ts: z.number(), pack: z.string() }).nullable().catch(null),
  rotation_index: z.number().int().nonnegative().catch(0),
});

export interface StateDocument {
  last_active: Record<string, string | number>;
  last_stop_time: number;
  last_played: Record<string, string>;
  prompt_timestamps: Record<string, number[]>;
  prompt_start_times: Record<string, number>;
  session_start_times: Record<string, number>;
  session_packs: Record<string, { pack: string; last_used: number }>;
  subagent_sessions: Record<string, number>;
  agent_sessions: string[];
  pending_subagent_pack: Record<string, string | number>;
  rotation_index: number;
}

/**
 * Process-wide state shared by every session: per-session bookkeeping,
 * anti-repeat memory, the rotation cursor and inheritance scratch records.
 *
 * Only the serialized processing path may call the mutators. Every mutation
 * sets the dirty flag; nothing is written until {@link flushIfDirty}.
 */
export class StateStore {
  private lastActiveRecord: LastActive | null = null;
  private lastStop = 0;
  private readonly lastPlayed = new Map<string, string>();
  private readonly promptTimestamps = new Map<string, number[]>();
  private readonly promptStartTimes = new Map<string, number>();
  private readonly sessionStartTimes = new Map<string, number>();
  private readonly sessionPacks = new Map<string, SessionPackEntry>();
  private readonly subagentSessions = new Map<string, number>();
  private readonly agentSessions = new Set<string>();
  private pendingSubagent: PendingSubagentPack | null = null;
  private rotationIndex = 0;
  private dirtyFlag = false;

  constructor(
    readonly path: string,
    private readonly clock: Clock,
  ) {}

  static open(path: string, clock: Clock): StateStore {
    const store = new StateStore(path, clock);
    store.load();
    return store;
  }

  get dirty(): boolean {
    return this.dirtyFlag;
  }

  private markDirty(): void {
    this.dirtyFlag = true;
  }

  load(): void {
    let json: unknown;
    try {
      json = JSON.parse(readFileSync(this.path, 'utf-8'));
    } catch (error) {
      if (!(error instanceof Error && 'code' in error && error.code === 'ENOENT')) {
        logger.warn({ path: this.path, error }, 'State file unreadable, starting empty');
      }
      return;
    }

    const parsed = stateDocumentSchema.safeParse(json);
    if (!parsed.success) {
      logger.warn({ path: this.path }, 'State file has unexpected shape, starting empty');
      return;
    }

    const doc = parsed.data;
    const loadedAt = this.clock();
    this.lastActiveRecord = doc.last_active
      ? {
          sessionId: doc.last_active.session_id,
          pack: doc.last_active.pack,
          timestamp: doc.last_active.timestamp,
          event: doc.last_active.event,
          cwd: doc.last_active.cwd,
        }
      : null;
    this.lastStop = doc.last_stop_time;
    for (const [key, value] of Object.entries(doc.last_played)) this.lastPlayed.set(key, value);
    for (const [key, value] of Object.entries(doc.prompt_timestamps)) this.promptTimestamps.set(key, value);
    for (const [key, value] of Object.entries(doc.prompt_start_times)) this.promptStartTimes.set(key, value);
    for (const [key, value] of Object.entries(doc.session_start_times)) this.sessionStartTimes.set(key, value);
    for (const [key, value] of Object.entries(doc.subagent_sessions)) this.subagentSessions.set(key, value);
    for (const [sessionId, entry] of Object.entries(doc.session_packs)) {
      if (entry === null) continue;
      // Bare pack names predate last_used tracking; treat them as fresh.
      this.sessionPacks.set(
        sessionId,
        typeof entry === 'string' ? { pack: entry, lastUsed: loadedAt } : { pack: entry.pack, lastUsed: entry.last_used },
      );
    }
    for (const sessionId of doc.agent_sessions) this.agentSessions.add(sessionId);
    this.pendingSubagent = doc.pending_subagent_pack;
    this.rotationIndex = doc.rotation_index;
    this.dirtyFlag = false;
  }

  toDocument(): StateDocument {
    const sessionPacks: StateDocument['session_packs'] = {};
    for (const [sessionId, entry] of this.sessionPacks) {
      sessionPacks[sessionId] = { pack: entry.pack, last_used: entry.lastUsed };
    }
    const last = this.lastActiveRecord;
    return {
      last_active: last
        ? { session_id: last.sessionId, pack: last.pack, timestamp: last.timestamp, event: last.event, cwd: last.cwd }
        : {},
      last_stop_time: this.lastStop,
      last_played: Object.fromEntries(this.lastPlayed),
      prompt_timestamps: Object.fromEntries(this.promptTimestamps),
      prompt_start_times: Object.fromEntries(this.promptStartTimes),
      session_start_times: Object.fromEntries(this.sessionStartTimes),
      session_packs: sessionPacks,
      subagent_sessions: Object.fromEntries(this.subagentSessions),
      agent_sessions: [...this.agentSessions],
      pending_subagent_pack: this.pendingSubagent ? { ts: this.pendingSubagent.ts, pack: this.pendingSubagent.pack } : {},
      rotation_index: this.rotationIndex,
    };
  }

  /**
   * Write the snapshot if anything changed since the last successful write.
   * A failed write leaves the store dirty so the next flush retries.
   */
  flushIfDirty(): boolean {
    if (!this.dirtyFlag) return false;
    const tmpPath = `${this.path}.${process.pid}.tmp`;
    try {
      mkdirSync(dirname(this.path), { recursive: true });
      writeFileSync(tmpPath, JSON.stringify(this.toDocument()), { mode: 0o600 });
      renameSync(tmpPath, this.path);
      this.dirtyFlag = false;
      logger.debug({ path: this.path }, 'State flushed');
      return true;
    } catch (error) {
      logger.warn({ path: this.path, error }, 'Failed to flush state');
      return false;
    }
  }

  // ── Agent sessions ─────────────────────────────────────────────────────

  isAgent(sessionId: string): boolean {
    return this.agentSessions.has(sessionId);
  }

  markAgent(sessionId: string): void {
    this.agentSessions.add(sessionId);
    this.markDirty();
  }

  // ── Session pack assignments ───────────────────────────────────────────

  getSessionPack(sessionId: string): string | null {
    return this.sessionPacks.get(sessionId)?.pack ?? null;
  }

  setSessionPack(sessionId: string, pack: string): void {
    this.sessionPacks.set(sessionId, { pack, lastUsed: this.clock() });
    this.markDirty();
  }

  sessionPackEntries(): ReadonlyMap<string, SessionPackEntry> {
    return this.sessionPacks;
  }

  /**
   * Drop assignments unused for longer than the TTL and refresh the
   * current session's entry if it survives. Other per-session bookkeeping
   * whose newest timestamp is past the TTL goes too.
   */
  pruneSessionPacks(now: number, ttlDays: number, currentSessionId: string): void {
    const cutoff = now - ttlDays * SECONDS_PER_DAY;
    for (const [sessionId, entry] of this.sessionPacks) {
      if (entry.lastUsed <= cutoff) {
        this.sessionPacks.delete(sessionId);
        this.markDirty();
      } else if (sessionId === currentSessionId && entry.lastUsed !== now) {
        this.sessionPacks.set(sessionId, { pack: entry.pack, lastUsed: now });
        this.markDirty();
      }
    }

    for (const [sessionId, lastSeen] of this.lastSeenBySession()) {
      if (sessionId === currentSessionId || lastSeen > cutoff) continue;
      this.promptTimestamps.delete(sessionId);
      this.promptStartTimes.delete(sessionId);
      this.sessionStartTimes.delete(sessionId);
      this.subagentSessions.delete(sessionId);
      this.markDirty();
    }
  }

  private lastSeenBySession(): Map<string, number> {
    const lastSeen = new Map<string, number>();
    const see = (sessionId: string, ts: number): void => {
      lastSeen.set(sessionId, Math.max(ts, lastSeen.get(sessionId) ?? ts));
    };
    for (const [sessionId, stamps] of this.promptTimestamps) {
      // An empty window still counts as seen, at epoch zero.
      see(sessionId, stamps.length > 0 ? Math.max(...stamps) : 0);
    }
    for (const [sessionId, ts] of this.promptStartTimes) see(sessionId, ts);
    for (const [sessionId, ts] of this.sessionStartTimes) see(sessionId, ts);
    for (const [sessionId, ts] of this.subagentSessions) see(sessionId, ts);
    return lastSeen;
  }

  // ── Last active ────────────────────────────────────────────────────────

  get lastActive(): LastActive | null {
    return this.lastActiveRecord;
  }

  recordLastActive(record: LastActive): void {
    this.lastActiveRecord = record;
    this.markDirty();
  }

  // ── Prompt tracking ────────────────────────────────────────────────────

  /**
   * Append a prompt to the session's rolling window, dropping entries older
   * than the window. Returns the window length including this prompt.
   */
  recordPrompt(sessionId: string, now: number, windowSeconds: number): number {
    const recent = (this.promptTimestamps.get(sessionId) ?? []).filter((ts) => now - ts < windowSeconds);
    recent.push(now);
    this.promptTimestamps.set(sessionId, recent);
    this.markDirty();
    return recent.length;
  }

  setPromptStart(sessionId: string, now: number): void {
    this.promptStartTimes.set(sessionId, now);
    this.markDirty();
  }

  /** Read and remove the session's prompt start time. */
  takePromptStart(sessionId: string): number | null {
    const start = this.promptStartTimes.get(sessionId);
    if (start === undefined) return null;
    this.promptStartTimes.delete(sessionId);
    this.markDirty();
    return start;
  }

  // ── Session start / stop ───────────────────────────────────────────────

  setSessionStart(sessionId: string, now: number): void {
    this.sessionStartTimes.set(sessionId, now);
    this.markDirty();
  }

  getSessionStart(sessionId: string): number | null {
    return this.sessionStartTimes.get(sessionId) ?? null;
  }

  get lastStopTime(): number {
    return this.lastStop;
  }

  recordStop(now: number): void {
    this.lastStop = now;
    this.markDirty();
  }

  // ── Subagents ──────────────────────────────────────────────────────────

  isSubagent(sessionId: string): boolean {
    return this.subagentSessions.has(sessionId);
  }

  /** Mark a child session and forget subagents older than the retention window. */
  markSubagent(sessionId: string, now: number): void {
    this.subagentSessions.set(sessionId, now);
    for (const [id, ts] of this.subagentSessions) {
      if (now - ts >= SUBAGENT_RETENTION_SECONDS) this.subagentSessions.delete(id);
    }
    this.markDirty();
  }

  /** Producer: subagent start records the parent's pack. */
  recordPendingSubagentPack(pack: string, now: number): void {
    this.pendingSubagent = { ts: now, pack };
    this.markDirty();
  }

  /**
   * Consumer: a starting session reads the pending pack. A fresh record is
   * left in place for sibling subagents; a stale one is cleared and yields
   * null.
   */
  readPendingSubagentPack(now: number): string | null {
    const pending = this.pendingSubagent;
    if (!pending) return null;
    if (now - pending.ts >= PENDING_SUBAGENT_MAX_AGE_SECONDS) {
      this.pendingSubagent = null;
      this.markDirty();
      return null;
    }
    return pending.pack;
  }

  // ── Anti-repeat and rotation ───────────────────────────────────────────

  getLastPlayed(category: string): string | null {
    return this.lastPlayed.get(category) ?? null;
  }

  setLastPlayed(category: string, file: string): void {
    this.lastPlayed.set(category, file);
    this.markDirty();
  }

  get rotationCursor(): number {
    return this.rotationIndex;
  }

  /** Claim the next round-robin slot. Each call observes a distinct cursor value. */
  claimRotationSlot(length: number): number {
    const index = this.rotationIndex % length;
    this.rotationIndex = index + 1;
    this.markDirty();
    return index;
  }

  // ── Session end ────────────────────────────────────────────────────────

  /** Drop the session's bookkeeping. An agent id stays marked. */
  clearSession(sessionId: string): void {
    this.promptTimestamps.delete(sessionId);
    this.promptStartTimes.delete(sessionId);
    this.sessionStartTimes.delete(sessionId);
    this.subagentSessions.delete(sessionId);
    this.sessionPacks.delete(sessionId);
    this.markDirty();
  }
}
