import {
  DEFAULT_SESSION_KEY,
  SIBLING_SESSION_WINDOW_SECONDS,
} from '../constants.js';
import type { HookEventName } from '../types/hook.js';
import { pickIndex, type RandomSource } from '../types/runtime.js';
import type { RotationMode, Settings } from '../types/settings.js';
import { globMatch } from './glob.js';
import type { PackLookup } from './pack-catalog.js';
import type { StateStore } from './state-store.js';

export interface ResolveRequest {
  readonly event: HookEventName;
  readonly sessionId: string;
  readonly cwd: string;
  readonly source: string;
  readonly now: number;
}

interface ResolveContext extends ResolveRequest {
  readonly settings: Settings;
  /** First matching path rule whose pack is installed. */
  readonly pathRulePack: string | null;
}

type ModeHandler = (ctx: ResolveContext) => string;

// Events after which a session no longer counts as a live sibling.
const TERMINAL_EVENTS: ReadonlySet<string> = new Set(['Stop', 'SessionEnd']);

/**
 * Decides which pack governs a dispatch. Path rules are evaluated first;
 * the rotation mode then decides whether the rule, a sticky per-session
 * assignment, an inherited pack or a fresh rotation pick wins.
 */
export class PackResolver {
  private readonly handlers: Record<RotationMode, ModeHandler> = {
    session_override: (ctx) => this.resolveSticky(ctx),
    agentskill: (ctx) => this.resolveSticky(ctx),
    random: (ctx) => this.resolveRotation(ctx, 'random'),
    'round-robin': (ctx) => this.resolveRotation(ctx, 'round-robin'),
    unrecognized: (ctx) => this.resolveFallback(ctx),
  };

  constructor(
    private readonly packs: PackLookup,
    private readonly state: StateStore,
    private readonly random: RandomSource,
  ) {}

  resolve(settings: Settings, request: ResolveRequest): string {
    const ctx: ResolveContext = {
      ...request,
      settings,
      pathRulePack: this.matchPathRule(settings, request.cwd),
    };
    return this.handlers[settings.packRotationMode](ctx);
  }

  private matchPathRule(settings: Settings, cwd: string): string | null {
    if (!cwd) return null;
    for (const rule of settings.pathRules) {
      if (globMatch(rule.pattern, cwd) && this.packs.packExists(rule.pack)) {
        return rule.pack;
      }
    }
    return null;
  }

  private resolveFallback(ctx: ResolveContext): string {
    return ctx.pathRulePack ?? ctx.settings.defaultPack;
  }

  /** session_override / agentskill: an existing assignment outlives rules and rotation. */
  private resolveSticky(ctx: ResolveContext): string {
    const existing = this.state.getSessionPack(ctx.sessionId);
    if (existing && this.packs.packExists(existing)) {
      this.state.setSessionPack(ctx.sessionId, existing);
      return existing;
    }

    const defaultEntry = this.state.getSessionPack(DEFAULT_SESSION_KEY);
    if (defaultEntry && this.packs.packExists(defaultEntry)) {
      return defaultEntry;
    }

    return this.resolveFallback(ctx);
  }

  private resolveRotation(ctx: ResolveContext, mode: 'random' | 'round-robin'): string {
    const rotation = ctx.settings.packRotation;
    if (rotation.length === 0) return this.resolveFallback(ctx);
    if (ctx.pathRulePack) return ctx.pathRulePack;

    const existing = this.state.getSessionPack(ctx.sessionId);
    if (existing && rotation.includes(existing)) return existing;

    const inherited = ctx.event === 'SessionStart' ? this.inherit(ctx, rotation) : null;
    const pack = inherited ?? this.pickFresh(rotation, mode, ctx.settings.defaultPack);
    this.state.setSessionPack(ctx.sessionId, pack);
    return pack;
  }

  /**
   * A starting session may continue a pack already in use: a resumed
   * session keeps the last active pack, a subagent takes its parent's, and
   * a session opened right next to a live one shares it.
   */
  private inherit(ctx: ResolveContext, rotation: readonly string[]): string | null {
    const last = this.state.lastActive;

    if (ctx.source === 'resume' && last && rotation.includes(last.pack)) {
      return last.pack;
    }

    const parentPack = this.state.readPendingSubagentPack(ctx.now);
    if (parentPack !== null && rotation.includes(parentPack)) {
      this.state.markSubagent(ctx.sessionId, ctx.now);
      return parentPack;
    }

    if (
      last &&
      last.sessionId !== '' &&
      last.sessionId !== ctx.sessionId &&
      rotation.includes(last.pack) &&
      !TERMINAL_EVENTS.has(last.event) &&
      ctx.now - last.timestamp < SIBLING_SESSION_WINDOW_SECONDS
    ) {
      return last.pack;
    }

    return null;
  }

  private pickFresh(rotation: readonly string[], mode: 'random' | 'round-robin', fallback: string): string {
    const index =
      mode === 'round-robin'
        ? this.state.claimRotationSlot(rotation.length)
        : pickIndex(rotation.length, this.random);
    return rotation[index] ?? fallback;
  }
}
