import { basename } from 'path';
import {
  AGENT_PERMISSION_MODE,
  DEFAULT_PROJECT_LABEL,
  REPLAY_SUPPRESSION_SECONDS,
  SHELL_TOOL_NAME,
  STOP_DEBOUNCE_SECONDS,
} from '../constants.js';
import type { HookEvent } from '../types/hook.js';
import type { Clock } from '../types/runtime.js';
import type { Category, Settings } from '../types/settings.js';
import type { PackResolver } from './pack-resolver.js';
import type { StateStore } from './state-store.js';

export type SessionStatus = 'ready' | 'working' | 'done' | 'needs approval' | 'error';
export type NotifyColor = 'blue' | 'yellow' | 'red';

export type SkipReason =
  | 'disabled'
  | 'agent'
  | 'compact'
  | 'subagent'
  | 'unknown_notification'
  | 'non_bash_failure'
  | 'subagent_start'
  | 'session_end'
  | 'unknown_event';

interface Route {
  category: Category | null;
  status: SessionStatus;
  marker: boolean;
  notify: boolean;
  notifyColor: NotifyColor | null;
  message: string;
}

export interface Dispatch extends Readonly<Route> {
  readonly kind: 'dispatch';
  readonly pack: string;
  readonly project: string;
}

export interface Skip {
  readonly kind: 'skip';
  readonly reason: SkipReason;
}

export type Decision = Dispatch | Skip;

const skip = (reason: SkipReason): Skip => ({ kind: 'skip', reason });

/** Tab/notification label for a working directory. */
export function projectLabel(cwd: string): string {
  const name = basename(cwd).replace(/[^a-zA-Z0-9 ._-]/g, '');
  return name || DEFAULT_PROJECT_LABEL;
}

export interface ClassifierDeps {
  readonly state: StateStore;
  readonly resolver: PackResolver;
  readonly clock: Clock;
}

/**
 * Maps one hook event plus session history to a decision. All state
 * mutation for the event happens here; callers must serialize calls.
 */
export class EventClassifier {
  constructor(private readonly deps: ClassifierDeps) {}

  classify(event: HookEvent, settings: Settings): Decision {
    const { state, resolver } = this.deps;
    const now = this.deps.clock();
    const { sessionId } = event;

    if (!settings.enabled) return skip('disabled');

    // Delegated runs never produce effects. The id stays marked after its end.
    if (event.permissionMode === AGENT_PERMISSION_MODE || state.isAgent(sessionId)) {
      if (!state.isAgent(sessionId)) state.markAgent(sessionId);
      if (event.name === 'SessionEnd') state.clearSession(sessionId);
      return skip('agent');
    }

    state.pruneSessionPacks(now, settings.sessionTtlDays, sessionId);

    if (event.name === 'SessionStart' && event.source === 'compact') {
      return skip('compact');
    }

    const pack = resolver.resolve(settings, {
      event: event.name,
      sessionId,
      cwd: event.cwd,
      source: event.source,
      now,
    });
    state.recordLastActive({ sessionId, pack, timestamp: now, event: event.rawName, cwd: event.cwd });

    const project = projectLabel(event.cwd);
    const route = this.route(event, settings, project, pack, now);
    if (typeof route === 'string') return skip(route);

    if (event.name === 'Stop') {
      // Measured from the last accepted completion, across all sessions.
      if (now - state.lastStopTime < STOP_DEBOUNCE_SECONDS) {
        route.category = null;
        route.notify = false;
      } else {
        state.recordStop(now);
      }
    }

    if (event.name === 'SessionStart') {
      state.setSessionStart(sessionId, now);
    } else if (route.category !== null) {
      const startedAt = state.getSessionStart(sessionId);
      if (startedAt !== null && now - startedAt < REPLAY_SUPPRESSION_SECONDS) {
        route.category = null;
        route.notify = false;
      }
    }

    if (route.category !== null && !settings.categories[route.category]) {
      route.category = null;
    }

    return { kind: 'dispatch', pack, project, ...route };
  }

  private route(event: HookEvent, settings: Settings, project: string, pack: string, now: number): Route | SkipReason {
    const { state } = this.deps;
    const { sessionId } = event;

    switch (event.name) {
      case 'SessionStart':
        return quiet('session.start', 'ready');

      case 'UserPromptSubmit': {
        let category: Category | null = null;
        if (settings.categories['user.spam']) {
          const recent = state.recordPrompt(sessionId, now, settings.annoyedWindowSeconds);
          if (recent >= settings.annoyedThreshold) category = 'user.spam';
        }
        if (category === null && settings.categories['task.acknowledge']) {
          category = 'task.acknowledge';
        }
        if (settings.silentWindowSeconds > 0) {
          state.setPromptStart(sessionId, now);
        }
        return quiet(category, 'working');
      }

      case 'Stop': {
        if (settings.suppressSubagentComplete && state.isSubagent(sessionId)) {
          return 'subagent';
        }
        if (settings.silentWindowSeconds > 0) {
          const startedAt = state.takePromptStart(sessionId);
          if (startedAt !== null && now - startedAt < settings.silentWindowSeconds) {
            return quiet(null, 'done');
          }
        }
        return alert('task.complete', 'done', 'blue', `${project}  —  Task complete`);
      }

      case 'Notification':
        if (event.notificationType === 'permission_prompt') {
          return { ...quiet(null, 'needs approval'), marker: true };
        }
        if (event.notificationType === 'idle_prompt') {
          return alert(null, 'done', 'yellow', `${project}  —  Waiting for input`);
        }
        return 'unknown_notification';

      case 'PermissionRequest':
        return alert('input.required', 'needs approval', 'red', `${project}  —  Permission needed`);

      case 'PostToolUseFailure':
        if (event.toolName === SHELL_TOOL_NAME && event.error !== '') {
          return quiet('task.error', 'error');
        }
        return 'non_bash_failure';

      case 'SubagentStart':
        state.recordPendingSubagentPack(pack, now);
        return 'subagent_start';

      case 'PreCompact':
        return quiet('resource.limit', 'working');

      case 'SessionEnd':
        state.clearSession(sessionId);
        return 'session_end';

      case 'unknown':
        return 'unknown_event';
    }
  }
}

function quiet(category: Category | null, status: SessionStatus): Route {
  return { category, status, marker: false, notify: false, notifyColor: null, message: '' };
}

function alert(category: Category | null, status: SessionStatus, color: NotifyColor, message: string): Route {
  return { category, status, marker: true, notify: true, notifyColor: color, message };
}
