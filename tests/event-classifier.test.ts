import { join } from 'path';
import { describe, it, expect } from 'vitest';
import { EventClassifier, projectLabel, type Decision, type Dispatch } from '../src/core/event-classifier.js';
import { PackResolver } from '../src/core/pack-resolver.js';
import { StateStore } from '../src/core/state-store.js';
import type { HookEvent } from '../src/types/hook.js';
import type { Settings } from '../src/types/settings.js';
import { DEFAULT_CATEGORIES } from '../src/core/settings.js';
import { T0, hookEvent, sequenceRandom, settingsWith, tempDir, testClock } from './helpers.js';

function setup(settings: Settings = settingsWith()) {
  const clock = testClock();
  const state = new StateStore(join(tempDir(), '.state.json'), clock);
  const resolver = new PackResolver({ packExists: (name) => name === 'peon' }, state, sequenceRandom(0));
  const classifier = new EventClassifier({ state, resolver, clock });
  const at = (t: number, event: HookEvent, with_: Settings = settings): Decision => {
    clock.set(T0 + t);
    return classifier.classify(event, with_);
  };
  return { clock, state, classifier, at };
}

function expectDispatch(decision: Decision): Dispatch {
  if (decision.kind !== 'dispatch') {
    throw new Error(`expected a dispatch, got skip ${decision.reason}`);
  }
  return decision;
}

describe('projectLabel', () => {
  it('uses the sanitized directory name', () => {
    expect(projectLabel('/home/dev/webapp')).toBe('webapp');
    expect(projectLabel('/home/dev/my app!')).toBe('my app');
    expect(projectLabel('/')).toBe('claude');
    expect(projectLabel('')).toBe('claude');
  });
});

describe('EventClassifier', () => {
  it('skips everything when disabled', () => {
    const { at } = setup(settingsWith({ enabled: false }));
    expect(at(0, hookEvent('Stop'))).toEqual({ kind: 'skip', reason: 'disabled' });
  });

  it('routes session start to a ready tab', () => {
    const { at } = setup();
    expect(at(0, hookEvent('SessionStart'))).toEqual({
      kind: 'dispatch',
      pack: 'peon',
      project: 'webapp',
      category: 'session.start',
      status: 'ready',
      marker: false,
      notify: false,
      notifyColor: null,
      message: '',
    });
  });

  it('records the last active session', () => {
    const { at, state } = setup();
    at(2, hookEvent('UserPromptSubmit'));
    expect(state.lastActive).toEqual({
      sessionId: 's1',
      pack: 'peon',
      timestamp: T0 + 2,
      event: 'UserPromptSubmit',
      cwd: '/home/dev/projects/webapp',
    });
  });

  describe('spam detection', () => {
    it('flags the third prompt inside the window and resets after it', () => {
      const { at } = setup();
      const category = (t: number) => expectDispatch(at(t, hookEvent('UserPromptSubmit'))).category;
      expect(category(0)).toBeNull();
      expect(category(4)).toBeNull();
      expect(category(8)).toBe('user.spam');
      expect(category(25)).toBeNull();
    });

    it('acknowledges prompts when that category is on', () => {
      const { at } = setup(settingsWith({ categories: { ...DEFAULT_CATEGORIES, 'task.acknowledge': true } }));
      const decision = expectDispatch(at(0, hookEvent('UserPromptSubmit')));
      expect(decision.category).toBe('task.acknowledge');
      expect(decision.status).toBe('working');
    });
  });

  describe('stop debounce', () => {
    it('drops a completion within five seconds of the last accepted one, across sessions', () => {
      const { at } = setup();
      const first = expectDispatch(at(0, hookEvent('Stop', { sessionId: 'a' })));
      const second = expectDispatch(at(3, hookEvent('Stop', { sessionId: 'b' })));
      const third = expectDispatch(at(6, hookEvent('Stop', { sessionId: 'c' })));

      expect(first.category).toBe('task.complete');
      expect(first.notify).toBe(true);
      expect(first.message).toBe('webapp  —  Task complete');
      expect(second.category).toBeNull();
      expect(second.notify).toBe(false);
      expect(second.status).toBe('done');
      expect(third.category).toBe('task.complete');
    });
  });

  describe('replay suppression', () => {
    it('silences events shortly after session start', () => {
      const { at } = setup();
      at(0, hookEvent('SessionStart'));

      const early = expectDispatch(at(1, hookEvent('PermissionRequest')));
      expect(early.category).toBeNull();
      expect(early.notify).toBe(false);
      expect(early.status).toBe('needs approval');

      const later = expectDispatch(at(4, hookEvent('PermissionRequest')));
      expect(later.category).toBe('input.required');
      expect(later.notify).toBe(true);
      expect(later.notifyColor).toBe('red');
    });

    it('skips a compaction restart without touching state', () => {
      const { at, state } = setup();
      expect(at(0, hookEvent('SessionStart', { source: 'compact' }))).toEqual({ kind: 'skip', reason: 'compact' });
      expect(state.lastActive).toBeNull();
      expect(state.getSessionStart('s1')).toBeNull();
    });
  });

  describe('agent gating', () => {
    it('ignores every event of a delegated session', () => {
      const { at, state } = setup();
      const agent = { kind: 'skip', reason: 'agent' };

      expect(at(0, hookEvent('SessionStart', { permissionMode: 'delegate' }))).toEqual(agent);
      expect(at(10, hookEvent('Stop'))).toEqual(agent);
      expect(at(20, hookEvent('PostToolUseFailure', { toolName: 'Bash', error: 'exit 1' }))).toEqual(agent);
      expect(state.isAgent('s1')).toBe(true);

      expect(at(30, hookEvent('SessionEnd'))).toEqual(agent);
      expect(state.isAgent('s1')).toBe(true);
      expect(state.lastStopTime).toBe(0);
    });

    it('keeps a delegated session silent after it ends', () => {
      const { at, state } = setup();
      const agent = { kind: 'skip', reason: 'agent' };

      expect(at(0, hookEvent('SessionStart', { sessionId: 'ag', permissionMode: 'delegate' }))).toEqual(agent);
      expect(at(10, hookEvent('SessionEnd', { sessionId: 'ag' }))).toEqual(agent);
      expect(at(20, hookEvent('Stop', { sessionId: 'ag' }))).toEqual(agent);
      expect(at(30, hookEvent('UserPromptSubmit', { sessionId: 'ag' }))).toEqual(agent);
      expect(state.lastStopTime).toBe(0);
    });
  });

  describe('silent window', () => {
    it('keeps quick tasks quiet and announces slow ones', () => {
      const { at } = setup(settingsWith({ silentWindowSeconds: 10 }));

      at(0, hookEvent('UserPromptSubmit'));
      const quick = expectDispatch(at(5, hookEvent('Stop')));
      expect(quick.category).toBeNull();
      expect(quick.notify).toBe(false);
      expect(quick.marker).toBe(false);
      expect(quick.status).toBe('done');

      at(8, hookEvent('UserPromptSubmit'));
      const slow = expectDispatch(at(20, hookEvent('Stop')));
      expect(slow.category).toBe('task.complete');
      expect(slow.marker).toBe(true);
    });
  });

  it('suppresses subagent completions when configured', () => {
    const { at, state } = setup(settingsWith({ suppressSubagentComplete: true }));
    state.markSubagent('child', T0);
    expect(at(0, hookEvent('Stop', { sessionId: 'child' }))).toEqual({ kind: 'skip', reason: 'subagent' });
    expect(expectDispatch(at(10, hookEvent('Stop', { sessionId: 'parent' }))).category).toBe('task.complete');
  });

  describe('notifications', () => {
    it('marks the tab on a permission prompt without notifying', () => {
      const { at } = setup();
      const decision = expectDispatch(at(0, hookEvent('Notification', { notificationType: 'permission_prompt' })));
      expect(decision).toMatchObject({ category: null, status: 'needs approval', marker: true, notify: false });
    });

    it('notifies in yellow when idle', () => {
      const { at } = setup();
      const decision = expectDispatch(at(0, hookEvent('Notification', { notificationType: 'idle_prompt' })));
      expect(decision).toMatchObject({
        category: null,
        status: 'done',
        notify: true,
        notifyColor: 'yellow',
        message: 'webapp  —  Waiting for input',
      });
    });

    it('skips other notification types', () => {
      const { at } = setup();
      expect(at(0, hookEvent('Notification', { notificationType: 'auth_success' }))).toEqual({
        kind: 'skip',
        reason: 'unknown_notification',
      });
    });
  });

  describe('tool failures', () => {
    it('reports failed shell commands', () => {
      const { at } = setup();
      const decision = expectDispatch(at(0, hookEvent('PostToolUseFailure', { toolName: 'Bash', error: 'exit 2' })));
      expect(decision).toMatchObject({ category: 'task.error', status: 'error', notify: false });
    });

    it('ignores other tools and empty errors', () => {
      const { at } = setup();
      const skip = { kind: 'skip', reason: 'non_bash_failure' };
      expect(at(0, hookEvent('PostToolUseFailure', { toolName: 'Read', error: 'ENOENT' }))).toEqual(skip);
      expect(at(1, hookEvent('PostToolUseFailure', { toolName: 'Bash', error: '' }))).toEqual(skip);
    });
  });

  it('records the parent pack on subagent start', () => {
    const { at, state } = setup();
    expect(at(0, hookEvent('SubagentStart'))).toEqual({ kind: 'skip', reason: 'subagent_start' });
    expect(state.readPendingSubagentPack(T0 + 1)).toBe('peon');
  });

  it('treats compaction as a resource limit', () => {
    const { at } = setup();
    expect(expectDispatch(at(0, hookEvent('PreCompact')))).toMatchObject({ category: 'resource.limit', status: 'working' });
  });

  it('clears session bookkeeping on session end', () => {
    const { at, state } = setup();
    at(0, hookEvent('SessionStart'));
    expect(at(5, hookEvent('SessionEnd'))).toEqual({ kind: 'skip', reason: 'session_end' });
    expect(state.getSessionStart('s1')).toBeNull();
  });

  it('skips unknown events', () => {
    const { at } = setup();
    expect(at(0, hookEvent('TeammateIdle'))).toEqual({ kind: 'skip', reason: 'unknown_event' });
  });

  it('drops disabled categories but keeps the tab update', () => {
    const { at } = setup(settingsWith({ categories: { ...DEFAULT_CATEGORIES, 'task.complete': false } }));
    const decision = expectDispatch(at(0, hookEvent('Stop')));
    expect(decision.category).toBeNull();
    expect(decision.notify).toBe(true);
    expect(decision.status).toBe('done');
  });
});
