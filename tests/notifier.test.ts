import { EventEmitter } from 'events';
import { writeFileSync } from 'fs';
import { join } from 'path';
import { describe, it, expect, vi } from 'vitest';
import { DesktopNotifier, PopupSlots, type NotificationRequest } from '../src/services/notifier.js';
import { isTerminalFocused, parseFrontmost } from '../src/services/focus.js';
import type { SpawnFn } from '../src/services/spawn.js';
import { tempDir } from './helpers.js';

function fakeSpawn() {
  const children: Array<EventEmitter & { kill: () => boolean }> = [];
  const calls: Array<[string, readonly string[]]> = [];
  const spawnFn: SpawnFn = (command, args) => {
    calls.push([command, args]);
    const child = Object.assign(new EventEmitter(), { kill: vi.fn(() => true) });
    children.push(child);
    return child;
  };
  return { spawnFn, calls, children };
}

const request: NotificationRequest = {
  message: 'webapp  —  Task complete',
  title: '● webapp: done',
  color: 'blue',
  iconPath: '/packs/peon/icon.png',
  style: 'overlay',
  bundleId: 'com.example.term',
  idePid: '99',
};

describe('PopupSlots', () => {
  it('hands out the lowest free slot', () => {
    const slots = new PopupSlots(3);
    expect([slots.acquire(), slots.acquire()]).toEqual([0, 1]);
    slots.release(0);
    expect(slots.acquire()).toBe(0);
    expect(slots.acquire()).toBe(2);
  });

  it('gives up when every slot is fresh and reclaims stale ones', () => {
    let now = 0;
    const slots = new PopupSlots(2, 60_000, () => now);
    slots.acquire();
    now = 30_000;
    slots.acquire();

    now = 50_000;
    expect(slots.acquire()).toBeNull();

    now = 61_000;
    expect(slots.acquire()).toBe(0);
    expect(slots.inUse).toBe(2);
  });
});

describe('isTerminalFocused', () => {
  it('matches the sending app or a known terminal', () => {
    expect(isTerminalFocused({ bundleId: 'com.example.term', name: 'Example' }, 'com.example.term')).toBe(true);
    expect(isTerminalFocused({ bundleId: 'com.googlecode.iterm2', name: 'iTerm2' }, '')).toBe(true);
    expect(isTerminalFocused({ bundleId: 'com.apple.Safari', name: 'Safari' }, 'com.example.term')).toBe(false);
    expect(isTerminalFocused(null, 'com.example.term')).toBe(false);
  });

  it('parses the probe output', () => {
    expect(parseFrontmost('com.apple.Safari\nSafari\n')).toEqual({ bundleId: 'com.apple.Safari', name: 'Safari' });
    expect(parseFrontmost('\n')).toBeNull();
  });
});

describe('DesktopNotifier', () => {
  const unfocused = async () => ({ bundleId: 'com.apple.Safari', name: 'Safari' });

  it('shows an overlay popup in a slot and frees it when the popup closes', async () => {
    const overlayScript = join(tempDir(), 'mac-overlay.js');
    writeFileSync(overlayScript, '');
    const { spawnFn, calls, children } = fakeSpawn();
    const notifier = new DesktopNotifier({ overlayScript, spawnFn, probe: unfocused, platform: 'darwin' });

    await notifier.deliver(request);

    expect(calls).toEqual([
      [
        'osascript',
        ['-l', 'JavaScript', overlayScript, request.message, 'blue', '/packs/peon/icon.png', '0', '4', 'com.example.term', '99'],
      ],
    ]);
    expect(notifier.slots.inUse).toBe(1);
    children[0]?.emit('close');
    expect(notifier.slots.inUse).toBe(0);
  });

  it('falls back to a standard notification without the overlay script', async () => {
    const { spawnFn, calls } = fakeSpawn();
    const notifier = new DesktopNotifier({
      overlayScript: join(tempDir(), 'missing.js'),
      spawnFn,
      probe: unfocused,
      platform: 'darwin',
    });

    await notifier.deliver({ ...request, message: 'say "hi"' });

    expect(calls).toEqual([['osascript', ['-e', 'display notification "say \\"hi\\"" with title "● webapp: done"']]]);
  });

  it('uses notify-send on linux', async () => {
    const { spawnFn, calls } = fakeSpawn();
    const notifier = new DesktopNotifier({ overlayScript: '/none', spawnFn, probe: async () => null, platform: 'linux' });

    await notifier.deliver({ ...request, style: 'standard' });

    expect(calls).toEqual([['notify-send', ['--app-name', 'hookchime', '● webapp: done', request.message]]]);
  });

  it('stays quiet while the terminal is focused', async () => {
    const { spawnFn, calls } = fakeSpawn();
    const notifier = new DesktopNotifier({
      overlayScript: '/none',
      spawnFn,
      probe: async () => ({ bundleId: 'com.example.term', name: 'Example' }),
      platform: 'linux',
    });

    await notifier.deliver(request);

    expect(calls).toEqual([]);
  });

  it('never throws when the helper cannot be spawned', async () => {
    const notifier = new DesktopNotifier({
      overlayScript: '/none',
      spawnFn: () => {
        throw new Error('ENOENT');
      },
      probe: async () => null,
      platform: 'linux',
    });
    await expect(notifier.deliver(request)).resolves.toBeUndefined();
  });

  it('releases the slot when the popup process errors', async () => {
    const overlayScript = join(tempDir(), 'mac-overlay.js');
    writeFileSync(overlayScript, '');
    const { spawnFn, children } = fakeSpawn();
    const notifier = new DesktopNotifier({ overlayScript, spawnFn, probe: unfocused, platform: 'darwin' });

    await notifier.deliver(request);
    children[0]?.emit('error', new Error('spawn osascript ENOENT'));

    expect(notifier.slots.inUse).toBe(0);
  });
});
