import { EventEmitter } from 'events';
import { describe, it, expect, vi } from 'vitest';
import { playerCommand, ProcessSoundPlayer } from '../src/services/sound-player.js';
import type { SpawnFn } from '../src/services/spawn.js';

describe('playerCommand', () => {
  it('builds afplay and paplay invocations', () => {
    expect(playerCommand('darwin', '/s/a.wav', 0.5)).toEqual(['afplay', ['-v', '0.50', '/s/a.wav']]);
    expect(playerCommand('linux', '/s/a.wav', 0.5)).toEqual(['paplay', ['--volume=32768', '/s/a.wav']]);
    expect(playerCommand('win32', '/s/a.wav', 0.5)).toBeNull();
  });
});

describe('ProcessSoundPlayer', () => {
  it('stops the previous sound before starting the next', () => {
    const kills: Array<() => boolean> = [];
    const spawnFn: SpawnFn = () => {
      const kill = vi.fn(() => true);
      kills.push(kill);
      return Object.assign(new EventEmitter(), { kill });
    };
    const player = new ProcessSoundPlayer(spawnFn, 'linux');

    player.play('/s/a.wav', 1);
    player.play('/s/b.wav', 1);

    expect(kills[0]).toHaveBeenCalledTimes(1);
    expect(kills[1]).not.toHaveBeenCalled();
  });

  it('does not kill a sound that already finished', () => {
    const child = Object.assign(new EventEmitter(), { kill: vi.fn(() => true) });
    const player = new ProcessSoundPlayer(() => child, 'darwin');

    player.play('/s/a.wav', 1);
    child.emit('close');
    player.stop();

    expect(child.kill).not.toHaveBeenCalled();
  });

  it('swallows spawn failures', () => {
    const player = new ProcessSoundPlayer(() => {
      throw new Error('ENOENT');
    }, 'linux');
    expect(() => player.play('/s/a.wav', 1)).not.toThrow();
  });
});
