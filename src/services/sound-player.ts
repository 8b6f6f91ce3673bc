import { logger } from '../utils/logger.js';
import { spawnQuiet, type SpawnFn, type SpawnedProcess } from './spawn.js';

export interface SoundPlayer {
  /** Start playback and return immediately. */
  play(path: string, volume: number): void;
  stop(): void;
}

const PULSE_FULL_VOLUME = 65536;

/** Player command for a platform, or null where none is known. */
export function playerCommand(platform: NodeJS.Platform, path: string, volume: number): [string, string[]] | null {
  switch (platform) {
    case 'darwin':
      return ['afplay', ['-v', volume.toFixed(2), path]];
    case 'linux':
      return ['paplay', [`--volume=${Math.round(volume * PULSE_FULL_VOLUME)}`, path]];
    default:
      return null;
  }
}

/** One sound at a time: a new play cuts the previous one off. */
export class ProcessSoundPlayer implements SoundPlayer {
  private current: SpawnedProcess | null = null;

  constructor(
    private readonly spawnFn: SpawnFn = spawnQuiet,
    private readonly platform: NodeJS.Platform = process.platform,
  ) {}

  play(path: string, volume: number): void {
    const command = playerCommand(this.platform, path, volume);
    if (!command) {
      logger.debug({ platform: this.platform }, 'No audio player for platform');
      return;
    }

    this.stop();
    const [bin, args] = command;
    try {
      const child = this.spawnFn(bin, args);
      child.once('error', (error) => {
        logger.debug({ bin, error }, 'Audio player failed');
      });
      child.once('close', () => {
        if (this.current === child) this.current = null;
      });
      this.current = child;
    } catch (error) {
      logger.debug({ bin, error }, 'Audio player failed to start');
    }
  }

  stop(): void {
    if (this.current) {
      this.current.kill();
      this.current = null;
    }
  }
}
