import { existsSync, rmSync, writeFileSync } from 'fs';
import { logger } from '../utils/logger.js';

/**
 * Presence of the marker file pauses sounds and notifications without
 * touching the `enabled` config flag.
 */
export class PauseMarker {
  constructor(readonly path: string) {}

  isPaused(): boolean {
    return existsSync(this.path);
  }

  pause(): void {
    try {
      writeFileSync(this.path, '');
    } catch (error) {
      logger.warn({ path: this.path, error }, 'Failed to create pause marker');
    }
  }

  resume(): void {
    try {
      rmSync(this.path, { force: true });
    } catch (error) {
      logger.warn({ path: this.path, error }, 'Failed to remove pause marker');
    }
  }

  /** Flip the paused state and return the new one. */
  toggle(): boolean {
    if (this.isPaused()) {
      this.resume();
    } else {
      this.pause();
    }
    return this.isPaused();
  }
}
