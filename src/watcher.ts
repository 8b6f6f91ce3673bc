import { watch, type FSWatcher } from 'chokidar';
import { logger } from './utils/logger.js';

/** Calls `onChange` whenever the config file is written, replaced or created. */
export class ConfigWatcher {
  private watcher: FSWatcher | null = null;

  constructor(
    readonly path: string,
    private readonly onChange: () => void,
  ) {}

  start(): void {
    if (this.watcher) return;
    this.watcher = watch(this.path, {
      ignoreInitial: true,
      awaitWriteFinish: { stabilityThreshold: 100, pollInterval: 50 },
    });

    this.watcher
      .on('add', () => this.onChange())
      .on('change', () => this.onChange())
      .on('error', (error: unknown) => {
        logger.warn({ path: this.path, error }, 'Config watcher error');
      });
    logger.debug({ path: this.path }, 'Watching config');
  }

  async close(): Promise<void> {
    if (!this.watcher) return;
    const watcher = this.watcher;
    this.watcher = null;
    await watcher.close();
  }
}
