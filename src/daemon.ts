import { join } from 'path';
import type { DaemonPaths } from './config.js';
import { OVERLAY_SCRIPT, PACKS_DIR, PAUSE_MARKER_FILE } from './constants.js';
import { EventClassifier } from './core/event-classifier.js';
import { EventProcessor } from './core/event-processor.js';
import { PackCatalog } from './core/pack-catalog.js';
import { PackResolver } from './core/pack-resolver.js';
import { PauseMarker } from './core/pause-marker.js';
import { SerialQueue } from './core/serial-queue.js';
import { SettingsStore } from './core/settings.js';
import { StateStore } from './core/state-store.js';
import { closeDatabase, initDatabase } from './db/database.js';
import { sqliteDispatchLog, type DispatchLog } from './db/history-repository.js';
import { SocketServer } from './server.js';
import { DesktopNotifier, type Notifier } from './services/notifier.js';
import { ProcessSoundPlayer, type SoundPlayer } from './services/sound-player.js';
import { systemClock, systemRandom, type Clock, type RandomSource } from './types/runtime.js';
import { logger } from './utils/logger.js';
import { ConfigWatcher } from './watcher.js';

export interface DaemonOptions {
  readonly paths: DaemonPaths;
  readonly flushIntervalSeconds: number;
  readonly clock?: Clock;
  readonly random?: RandomSource;
  readonly player?: SoundPlayer;
  readonly notifier?: Notifier;
  /** Defaults to the SQLite log at `paths.historyDbPath`. */
  readonly history?: DispatchLog;
}

const unavailableHistory: DispatchLog = {
  record: () => undefined,
  recent: () => {
    throw new Error('History database unavailable');
  },
  prune: () => 0,
};

function openHistory(path: string): DispatchLog {
  try {
    initDatabase(path);
    return sqliteDispatchLog;
  } catch (error) {
    logger.warn({ path, error }, 'History database unavailable, dispatches will not be recorded');
    return unavailableHistory;
  }
}

/**
 * Wires the stores, the processor and the socket server together. Requests,
 * config reloads and flushes all run through one {@link SerialQueue}.
 */
export class Daemon {
  readonly queue = new SerialQueue();
  readonly processor: EventProcessor;
  readonly server: SocketServer;
  private readonly watcher: ConfigWatcher;
  private readonly ownsHistoryDb: boolean;
  private flushTimer: NodeJS.Timeout | null = null;

  constructor(private readonly options: DaemonOptions) {
    const { paths } = options;
    const clock = options.clock ?? systemClock;
    const random = options.random ?? systemRandom;

    const settings = new SettingsStore(paths.configPath);
    const state = StateStore.open(paths.statePath, clock);
    const packs = new PackCatalog(join(paths.workDir, PACKS_DIR), random);
    const resolver = new PackResolver(packs, state, random);

    this.ownsHistoryDb = options.history === undefined;
    const history = options.history ?? openHistory(paths.historyDbPath);

    this.processor = new EventProcessor({
      settings,
      packs,
      state,
      pause: new PauseMarker(join(paths.workDir, PAUSE_MARKER_FILE)),
      classifier: new EventClassifier({ state, resolver, clock }),
      player: options.player ?? new ProcessSoundPlayer(),
      notifier: options.notifier ?? new DesktopNotifier({ overlayScript: join(paths.workDir, OVERLAY_SCRIPT) }),
      history,
      clock,
    });

    this.server = new SocketServer({
      socketPath: paths.socketPath,
      handler: (request) => this.queue.run(() => this.processor.handle(request)),
    });

    this.watcher = new ConfigWatcher(paths.configPath, () => {
      this.queue
        .run(() => this.processor.reloadSettings())
        .catch((error: unknown) => logger.error({ error }, 'Config reload failed'));
    });
  }

  async start(): Promise<void> {
    await this.server.start();
    this.watcher.start();

    this.flushTimer = setInterval(() => {
      this.flush().catch((error: unknown) => logger.error({ error }, 'Periodic flush failed'));
    }, this.options.flushIntervalSeconds * 1000);

    logger.info({ workDir: this.options.paths.workDir }, 'Daemon started');
  }

  flush(): Promise<void> {
    return this.queue.run(() => this.processor.flush());
  }

  /**
   * Stop the timer and watcher, close the socket, then flush whatever the
   * queue still holds and close the history db.
   */
  async stop(): Promise<void> {
    if (this.flushTimer) {
      clearInterval(this.flushTimer);
      this.flushTimer = null;
    }
    await this.watcher.close();
    await this.server.stop();
    await this.flush();
    if (this.ownsHistoryDb) closeDatabase();
    logger.info('Daemon stopped');
  }
}
