import { PRODUCT_NAME, SECONDS_PER_DAY } from '../constants.js';
import { runCommand, type CommandContext } from '../commands/index.js';
import type { DispatchLog } from '../db/history-repository.js';
import type { Notifier } from '../services/notifier.js';
import type { SoundPlayer } from '../services/sound-player.js';
import { tabColorFor, tabTitleEscape, tabTitleText } from '../terminal/escapes.js';
import type { HookEvent } from '../types/hook.js';
import type { CliRequest, DaemonRequest, DaemonResponse } from '../types/protocol.js';
import type { Clock } from '../types/runtime.js';
import type { Settings } from '../types/settings.js';
import { logger } from '../utils/logger.js';
import type { Dispatch, EventClassifier } from './event-classifier.js';
import type { PackCatalog, PickedSound } from './pack-catalog.js';
import type { PauseMarker } from './pause-marker.js';
import type { SettingsStore } from './settings.js';
import type { StateStore } from './state-store.js';

export const PAUSED_HINT = `${PRODUCT_NAME}: sounds paused — run '${PRODUCT_NAME} resume' to unpause`;

export interface ProcessorDeps {
  readonly settings: SettingsStore;
  readonly packs: PackCatalog;
  readonly state: StateStore;
  readonly pause: PauseMarker;
  readonly classifier: EventClassifier;
  readonly player: SoundPlayer;
  readonly notifier: Notifier;
  readonly history: DispatchLog;
  readonly clock: Clock;
}

/**
 * Turns decoded requests into responses and side effects. Every method is
 * synchronous and must only be called from the serialized queue.
 */
export class EventProcessor {
  private readonly commands: CommandContext;

  constructor(private readonly deps: ProcessorDeps) {
    this.commands = {
      settings: deps.settings,
      packs: deps.packs,
      state: deps.state,
      pause: deps.pause,
      player: deps.player,
      history: deps.history,
    };
  }

  handle(request: DaemonRequest): DaemonResponse {
    return request.kind === 'cli' ? this.processCli(request) : this.processHook(request.event);
  }

  processCli(request: CliRequest): DaemonResponse {
    const result = runCommand(this.commands, request);
    logger.debug({ verb: request.verb, ok: result.ok }, 'CLI request');
    return { ok: result.ok, text: result.text };
  }

  processHook(event: HookEvent): DaemonResponse {
    const settings = this.deps.settings.current;
    const decision = this.deps.classifier.classify(event, settings);

    if (decision.kind === 'skip') {
      logger.debug({ event: event.rawName, session: event.sessionId, reason: decision.reason }, 'Event skipped');
      return { ok: true, skipped: decision.reason };
    }

    const paused = this.deps.pause.isPaused();
    const sound = decision.category !== null && !paused ? this.playSound(decision, settings) : null;

    const title = tabTitleText(decision.project, decision.status, decision.marker);
    const response: DaemonResponse = { ok: true, tab_title: tabTitleEscape(title) };

    const color = tabColorFor(settings.tabColor, decision.project, decision.status);
    if (color !== null) response.tab_color = color;

    if (decision.notify && !paused && settings.desktopNotifications && decision.message !== '' && decision.notifyColor) {
      this.deps.notifier.notify({
        message: decision.message,
        title,
        color: decision.notifyColor,
        iconPath: sound?.iconPath ?? null,
        style: settings.notificationStyle,
        bundleId: event.bundleId,
        idePid: event.idePid,
      });
    }

    if (paused && event.name === 'SessionStart') {
      response.stderr = PAUSED_HINT;
    }

    this.recordHistory(event, decision, sound);
    return response;
  }

  private playSound(decision: Dispatch, settings: Settings): PickedSound | null {
    if (decision.category === null) return null;
    const { state, packs, player } = this.deps;

    const sound = packs.pickSound(decision.pack, decision.category, state.getLastPlayed(decision.category));
    if (!sound) {
      logger.debug({ pack: decision.pack, category: decision.category }, 'No sound for category');
      return null;
    }

    state.setLastPlayed(decision.category, sound.file);
    player.play(sound.path, settings.volume);
    return sound;
  }

  private recordHistory(event: HookEvent, decision: Dispatch, sound: PickedSound | null): void {
    try {
      this.deps.history.record({
        sessionId: event.sessionId,
        event: event.rawName,
        pack: decision.pack,
        category: decision.category,
        sound: sound?.file ?? null,
        status: decision.status,
        createdAt: Math.floor(this.deps.clock()),
      });
    } catch (error) {
      logger.warn({ error }, 'Failed to record dispatch');
    }
  }

  /** Re-read the config file and drop cached manifests. */
  reloadSettings(): void {
    this.deps.settings.reload();
    this.deps.packs.clearCache();
  }

  /** Write dirty state and drop history older than the session TTL. */
  flush(): void {
    this.deps.state.flushIfDirty();

    const ttlDays = this.deps.settings.current.sessionTtlDays;
    if (ttlDays <= 0) return;
    try {
      const removed = this.deps.history.prune(Math.floor(this.deps.clock()) - ttlDays * SECONDS_PER_DAY);
      if (removed > 0) logger.debug({ removed }, 'Pruned dispatch history');
    } catch (error) {
      logger.warn({ error }, 'Failed to prune dispatch history');
    }
  }
}
