import { existsSync } from 'fs';
import { POPUP_DISMISS_SECONDS, POPUP_SLOT_COUNT, POPUP_STALE_SLOT_MS, PRODUCT_NAME } from '../constants.js';
import type { NotifyColor } from '../core/event-classifier.js';
import type { NotificationStyle } from '../types/settings.js';
import { logger } from '../utils/logger.js';
import { isTerminalFocused, probeFrontmostApp, type FrontmostProbe } from './focus.js';
import { spawnQuiet, type SpawnFn } from './spawn.js';

export interface NotificationRequest {
  readonly message: string;
  readonly title: string;
  readonly color: NotifyColor;
  readonly iconPath: string | null;
  readonly style: NotificationStyle;
  /** App that sent the hook event; a focused sender gets no popup. */
  readonly bundleId: string;
  readonly idePid: string;
}

export interface Notifier {
  /** Request a popup. Never throws and never waits for delivery. */
  notify(request: NotificationRequest): void;
}

/**
 * Vertical positions for stacked overlay popups. A slot is held while its
 * popup is on screen; slots held longer than `staleMs` are presumed
 * orphaned and reclaimed.
 */
export class PopupSlots {
  private readonly taken = new Map<number, number>();

  constructor(
    readonly size: number = POPUP_SLOT_COUNT,
    private readonly staleMs: number = POPUP_STALE_SLOT_MS,
    private readonly now: () => number = Date.now,
  ) {}

  get inUse(): number {
    return this.taken.size;
  }

  acquire(): number | null {
    let slot = this.firstFree();
    if (slot === null) {
      const cutoff = this.now() - this.staleMs;
      for (const [index, since] of this.taken) {
        if (since < cutoff) this.taken.delete(index);
      }
      slot = this.firstFree();
    }
    if (slot !== null) this.taken.set(slot, this.now());
    return slot;
  }

  release(slot: number): void {
    this.taken.delete(slot);
  }

  private firstFree(): number | null {
    for (let slot = 0; slot < this.size; slot++) {
      if (!this.taken.has(slot)) return slot;
    }
    return null;
  }
}

function appleScriptString(value: string): string {
  return `"${value.replace(/\\/g, '\\\\').replace(/"/g, '\\"')}"`;
}

export interface DesktopNotifierOptions {
  readonly overlayScript: string;
  readonly spawnFn?: SpawnFn;
  readonly probe?: FrontmostProbe;
  readonly platform?: NodeJS.Platform;
  readonly slots?: PopupSlots;
}

export class DesktopNotifier implements Notifier {
  private readonly overlayScript: string;
  private readonly spawnFn: SpawnFn;
  private readonly probe: FrontmostProbe;
  private readonly platform: NodeJS.Platform;
  readonly slots: PopupSlots;

  constructor(options: DesktopNotifierOptions) {
    this.overlayScript = options.overlayScript;
    this.spawnFn = options.spawnFn ?? spawnQuiet;
    this.probe = options.probe ?? probeFrontmostApp;
    this.platform = options.platform ?? process.platform;
    this.slots = options.slots ?? new PopupSlots();
  }

  notify(request: NotificationRequest): void {
    this.deliver(request).catch((error: unknown) => {
      logger.debug({ error }, 'Notification delivery failed');
    });
  }

  /** Resolves once the popup process has been started (or skipped). */
  async deliver(request: NotificationRequest): Promise<void> {
    const frontmost = await this.probe();
    if (isTerminalFocused(frontmost, request.bundleId)) {
      logger.debug({ app: frontmost?.name }, 'Terminal focused, skipping notification');
      return;
    }

    if (request.style === 'overlay' && this.platform === 'darwin' && existsSync(this.overlayScript)) {
      this.showOverlay(request);
    } else {
      this.showStandard(request);
    }
  }

  private showOverlay(request: NotificationRequest): void {
    const slot = this.slots.acquire();
    if (slot === null) {
      logger.debug('No free popup slot, dropping notification');
      return;
    }

    const args = [
      '-l',
      'JavaScript',
      this.overlayScript,
      request.message,
      request.color,
      request.iconPath ?? '',
      String(slot),
      String(POPUP_DISMISS_SECONDS),
      request.bundleId,
      request.idePid,
    ];
    const release = (): void => this.slots.release(slot);
    this.run('osascript', args, release);
  }

  private showStandard(request: NotificationRequest): void {
    switch (this.platform) {
      case 'darwin':
        this.run('osascript', [
          '-e',
          `display notification ${appleScriptString(request.message)} with title ${appleScriptString(request.title)}`,
        ]);
        return;
      case 'linux':
        this.run('notify-send', ['--app-name', PRODUCT_NAME, request.title, request.message]);
        return;
      default:
        logger.debug({ platform: this.platform }, 'No notification backend for platform');
    }
  }

  private run(bin: string, args: readonly string[], onDone?: () => void): void {
    let finished = false;
    const done = (): void => {
      if (finished) return;
      finished = true;
      onDone?.();
    };

    try {
      const child = this.spawnFn(bin, args);
      child.once('error', (error) => {
        logger.debug({ bin, error }, 'Notification process failed');
        done();
      });
      child.once('close', done);
    } catch (error) {
      logger.debug({ bin, error }, 'Notification process failed to start');
      done();
    }
  }
}
