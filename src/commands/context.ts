import type { PackCatalog } from '../core/pack-catalog.js';
import type { PauseMarker } from '../core/pause-marker.js';
import type { SettingsStore } from '../core/settings.js';
import type { StateStore } from '../core/state-store.js';
import type { DispatchLog } from '../db/history-repository.js';
import type { SoundPlayer } from '../services/sound-player.js';
import type { CliRequest } from '../types/protocol.js';

/** Everything a verb may read or change. Verbs run inside the serialized path. */
export interface CommandContext {
  readonly settings: SettingsStore;
  readonly packs: PackCatalog;
  readonly state: StateStore;
  readonly pause: PauseMarker;
  readonly player: SoundPlayer;
  readonly history: DispatchLog;
}

export interface CommandResult {
  readonly ok: boolean;
  readonly text: string;
}

export type CommandArgs = Omit<CliRequest, 'kind' | 'verb'>;

export type CommandHandler = (ctx: CommandContext, args: CommandArgs) => CommandResult;

export const ok = (text: string): CommandResult => ({ ok: true, text });
export const fail = (text: string): CommandResult => ({ ok: false, text });
