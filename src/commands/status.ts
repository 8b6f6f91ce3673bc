import { PRODUCT_NAME } from '../constants.js';
import type { Settings } from '../types/settings.js';
import { ok, type CommandHandler } from './context.js';

export function notificationLabel(settings: Settings): string {
  return settings.desktopNotifications ? settings.notificationStyle : 'off';
}

export const statusCommand: CommandHandler = (ctx) => {
  const settings = ctx.settings.current;
  const installed = ctx.packs.listPacks().map((p) => p.name);

  const lines = [
    `${PRODUCT_NAME} daemon: running`,
    `enabled: ${settings.enabled}`,
    `paused: ${ctx.pause.isPaused()}`,
    `volume: ${settings.volume}`,
    `pack: ${settings.defaultPack}`,
    `rotation: ${settings.packRotationMode} [${settings.packRotation.join(', ')}]`,
    `notifications: ${notificationLabel(settings)}`,
    `installed: ${installed.join(', ')}`,
  ];
  return ok(lines.join('\n'));
};
