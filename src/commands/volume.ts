import { ok, type CommandHandler } from './context.js';

const format = (volume: number): string => `volume: ${volume.toFixed(2)}`;

/** `volume` reports; `volume <v>` clamps to [0, 1] and writes two decimals. */
export const volumeCommand: CommandHandler = (ctx, { value }) => {
  const requested = value.trim() === '' ? NaN : Number(value);
  if (!Number.isFinite(requested)) {
    return ok(format(ctx.settings.current.volume));
  }

  const clamped = Math.max(0, Math.min(1, requested));
  ctx.settings.update({ volume: Math.round(clamped * 100) / 100 });
  return ok(format(clamped));
};
