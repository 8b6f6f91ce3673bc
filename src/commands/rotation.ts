import { ROTATION_MODES } from '../types/settings.js';
import { fail, ok, type CommandHandler } from './context.js';

export const rotationCommand: CommandHandler = (ctx, { value }) => {
  if (!value) return ok(`rotation: ${ctx.settings.current.packRotationMode}`);

  const mode = ROTATION_MODES.find((m) => m === value);
  if (!mode) return fail(`Valid modes: ${ROTATION_MODES.join(', ')}`);

  ctx.settings.update({ pack_rotation_mode: mode });
  return ok(`rotation: ${mode}`);
};
