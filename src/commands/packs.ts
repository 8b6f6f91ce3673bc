import { PRODUCT_NAME } from '../constants.js';
import { fail, ok, type CommandArgs, type CommandContext, type CommandHandler, type CommandResult } from './context.js';

function listPacks(ctx: CommandContext): CommandResult {
  const settings = ctx.settings.current;
  const packs = ctx.packs.listPacks();
  if (packs.length === 0) return ok('No packs installed');

  const lines = packs.map((p) => {
    const active = p.name === settings.defaultPack ? ' *' : '';
    const inRotation = settings.packRotation.includes(p.name) ? ' [rotation]' : '';
    return `  ${p.name} (${p.displayName}, ${p.soundCount} sounds)${active}${inRotation}`;
  });
  return ok(['Installed packs:', ...lines].join('\n'));
}

function usePack(ctx: CommandContext, name: string): CommandResult {
  if (!name) return fail(`Usage: ${PRODUCT_NAME} packs use <name>`);
  if (!ctx.packs.packExists(name)) return fail(`Pack '${name}' not found`);
  ctx.settings.update({ default_pack: name });
  return ok(`Active pack: ${name}`);
}

function nextPack(ctx: CommandContext): CommandResult {
  const names = ctx.packs.listPacks().map((p) => p.name);
  if (names.length <= 1) return fail('Only one pack installed');

  const current = Math.max(0, names.indexOf(ctx.settings.current.defaultPack));
  const next = names[(current + 1) % names.length];
  if (next === undefined) return fail('No packs installed');
  ctx.settings.update({ default_pack: next });
  return ok(`Active pack: ${next}`);
}

const rotationText = (rotation: readonly string[]): string =>
  rotation.length === 0 ? '(empty)' : rotation.join(', ');

function rotation(ctx: CommandContext, sub: string, name: string): CommandResult {
  const current = ctx.settings.current.packRotation;

  switch (sub) {
    case '':
    case 'list':
      return ok(`Rotation list: ${rotationText(current)}`);

    case 'add': {
      if (!name) return fail(`Usage: ${PRODUCT_NAME} packs rotation add <name>`);
      if (!ctx.packs.packExists(name)) return fail(`Pack '${name}' not found`);
      if (current.includes(name)) return ok(`Rotation: ${rotationText(current)}`);
      const updated = [...current, name];
      ctx.settings.update({ pack_rotation: updated });
      return ok(`Rotation: ${rotationText(updated)}`);
    }

    case 'remove': {
      if (!name) return fail(`Usage: ${PRODUCT_NAME} packs rotation remove <name>`);
      const updated = current.filter((p) => p !== name);
      ctx.settings.update({ pack_rotation: updated });
      return ok(`Rotation: ${rotationText(updated)}`);
    }

    default:
      return fail(`Usage: ${PRODUCT_NAME} packs rotation [list|add|remove] [name]`);
  }
}

/** Pin a session (or the process-wide `default` entry) to a pack for the sticky modes. */
function assign(ctx: CommandContext, sessionId: string, name: string): CommandResult {
  if (!sessionId || !name) return fail(`Usage: ${PRODUCT_NAME} packs assign <session|default> <name>`);
  if (!ctx.packs.packExists(name)) return fail(`Pack '${name}' not found`);
  ctx.state.setSessionPack(sessionId, name);
  return ok(`Session ${sessionId}: ${name}`);
}

export const packsCommand: CommandHandler = (ctx, { action, arg, arg2 }: CommandArgs) => {
  switch (action) {
    case '':
    case 'list':
      return listPacks(ctx);
    case 'use':
      return usePack(ctx, arg);
    case 'next':
      return nextPack(ctx);
    case 'rotation':
      return rotation(ctx, arg, arg2);
    case 'assign':
      return assign(ctx, arg, arg2);
    default:
      return fail(`Usage: ${PRODUCT_NAME} packs [list|use|next|rotation|assign] [args]`);
  }
};
