import { fail, ok, type CommandHandler } from './context.js';

const DEFAULT_PREVIEW_CATEGORY = 'task.complete';

export const previewCommand: CommandHandler = (ctx, { value }) => {
  const settings = ctx.settings.current;
  const pack = settings.defaultPack;

  if (value === '--list') {
    const categories = ctx.packs.listCategories(pack);
    if (categories.length === 0) {
      return fail(`No categories found for ${pack}`);
    }
    return ok([`Categories for ${pack}:`, ...categories.map((c) => `  ${c}`)].join('\n'));
  }

  const category = value || DEFAULT_PREVIEW_CATEGORY;
  const sound = ctx.packs.pickSound(pack, category, null);
  if (!sound) {
    return fail(`No sounds found for ${category} in ${pack}`);
  }

  ctx.player.play(sound.path, settings.volume);
  return ok(`Playing ${category} from ${pack}`);
};
