import { PRODUCT_NAME } from '../constants.js';
import { ok, type CommandHandler } from './context.js';

const PAUSED_TEXT = `${PRODUCT_NAME}: sounds paused`;
const RESUMED_TEXT = `${PRODUCT_NAME}: sounds resumed`;

export const pauseCommand: CommandHandler = (ctx) => {
  ctx.pause.pause();
  ctx.player.stop();
  return ok(PAUSED_TEXT);
};

export const resumeCommand: CommandHandler = (ctx) => {
  ctx.pause.resume();
  return ok(RESUMED_TEXT);
};

export const toggleCommand: CommandHandler = (ctx) => {
  const paused = ctx.pause.toggle();
  if (paused) ctx.player.stop();
  return ok(paused ? PAUSED_TEXT : RESUMED_TEXT);
};
