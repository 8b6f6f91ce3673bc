import { ok, type CommandHandler } from './context.js';

export const pingCommand: CommandHandler = () => ok('pong');
