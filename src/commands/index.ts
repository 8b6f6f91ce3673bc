import { PRODUCT_NAME } from '../constants.js';
import type { CliRequest } from '../types/protocol.js';
import { fail, type CommandContext, type CommandHandler, type CommandResult } from './context.js';
import { historyCommand } from './history.js';
import { notificationsCommand } from './notifications.js';
import { packsCommand } from './packs.js';
import { pauseCommand, resumeCommand, toggleCommand } from './pause.js';
import { pingCommand } from './ping.js';
import { previewCommand } from './preview.js';
import { rotationCommand } from './rotation.js';
import { statusCommand } from './status.js';
import { volumeCommand } from './volume.js';

export const COMMANDS = {
  status: statusCommand,
  pause: pauseCommand,
  resume: resumeCommand,
  toggle: toggleCommand,
  volume: volumeCommand,
  preview: previewCommand,
  packs: packsCommand,
  notifications: notificationsCommand,
  rotation: rotationCommand,
  history: historyCommand,
  ping: pingCommand,
} satisfies Record<string, CommandHandler>;

export type Verb = keyof typeof COMMANDS;

export function isVerb(name: string): name is Verb {
  return Object.prototype.hasOwnProperty.call(COMMANDS, name);
}

export function runCommand(ctx: CommandContext, request: CliRequest): CommandResult {
  if (!isVerb(request.verb)) {
    return fail(`Unknown command: ${request.verb}. Run '${PRODUCT_NAME} help' for usage.`);
  }
  return COMMANDS[request.verb](ctx, request);
}

export type { CommandContext, CommandResult } from './context.js';
