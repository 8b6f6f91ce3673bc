import { PRODUCT_NAME } from '../constants.js';
import { fail, ok, type CommandHandler } from './context.js';
import { notificationLabel } from './status.js';

export const notificationsCommand: CommandHandler = (ctx, { value }) => {
  switch (value) {
    case '':
      return ok(`notifications: ${notificationLabel(ctx.settings.current)}`);
    case 'on':
      ctx.settings.update({ desktop_notifications: true });
      return ok('notifications: on');
    case 'off':
      ctx.settings.update({ desktop_notifications: false });
      return ok('notifications: off');
    case 'overlay':
    case 'standard':
      ctx.settings.update({ desktop_notifications: true, notification_style: value });
      return ok(`notifications: ${value}`);
    default:
      return fail(`Usage: ${PRODUCT_NAME} notifications [on|off|overlay|standard]`);
  }
};
