import { TAB_MARKER } from '../constants.js';
import type { Rgb, TabColorSettings } from '../types/settings.js';

const ESC = '\u001b';
const BEL = '\u0007';

export function tabTitleText(project: string, status: string, marker: boolean): string {
  return `${marker ? TAB_MARKER : ''}${project}: ${status}`;
}

/** OSC 0: set window and tab title. */
export function tabTitleEscape(title: string): string {
  return `${ESC}]0;${title}${BEL}`;
}

/** Status label to palette key: "needs approval" → "needs_approval". */
export function statusColorKey(status: string): string {
  return status.replace(/ /g, '_');
}

export function resolveTabColor(settings: TabColorSettings, project: string, status: string): Rgb | null {
  const key = statusColorKey(status);
  return settings.profiles.get(project)?.get(key) ?? settings.colors.get(key) ?? null;
}

/** iTerm2 OSC 6 tab colour, one sequence per channel. */
export function tabColorEscape([red, green, blue]: Rgb): string {
  return (
    `${ESC}]6;1;bg;red;brightness;${red}${BEL}` +
    `${ESC}]6;1;bg;green;brightness;${green}${BEL}` +
    `${ESC}]6;1;bg;blue;brightness;${blue}${BEL}`
  );
}

/** Colour payload for a status, or null when colouring is off or unmapped. */
export function tabColorFor(settings: TabColorSettings, project: string, status: string): string | null {
  if (!settings.enabled || status === '') return null;
  const rgb = resolveTabColor(settings, project, status);
  return rgb ? tabColorEscape(rgb) : null;
}
