/**
 * Standard command identifiers.
 *
 * Ids below INTERNAL_COMMAND_BASE end a modal loop when a dialog produces
 * them; ids at or above it are private signals between a dialog's children.
 */

export const CM_OK = 10;
export const CM_CANCEL = 11;
export const CM_YES = 12;
export const CM_NO = 13;
export const CM_DEFAULT = 14;

export const CM_QUIT = 24;
export const CM_CLOSE = 25;
export const CM_ZOOM = 26;
export const CM_NEXT = 27;
export const CM_PREV = 28;
export const CM_TILE = 29;
export const CM_CASCADE = 30;

// Broadcasts
export const CM_RECEIVED_FOCUS = 50;
export const CM_RELEASED_FOCUS = 51;
export const CM_COMMAND_SET_CHANGED = 52;
export const CM_GRAB_DEFAULT = 62;
export const CM_RELEASE_DEFAULT = 63;

export const INTERNAL_COMMAND_BASE = 1000;

export function isTerminalCommand(id: number): boolean {
  return id < INTERNAL_COMMAND_BASE;
}
