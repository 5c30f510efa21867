// View state flags
export const SF_VISIBLE = 0x0001;
export const SF_CURSOR_VIS = 0x0002;
export const SF_CURSOR_INS = 0x0004;
export const SF_SHADOW = 0x0008;
export const SF_ACTIVE = 0x0010;
export const SF_SELECTED = 0x0020;
export const SF_FOCUSED = 0x0040;
export const SF_DRAGGING = 0x0080;
export const SF_DISABLED = 0x0100;
export const SF_MODAL = 0x0200;
export const SF_DEFAULT = 0x0400;
export const SF_EXPOSED = 0x0800;
export const SF_CLOSED = 0x1000;
export const SF_RESIZING = 0x2000;

// View option flags
export const OF_SELECTABLE = 0x0001;
export const OF_TOP_SELECT = 0x0002;
export const OF_FIRST_CLICK = 0x0004;
export const OF_FRAMED = 0x0008;
export const OF_PRE_PROCESS = 0x0010;
export const OF_POST_PROCESS = 0x0020;
export const OF_BUFFERED = 0x0040;
export const OF_TILEABLE = 0x0080;
export const OF_CENTER_X = 0x0100;
export const OF_CENTER_Y = 0x0200;
export const OF_CENTERED = 0x0300;
export const OF_VALIDATE = 0x0400;
