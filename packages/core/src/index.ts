/**
 * @textvision/core
 *
 * Platform-neutral event pipeline: input decoding, the backend contract,
 * view routing and the application loop.
 * This package MUST NOT use Node-specific APIs (Buffer, node:* imports).
 */

// =============================================================================
// Errors and logging
// =============================================================================

export {
  type TvErrorCode,
  TvError,
  isTvError,
  describeThrown,
  brokenPipe,
} from "./errors.js";

export {
  type LogLevel,
  type Logger,
  LOG_LEVELS,
  isLogLevel,
  levelEnabled,
  silentLogger,
  consoleLogger,
} from "./logger.js";

export {
  type AppConfig,
  type ResolvedAppConfig,
  DEFAULT_CONFIG,
  resolveAppConfig,
} from "./config.js";

// =============================================================================
// Primitives
// =============================================================================

export {
  type Point,
  type Rect,
  point,
  rect,
  pointEquals,
  rectWidth,
  rectHeight,
  rectWidthClamped,
  rectHeightClamped,
  rectEquals,
  rectIsEmpty,
  rectContains,
  rectIntersect,
  rectIntersects,
  rectUnion,
  rectGrow,
  rectMove,
} from "./geometry.js";

export {
  KB_ESC,
  KB_ENTER,
  KB_BACKSPACE,
  KB_TAB,
  KB_SHIFT_TAB,
  KB_ESC_ESC,
  KB_F1,
  KB_F2,
  KB_F3,
  KB_F4,
  KB_F5,
  KB_F6,
  KB_F7,
  KB_F8,
  KB_F9,
  KB_F10,
  KB_F11,
  KB_F12,
  KB_SHIFT_F12,
  FUNCTION_KEYS,
  KB_UP,
  KB_DOWN,
  KB_LEFT,
  KB_RIGHT,
  KB_HOME,
  KB_END,
  KB_PGUP,
  KB_PGDN,
  KB_INS,
  KB_DEL,
  KB_CTRL_C,
  ESC_LETTERS,
  altLetterCode,
  escLetterCode,
  ctrlLetterCode,
  KB_ALT_A,
  KB_ALT_E,
  KB_ALT_F,
  KB_ALT_H,
  KB_ALT_O,
  KB_ALT_X,
  KB_ESC_A,
  KB_ESC_E,
  KB_ESC_F,
  KB_ESC_H,
  KB_ESC_O,
  KB_ESC_S,
  KB_ESC_V,
  KB_ESC_X,
  letterOfAltCode,
} from "./keys/keyCodes.js";

export {
  type KeyNameErrorCode,
  type KeyNameError,
  type ParseKeyNameResult,
  parseKeyName,
  keyCodeOf,
  keyName,
} from "./keys/keyNames.js";

export {
  KB_SHIFT,
  KB_CTRL,
  KB_ALT,
  MB_LEFT,
  MB_MIDDLE,
  MB_RIGHT,
  EV_NOTHING,
  EV_MOUSE_DOWN,
  EV_MOUSE_UP,
  EV_MOUSE_MOVE,
  EV_MOUSE_AUTO,
  EV_MOUSE_WHEEL_UP,
  EV_MOUSE_WHEEL_DOWN,
  EV_MOUSE,
  EV_KEYBOARD,
  EV_COMMAND,
  EV_BROADCAST,
  EV_MESSAGE,
  type MouseEvent,
  type MouseButtonKind,
  type MouseWheelKind,
  type MouseKind,
  type Event,
  type EventKind,
  type KeyboardEvent,
  type MouseInputEvent,
  NOTHING,
  keyEvent,
  mouseEvent,
  commandEvent,
  broadcastEvent,
  isMouseEvent,
  isKey,
  eventMask,
  RoutedEvent,
} from "./events.js";

export {
  CM_OK,
  CM_CANCEL,
  CM_YES,
  CM_NO,
  CM_DEFAULT,
  CM_QUIT,
  CM_CLOSE,
  CM_ZOOM,
  CM_NEXT,
  CM_PREV,
  CM_TILE,
  CM_CASCADE,
  CM_RECEIVED_FOCUS,
  CM_RELEASED_FOCUS,
  CM_COMMAND_SET_CHANGED,
  CM_GRAB_DEFAULT,
  CM_RELEASE_DEFAULT,
  INTERNAL_COMMAND_BASE,
  isTerminalCommand,
} from "./commands.js";

export {
  COMMAND_CAPACITY,
  CommandRegistry,
} from "./commandSet.js";

// =============================================================================
// Input
// =============================================================================

export {
  type Clock,
  systemClock,
} from "./input/clock.js";

export {
  type InputDecoderOptions,
  InputDecoder,
  decodeOne,
} from "./input/decoder.js";

export {
  MIN_ESC_TIMEOUT_MS,
  MAX_ESC_TIMEOUT_MS,
  DEFAULT_ESC_TIMEOUT_MS,
  requireEscTimeout,
  EscSequenceTracker,
} from "./input/escTracker.js";

export {
  DEFAULT_DOUBLE_CLICK_MS,
  DoubleClickDetector,
} from "./input/doubleClick.js";

export {
  EventQueue,
} from "./input/eventQueue.js";

// =============================================================================
// Backends and terminal
// =============================================================================

export {
  type Capabilities,
  DEFAULT_CAPABILITIES,
  type TerminalSize,
  type CellAspectRatio,
  DEFAULT_CELL_ASPECT_RATIO,
  ALT_SCREEN_ON,
  ALT_SCREEN_OFF,
  MOUSE_TRACKING_ON,
  MOUSE_TRACKING_OFF,
  MOUSE_SGR_ON,
  MOUSE_SGR_OFF,
  MOUSE_DRAG_ON,
  MOUSE_DRAG_OFF,
  CURSOR_HIDE,
  CURSOR_SHOW,
  AUTOWRAP_OFF,
  AUTOWRAP_ON,
  SGR_RESET,
  BELL,
  CLEAR_HOME,
  cursorTo,
  setupSequences,
  teardownSequences,
  type Backend,
} from "./backend.js";

export {
  DEFAULT_ATTR,
  attrToSgr,
  Surface,
} from "./surface.js";

export {
  Terminal,
} from "./terminal.js";

export {
  DEFAULT_CHANNEL_SIZE,
  type ChannelSessionOptions,
  type ChannelSessionHandle,
  type ChannelSession,
  SizeCell,
  ChannelBackend,
  createChannelSession,
} from "./backends/channelBackend.js";

// =============================================================================
// Views
// =============================================================================

export {
  SF_VISIBLE,
  SF_CURSOR_VIS,
  SF_CURSOR_INS,
  SF_SHADOW,
  SF_ACTIVE,
  SF_SELECTED,
  SF_FOCUSED,
  SF_DRAGGING,
  SF_DISABLED,
  SF_MODAL,
  SF_DEFAULT,
  SF_EXPOSED,
  SF_CLOSED,
  SF_RESIZING,
  OF_SELECTABLE,
  OF_TOP_SELECT,
  OF_FIRST_CLICK,
  OF_FRAMED,
  OF_PRE_PROCESS,
  OF_POST_PROCESS,
  OF_BUFFERED,
  OF_TILEABLE,
  OF_CENTER_X,
  OF_CENTER_Y,
  OF_CENTERED,
  OF_VALIDATE,
} from "./views/flags.js";

export {
  type ViewContext,
  type View,
  ViewBase,
} from "./views/view.js";

export {
  Group,
} from "./views/group.js";

export {
  type ButtonOptions,
  Button,
} from "./views/button.js";

export {
  Window,
} from "./views/window.js";

export {
  Dialog,
} from "./views/dialog.js";

export {
  Desktop,
} from "./views/desktop.js";

export {
  type MenuItem,
  type Menu,
  MenuBar,
} from "./views/menuBar.js";

export {
  type StatusItem,
  StatusLine,
} from "./views/statusLine.js";

// =============================================================================
// Application
// =============================================================================

export {
  type ApplicationOptions,
  Application,
} from "./app/application.js";
