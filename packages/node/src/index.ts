/**
 * @textvision/node
 *
 * Node host for @textvision/core: the local TTY backend, remote sessions over
 * sockets, environment configuration and file dumps.
 */

export {
  LocalBackend,
  type HotkeyHooks,
  type InputStreamLike,
  type LocalBackendOptions,
  type OutputStreamLike,
} from "./backend/localBackend.js";
export {
  cellAspectRatioFromPixels,
  terminalProfileFromNodeEnv,
  type EnvMap,
  type TerminalProfile,
} from "./backend/terminalProfile.js";
export {
  ENV_DOUBLE_CLICK_MS,
  ENV_ESC_TIMEOUT_MS,
  ENV_LOG,
  ENV_POLL_MS,
  appConfigFromEnv,
  logLevelFromEnv,
} from "./config.js";
export { SCREEN_DUMP_FILE, VIEW_DUMP_FILE, writeScreenDump, writeViewDump } from "./dumps.js";
export { createStderrLogger, type StderrLoggerOptions, type WritableLike } from "./logger.js";
export {
  attachStream,
  createSessionServer,
  runSocketSession,
  type AttachOptions,
  type AttachedSession,
  type RemoteSession,
  type SessionServerOptions,
} from "./remote/sessionServer.js";
export { createNodeApp, type CreateNodeAppOptions, type NodeApp } from "./createNodeApp.js";
