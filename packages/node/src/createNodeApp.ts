/**
 * packages/node/src/createNodeApp.ts: Application on the local terminal.
 *
 * Wires the local backend, configuration from the environment, the stderr
 * logger and the F12 / Shift+F12 dump hotkeys.
 */

import {
  type AppConfig,
  Application,
  type Logger,
  type MenuBar,
  type StatusLine,
  Terminal,
  describeThrown,
  isTvError,
  resolveAppConfig,
} from "@textvision/core";
import { type InputStreamLike, LocalBackend, type OutputStreamLike } from "./backend/localBackend.js";
import { type EnvMap, terminalProfileFromNodeEnv } from "./backend/terminalProfile.js";
import { appConfigFromEnv, logLevelFromEnv } from "./config.js";
import { writeScreenDump, writeViewDump } from "./dumps.js";
import { createStderrLogger } from "./logger.js";

export type CreateNodeAppOptions = Readonly<{
  menuBar?: MenuBar;
  statusLine?: StatusLine;
  /** Applied over the environment overrides. */
  config?: AppConfig;
  env?: EnvMap;
  stdin?: InputStreamLike;
  stdout?: OutputStreamLike;
  logger?: Logger;
  /** Directory for dump files. Defaults to the working directory. */
  dumpDir?: string;
}>;

export type NodeApp = Readonly<{
  app: Application;
  terminal: Terminal;
  backend: LocalBackend;
  logger: Logger;
}>;

export function createNodeApp(opts: CreateNodeAppOptions = {}): NodeApp {
  const env = opts.env ?? process.env;
  const logger = opts.logger ?? createStderrLogger({ level: logLevelFromEnv(env) });
  const config = resolveAppConfig({ ...appConfigFromEnv(env), ...opts.config });
  const dumpDir = opts.dumpDir ?? process.cwd();

  const backend = new LocalBackend({
    config,
    profile: terminalProfileFromNodeEnv(env),
    logger,
    ...(opts.stdin === undefined ? {} : { stdin: opts.stdin }),
    ...(opts.stdout === undefined ? {} : { stdout: opts.stdout }),
  });
  const terminal = new Terminal(backend);
  const app = new Application({
    terminal,
    config,
    logger,
    ...(opts.menuBar === undefined ? {} : { menuBar: opts.menuBar }),
    ...(opts.statusLine === undefined ? {} : { statusLine: opts.statusLine }),
  });

  const dump = async (what: string, write: () => Promise<string>): Promise<void> => {
    try {
      const path = await write();
      logger.info(`${what} written to ${path}`);
    } catch (err) {
      const code = isTvError(err) ? err.code : "TV_FILE_OPERATION";
      logger.error(`${code}: ${what} failed: ${describeThrown(err)}`);
    }
  };

  backend.setHooks({
    screenDump: () => dump("screen dump", () => writeScreenDump(terminal, dumpDir)),
    viewDump: () => dump("view dump", () => writeViewDump(app, dumpDir)),
  });

  return Object.freeze({ app, terminal, backend, logger });
}
