/**
 * packages/node/src/remote/sessionServer.ts: Terminal sessions over sockets.
 *
 * Any Duplex carrying raw terminal bytes (a TCP socket, an SSH channel from
 * an SSH library, a test PassThrough pair) becomes a channel session with
 * its own Terminal. Each connection is independent: it gets its own decoder
 * state, event queue and, through its own Application, its own command
 * registry.
 */

import { type Server, type Socket, createServer } from "node:net";
import type { Duplex } from "node:stream";
import {
  type AppConfig,
  type Capabilities,
  type ChannelSessionHandle,
  type Clock,
  type Logger,
  Terminal,
  type TerminalSize,
  createChannelSession,
  describeThrown,
  silentLogger,
} from "@textvision/core";

export type AttachOptions = Readonly<{
  size?: TerminalSize;
  config?: AppConfig;
  capabilities?: Partial<Capabilities>;
  clock?: Clock;
  logger?: Logger;
}>;

export type AttachedSession = Readonly<{
  terminal: Terminal;
  handle: ChannelSessionHandle;
  /** Stops listening to the stream without closing it. */
  detach: () => void;
}>;

export function attachStream(stream: Duplex, opts: AttachOptions = {}): AttachedSession {
  const logger = opts.logger ?? silentLogger;
  const { backend, handle } = createChannelSession({
    send: (bytes) => {
      stream.write(bytes);
    },
    ...(opts.size === undefined ? {} : { size: opts.size }),
    ...(opts.config === undefined ? {} : { config: opts.config }),
    ...(opts.capabilities === undefined ? {} : { capabilities: opts.capabilities }),
    ...(opts.clock === undefined ? {} : { clock: opts.clock }),
    logger,
  });

  const onData = (chunk: Buffer | string): void => {
    handle.processInput(chunk);
  };
  const onClose = (): void => {
    handle.disconnect();
  };
  const onError = (err: Error): void => {
    logger.warn(`session stream error: ${describeThrown(err)}`);
    handle.disconnect();
  };

  stream.on("data", onData);
  stream.on("end", onClose);
  stream.on("close", onClose);
  stream.on("error", onError);

  const detach = (): void => {
    stream.off("data", onData);
    stream.off("end", onClose);
    stream.off("close", onClose);
    stream.off("error", onError);
  };

  return Object.freeze({ terminal: new Terminal(backend), handle, detach });
}

export type RemoteSession = AttachedSession &
  Readonly<{
    socket: Socket;
    /** "address:port" of the peer, or "unknown". */
    peer: string;
  }>;

export type SessionServerOptions = AttachOptions &
  Readonly<{
    /** Runs the application for one connection; the socket ends when it settles. */
    onSession: (session: RemoteSession) => Promise<void>;
  }>;

function peerOf(socket: Socket): string {
  const address = socket.remoteAddress;
  if (address === undefined) return "unknown";
  return `${address}:${socket.remotePort ?? 0}`;
}

/**
 * Run `socket` as a session. Resolves once the session has settled and the
 * socket has been ended or destroyed; never rejects.
 */
export async function runSocketSession(
  socket: Socket,
  opts: SessionServerOptions,
): Promise<void> {
  const logger = opts.logger ?? silentLogger;
  const peer = peerOf(socket);
  const attached = attachStream(socket, opts);
  logger.info(`session opened: ${peer}`);

  try {
    await opts.onSession(Object.freeze({ ...attached, socket, peer }));
    socket.end();
  } catch (err) {
    logger.error(`session ${peer} failed: ${describeThrown(err)}`);
    socket.destroy();
  } finally {
    attached.detach();
    attached.handle.disconnect();
    logger.info(`session closed: ${peer}`);
  }
}

/** A `node:net` server that runs one session per connection. */
export function createSessionServer(opts: SessionServerOptions): Server {
  const logger = opts.logger ?? silentLogger;
  const server = createServer((socket) => {
    void runSocketSession(socket, opts);
  });
  server.on("error", (err) => {
    logger.error(`session server error: ${describeThrown(err)}`);
  });
  return server;
}
