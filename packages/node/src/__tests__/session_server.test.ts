import { Socket } from "node:net";
import { Duplex } from "node:stream";
import { isTvError, keyEvent, setupSequences } from "@textvision/core";
import { createMemoryLogger } from "@textvision/core/testing";
import { assert, test } from "@textvision/testkit";
import { type RemoteSession, attachStream, runSocketSession } from "../remote/sessionServer.js";

function fakeChannel() {
  const sent: string[] = [];
  const stream = new Duplex({
    read() {},
    write(chunk: Buffer, _encoding, callback) {
      sent.push(chunk.toString("utf8"));
      callback();
    },
  });
  return { stream, sent };
}

const isBrokenPipe = (err: unknown) => isTvError(err, "TV_BROKEN_PIPE");

test("attachStream runs a terminal over the stream", async () => {
  const { stream, sent } = fakeChannel();
  const session = attachStream(stream, { size: { cols: 100, rows: 40 } });
  await session.terminal.init();
  assert.deepEqual(sent, [setupSequences(true).join("")]);
  assert.deepEqual(session.terminal.size(), { cols: 100, rows: 40 });

  stream.emit("data", Buffer.from("a"));
  assert.deepEqual(await session.terminal.pollEvent(0), keyEvent(0x61));

  session.handle.resize(90, 30);
  assert.deepEqual(session.terminal.size(), { cols: 90, rows: 30 });
});

test("the end of the stream disconnects the session", async () => {
  const { stream } = fakeChannel();
  const session = attachStream(stream);
  stream.emit("end");
  assert.equal(session.handle.isDisconnected(), true);
  await assert.rejects(session.terminal.pollEvent(0), isBrokenPipe);
});

test("a stream error is logged and disconnects the session", () => {
  const logger = createMemoryLogger();
  const { stream } = fakeChannel();
  const session = attachStream(stream, { logger });
  stream.emit("error", new Error("reset"));
  assert.equal(session.handle.isDisconnected(), true);
  assert.deepEqual(logger.entries, [{ level: "warn", message: "session stream error: Error: reset" }]);
});

test("detach stops feeding the session", async () => {
  const { stream } = fakeChannel();
  const session = attachStream(stream);
  session.detach();
  stream.emit("data", Buffer.from("a"));
  assert.equal(await session.terminal.pollEvent(0), null);
  assert.equal(stream.listenerCount("data"), 0);
});

test("runSocketSession disconnects the session when it settles", async () => {
  const logger = createMemoryLogger();
  const socket = new Socket();
  const seen: RemoteSession[] = [];
  const disconnectedDuring: boolean[] = [];
  await runSocketSession(socket, {
    logger,
    onSession: async (session) => {
      seen.push(session);
      disconnectedDuring.push(session.handle.isDisconnected());
    },
  });
  assert.equal(seen[0]?.peer, "unknown");
  assert.equal(seen[0]?.socket, socket);
  assert.deepEqual(disconnectedDuring, [false]);
  assert.equal(seen[0]?.handle.isDisconnected(), true);
  assert.deepEqual(logger.entries, [
    { level: "info", message: "session opened: unknown" },
    { level: "info", message: "session closed: unknown" },
  ]);
});

test("runSocketSession logs a failed session and destroys the socket", async () => {
  const logger = createMemoryLogger();
  const socket = new Socket();
  await runSocketSession(socket, {
    logger,
    onSession: async () => {
      throw new Error("app crashed");
    },
  });
  assert.equal(socket.destroyed, true);
  assert.deepEqual(logger.entries, [
    { level: "info", message: "session opened: unknown" },
    { level: "error", message: "session unknown failed: Error: app crashed" },
    { level: "info", message: "session closed: unknown" },
  ]);
});
