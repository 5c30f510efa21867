import { EventEmitter } from "node:events";
import {
  KB_ALT_X,
  KB_ESC,
  KB_ESC_ESC,
  KB_UP,
  isTvError,
  keyEvent,
  resolveAppConfig,
  setupSequences,
  teardownSequences,
} from "@textvision/core";
import { createMemoryLogger } from "@textvision/core/testing";
import { assert, createManualClock, test } from "@textvision/testkit";
import { LocalBackend, type LocalBackendOptions } from "../backend/localBackend.js";
import { terminalProfileFromNodeEnv } from "../backend/terminalProfile.js";
import { FakeStdin, FakeStdout } from "./fakeStreams.js";

function setup(opts: Omit<LocalBackendOptions, "stdin" | "stdout" | "profile" | "clock"> = {}) {
  const stdin = new FakeStdin();
  const stdout = new FakeStdout();
  const clock = createManualClock(1000);
  const backend = new LocalBackend({
    stdin,
    stdout,
    profile: terminalProfileFromNodeEnv({ TERM: "xterm-256color" }),
    clock: clock.now,
    ...opts,
  });
  return { stdin, stdout, clock, backend };
}

test("init enters raw mode and writes the setup sequences once", async () => {
  const { stdin, stdout, backend } = setup();
  await backend.init();
  await backend.init();
  assert.deepEqual(stdin.rawModes, [true]);
  assert.deepEqual(stdin.flow, ["resume"]);
  assert.deepEqual(stdout.written, [setupSequences(true).join("")]);
  assert.equal(stdin.listenerCount("data"), 1);
});

test("cleanup reverses init", async () => {
  const { stdin, stdout, backend } = setup();
  await backend.init();
  await backend.cleanup();
  await backend.cleanup();
  assert.deepEqual(stdin.rawModes, [true, false]);
  assert.deepEqual(stdin.flow, ["resume", "pause"]);
  assert.equal(stdout.written[1], teardownSequences(true).join(""));
  assert.equal(stdout.written.length, 2);
  assert.equal(stdin.listenerCount("data"), 0);
  assert.equal(stdin.listenerCount("end"), 0);
});

test("a stdin that is already raw is left raw", async () => {
  const { stdin, backend } = setup();
  stdin.isRaw = true;
  await backend.init();
  await backend.cleanup();
  assert.deepEqual(stdin.rawModes, []);
});

test("a TTY without raw mode cannot be initialized", async () => {
  const stdin = Object.assign(new EventEmitter(), {
    isTTY: true,
    resume: () => undefined,
    pause: () => undefined,
  });
  const backend = new LocalBackend({ stdin, stdout: new FakeStdout() });
  await assert.rejects(backend.init(), (err: unknown) => isTvError(err, "TV_TERMINAL_INIT"));
});

test("write failures surface as TV_IO_ERROR", async () => {
  const { stdout, backend } = setup();
  stdout.failWith = new Error("EPIPE");
  await assert.rejects(backend.init(), (err: unknown) => {
    assert.ok(isTvError(err, "TV_IO_ERROR"));
    assert.equal(err.message, "terminal write failed: EPIPE");
    return true;
  });
});

test("stdin data is decoded and queued", async () => {
  const { stdin, backend } = setup();
  await backend.init();
  stdin.emit("data", Buffer.from("a\x1b[A"));
  assert.deepEqual(await backend.pollEvent(0), keyEvent(0x61));
  assert.deepEqual(await backend.pollEvent(0), keyEvent(KB_UP));
});

test("an arrow key split across two reads decodes as one key", async () => {
  const { backend } = setup();
  backend.ingest("\x1b");
  assert.equal(await backend.pollEvent(0), null);
  backend.ingest("[A");
  assert.deepEqual(await backend.pollEvent(0), keyEvent(KB_UP));
  assert.equal(await backend.pollEvent(0), null);
});

test("ESC then a letter in separate reads decodes like one read", async () => {
  const { backend } = setup();
  backend.ingest("\x1b");
  backend.ingest("x");
  assert.deepEqual(await backend.pollEvent(0), keyEvent(KB_ALT_X));
  assert.equal(await backend.pollEvent(0), null);
});

test("two ESC bytes in one read make ESC ESC", async () => {
  const { clock, backend } = setup();
  backend.ingest("\x1b\x1b");
  assert.equal(await backend.pollEvent(0), null);
  clock.advance(500);
  assert.deepEqual(await backend.pollEvent(0), keyEvent(KB_ESC_ESC));
  assert.equal(await backend.pollEvent(0), null);
});

test("a lone ESC is released once the ESC window has passed", async () => {
  const { clock, backend } = setup();
  backend.ingest("\x1b");
  assert.equal(await backend.pollEvent(0), null);
  clock.advance(499);
  assert.equal(await backend.pollEvent(0), null);
  clock.advance(1);
  assert.deepEqual(await backend.pollEvent(0), keyEvent(KB_ESC));
});

test("the ESC window follows the configured timeout", async () => {
  const { clock, backend } = setup({ config: resolveAppConfig({ escTimeoutMs: 250 }) });
  backend.ingest("\x1b");
  clock.advance(250);
  assert.deepEqual(await backend.pollEvent(0), keyEvent(KB_ESC));
});

test("end of stdin reports a broken pipe after the queue drains", async () => {
  const { stdin, backend } = setup();
  await backend.init();
  stdin.emit("data", "q");
  stdin.emit("end");
  assert.deepEqual(await backend.pollEvent(0), keyEvent(0x71));
  await assert.rejects(backend.pollEvent(0), (err: unknown) => isTvError(err, "TV_BROKEN_PIPE"));
});

test("F12 and Shift+F12 run the dump hooks instead of reaching the app", async () => {
  const calls: string[] = [];
  const { backend } = setup({
    hooks: {
      screenDump: () => {
        calls.push("screen");
      },
      viewDump: async () => {
        calls.push("views");
      },
    },
  });
  backend.ingest("\x1b[24~\x1b[24;2~");
  assert.equal(await backend.pollEvent(0), null);
  assert.equal(await backend.pollEvent(0), null);
  assert.deepEqual(calls, ["screen", "views"]);
});

test("a failing hook is logged and swallowed", async () => {
  const logger = createMemoryLogger();
  const { backend } = setup({
    logger,
    hooks: {
      screenDump: () => {
        throw new Error("disk full");
      },
    },
  });
  backend.ingest("\x1b[24~");
  assert.equal(await backend.pollEvent(0), null);
  assert.deepEqual(logger.entries, [{ level: "warn", message: "screen dump failed: Error: disk full" }]);
});

test("output is buffered until flush", async () => {
  const { stdout, backend } = setup();
  backend.writeRaw("ab");
  backend.showCursor(2, 1);
  assert.deepEqual(stdout.written, []);
  await backend.flush();
  await backend.flush();
  assert.deepEqual(stdout.written, ["ab\x1b[2;3H\x1b[?25h"]);
});

test("size comes from the output stream", () => {
  const { backend } = setup();
  assert.deepEqual(backend.size(), { cols: 100, rows: 30 });
});

test("bell and clearScreen write immediately", async () => {
  const { stdout, backend } = setup();
  await backend.bell();
  await backend.clearScreen();
  assert.deepEqual(stdout.written, ["\x07", "\x1b[2J\x1b[H"]);
});
