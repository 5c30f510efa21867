import { mkdtemp, readFile, rm } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { createMemoryLogger } from "@textvision/core/testing";
import { assert, test } from "@textvision/testkit";
import { createNodeApp } from "../createNodeApp.js";
import { SCREEN_DUMP_FILE } from "../dumps.js";
import { FakeStdin, FakeStdout } from "./fakeStreams.js";

function build(dumpDir: string) {
  const stdout = new FakeStdout();
  stdout.columns = 6;
  stdout.rows = 2;
  const logger = createMemoryLogger();
  const node = createNodeApp({
    env: { TERM: "xterm", TEXTVISION_POLL_MS: "15" },
    config: { modalPollIntervalMs: 70 },
    stdin: new FakeStdin(),
    stdout,
    logger,
    dumpDir,
  });
  return { ...node, logger, stdout };
}

test("createNodeApp merges environment and explicit config", () => {
  const { app, backend } = build(tmpdir());
  assert.equal(app.config.pollIntervalMs, 15);
  assert.equal(app.config.modalPollIntervalMs, 70);
  assert.equal(backend.capabilities().mouse, true);
  assert.deepEqual(app.terminal.size(), { cols: 6, rows: 2 });
});

test("F12 writes a screen dump to the dump directory", async () => {
  const dir = await mkdtemp(join(tmpdir(), "textvision-app-"));
  try {
    const { app, backend, logger } = build(dir);
    app.draw();
    backend.ingest("\x1b[24~");
    assert.equal(await app.terminal.pollEvent(0), null);

    const path = join(dir, SCREEN_DUMP_FILE);
    assert.equal(await readFile(path, "utf8"), "░░░░░░\n░░░░░░\n");
    assert.deepEqual(logger.entries, [{ level: "info", message: `screen dump written to ${path}` }]);
  } finally {
    await rm(dir, { recursive: true, force: true });
  }
});

test("a failed dump is logged with its error code", async () => {
  const { backend, logger } = build(join(tmpdir(), "textvision-missing-dir", "nested"));
  backend.ingest("\x1b[24;2~");
  assert.equal(await backend.pollEvent(0), null);
  assert.equal(logger.entries.length, 1);
  assert.equal(logger.entries[0]?.level, "error");
  assert.ok(logger.entries[0]?.message.startsWith("TV_FILE_OPERATION: view dump failed: TvError: cannot write"));
});
