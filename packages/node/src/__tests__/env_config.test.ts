import { assert, test } from "@textvision/testkit";
import { appConfigFromEnv, logLevelFromEnv } from "../config.js";
import { createStderrLogger } from "../logger.js";

test("appConfigFromEnv reads timing overrides", () => {
  assert.deepEqual(
    appConfigFromEnv({
      TEXTVISION_ESC_TIMEOUT_MS: "300",
      TEXTVISION_DOUBLE_CLICK_MS: "400",
      TEXTVISION_POLL_MS: "15",
    }),
    { escTimeoutMs: 300, doubleClickMs: 400, pollIntervalMs: 15 },
  );
});

test("appConfigFromEnv ignores values the core would reject", () => {
  assert.deepEqual(appConfigFromEnv({ TEXTVISION_ESC_TIMEOUT_MS: "100" }), {});
  assert.deepEqual(appConfigFromEnv({ TEXTVISION_ESC_TIMEOUT_MS: "2000" }), {});
  assert.deepEqual(appConfigFromEnv({ TEXTVISION_DOUBLE_CLICK_MS: "fast" }), {});
});

test("logLevelFromEnv falls back to warn", () => {
  assert.equal(logLevelFromEnv({ TEXTVISION_LOG: " DEBUG " }), "debug");
  assert.equal(logLevelFromEnv({ TEXTVISION_LOG: "loud" }), "warn");
  assert.equal(logLevelFromEnv({}), "warn");
});

test("createStderrLogger filters by level and prefixes lines", () => {
  const lines: string[] = [];
  const logger = createStderrLogger({ level: "info", stream: { write: (s: string) => lines.push(s) } });
  logger.debug("hidden");
  logger.info("session opened");
  logger.error("boom");
  assert.deepEqual(lines, ["[textvision] info session opened\n", "[textvision] error boom\n"]);
});
