/**
 * packages/node/src/config.ts: Configuration overrides from the environment.
 *
 * Values that do not parse, or that the core would reject, are ignored so a
 * bad variable never keeps the terminal from starting.
 */

import {
  type AppConfig,
  type LogLevel,
  MAX_ESC_TIMEOUT_MS,
  MIN_ESC_TIMEOUT_MS,
  isLogLevel,
} from "@textvision/core";
import { type EnvMap, envInt } from "./backend/terminalProfile.js";

export const ENV_ESC_TIMEOUT_MS = "TEXTVISION_ESC_TIMEOUT_MS";
export const ENV_DOUBLE_CLICK_MS = "TEXTVISION_DOUBLE_CLICK_MS";
export const ENV_POLL_MS = "TEXTVISION_POLL_MS";
export const ENV_LOG = "TEXTVISION_LOG";

export function appConfigFromEnv(env: EnvMap = process.env): AppConfig {
  const escTimeoutMs = envInt(env, ENV_ESC_TIMEOUT_MS);
  const doubleClickMs = envInt(env, ENV_DOUBLE_CLICK_MS);
  const pollIntervalMs = envInt(env, ENV_POLL_MS);
  const escInRange =
    escTimeoutMs !== undefined &&
    escTimeoutMs >= MIN_ESC_TIMEOUT_MS &&
    escTimeoutMs <= MAX_ESC_TIMEOUT_MS;

  return Object.freeze({
    ...(escInRange ? { escTimeoutMs } : {}),
    ...(doubleClickMs === undefined ? {} : { doubleClickMs }),
    ...(pollIntervalMs === undefined ? {} : { pollIntervalMs }),
  });
}

export function logLevelFromEnv(env: EnvMap = process.env): LogLevel {
  const raw = env[ENV_LOG]?.trim().toLowerCase();
  return isLogLevel(raw) ? raw : "warn";
}
