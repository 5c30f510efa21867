/**
 * packages/core/src/config.ts: Application configuration and defaults.
 *
 * The timing constants are empirical; they are defaults, not invariants.
 */

import { TvError } from "./errors.js";
import { DEFAULT_DOUBLE_CLICK_MS } from "./input/doubleClick.js";
import { DEFAULT_ESC_TIMEOUT_MS, MAX_ESC_TIMEOUT_MS, MIN_ESC_TIMEOUT_MS } from "./input/escTracker.js";

export type AppConfig = Readonly<{
  /** Poll timeout of the main loop. */
  pollIntervalMs?: number;
  /** Poll timeout inside a modal loop. */
  modalPollIntervalMs?: number;
  doubleClickMs?: number;
  /** ESC prefix window of the local backend, 250..1500. */
  escTimeoutMs?: number;
  /** The decoder discards held-back bytes above this size. */
  maxInputBufferBytes?: number;
}>;

export type ResolvedAppConfig = Readonly<{
  pollIntervalMs: number;
  modalPollIntervalMs: number;
  doubleClickMs: number;
  escTimeoutMs: number;
  maxInputBufferBytes: number;
}>;

export const DEFAULT_CONFIG: ResolvedAppConfig = Object.freeze({
  pollIntervalMs: 20,
  modalPollIntervalMs: 50,
  doubleClickMs: DEFAULT_DOUBLE_CLICK_MS,
  escTimeoutMs: DEFAULT_ESC_TIMEOUT_MS,
  maxInputBufferBytes: 64 * 1024,
});

function invalidInput(detail: string): never {
  throw new TvError("TV_INVALID_INPUT", detail);
}

function requirePositiveInt(name: string, v: number): number {
  if (!Number.isInteger(v) || v <= 0) invalidInput(`${name} must be a positive integer`);
  return v;
}

function requireIntInRange(name: string, v: number, min: number, max: number): number {
  if (!Number.isInteger(v) || v < min || v > max) {
    invalidInput(`${name} must be an integer between ${min} and ${max}`);
  }
  return v;
}

export function resolveAppConfig(config: AppConfig | undefined): ResolvedAppConfig {
  if (!config) return DEFAULT_CONFIG;
  const pollIntervalMs =
    config.pollIntervalMs === undefined
      ? DEFAULT_CONFIG.pollIntervalMs
      : requirePositiveInt("pollIntervalMs", config.pollIntervalMs);
  const modalPollIntervalMs =
    config.modalPollIntervalMs === undefined
      ? DEFAULT_CONFIG.modalPollIntervalMs
      : requirePositiveInt("modalPollIntervalMs", config.modalPollIntervalMs);
  const doubleClickMs =
    config.doubleClickMs === undefined
      ? DEFAULT_CONFIG.doubleClickMs
      : requirePositiveInt("doubleClickMs", config.doubleClickMs);
  const escTimeoutMs =
    config.escTimeoutMs === undefined
      ? DEFAULT_CONFIG.escTimeoutMs
      : requireIntInRange("escTimeoutMs", config.escTimeoutMs, MIN_ESC_TIMEOUT_MS, MAX_ESC_TIMEOUT_MS);
  const maxInputBufferBytes =
    config.maxInputBufferBytes === undefined
      ? DEFAULT_CONFIG.maxInputBufferBytes
      : requirePositiveInt("maxInputBufferBytes", config.maxInputBufferBytes);

  return Object.freeze({
    pollIntervalMs,
    modalPollIntervalMs,
    doubleClickMs,
    escTimeoutMs,
    maxInputBufferBytes,
  });
}
