/**
 * Manual clock for timing-dependent input code (ESC prefix, double click).
 * `now` matches the core `Clock` signature, so it can be passed directly.
 */

export type ManualClock = Readonly<{
  now: () => number;
  advance: (ms: number) => number;
  set: (ms: number) => void;
}>;

export function createManualClock(startMs = 0): ManualClock {
  let t = startMs;
  return Object.freeze({
    now: () => t,
    advance: (ms: number) => {
      t += ms;
      return t;
    },
    set: (ms: number) => {
      t = ms;
    },
  });
}
