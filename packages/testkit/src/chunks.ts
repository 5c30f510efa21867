/**
 * Byte splitting helpers for decoders that must not depend on how input is
 * chunked.
 */

const encoder = new TextEncoder();

export function toBytes(input: Uint8Array | string): Uint8Array {
  return typeof input === "string" ? encoder.encode(input) : input;
}

/** Consecutive chunks of at most `size` bytes. */
export function chunkEvery(input: Uint8Array | string, size: number): Uint8Array[] {
  if (!Number.isInteger(size) || size <= 0) {
    throw new RangeError(`chunkEvery: size must be a positive integer (got ${String(size)})`);
  }
  const bytes = toBytes(input);
  const out: Uint8Array[] = [];
  for (let i = 0; i < bytes.length; i += size) out.push(bytes.subarray(i, i + size));
  return out;
}

/** Split at the given byte offsets (sorted, deduplicated, clamped). */
export function splitAt(input: Uint8Array | string, offsets: readonly number[]): Uint8Array[] {
  const bytes = toBytes(input);
  const cuts = [...new Set(offsets.map((o) => Math.max(0, Math.min(bytes.length, o))))].sort(
    (a, b) => a - b,
  );
  const out: Uint8Array[] = [];
  let start = 0;
  for (const cut of cuts) {
    if (cut === start) continue;
    out.push(bytes.subarray(start, cut));
    start = cut;
  }
  if (start < bytes.length) out.push(bytes.subarray(start));
  return out;
}

/** Every way to cut the input into two non-empty halves. */
export function twoWaySplits(input: Uint8Array | string): Uint8Array[][] {
  const bytes = toBytes(input);
  const out: Uint8Array[][] = [];
  for (let i = 1; i < bytes.length; i++) out.push([bytes.subarray(0, i), bytes.subarray(i)]);
  return out;
}

/** Render control bytes readably, for assertion messages. */
export function showControls(s: string): string {
  return s.replace(/[\x00-\x1f\x7f]/g, (ch) => {
    if (ch === "\x1b") return "\\e";
    return `\\x${ch.charCodeAt(0).toString(16).padStart(2, "0")}`;
  });
}
