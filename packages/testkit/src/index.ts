export { assert, describe, test } from "./nodeTest.js";
export { createManualClock, type ManualClock } from "./clock.js";
export { chunkEvery, showControls, splitAt, toBytes, twoWaySplits } from "./chunks.js";
