/** Millisecond clock. Injected wherever timing decides what an input means. */
export type Clock = () => number;

export const systemClock: Clock = () => Date.now();
