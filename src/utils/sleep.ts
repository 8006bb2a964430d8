/**
 * Timer helpers shared by the rate limiter and retry loop.
 */

/** A function that resolves after `ms` milliseconds. Injected in tests. */
export type Sleeper = (ms: number) => Promise<void>;

/**
 * Promise-based setTimeout.
 */
export const sleep: Sleeper = (ms: number) =>
  new Promise((resolve) => setTimeout(resolve, Math.max(0, ms)));
