/**
 * Clock
 *
 * Source of time for anything that waits or stamps. Production uses the
 * wall clock; tests inject a virtual one whose sleep advances time
 * instead of waiting.
 *
 * @module clock
 */

export interface Clock {
  /** Epoch milliseconds */
  now(): number;
  sleep(ms: number): Promise<void>;
}

export const systemClock: Clock = {
  now: () => Date.now(),
  sleep: (ms: number) =>
    new Promise((resolve) => {
      setTimeout(resolve, Math.max(0, ms));
    }),
};

/** ISO-8601 timestamp for the given clock */
export function isoNow(clock: Clock = systemClock): string {
  return new Date(clock.now()).toISOString();
}
