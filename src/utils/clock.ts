/**
 * Injectable clock. Every time-dependent component reads time through a
 * Clock so tests can move the budget day and cache expiry forward.
 */
export interface Clock {
  /** Milliseconds since epoch */
  now(): number;
}

export const systemClock: Clock = { now: () => Date.now() };
