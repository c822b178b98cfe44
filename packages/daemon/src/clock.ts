/** Time source in epoch milliseconds. */
export interface Clock {
  now(): number;
}

/** Monotonic: wall-clock corrections never move it backwards. */
export const systemClock: Clock = {
  now: () => performance.timeOrigin + performance.now(),
};
