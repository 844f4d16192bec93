import { Clock, Duration, Timestamp } from "../types/game";

const UINT64_MASK = (1n << 64n) - 1n;

export function wrap(duration: Duration, timestamp: Timestamp): Clock {
  return ((duration & UINT64_MASK) << 64n) | (timestamp & UINT64_MASK);
}

/** Seconds accumulated on this side's clock. */
export function duration(clock: Clock): Duration {
  return (clock >> 64n) & UINT64_MASK;
}

/** When the clock was last stamped. */
export function timestamp(clock: Clock): Timestamp {
  return clock & UINT64_MASK;
}
