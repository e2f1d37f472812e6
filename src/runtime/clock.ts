import { performance } from "node:perf_hooks";

/** Millisecond clock. Tests inject deterministic implementations. */
export type Clock = () => number;

/** Monotonic clock backed by {@link performance.now}. */
export const monotonicClock: Clock = () => performance.now();

/**
 * Seconds elapsed between `since` and `now`. A reading that cannot be trusted
 * (non-finite value, clock going backwards) yields `fallbackSeconds` instead.
 */
export function elapsedSeconds(since: number, now: number, fallbackSeconds: number): number {
  const deltaMs = now - since;
  if (!Number.isFinite(deltaMs) || deltaMs < 0) {
    return fallbackSeconds;
  }
  return deltaMs / 1_000;
}
