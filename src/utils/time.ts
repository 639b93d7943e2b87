import { performance } from "perf_hooks";

export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/** Monotonic milliseconds, suitable for measuring durations. */
export function now(): number {
  return performance.now();
}
