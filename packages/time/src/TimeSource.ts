import { performance } from "node:perf_hooks";

/** Milliseconds elapsed since an arbitrary, fixed origin. Must never go backwards. */
export type TimeSource = () => number;

export const monotonicTimeSource: TimeSource = () => Math.floor(performance.now());

// Math.trunc(-0.4) is -0; keep whole milliseconds free of negative zero.
export function toWholeMillis(value: number): number {
  const millis = Math.trunc(value);
  return millis === 0 ? 0 : millis;
}

export function compareMillis(a: number, b: number): -1 | 0 | 1 {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}
