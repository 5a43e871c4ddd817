import { Moment } from "./Moment";
import { TimeSource, monotonicTimeSource } from "./TimeSource";

export interface Clock {
  now(): Moment;
}

/** Binds a time source, so code that reads the time can take a fake clock in tests. */
export function createClock(source: TimeSource = monotonicTimeSource): Clock {
  return {
    now: () => Moment.now(source),
  };
}
