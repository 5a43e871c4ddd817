export { Duration } from "./Duration";
export { Moment } from "./Moment";
export { createClock } from "./Clock";
export type { Clock } from "./Clock";
export { monotonicTimeSource } from "./TimeSource";
export type { TimeSource } from "./TimeSource";
