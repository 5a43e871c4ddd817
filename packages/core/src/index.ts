// Core
export { BoundedQueue } from "./queue/BoundedQueue";
export type { BoundedQueueOptions } from "./queue/BoundedQueue";
export { Option, plainLifecycle } from "./option/Option";
export type { ValueLifecycle } from "./option/Option";

// Types
export type { BoundedQueueEventMap } from "./types/QueueEvents";

// Configuration
export { MAX_CAPACITY, CapacitySchema, QueueConfigSchema, parseCapacity } from "./config";
export type { QueueConfig } from "./config";

// Errors
export { FixedqError, ConfigurationError, IndexOutOfRangeError } from "./errors";
export type { FixedqErrorCode } from "./errors";

// Logging
export { consoleLogger, silentLogger } from "./logger";
export type { Logger, LogLevel } from "./logger";
