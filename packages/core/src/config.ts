import { z } from "zod";
import { ConfigurationError } from "./errors";

// Every slot is allocated up front; larger rings exhaust the default heap.
export const MAX_CAPACITY = 2 ** 20;

export const CapacitySchema = z
    .number({ invalid_type_error: "capacity must be a number" })
    .int("capacity must be an integer")
    .positive("capacity must be greater than 0")
    .max(MAX_CAPACITY, `capacity must be at most ${MAX_CAPACITY}`);

export const QueueConfigSchema = z.object({
    capacity: CapacitySchema,
});

export type QueueConfig = z.infer<typeof QueueConfigSchema>;

/**
 * Validates a capacity or length fixed at construction.
 * @throws ConfigurationError listing every failed rule.
 */
export function parseCapacity(capacity: number, label: string = "capacity"): number {
    const result = QueueConfigSchema.safeParse({ capacity });
    if (!result.success) {
        const reasons = result.error.issues.map((issue) => issue.message.replace(/^capacity/, label));
        throw new ConfigurationError(`Invalid ${label} ${String(capacity)}: ${reasons.join("; ")}`, {
            cause: result.error,
        });
    }
    return result.data.capacity;
}
