export type FixedqErrorCode = "INVALID_CONFIGURATION" | "INDEX_OUT_OF_RANGE";

/**
 * Base class for every error thrown by fixedq. The `.code` field discriminates
 * the specific error.
 *
 * Only programming mistakes end up here. A full queue or an empty queue is an
 * expected outcome and is reported through return values instead.
 */
export abstract class FixedqError extends Error {
    abstract readonly _tag: string;
    abstract readonly code: FixedqErrorCode;

    constructor(message: string, options?: { cause?: unknown }) {
        super(message, options);
        this.name = new.target.name;
    }
}

/** Thrown when a capacity or length is not usable, at construction time. */
export class ConfigurationError extends FixedqError {
    readonly _tag = "ConfigurationError" as const;
    readonly code = "INVALID_CONFIGURATION" as const;
}

export class IndexOutOfRangeError extends FixedqError {
    readonly _tag = "IndexOutOfRangeError" as const;
    readonly code = "INDEX_OUT_OF_RANGE" as const;

    constructor(
        message: string,
        readonly index: number,
        readonly length: number,
    ) {
        super(`${message} (index ${index}, length ${length})`);
    }
}
