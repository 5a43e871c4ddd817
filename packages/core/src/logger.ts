export type LogLevel = "debug" | "info" | "warn" | "error";

export type Logger = {
    [Level in LogLevel]: (message: string, extra?: Record<string, unknown>) => void;
};

/**
 * Logger that writes to the console. Pass it in the queue options to see
 * rejections and evictions while debugging.
 */
export const consoleLogger: Logger = {
    debug: (message, extra) => {
        console.debug(message, extra ?? "");
    },
    info: (message, extra) => {
        console.info(message, extra ?? "");
    },
    warn: (message, extra) => {
        console.warn(message, extra ?? "");
    },
    error: (message, extra) => {
        console.error(message, extra ?? "");
    },
};

const noop = (): void => {};

/** Default logger: drops everything. */
export const silentLogger: Logger = {
    debug: noop,
    info: noop,
    warn: noop,
    error: noop,
};
