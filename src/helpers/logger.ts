export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

const LEVEL_ORDER: Record<LogLevel, number> = {
    debug: 10,
    info: 20,
    warn: 30,
    error: 40,
};

let currentLevel: LogLevel = 'info';

export function setLogLevel(level: LogLevel): void {
    currentLevel = level;
}

function enabled(level: LogLevel): boolean {
    return LEVEL_ORDER[level] >= LEVEL_ORDER[currentLevel];
}

/**
 * Console logger with a level threshold. Messages keep the emoji prefixes
 * callers pass in; errors are always printed along with the error object.
 */
export const logger = {
    debug: (message: string, ...data: unknown[]): void => {
        if (enabled('debug')) console.debug(message, ...data);
    },

    info: (message: string, ...data: unknown[]): void => {
        if (enabled('info')) console.log(message, ...data);
    },

    warn: (message: string, ...data: unknown[]): void => {
        if (enabled('warn')) console.warn(message, ...data);
    },

    error: (message: string, error?: unknown): void => {
        if (error === undefined) {
            console.error(message);
        } else {
            console.error(message, error);
        }
    },
};
