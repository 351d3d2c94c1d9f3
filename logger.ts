export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

const LEVELS: Record<LogLevel, number> = { debug: 10, info: 20, warn: 30, error: 40, silent: 100 };

function isLogLevel(value: string): value is LogLevel {
    return value in LEVELS;
}

function currentLevel(): LogLevel {
    const env = (process.env.LOG_LEVEL || 'info').toLowerCase();
    return isLogLevel(env) ? env : 'info';
}

export type Logger = {
    debug(message: string): void;
    info(message: string): void;
    warn(message: string): void;
    error(message: string, err?: unknown): void;
};

function enabled(level: LogLevel): boolean {
    return LEVELS[level] >= LEVELS[currentLevel()];
}

/**
 * Console logger tagged with the module it belongs to. The level is read from
 * LOG_LEVEL on every call so tests and the CLI can change it at runtime.
 */
export function getLogger(tag: string): Logger {
    const prefix = `[${tag}]`;
    return {
        debug(message) {
            if (enabled('debug')) console.debug(prefix, message);
        },
        info(message) {
            if (enabled('info')) console.log(prefix, message);
        },
        warn(message) {
            if (enabled('warn')) console.warn(prefix, message);
        },
        error(message, err) {
            if (!enabled('error')) return;
            if (err === undefined) console.error(prefix, message);
            else console.error(prefix, message, err instanceof Error ? err.message : err);
        },
    };
}
