/**
 * Logger
 * Level-filtered, tag-prefixed logging with structured metadata.
 * Writes to stderr so CLI reports on stdout stay clean.
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

const LEVEL_ORDER: Record<LogLevel, number> = {
    debug: 10,
    info: 20,
    warn: 30,
    error: 40,
    silent: 100
};

const DEFAULT_LEVEL: LogLevel = 'warn';

export function isLogLevel(value: string): value is LogLevel {
    return Object.hasOwn(LEVEL_ORDER, value);
}

function serialize(meta: unknown): string {
    if (meta instanceof Error) {
        return meta.stack || `${meta.name}: ${meta.message}`;
    }
    if (typeof meta === 'string') return meta;
    try {
        return JSON.stringify(meta);
    } catch {
        return String(meta);
    }
}

export class Logger {
    private level: LogLevel;

    constructor(level: string = process.env.LOG_LEVEL || DEFAULT_LEVEL) {
        this.level = isLogLevel(level) ? level : DEFAULT_LEVEL;
    }

    setLevel(level: LogLevel): void {
        this.level = level;
    }

    getLevel(): LogLevel {
        return this.level;
    }

    debug(message: string, meta?: unknown): void {
        this.write('debug', message, meta);
    }

    info(message: string, meta?: unknown): void {
        this.write('info', message, meta);
    }

    warn(message: string, meta?: unknown): void {
        this.write('warn', message, meta);
    }

    error(message: string, meta?: unknown): void {
        this.write('error', message, meta);
    }

    private write(level: Exclude<LogLevel, 'silent'>, message: string, meta?: unknown): void {
        if (LEVEL_ORDER[level] < LEVEL_ORDER[this.level]) return;

        const line = `${new Date().toISOString()} ${level.toUpperCase()} ${message}`;
        process.stderr.write(meta === undefined ? `${line}\n` : `${line} ${serialize(meta)}\n`);
    }
}

export const logger = new Logger();

export default logger;
