import type { LogLevel } from '../types.js';

const LEVEL_WEIGHT: Record<LogLevel, number> = {
    debug: 10,
    info: 20,
    warn: 30,
    error: 40,
};

export const isLogLevel = (value: string): value is LogLevel => Object.hasOwn(LEVEL_WEIGHT, value);

// Error instances have no enumerable fields, so JSON.stringify would drop them.
const serialize = (value: unknown): unknown => {
    if (value instanceof Error) {
        return { name: value.name, message: value.message, stack: value.stack };
    }
    if (Array.isArray(value)) return value.map(serialize);
    if (value && typeof value === 'object') {
        return Object.fromEntries(Object.entries(value).map(([k, v]) => [k, serialize(v)]));
    }
    return value;
};

class LoggerService {
    private threshold: LogLevel = process.env.NODE_ENV === 'test' ? 'warn' : 'info';

    setLevel(level: LogLevel) {
        this.threshold = level;
    }

    getLevel(): LogLevel {
        return this.threshold;
    }

    debug(message: string, meta?: Record<string, unknown>) {
        this.write('debug', message, meta);
    }

    info(message: string, meta?: Record<string, unknown>) {
        this.write('info', message, meta);
    }

    warn(message: string, meta?: Record<string, unknown>) {
        this.write('warn', message, meta);
    }

    error(message: string, meta?: Record<string, unknown>) {
        this.write('error', message, meta);
    }

    private write(level: LogLevel, message: string, meta?: Record<string, unknown>) {
        if (LEVEL_WEIGHT[level] < LEVEL_WEIGHT[this.threshold]) return;

        const entry = {
            timestamp: new Date().toISOString(),
            level,
            message,
            ...(meta ? { meta: serialize(meta) } : {}),
        };
        const line = JSON.stringify(entry);

        if (level === 'error') console.error(line);
        else console.log(line);
    }
}

export const loggerService = new LoggerService();
