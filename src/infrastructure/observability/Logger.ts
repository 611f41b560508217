/**
 * Logger - Structured logging interface and implementation.
 *
 * Entries are JSON lines carrying a level, a message and merged context.
 * Child loggers extend the context and share the parent's sink and level.
 */

export const LOG_LEVELS = ['debug', 'info', 'warn', 'error'] as const;
export type LogLevel = (typeof LOG_LEVELS)[number];

export interface LogContext {
    service?: string;
    component?: string;
    operation?: string;
    entityType?: string;
    entityId?: string;
    path?: string;
    durationMs?: number;
    [key: string]: unknown;
}

export interface ILogger {
    debug(message: string, context?: LogContext): void;
    info(message: string, context?: LogContext): void;
    warn(message: string, context?: LogContext): void;
    error(message: string, error?: Error, context?: LogContext): void;

    /**
     * Creates a child logger with inherited context.
     */
    child(context: LogContext): ILogger;
}

export function isLogLevel(value: unknown): value is LogLevel {
    return typeof value === 'string' && LOG_LEVELS.some(level => level === value);
}

/**
 * Receives one formatted JSON line per entry.
 */
export type LogSink = (level: LogLevel, line: string) => void;

const consoleSink: LogSink = (level, line) => {
    console[level](line);
};

export interface ConsoleLoggerOptions {
    /** Fields merged into every entry */
    context?: LogContext;
    /** Entries below this level are dropped (default: debug) */
    minLevel?: LogLevel;
    /** Where lines go (default: the console method named by the level) */
    sink?: LogSink;
}

/**
 * Structured logger writing one JSON object per line.
 */
export class ConsoleLogger implements ILogger {
    private readonly context: LogContext;
    private readonly minLevel: LogLevel;
    private readonly sink: LogSink;

    constructor(options: ConsoleLoggerOptions = {}) {
        this.context = options.context ?? {};
        this.minLevel = options.minLevel ?? 'debug';
        this.sink = options.sink ?? consoleSink;
    }

    debug(message: string, context?: LogContext): void {
        this.write('debug', message, context);
    }

    info(message: string, context?: LogContext): void {
        this.write('info', message, context);
    }

    warn(message: string, context?: LogContext): void {
        this.write('warn', message, context);
    }

    error(message: string, error?: Error, context?: LogContext): void {
        this.write('error', message, error ? { ...context, error: describeError(error) } : context);
    }

    child(context: LogContext): ILogger {
        return new ConsoleLogger({
            context: { ...this.context, ...context },
            minLevel: this.minLevel,
            sink: this.sink,
        });
    }

    private write(level: LogLevel, message: string, context?: LogContext): void {
        if (LOG_LEVELS.indexOf(level) < LOG_LEVELS.indexOf(this.minLevel)) {
            return;
        }

        // Undefined fields are left out by JSON.stringify.
        this.sink(level, JSON.stringify({
            timestamp: new Date().toISOString(),
            level,
            message,
            ...this.context,
            ...context,
        }));
    }
}

/**
 * Plain-object form of an error, following `cause` chains.
 */
export function describeError(error: Error): LogContext {
    const described: LogContext = { name: error.name, message: error.message };
    if ('code' in error && typeof error.code === 'string') {
        described.code = error.code;
    }
    if (error.cause instanceof Error) {
        described.cause = describeError(error.cause);
    }
    described.stack = error.stack;
    return described;
}

/**
 * No-op logger for testing or when logging is disabled.
 */
export class NullLogger implements ILogger {
    debug(_message: string, _context?: LogContext): void {}
    info(_message: string, _context?: LogContext): void {}
    warn(_message: string, _context?: LogContext): void {}
    error(_message: string, _error?: Error, _context?: LogContext): void {}
    child(_context: LogContext): ILogger {
        return this;
    }
}
