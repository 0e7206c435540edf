/**
 * Standalone Logger Utility
 *
 * Provides consistent logging with environment-aware formatting.
 * The level threshold comes from LOG_LEVEL and is read on every call so
 * tests and the entry point can change it after import.
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';
export type LogMeta = Record<string, unknown>;

const LEVEL_ORDER: Record<LogLevel | 'silent', number> = {
    debug: 10,
    info: 20,
    warn: 30,
    error: 40,
    silent: 100,
};

function isThreshold(value: string): value is LogLevel | 'silent' {
    return value in LEVEL_ORDER;
}

function currentThreshold(): number {
    const configured = (process.env.LOG_LEVEL || 'info').toLowerCase();
    return isThreshold(configured) ? LEVEL_ORDER[configured] : LEVEL_ORDER.info;
}

export class Logger {
    constructor(private readonly scope?: string) {}

    /**
     * Create a logger whose messages are prefixed with a scope, e.g. "bot" or "http"
     */
    child(scope: string): Logger {
        return new Logger(this.scope ? `${this.scope}:${scope}` : scope);
    }

    debug(message: string, meta?: LogMeta): void {
        if (this.enabled('debug')) {
            console.debug(this.formatLog('DEBUG', message, meta));
        }
    }

    info(message: string, meta?: LogMeta): void {
        if (this.enabled('info')) {
            console.info(this.formatLog('INFO', message, meta));
        }
    }

    warn(message: string, meta?: LogMeta): void {
        if (this.enabled('warn')) {
            console.warn(this.formatLog('WARN', message, meta));
        }
    }

    error(message: string, meta?: LogMeta): void {
        if (this.enabled('error')) {
            console.error(this.formatLog('ERROR', message, meta));
        }
    }

    /**
     * Log timing data with calculated elapsed time using hrtime precision
     * Takes start time from process.hrtime.bigint() and calculates duration
     */
    time(label: string, startTime: bigint, meta: LogMeta = {}): void {
        const durationMs = Number(process.hrtime.bigint() - startTime) / 1_000_000;
        this.info(label, { ...meta, durationMs: Math.round(durationMs * 100) / 100 });
    }

    private enabled(level: LogLevel): boolean {
        return LEVEL_ORDER[level] >= currentThreshold();
    }

    /**
     * Format log message with environment-aware output
     */
    private formatLog(level: string, message: string, meta?: LogMeta): string {
        const scoped = this.scope ? `[${this.scope}] ${message}` : message;

        if (process.env.NODE_ENV === 'production') {
            // Structured JSON for production log aggregation
            return JSON.stringify({
                timestamp: new Date().toISOString(),
                level,
                ...(this.scope && { scope: this.scope }),
                message,
                ...meta,
            });
        }

        // Pretty format for development
        const metaStr = meta && Object.keys(meta).length > 0 ? ` ${JSON.stringify(meta)}` : '';
        return `${level} ${scoped}${metaStr}`;
    }
}

/**
 * Turn any thrown value into loggable metadata
 */
export function describeError(error: unknown): LogMeta {
    if (error instanceof Error) {
        const code = 'code' in error && typeof error.code === 'string' ? error.code : undefined;
        return {
            error: error.message,
            errorName: error.name,
            ...(code && { errorCode: code }),
            ...(error.cause !== undefined && { cause: error.cause instanceof Error ? error.cause.message : String(error.cause) }),
        };
    }
    return { error: String(error) };
}

/**
 * Global logger instance for infrastructure components
 * Use this when no scoped logger is handed in (startup, scripts, middleware)
 */
export const logger = new Logger();
