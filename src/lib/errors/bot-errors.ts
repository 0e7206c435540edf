/**
 * Bot Error Types
 *
 * Categorized errors raised by configuration, encoding and the dispatcher.
 * Each carries a stable `code` that shows up in logs and HTTP error bodies.
 */

import type { CodeKind } from '@src/lib/encoder/serial.js';

/**
 * Base class for all bot errors
 */
export abstract class LabelBotError extends Error {
    public readonly code: string;

    constructor(message: string, code: string, options?: ErrorOptions) {
        super(message, options);
        this.name = this.constructor.name;
        this.code = code;
        Error.captureStackTrace?.(this, this.constructor);
    }
}

/**
 * ConfigError - missing or malformed environment configuration, fatal at startup
 */
export class ConfigError extends LabelBotError {
    constructor(message: string, public readonly variable: string) {
        super(message, 'CONFIG_ERROR');
    }
}

/**
 * InvalidSerialError - the serial is empty after trimming
 */
export class InvalidSerialError extends LabelBotError {
    constructor(message = 'Serial number is empty') {
        super(message, 'INVALID_SERIAL');
    }
}

/**
 * SessionExpiredError - a reply button was pressed but no serial is stored
 * for the user (never sent one, expired, or the process restarted)
 */
export class SessionExpiredError extends LabelBotError {
    constructor(public readonly sessionKey?: string) {
        super('No serial number in session; send one first', 'SESSION_EXPIRED');
    }
}

/**
 * EncodeError - the symbol library rejected the serial
 */
export class EncodeError extends LabelBotError {
    constructor(public readonly kind: CodeKind, cause: unknown) {
        const reason = cause instanceof Error ? cause.message : String(cause);
        super(`Cannot encode serial as ${kind}: ${reason}`, 'ENCODE_FAILED', { cause });
    }
}

/**
 * MetricsError - the metrics server refused a request that must succeed (registration)
 */
export class MetricsError extends LabelBotError {
    constructor(message: string, public readonly status?: number) {
        super(message, 'METRICS_ERROR');
    }
}
