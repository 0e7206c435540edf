import type { Context } from 'hono';
import { EncodeError, InvalidSerialError } from '@src/lib/errors/bot-errors.js';
import { HttpError, HttpErrors, isHttpError } from '@src/lib/errors/http-error.js';
import { describeError, logger } from '@src/lib/logger.js';

/**
 * API Response Helpers
 *
 * Response envelopes shared by the bot's HTTP routes and the error handler.
 */

export interface ApiSuccessResponse<T> {
    success: true;
    data: T;
}

export interface ApiErrorResponse {
    success: false;
    error: string;
    error_code?: string;
    data?: Record<string, unknown>;
}

export function createSuccessResponse<T>(c: Context, data: T) {
    const body: ApiSuccessResponse<T> = { success: true, data };
    return c.json(body, 200);
}

/**
 * Map domain errors to HTTP semantics; anything unknown becomes a 500
 */
export function toHttpError(error: unknown): HttpError {
    if (isHttpError(error)) {
        return error;
    }
    if (error instanceof InvalidSerialError || error instanceof EncodeError) {
        return HttpErrors.unprocessableEntity(error.message, error.code);
    }
    return HttpErrors.internal(error instanceof Error ? error.message : String(error));
}

/**
 * Error handler for app.onError: JSON body, stack details only in development
 */
export function createErrorResponse(c: Context, error: unknown) {
    const httpError = toHttpError(error);

    if (httpError.statusCode >= 500) {
        logger.error('Unhandled error', { path: c.req.path, ...describeError(error) });
    } else {
        logger.warn('Request rejected', { path: c.req.path, status: httpError.statusCode, code: httpError.errorCode });
    }

    const body: ApiErrorResponse = httpError.toJSON();
    if (process.env.NODE_ENV === 'development' && error instanceof Error) {
        body.data = { ...body.data, name: error.name, stack: error.stack };
    }

    return c.json(body, httpError.statusCode);
}
