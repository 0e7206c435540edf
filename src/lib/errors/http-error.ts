/**
 * HttpError - Structured HTTP error handling for API responses
 *
 * Separates business logic errors from HTTP transport concerns.
 * Route handlers throw semantic errors, the app error handler turns them
 * into JSON responses.
 */
export class HttpError extends Error {
    public readonly name = 'HttpError';

    constructor(
        public readonly statusCode: 400 | 401 | 404 | 422 | 500,
        message: string,
        public readonly errorCode?: string,
        public readonly details?: Record<string, unknown>
    ) {
        super(message);

        // Maintain proper prototype chain for instanceof checks
        Object.setPrototypeOf(this, HttpError.prototype);
    }

    /**
     * Convert to JSON-serializable object for API responses
     */
    toJSON() {
        return {
            success: false as const,
            error: this.message,
            error_code: this.errorCode,
            ...(this.details && { data: this.details }),
        };
    }
}

/**
 * Factory methods for the HTTP error scenarios the bot's server produces
 */
export class HttpErrors {
    static badRequest(message: string, errorCode = 'BAD_REQUEST', details?: Record<string, unknown>) {
        return new HttpError(400, message, errorCode, details);
    }

    static notFound(message = 'Not found', errorCode = 'NOT_FOUND') {
        return new HttpError(404, message, errorCode);
    }

    static unprocessableEntity(message: string, errorCode = 'UNPROCESSABLE_ENTITY', details?: Record<string, unknown>) {
        return new HttpError(422, message, errorCode, details);
    }

    static internal(message = 'Internal server error', errorCode = 'INTERNAL_ERROR') {
        return new HttpError(500, message, errorCode);
    }
}

export function isHttpError(error: unknown): error is HttpError {
    return error instanceof HttpError;
}
