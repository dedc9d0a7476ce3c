import { Request, Response, NextFunction } from 'express';
import { ApiError, ApiErrorCode, ValidationError } from '../../domain/errors';

/**
 * Application-specific error with status code.
 */
export class AppError extends Error {
    constructor(
        public readonly statusCode: number,
        message: string
    ) {
        super(message);
        this.name = 'AppError';
    }
}

/**
 * Not found error (404).
 */
export class NotFoundError extends AppError {
    constructor(message: string = 'Resource not found') {
        super(404, message);
        this.name = 'NotFoundError';
    }
}

/**
 * Bad request error (400).
 */
export class BadRequestError extends AppError {
    constructor(message: string = 'Bad request') {
        super(400, message);
        this.name = 'BadRequestError';
    }
}

/**
 * Error response structure.
 */
export interface ErrorResponse {
    error: {
        message: string;
        code: string;
        hint?: string;
        field?: string;
    };
}

const API_ERROR_STATUS: Record<ApiErrorCode, number> = {
    Unauthorized: 401,
    RateLimited: 429,
    BadRequest: 400,
    ServerError: 502,
    NetworkError: 504,
    EmptyResult: 502,
};

/**
 * Global error handler middleware.
 */
export function errorHandler(
    err: Error,
    req: Request,
    res: Response,
    _next: NextFunction
): void {
    if (err instanceof ValidationError) {
        console.warn(`[WARN] ${err.code}: ${err.message} (${req.method} ${req.path})`);
        const response: ErrorResponse = {
            error: { message: err.message, code: err.code, field: err.field },
        };
        res.status(400).json(response);
        return;
    }

    if (err instanceof ApiError) {
        console.error(`[ERROR] ${err.code}: ${err.message}`);
        const response: ErrorResponse = {
            error: { message: err.message, code: err.code, hint: err.hint },
        };
        res.status(API_ERROR_STATUS[err.code]).json(response);
        return;
    }

    if (err instanceof NotFoundError) {
        console.warn(`[WARN] ${err.name}: ${err.message} (${req.method} ${req.path})`);
    } else {
        console.error(`[ERROR] ${err.name}: ${err.message}`);
        if (err.stack) {
            console.error(err.stack);
        }
    }

    if (err instanceof AppError) {
        const response: ErrorResponse = {
            error: {
                message: err.message,
                code: err.name,
            },
        };
        res.status(err.statusCode).json(response);
        return;
    }

    // body-parser rejects oversized or malformed JSON with a status of its own
    const status = httpStatusOf(err);
    if (status !== undefined && status >= 400 && status < 500) {
        const response: ErrorResponse = {
            error: { message: err.message, code: 'INVALID_REQUEST_BODY' },
        };
        res.status(status).json(response);
        return;
    }

    // Generic server error
    const response: ErrorResponse = {
        error: {
            message: process.env.NODE_ENV === 'production'
                ? 'Internal server error'
                : err.message,
            code: 'INTERNAL_ERROR',
        },
    };
    res.status(500).json(response);
}

function httpStatusOf(err: Error): number | undefined {
    const status: unknown = 'status' in err ? err.status : undefined;
    return typeof status === 'number' ? status : undefined;
}

/**
 * Async route handler wrapper to catch errors.
 */
export function asyncHandler(
    fn: (req: Request, res: Response, next: NextFunction) => Promise<void>
) {
    return (req: Request, res: Response, next: NextFunction) => {
        return Promise.resolve(fn(req, res, next)).catch(next);
    };
}
