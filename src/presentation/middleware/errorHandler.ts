import { Request, Response, NextFunction } from 'express';
import { MulterError } from 'multer';
import { ServiceError, ServiceErrorCode } from '../../domain/errors/ServiceError';

/**
 * HTTP-level error with status code, for request validation in the routes.
 */
export class AppError extends Error {
    constructor(
        public readonly statusCode: number,
        message: string,
        public readonly code: string = 'INVALID_INPUT'
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
        super(404, message, 'NOT_FOUND');
        this.name = 'NotFoundError';
    }
}

/**
 * Bad request error (400).
 */
export class BadRequestError extends AppError {
    constructor(message: string = 'Bad request') {
        super(400, message, 'INVALID_INPUT');
        this.name = 'BadRequestError';
    }
}

/**
 * HTTP status for every service error code.
 */
export const STATUS_BY_CODE: Record<ServiceErrorCode, number> = {
    NOT_FOUND: 404,
    INVALID_INPUT: 400,
    INVALID_SOURCE: 400,
    DUPLICATE_AVATAR: 409,
    AVATAR_NOT_READY: 409,
    AVATAR_DEGRADED: 409,
    JOB_CANCELLED: 409,
    RESOURCE_EXHAUSTED: 503,
    INVOKER_TIMEOUT: 504,
    INVOKER_CRASHED: 502,
    OUTPUT_MISSING: 502,
    INTERNAL: 500,
};

/**
 * Error response structure.
 */
export interface ErrorResponse {
    error: {
        message: string;
        code: string;
    };
}

/**
 * Global error handler middleware.
 */
export function errorHandler(
    err: Error,
    req: Request,
    res: Response,
    _next: NextFunction
): void {
    const { status, code } = classify(err);

    if (status < 500) {
        console.warn(`[WARN] ${err.name}: ${err.message} (${req.method} ${req.path})`);
    } else {
        console.error(`[ERROR] ${err.name}: ${err.message}`);
        if (err.stack) {
            console.error(err.stack);
        }
    }

    if (res.headersSent) {
        return;
    }

    const hideMessage = code === 'INTERNAL' && process.env.NODE_ENV === 'production';
    const response: ErrorResponse = {
        error: {
            message: hideMessage ? 'Internal server error' : err.message,
            code,
        },
    };
    res.status(status).json(response);
}

function classify(err: Error): { status: number; code: string } {
    if (err instanceof ServiceError) {
        return { status: STATUS_BY_CODE[err.code], code: err.code };
    }
    if (err instanceof AppError) {
        return { status: err.statusCode, code: err.code };
    }
    if (err instanceof MulterError) {
        return { status: err.code === 'LIMIT_FILE_SIZE' ? 413 : 400, code: 'INVALID_INPUT' };
    }
    // express.json() parse failures carry a 4xx status
    if (err instanceof SyntaxError && 'status' in err && err.status === 400) {
        return { status: 400, code: 'INVALID_INPUT' };
    }
    return { status: 500, code: 'INTERNAL' };
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
