import { Request, Response, NextFunction } from 'express';
import { ValidationError } from '../../domain/entities/PostGeneration';
import { GenerationError } from '../../application/PostGenerator';
import { SessionBusyError } from '../../application/PostSession';

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
 * Conflict error (409).
 */
export class ConflictError extends AppError {
    constructor(message: string = 'Conflict') {
        super(409, message);
        this.name = 'ConflictError';
    }
}

/**
 * Upstream text generation failed (502).
 */
export class BadGatewayError extends AppError {
    constructor(message: string = 'Upstream service failed') {
        super(502, message);
        this.name = 'BadGatewayError';
    }
}

/**
 * Error response structure.
 */
interface ErrorResponse {
    error: {
        message: string;
        code: string;
        step?: string;
    };
}

/**
 * express.json() rejects unparsable bodies with a SyntaxError tagged
 * `entity.parse.failed`.
 */
function isBodyParseError(err: Error): boolean {
    return 'type' in err && err.type === 'entity.parse.failed';
}

/**
 * Maps domain and application errors onto HTTP errors.
 */
export function toAppError(err: Error): AppError | null {
    if (err instanceof AppError) return err;
    if (isBodyParseError(err)) return new BadRequestError('Request body must be valid JSON');
    if (err instanceof ValidationError) return new BadRequestError(err.message);
    if (err instanceof SessionBusyError) return new ConflictError(err.message);
    if (err instanceof GenerationError) return new BadGatewayError(err.message);
    return null;
}

/**
 * Global error handler middleware.
 */
export function errorHandler(
    err: Error,
    req: Request,
    res: Response,
    next: NextFunction
): void {
    const appError = toAppError(err);

    if (appError instanceof NotFoundError) {
        console.warn(`[WARN] ${appError.name}: ${appError.message} (${req.method} ${req.path})`);
    } else {
        console.error(`[ERROR] ${err.name}: ${err.message}`);
        if (err.stack && !appError) {
            console.error(err.stack);
        }
    }

    if (appError) {
        const response: ErrorResponse = {
            error: {
                message: appError.message,
                code: appError.name,
                ...(err instanceof GenerationError && { step: err.step }),
            },
        };
        res.status(appError.statusCode).json(response);
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
