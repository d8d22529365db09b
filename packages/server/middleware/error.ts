import type { NotFoundResponse, ServerErrorResponse } from '@transcript-relay/shared';
import { TRANSCRIPT_SOURCES } from '@transcript-relay/shared';
import type { Request, Response, NextFunction, ErrorRequestHandler } from 'express';
import { log } from '../lib/logger.js';

// Errors raised by body-parser and http-errors carry their HTTP status
interface HttpError extends Error {
    statusCode?: number;
    status?: number;
    type?: string;
}

function isHttpError(error: unknown): error is HttpError {
    return error instanceof Error;
}

function resolveStatus(error: HttpError): number {
    const status = error.statusCode ?? error.status;
    return status !== undefined && status >= 400 && status < 600 ? status : 500;
}

/**
 * Global error handling middleware
 * Answers every uncaught error with `{ error, source: 'ServerError' }`
 */
export const errorHandler = (
    error: unknown,
    req: Request,
    res: Response,
    _next: NextFunction
): void => {
    const normalized: HttpError = isHttpError(error) ? error : new Error(String(error));
    const statusCode = resolveStatus(normalized);

    log.error('http', 'Unhandled error while serving request', normalized, {
        method: req.method,
        path: req.originalUrl,
        status: statusCode
    });

    const errorResponse: ServerErrorResponse = {
        error: normalized.message || 'An unexpected error occurred',
        source: TRANSCRIPT_SOURCES.SERVER_ERROR
    };

    res.status(statusCode).json(errorResponse);
};

/**
 * Turn any request body failure into a plain-text 400
 * Mount right after `express.json()` on the routes that need it
 *
 * body-parser tags its errors with `type` (entity.parse.failed,
 * entity.too.large, charset.unsupported, encoding.unsupported, ...).
 */
export const jsonBodyErrorHandler = (message: string): ErrorRequestHandler => {
    return (error: unknown, _req: Request, res: Response, next: NextFunction): void => {
        if (isHttpError(error) && typeof error.type === 'string') {
            res.status(400).type('text/plain').send(message);
            return;
        }
        next(error);
    };
};

/**
 * 404 Not Found handler
 * Handles requests to non-existent endpoints
 */
export const notFoundHandler = (_req: Request, res: Response): void => {
    const errorResponse: NotFoundResponse = {
        error: 'Endpoint not found',
        code: 'ENDPOINT_NOT_FOUND'
    };

    res.status(404).json(errorResponse);
};

/**
 * Async error wrapper
 * Wraps async route handlers to catch errors automatically
 */
export const asyncHandler = (
    fn: (req: Request, res: Response, next: NextFunction) => Promise<void>
) => {
    return (req: Request, res: Response, next: NextFunction): void => {
        Promise.resolve(fn(req, res, next)).catch(next);
    };
};
