import { Request, Response, NextFunction, RequestHandler } from 'express';
import { logger } from '../config/logger';
import { ErrorResponse } from '../types/api';

export interface AppError extends Error {
    statusCode?: number;
    isOperational?: boolean;
    /** Set by the body parser on malformed payloads. */
    type?: string;
}

export class ValidationError extends Error {
    statusCode = 400;
    isOperational = true;

    constructor(message: string) {
        super(message);
        this.name = 'ValidationError';
    }
}

export class UnauthorizedError extends Error {
    statusCode = 401;
    isOperational = true;

    constructor(message: string = 'Unauthorized') {
        super(message);
        this.name = 'UnauthorizedError';
    }
}

export class NotFoundError extends Error {
    statusCode = 404;
    isOperational = true;

    constructor(message: string) {
        super(message);
        this.name = 'NotFoundError';
    }
}

export class DatabaseError extends Error {
    statusCode = 500;
    isOperational = true;

    constructor(message: string) {
        super(message);
        this.name = 'DatabaseError';
    }
}

export class UpstreamServiceError extends Error {
    statusCode = 502;
    isOperational = true;

    constructor(message: string) {
        super(message);
        this.name = 'UpstreamServiceError';
    }
}

const toClientMessage = (err: AppError, statusCode: number): string => {
    if (err.type == 'entity.parse.failed') {
        return 'Request body is not valid JSON';
    }
    if (err.isOperational) {
        return err.message;
    }
    if (statusCode < 500) {
        return err.message || 'Bad request';
    }
    return `Internal error: ${err.message || 'unexpected failure'}`;
};

export const errorHandler = (
    err: AppError,
    req: Request,
    res: Response,
    // express only treats four-argument middleware as an error handler
    next: NextFunction
): void => {
    // body-parser errors carry their HTTP status in `status`
    const parserStatus = 'status' in err && typeof err.status == 'number' ? err.status : undefined;
    const statusCode = err.statusCode ?? parserStatus ?? 500;

    const logMeta = {
        message: err.message,
        stack: err.stack,
        statusCode,
        path: req.path,
        method: req.method,
        requestId: res.locals.requestId
    };

    if (statusCode >= 500) {
        logger.error('API error occurred:', logMeta);
    } else {
        logger.warn('Request rejected:', logMeta);
    }

    const errorResponse: ErrorResponse = {
        error: toClientMessage(err, statusCode)
    };

    res.status(statusCode).json(errorResponse);
};

export const asyncHandler = (fn: (req: Request, res: Response, next: NextFunction) => Promise<void>): RequestHandler => {
    return (req, res, next) => {
        Promise.resolve(fn(req, res, next)).catch(next);
    };
};
