import { timingSafeEqual } from 'crypto';
import { Request, Response, NextFunction } from 'express';
import { UnauthorizedError } from './errorHandler';

export const FUNCTION_KEY_HEADER = 'x-functions-key';

const keysMatch = (presented: string, expected: string): boolean => {
    const a = Buffer.from(presented);
    const b = Buffer.from(expected);
    return a.length == b.length && timingSafeEqual(a, b);
};

/**
 * Function-level authorization: the caller presents the shared key either in
 * the `x-functions-key` header or in the `code` query parameter.
 * Without a configured key every request passes.
 */
export const requireFunctionKey = (functionKey?: string) => {
    return (req: Request, res: Response, next: NextFunction): void => {
        if (!functionKey) {
            return next();
        }

        const fromQuery = typeof req.query.code == 'string' ? req.query.code : undefined;
        const fromHeader = req.get(FUNCTION_KEY_HEADER);
        const presented = fromHeader ? fromHeader : fromQuery;

        if (presented === undefined || !keysMatch(presented, functionKey)) {
            return next(new UnauthorizedError());
        }

        next();
    };
};
