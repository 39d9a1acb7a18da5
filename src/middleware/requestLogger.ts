import { Request, Response, NextFunction } from 'express';
import { v4 as uuidv4 } from 'uuid';
import { logger } from '../config/logger';

export const REQUEST_ID_HEADER = 'x-request-id';

export const requestLogger = (req: Request, res: Response, next: NextFunction): void => {
    const incoming = req.get(REQUEST_ID_HEADER);
    const requestId = incoming && incoming.trim() != '' ? incoming : uuidv4();

    res.locals.requestId = requestId;
    res.setHeader(REQUEST_ID_HEADER, requestId);

    logger.info(`${req.method} ${req.path}`, {
        requestId,
        ip: req.ip,
        userAgent: req.get('User-Agent'),
        body: req.method == 'POST' ? req.body : undefined
    });

    next();
};
