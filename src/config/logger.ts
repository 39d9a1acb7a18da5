import winston from 'winston';
import { settings } from './settings';

export const logger = winston.createLogger({
    level: settings.logLevel,
    silent: settings.nodeEnv == 'test',

    format: winston.format.combine(
        winston.format.timestamp({
            format: 'YYYY-MM-DD HH:mm:ss'
        }),

        winston.format.errors({ stack: true }),

        winston.format.colorize({ all: true }),

        winston.format.printf(({ timestamp, level, message, stack, ...meta }) => {
            let log = `${timestamp} [${level}]: ${message}`;

            if (Object.keys(meta).length > 0) {
                log += ` ${JSON.stringify(meta)}`;
            }

            if (stack) {
                log += `\n${stack}`;
            }

            return log;
        })
    ),

    transports: [
        new winston.transports.Console({
            level: settings.logLevel
        })
    ]
});

if (settings.nodeEnv == 'production') {
    logger.add(new winston.transports.File({
        filename: 'logs/error.log',
        level: 'error'
    }));

    logger.add(new winston.transports.File({
        filename: 'logs/combined.log'
    }));
}
