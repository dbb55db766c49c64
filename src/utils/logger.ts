import path from 'path';
import winston from 'winston';
import { config } from '../config.js';

/**
 * Console lines: `21:30:04 info [mystery] message {meta}`.
 * Levels are colorized by winston before this runs.
 */
const consoleLine = winston.format.printf(({ level, message, timestamp, ...meta }) => {
    const extra = Object.keys(meta).length > 0 ? ` ${JSON.stringify(meta)}` : '';
    return `${String(timestamp)} ${level} [mystery] ${String(message)}${extra}`;
});

export const logger = winston.createLogger({
    level: config.logging.level,
    silent: config.logging.silent,
    format: winston.format.combine(
        winston.format.timestamp({ format: 'HH:mm:ss' }),
        winston.format.json()
    ),
    transports: config.logging.silent ? [] : [
        new winston.transports.File({ filename: path.join(config.logging.dir, 'error.log'), level: 'error' }),
        new winston.transports.File({ filename: path.join(config.logging.dir, 'combined.log') }),
    ],
});

if (config.env !== 'production' && !config.logging.silent) {
    logger.add(new winston.transports.Console({
        format: winston.format.combine(
            winston.format.colorize(),
            winston.format.timestamp({ format: 'HH:mm:ss' }),
            consoleLine
        ),
    }));
}
