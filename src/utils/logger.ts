import winston from 'winston';
import { DEBUG } from '../constants';

const logLevel = DEBUG ? 'debug' : 'info';

export const logger = winston.createLogger({
  level: logLevel,
  format: winston.format.combine(
    winston.format.timestamp(),
    winston.format.errors({ stack: true }),
    winston.format.splat(),
    winston.format.printf(({ timestamp, level, message, ...meta }) => {
      const metaStr = Object.keys(meta).length ? ` ${JSON.stringify(meta)}` : '';
      return `${timestamp} [Strata] ${level.toUpperCase()}: ${message}${metaStr}`;
    })
  ),
  silent: process.env.NODE_ENV === 'test' && !DEBUG,
  transports: [new winston.transports.Console()]
});

// Export convenience methods
export const info = logger.info.bind(logger);
export const warn = logger.warn.bind(logger);
export const debug = logger.debug.bind(logger);
