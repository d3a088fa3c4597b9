import winston from 'winston';

const { combine, timestamp, printf, colorize, errors } = winston.format;

const consoleFormat = printf(({ timestamp, level, message, stack }) => {
  const line = `${timestamp} [${level}]: ${message}`;
  return typeof stack === 'string' ? `${line}\n${stack}` : line;
});

const logger = winston.createLogger({
  level: process.env.LOG_LEVEL || 'info',
  format: combine(errors({ stack: true }), timestamp()),
  transports: [
    new winston.transports.Console({
      format: combine(colorize(), consoleFormat),
      silent: process.env.NODE_ENV === 'test',
    }),
  ],
});

/**
 * Applies the configured level once config has been validated.
 */
export const setLogLevel = (level: string): void => {
  logger.level = level;
};

export default logger;
