import { Response } from 'express';
import logger from './logger';
import { errorMessage, isAppError } from './errors';

/**
 * Logs a failed request and answers with the error's status. Unexpected
 * errors become a 500 carrying `fallbackMessage`.
 */
export const sendError = (
  res: Response,
  error: unknown,
  context: string,
  fallbackMessage = 'Request failed'
): void => {
  if (isAppError(error) && error.statusCode < 500) {
    logger.warn(`${context}: ${error.message}`);
    res.status(error.statusCode).json({ error: error.message });
    return;
  }

  logger.error(`${context}: ${errorMessage(error)}`, error);
  res.status(500).json({ error: fallbackMessage });
};

export const queryString = (value: unknown): string | undefined =>
  typeof value === 'string' && value.trim().length > 0 ? value.trim() : undefined;
