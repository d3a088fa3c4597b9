import { Request, Response, NextFunction } from 'express';
import logger from '../utils/logger';
import { errorMessage, isAppError } from '../utils/errors';

// Last stop for anything a handler let escape, including malformed JSON bodies
export const errorHandler = (
  err: unknown,
  req: Request,
  res: Response,
  _next: NextFunction
): void => {
  const statusCode =
    isAppError(err) ? err.statusCode : err instanceof SyntaxError ? 400 : 500;
  const message = statusCode === 500 ? 'Internal Server Error' : errorMessage(err);

  logger.error(`[${req.method}] ${req.originalUrl} - ${statusCode} - ${errorMessage(err)}`);

  res.status(statusCode).json({ error: message });
};
