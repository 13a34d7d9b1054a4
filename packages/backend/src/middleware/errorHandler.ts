import { Request, Response, NextFunction } from 'express';
import { AppError, RemoteIOError, errorMessage } from '../shared/errors';
import { errorResponse } from '../shared/envelope';
import { logger } from '../shared/logger';
import '../shared/types';

const isProduction = (): boolean => process.env.NODE_ENV === 'production';

const INTERNAL_PATTERNS = [
  /\/app\/src\//i,
  /\/home\//i,
  /\/usr\//i,
  /\.(ts|js):\d+/,
  /at\s+\S+\s+\(/,
  /node_modules\//,
  /relation\s+"/i,
  /ECONNREFUSED/i,
  /ENOTFOUND/i,
  /password authentication failed/i,
  /syntax error at or near/i,
  /https?:\/\/\S+:\d+/i,
];

/** Messages mentioning file paths, database errors or cluster addresses are not sent to clients in production. */
function containsInternalDetails(message: string): boolean {
  return INTERNAL_PATTERNS.some((pattern) => pattern.test(message));
}

/** express.json() rejects unparsable bodies with a SyntaxError carrying the raw body. */
function isBodyParseError(err: Error): boolean {
  return err instanceof SyntaxError && 'body' in err;
}

export function errorHandler(
  err: Error,
  req: Request,
  res: Response,
  _next: NextFunction
): void {
  if (isBodyParseError(err)) {
    logger.warn('ErrorHandler: malformed JSON body', { requestId: req.id, path: req.originalUrl });
    res.status(400).json(errorResponse('VALIDATION_ERROR', 'Malformed JSON body'));
    return;
  }

  if (err instanceof AppError) {
    const meta = {
      requestId: req.id,
      code: err.code,
      statusCode: err.statusCode,
      message: err.message,
      ...(err instanceof RemoteIOError && err.source !== undefined ? { source: errorMessage(err.source) } : {}),
    };
    if (err.statusCode >= 500) {
      logger.error('ErrorHandler: request failed', { ...meta, stack: err.stack });
    } else {
      logger.warn('ErrorHandler: request rejected', meta);
    }

    const message = isProduction() && containsInternalDetails(err.message) ? 'An error occurred' : err.message;
    res.status(err.statusCode).json(errorResponse(err.code, message));
    return;
  }

  logger.error('ErrorHandler: unhandled error', {
    requestId: req.id,
    error: err.message,
    stack: err.stack,
  });

  res.status(500).json(errorResponse('INTERNAL_ERROR', 'An unexpected error occurred'));
}
