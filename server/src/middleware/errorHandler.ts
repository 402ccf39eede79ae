import type { NextFunction, Request, Response } from 'express';
import { InvalidClassTableError, PathError, SchemaError, describeError } from '@annomask/shared';
import { ReadOnlyStorageError } from '../adapters/fsAdapter';
import { logger } from '../utils/logger';

export const statusOf = (error: unknown) => {
  if (error instanceof PathError) return 404;
  if (error instanceof ReadOnlyStorageError) return 403;
  if (error instanceof SchemaError || error instanceof InvalidClassTableError || error instanceof RangeError) {
    return 400;
  }
  // express.json() parse failures
  if (error instanceof SyntaxError && 'status' in error && error.status === 400) return 400;
  return 500;
};

export const errorHandler = (err: unknown, req: Request, res: Response, _next: NextFunction) => {
  const status = statusOf(err);
  if (status >= 500) {
    logger.error({ err, method: req.method, url: req.originalUrl }, 'Unhandled error');
    res.status(status).json({ message: 'Internal Server Error' });
    return;
  }
  logger.warn({ status, method: req.method, url: req.originalUrl, message: describeError(err) }, 'request rejected');
  res.status(status).json({ message: describeError(err) });
};
