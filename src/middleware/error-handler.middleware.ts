import { Request, Response, NextFunction } from 'express';
import { AppError } from '../utils/app-error';
import { ErrorCodes } from '../utils/error-codes';
import { config } from '../config';
import { logger } from '../lib/logger';

interface ErrorResponse {
  success: false;
  error: {
    message: string;
    code?: string;
    details?: unknown;
    stack?: string;
  };
}

interface ErrorWithStatus extends Error {
  statusCode?: number;
  status?: number;
  code?: string;
  /** Set by the JSON body parser. */
  type?: string;
}

const toAppError = (err: ErrorWithStatus): AppError => {
  if (err instanceof AppError) {
    return err;
  }
  if (err.type === 'entity.parse.failed') {
    return AppError.badRequest('Request body is not valid JSON', ErrorCodes.BAD_REQUEST);
  }
  if (err.type === 'entity.too.large') {
    return AppError.payloadTooLarge();
  }
  if (err.statusCode || err.status) {
    const statusCode = err.statusCode || err.status || 500;
    return new AppError(err.message, statusCode, err.code);
  }
  return AppError.internal(
    config.nodeEnv === 'production' ? 'An unexpected error occurred' : err.message,
    ErrorCodes.INTERNAL_ERROR
  );
};

export const errorHandler = (
  err: ErrorWithStatus,
  req: Request,
  res: Response,
  _next: NextFunction
): void => {
  const error = toAppError(err);

  if (error.statusCode >= 500) {
    logger.error(`Unhandled error on ${req.method} ${req.originalUrl}`, err);
  }

  const response: ErrorResponse = {
    success: false,
    error: {
      message: error.message,
      code: error.code,
      ...(error.details !== undefined && { details: error.details }),
      ...(config.nodeEnv === 'development' && { stack: err.stack }),
    },
  };

  res.status(error.statusCode).json(response);
};
