import { ErrorCodes } from './error-codes';

export class AppError extends Error {
  public statusCode: number;
  public isOperational: boolean;
  public code?: string;
  public details?: unknown;

  constructor(message: string, statusCode: number, code?: string, details?: unknown) {
    super(message);
    this.statusCode = statusCode;
    this.isOperational = true;
    this.code = code;
    this.details = details;

    Error.captureStackTrace(this, this.constructor);
  }

  static badRequest(message: string, code?: string): AppError {
    return new AppError(message, 400, code || ErrorCodes.BAD_REQUEST);
  }

  static notFound(message: string = 'Resource not found', code?: string): AppError {
    return new AppError(message, 404, code || ErrorCodes.NOT_FOUND);
  }

  static payloadTooLarge(message: string = 'Request body too large', code?: string): AppError {
    return new AppError(message, 413, code || ErrorCodes.PAYLOAD_TOO_LARGE);
  }

  static unprocessable(message: string, code?: string, details?: unknown): AppError {
    return new AppError(message, 422, code || ErrorCodes.UNPROCESSABLE_ENTITY, details);
  }

  static internal(message: string = 'Internal server error', code?: string): AppError {
    return new AppError(message, 500, code || ErrorCodes.INTERNAL_ERROR);
  }
}
