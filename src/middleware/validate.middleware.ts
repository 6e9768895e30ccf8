import { Request, Response, NextFunction } from 'express';
import { z } from 'zod';
import { ErrorCodes } from '../utils/error-codes';

interface ValidationSchema {
  body?: z.ZodTypeAny;
}

export const validate = (schema: ValidationSchema) => {
  return async (req: Request, res: Response, next: NextFunction) => {
    try {
      if (schema.body) {
        req.body = await schema.body.parseAsync(req.body);
      }
      next();
    } catch (error) {
      if (error instanceof z.ZodError) {
        const fieldErrors = error.issues.map(err => ({
          field: err.path.join('.'),
          message: err.message,
          code: err.code,
        }));

        return res.status(400).json({
          success: false,
          error: {
            code: ErrorCodes.VALIDATION_ERROR,
            message: 'Request validation failed',
            details: fieldErrors,
          },
        });
      }
      next(error);
    }
  };
};
