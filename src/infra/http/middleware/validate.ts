import type { NextFunction, Request, Response } from 'express';
import type { ZodSchema } from 'zod';

export interface ValidationSchemas {
  body?: ZodSchema;
}

/**
 * Zod validation middleware.
 * Replaces the request body with the parsed value; a ZodError goes to the
 * error handler, which answers 400 VALIDATION_ERROR.
 */
export function validate(schemas: ValidationSchemas) {
  return (req: Request, _res: Response, next: NextFunction): void => {
    try {
      if (schemas.body) {
        req.body = schemas.body.parse(req.body);
      }
      next();
    } catch (error) {
      next(error);
    }
  };
}
