import { Request, Response, NextFunction } from 'express';
import { ZodError, type ZodTypeAny } from 'zod';
import { ValidationError } from '../utils/errors.js';

/**
 * Request whose body `validateRequest` already replaced with the parsed value
 */
export type ParsedBodyRequest<Body> = Request<Request['params'], unknown, Body>;

interface RequestSchemas {
  body?: ZodTypeAny;
  query?: ZodTypeAny;
  params?: ZodTypeAny;
}

/**
 * Request validation middleware factory
 * Validates request data (body, query, params) against Zod schemas and
 * replaces each part with the parsed value.
 */
export function validateRequest(schemas: RequestSchemas) {
  return async (req: Request, res: Response, next: NextFunction): Promise<void> => {
    try {
      if (schemas.body) {
        req.body = await schemas.body.parseAsync(req.body);
      }
      if (schemas.query) {
        req.query = await schemas.query.parseAsync(req.query);
      }
      if (schemas.params) {
        req.params = await schemas.params.parseAsync(req.params);
      }

      next();
    } catch (error) {
      if (error instanceof ZodError) {
        const details = error.errors.map((err) => ({
          path: err.path.join('.'),
          message: err.message,
          code: err.code,
        }));

        next(
          new ValidationError('Validation failed', {
            errors: details,
            field: error.errors[0]?.path.join('.'),
          })
        );
      } else {
        next(error);
      }
    }
  };
}

/**
 * Async handler wrapper
 * Automatically catches async errors and passes them to error handler
 */
export function asyncHandler(
  fn: (req: Request, res: Response, next: NextFunction) => Promise<void>
) {
  return (req: Request, res: Response, next: NextFunction): void => {
    Promise.resolve(fn(req, res, next)).catch(next);
  };
}
