import type { NextFunction, Request, Response } from 'express';
import type { ZodTypeAny } from 'zod';
import { ValidationError } from '../../lib/errors.js';

/**
 * Replace `req.body` with its parsed form, or fail with a 400.
 *
 * Query strings are parsed inside the controllers with `schema.parse()`;
 * a thrown ZodError reaches the error handler as a 400 as well.
 */
export function validateBody(schema: ZodTypeAny) {
  return (req: Request, _res: Response, next: NextFunction) => {
    const result = schema.safeParse(req.body);
    if (!result.success) {
      next(new ValidationError('Invalid request body', result.error.flatten()));
      return;
    }
    req.body = result.data;
    next();
  };
}
