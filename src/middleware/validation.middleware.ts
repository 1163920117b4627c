import type { Request, RequestHandler, Response } from 'express';
import type { z } from 'zod';

import { badRequestError } from '../utils/errors';

/**
 * Parses `req.query` with `schema` and hands the typed result to `handler`. Validation
 * failures become a 400 through the error handler.
 */
export const validateQuery =
  <T>(
    schema: z.ZodType<T, z.ZodTypeDef, unknown>,
    handler: (query: T, req: Request, res: Response) => void,
  ): RequestHandler =>
  (req, res, next) => {
    const result = schema.safeParse(req.query);
    if (!result.success) {
      next(badRequestError('Request validation failed', result.error.flatten()));
      return;
    }

    try {
      handler(result.data, req, res);
    } catch (error) {
      next(error);
    }
  };
