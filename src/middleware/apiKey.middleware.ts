import type { RequestHandler } from 'express';

import { unauthorizedError } from '../utils/errors';
import { logger } from '../utils/logger';

export const createApiKeyMiddleware =
  (configuredKey: string | null): RequestHandler =>
  (req, _res, next) => {
    if (!configuredKey) {
      logger.error('API_KEY environment variable is not configured');
      next(unauthorizedError());
      return;
    }

    const providedKey = req.header('x-api-key');
    if (!providedKey || providedKey !== configuredKey) {
      next(unauthorizedError('Invalid API key'));
      return;
    }

    next();
  };
