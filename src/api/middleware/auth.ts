import { Request, Response, NextFunction } from 'express';
import { config } from '../../utils/config.js';
import { logger } from '../../utils/logger.js';

/**
 * Guards /api when API_KEY is configured. Provider and Shopify credentials are separate
 * and travel with each request.
 */
export function authMiddleware(req: Request, res: Response, next: NextFunction): void {
  if (!config.apiKey) {
    next();
    return;
  }

  const apiKey = req.get('x-api-key') || (typeof req.query.api_key === 'string' ? req.query.api_key : undefined);

  if (!apiKey) {
    logger.warn('Missing API key', { path: req.path, ip: req.ip });
    res.status(401).json({
      success: false,
      error: {
        code: 'UNAUTHORIZED',
        message: 'Missing API key. Provide X-API-Key header or api_key query parameter.',
      },
    });
    return;
  }

  if (apiKey !== config.apiKey) {
    logger.warn('Invalid API key', { path: req.path, ip: req.ip });
    res.status(401).json({
      success: false,
      error: {
        code: 'UNAUTHORIZED',
        message: 'Invalid API key.',
      },
    });
    return;
  }

  next();
}
