import type { Request, Response, NextFunction } from 'express';
import { logger } from '../../services/logging/logger';

export const requestLogger = (req: Request, res: Response, next: NextFunction) => {
  const start = Date.now();

  logger.info(`Incoming ${req.method} request to ${req.originalUrl}`, {
    method: req.method,
    url: req.originalUrl,
    query: req.query,
  });

  res.on('finish', () => {
    const responseTime = Date.now() - start;

    logger.info(`Outgoing response for ${req.method} ${req.originalUrl}`, {
      method: req.method,
      url: req.originalUrl,
      statusCode: res.statusCode,
      responseTime: `${responseTime}ms`,
    });
  });

  next();
};

export const errorLogger = (error: Error, req: Request, _res: Response, next: NextFunction) => {
  logger.warn('Error processing request', {
    error: {
      name: error.name,
      message: error.message,
    },
    method: req.method,
    url: req.originalUrl,
  });

  next(error);
};
