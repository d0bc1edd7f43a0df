import type { Request, Response, NextFunction } from 'express';
import { AppError } from '../error/errorHandler';

const BODY_METHODS = new Set(['POST', 'PUT', 'PATCH']);

export const requireJson = (req: Request, _res: Response, next: NextFunction) => {
  if (BODY_METHODS.has(req.method) && !req.is('application/json')) {
    next(
      new AppError(
        `Unsupported Media Type: ${req.headers['content-type'] ?? 'none'}`,
        415,
        'UNSUPPORTED_MEDIA_TYPE'
      )
    );
    return;
  }
  next();
};
