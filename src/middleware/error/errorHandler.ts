import type { Request, Response, NextFunction } from 'express';
import { ZodError } from 'zod';
import { logger } from '../../services/logging/logger';

export type ErrorCode =
  | 'NOT_FOUND'
  | 'VALIDATION_ERROR'
  | 'UNSUPPORTED_MEDIA_TYPE'
  | 'BOT_ENGINE_ERROR'
  | 'DATABASE_ERROR'
  | 'ROUTE_NOT_FOUND'
  | 'MALFORMED_JSON'
  | 'INTERNAL_SERVER_ERROR';

export class AppError extends Error {
  constructor(
    public message: string,
    public statusCode: number,
    public code: ErrorCode,
    public details?: unknown
  ) {
    super(message);
    this.name = 'AppError';
  }

  static notFound(message: string): AppError {
    return new AppError(message, 404, 'NOT_FOUND');
  }

  static validation(message: string, details?: unknown): AppError {
    return new AppError(message, 400, 'VALIDATION_ERROR', details);
  }
}

export interface ErrorBody {
  error: {
    message: string;
    code: ErrorCode;
    details?: unknown;
  };
}

// body-parser rejects unparseable JSON with a SyntaxError carrying the raw body
function isMalformedJson(error: Error): boolean {
  return error instanceof SyntaxError && 'body' in error;
}

export function toErrorBody(error: unknown): { status: number; body: ErrorBody } {
  if (error instanceof ZodError) {
    return {
      status: 400,
      body: {
        error: {
          message: 'Validation error',
          code: 'VALIDATION_ERROR',
          details: error.errors,
        },
      },
    };
  }

  if (error instanceof AppError) {
    const body: ErrorBody = { error: { message: error.message, code: error.code } };
    if (error.details !== undefined) {
      body.error.details = error.details;
    }
    return { status: error.statusCode, body };
  }

  if (error instanceof Error && isMalformedJson(error)) {
    return {
      status: 400,
      body: { error: { message: 'Malformed JSON body', code: 'MALFORMED_JSON' } },
    };
  }

  return {
    status: 500,
    body: { error: { message: 'Internal server error', code: 'INTERNAL_SERVER_ERROR' } },
  };
}

export const notFoundHandler = (req: Request, _res: Response, next: NextFunction) => {
  next(new AppError(`Cannot ${req.method} ${req.path}`, 404, 'ROUTE_NOT_FOUND'));
};

export const errorHandler = (
  error: Error,
  _req: Request,
  res: Response,
  // Express recognises error middleware by arity
  _next: NextFunction
) => {
  const { status, body } = toErrorBody(error);

  if (status >= 500) {
    logger.error('Unhandled error', {
      name: error.name,
      message: error.message,
      stack: error.stack,
    });
  }

  res.status(status).json(body);
};
