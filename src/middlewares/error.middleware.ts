import { Request, Response, NextFunction } from 'express';
import { ZodError } from 'zod';
import jwt from 'jsonwebtoken';
import { logger } from '../utils/logging';
import { ResponseHandler } from '../utils/response';
import { errorMessage } from '../utils/errors';

export const errorHandler = (
  err: unknown,
  req: Request,
  res: Response,
  _next: NextFunction
) => {
  logger.error('[Error Handler]', {
    message: errorMessage(err),
    stack: err instanceof Error ? err.stack : undefined,
    url: req.originalUrl,
    method: req.method,
    ip: req.ip,
    params: req.params,
    query: req.query,
  });

  if (err instanceof ZodError) {
    return ResponseHandler.validationError(res, err.errors);
  }

  // TokenExpiredError extends JsonWebTokenError
  if (err instanceof jwt.TokenExpiredError) {
    return ResponseHandler.unauthorized(res, 'Token expired');
  }

  if (err instanceof jwt.JsonWebTokenError) {
    return ResponseHandler.unauthorized(res, 'Invalid token');
  }

  return ResponseHandler.fromError(res, err);
};

export const notFoundHandler = (
  req: Request,
  res: Response,
  _next: NextFunction
) => {
  logger.warn('[Not Found]', {
    url: req.originalUrl,
    method: req.method,
    ip: req.ip,
  });

  ResponseHandler.notFound(res, 'Route not found');
};
