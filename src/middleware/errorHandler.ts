import { NextFunction, Request, RequestHandler, Response } from 'express';
import { ZodError } from 'zod';
import { AppError } from '../utils/errors';
import { errorMessage, logger } from '../utils/logger';

type AsyncRoute = (req: Request, res: Response, next: NextFunction) => Promise<void>;

// Express 4 does not forward rejected promises on its own.
export const asyncHandler =
  (route: AsyncRoute): RequestHandler =>
  (req, res, next) => {
    route(req, res, next).catch(next);
  };

export const notFoundHandler: RequestHandler = (req, res) => {
  res.status(404).json({ error: { code: 'NOT_FOUND', message: `No route for ${req.method} ${req.path}` } });
};

export const errorHandler = (error: unknown, req: Request, res: Response, _next: NextFunction): void => {
  if (error instanceof AppError) {
    if (error.statusCode >= 500) {
      logger.error('Request failed', { path: req.path, code: error.code, error: error.message });
    }
    res.status(error.statusCode).json({ error: { code: error.code, message: error.message } });
    return;
  }
  if (error instanceof ZodError) {
    res.status(400).json({
      error: {
        code: 'VALIDATION_ERROR',
        message: error.issues.map((issue) => `${issue.path.join('.') || 'body'}: ${issue.message}`).join('; '),
      },
    });
    return;
  }

  if (error instanceof SyntaxError && 'body' in error) {
    res.status(400).json({ error: { code: 'INVALID_JSON', message: 'Request body is not valid JSON' } });
    return;
  }

  logger.error('Unhandled request error', {
    path: req.path,
    error: errorMessage(error),
    stack: error instanceof Error ? error.stack : undefined,
  });
  res.status(500).json({ error: { code: 'INTERNAL_ERROR', message: 'Something went wrong' } });
};
