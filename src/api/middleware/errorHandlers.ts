import { Request, Response, NextFunction } from 'express';
import { ZodError } from 'zod';
import { NbaApiError } from '../../lib/errors';

export interface ErrorBody {
  error: {
    message: string;
    code: string;
    details?: unknown;
    stack?: string;
  };
}

const GENERIC_SERVER_ERROR = 'An unexpected error occurred while processing your request';

export function errorHandler(err: unknown, req: Request, res: Response, next: NextFunction): void {
  if (res.headersSent) {
    return next(err);
  }

  let statusCode = 500;
  let message = GENERIC_SERVER_ERROR;
  let code = 'INTERNAL_ERROR';
  let details: unknown;

  if (err instanceof NbaApiError) {
    statusCode = err.statusCode;
    code = err.kind;
    // 5xx messages may carry upstream detail; those stay in the logs
    if (statusCode < 500) {
      message = err.message;
    }
  } else if (err instanceof ZodError) {
    statusCode = 400;
    message = 'Validation Error';
    code = 'VALIDATION_ERROR';
    details = err.issues.map(issue => ({ path: issue.path.join('.'), message: issue.message }));
  }

  const logPayload = {
    error: err instanceof Error ? err.message : String(err),
    url: req.originalUrl,
    method: req.method,
    statusCode,
  };
  if (statusCode >= 500) {
    console.error('❌ API Error:', { ...logPayload, stack: err instanceof Error ? err.stack : undefined });
  } else {
    console.warn('⚠️ API Error:', logPayload);
  }

  const body: ErrorBody = {
    error: {
      message,
      code,
      ...(details !== undefined && { details }),
      ...(process.env.NODE_ENV === 'development' && err instanceof Error && { stack: err.stack }),
    },
  };
  res.status(statusCode).json(body);
}

export function notFoundHandler(req: Request, res: Response): void {
  res.status(404).json({
    error: {
      message: `Route ${req.method} ${req.originalUrl} not found`,
      code: 'NOT_FOUND',
    },
  });
}

export function asyncHandler(fn: (req: Request, res: Response, next: NextFunction) => Promise<unknown>) {
  return (req: Request, res: Response, next: NextFunction): void => {
    fn(req, res, next).catch(next);
  };
}
