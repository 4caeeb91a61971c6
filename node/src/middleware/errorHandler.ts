import { Request, Response, NextFunction } from 'express';
import { logger } from '@/services/logger';
import { errorMessage } from '@/errors/pipelineErrors';
import { createErrorResponse } from '@/utils/errorResponse';
import { correlationIdOf } from './correlation';

function statusOf(err: unknown): number {
  if (typeof err === 'object' && err !== null && 'status' in err && typeof err.status === 'number') {
    return err.status >= 400 && err.status < 600 ? err.status : 500;
  }
  return 500;
}

// express recognises error middleware by its four parameters
export function errorHandler(err: unknown, req: Request, res: Response, _next: NextFunction): void {
  const status = statusOf(err);
  logger.error('http:error', {
    method: req.method,
    path: req.originalUrl,
    status,
    correlationId: correlationIdOf(res),
    error: errorMessage(err),
  });
  if (res.headersSent) return;
  res.status(status).json(createErrorResponse(status === 500 ? 'Internal server error' : errorMessage(err)));
}

export function notFoundHandler(req: Request, res: Response): void {
  res.status(404).json(createErrorResponse(`Route ${req.method} ${req.path} not found`));
}
