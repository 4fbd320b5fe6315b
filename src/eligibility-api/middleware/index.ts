import type { Request, Response, NextFunction } from 'express';
import morgan from 'morgan';
import { ZodError } from 'zod';
import { isConfigurationError } from '@core/errors';
import type { ApiResponse } from '@shared/types';

export const requestLogger = morgan('dev');

export function formatIssues(error: ZodError): string[] {
  return error.issues.map((issue) => `${issue.path.join('.') || '(body)'}: ${issue.message}`);
}

function statusOf(err: Error): number {
  // body-parser attaches an HTTP status to malformed JSON and oversized bodies
  if ('status' in err && typeof err.status === 'number') return err.status;
  return 500;
}

export function errorHandler(err: Error, _req: Request, res: Response, _next: NextFunction) {
  console.error('[ERROR]', err.message);

  if (isConfigurationError(err)) {
    const response: ApiResponse = {
      success: false,
      error: err.message,
      code: err.code,
      issues: err.issues,
    };
    res.status(err.code === 'UNKNOWN_SCHEME' ? 404 : 500).json(response);
    return;
  }

  if (err instanceof ZodError) {
    const response: ApiResponse = {
      success: false,
      error: 'Invalid request body',
      code: 'INVALID_REQUEST',
      issues: formatIssues(err),
    };
    res.status(400).json(response);
    return;
  }

  res.status(statusOf(err)).json({ success: false, error: err.message });
}
