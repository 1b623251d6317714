import { Request, Response, NextFunction } from 'express';
import { ZodError } from 'zod';
import { AppError, ValidationError, zodIssues } from '../errors';

export function errorHandler(
  err: Error,
  req: Request,
  res: Response,
  _next: NextFunction
): void {
  if (err instanceof ZodError) {
    res.status(400).json({ error: 'Validation error', details: zodIssues(err) });
    return;
  }

  if (err instanceof ValidationError) {
    res.status(err.statusCode).json({ error: 'Validation error', details: err.details });
    return;
  }

  if (err instanceof AppError) {
    res.status(err.statusCode).json({ error: err.message });
    return;
  }

  if (err.message.includes('CORS policy')) {
    res.status(403).json({ error: err.message });
    return;
  }

  console.error(`[http] ${req.method} ${req.originalUrl} failed:`, err);
  res.status(500).json({ error: 'Internal server error' });
}
