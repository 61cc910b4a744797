import { Request, Response, NextFunction } from 'express';
import { ZodError } from 'zod';
import { ConfigurationError, errorMessage } from '../services/errors.js';

export function statusFor(err: unknown): number {
  if (err instanceof ZodError) return 400;
  if (err instanceof SyntaxError) return 400; // malformed JSON body
  if (err instanceof ConfigurationError) return 422;
  return 500;
}

export const errorHandler = (err: unknown, req: Request, res: Response, _next: NextFunction) => {
  const status = statusFor(err);
  if (status >= 500) {
    console.error(`${req.method} ${req.originalUrl} failed:`, err);
  }
  const message =
    err instanceof ZodError
      ? err.issues.map((i) => `${i.path.join('.') || '(root)'}: ${i.message}`).join('; ')
      : errorMessage(err);
  res.status(status).json({ message });
};
