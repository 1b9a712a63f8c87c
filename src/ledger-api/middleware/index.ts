import type { Request, Response, NextFunction } from 'express';
import morgan from 'morgan';
import { LedgerPreconditionError } from '@core/errors';

export const requestLogger = morgan('dev');

export function errorHandler(err: Error, _req: Request, res: Response, _next: NextFunction) {
  if (err instanceof LedgerPreconditionError) {
    res.status(422).json({ success: false, error: err.message });
    return;
  }
  console.error('[ERROR]', err.message);
  res.status(500).json({ success: false, error: err.message });
}
