import type { Request, Response, NextFunction } from 'express';
import morgan from 'morgan';

export const requestLogger = morgan('dev');

interface HttpError extends Error {
  status?: number;
  type?: string;
}

// body-parser marks malformed JSON with status 400 and type 'entity.parse.failed'
export function errorHandler(err: HttpError, _req: Request, res: Response, _next: NextFunction) {
  const status = err.status && err.status >= 400 && err.status < 500 ? err.status : 500;
  if (status === 500) {
    console.error('[ERROR]', err.message);
  }
  res.status(status).json({ success: false, error: status === 500 ? 'Internal server error' : err.message });
}
