import { Request, Response, NextFunction } from 'express';
import { getSettings } from '../config/settings';
import { HttpError, RedirectSignal } from '../utils/errors';
import { logger } from '../utils/logger';

export const notFoundMiddleware = (req: Request, res: Response) => {
  res.status(404).json({ success: false, error: `No route for ${req.method} ${req.path}` });
};

export const methodNotAllowed = (allowed: string[]) => (_req: Request, res: Response) => {
  res.set('Allow', allowed.join(', '));
  res.status(405).json({ success: false, error: 'Method not allowed' });
};

export const errorMiddleware = (err: unknown, req: Request, res: Response, next: NextFunction) => {
  if (res.headersSent) {
    next(err);
    return;
  }

  if (err instanceof RedirectSignal) {
    res.redirect(302, err.location);
    return;
  }

  if (err instanceof HttpError) {
    if (err.status >= 500) logger.error('Error:', err);
    else logger.debug(`${req.method} ${req.url} -> ${err.status}: ${err.message}`);
    res.status(err.status).json({ success: false, error: err.message });
    return;
  }

  // body-parser marks malformed payloads with a 4xx status
  if (typeof err === 'object' && err !== null && 'status' in err && typeof err.status === 'number' && err.status < 500) {
    res.status(err.status).json({ success: false, error: 'Invalid request body' });
    return;
  }

  logger.error('Error:', err);
  const { env } = getSettings();
  const message = err instanceof Error ? err.message : 'Internal server error';
  res.status(500).json({
    success: false,
    error: env === 'production' ? 'Internal server error' : message,
    ...(env === 'development' && err instanceof Error && { stack: err.stack }),
  });
};
