import { Request, Response, NextFunction } from 'express';
import { getLogger } from '../../shared/log';
import { errorMessage } from '../../shared/logger';

export function createErrorHandler() {
  const logger = getLogger('api');

  // Express recognises error handlers by their four parameters
  return (error: unknown, req: Request, res: Response, _next: NextFunction): void => {
    // body-parser marks unparseable payloads with a 4xx status
    const status = typeof error === 'object' && error !== null ? Reflect.get(error, 'status') : undefined;
    if (typeof status === 'number' && status >= 400 && status < 500) {
      res.status(status).json({ error: 'Invalid request body' });
      return;
    }

    logger.error('Unhandled request error', {
      method: req.method,
      path: req.path,
      error: errorMessage(error),
    });

    if (res.headersSent) {
      res.end();
      return;
    }
    res.status(500).json({ error: 'Internal server error' });
  };
}
