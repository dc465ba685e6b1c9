import { Request, Response, NextFunction } from 'express';
import { config } from '../../shared/config';
import { TOKEN_HEADERS } from './tokenLifetime';

const ALLOWED_METHODS = ['GET', 'POST', 'PUT', 'PATCH', 'DELETE', 'OPTIONS'];
const ALLOWED_HEADERS = ['Content-Type', 'Authorization', 'X-Requested-With'];
// Browser clients must be able to read the token hints
const EXPOSED_HEADERS = ['X-Token-Type', ...Object.values(TOKEN_HEADERS)];
const PREFLIGHT_MAX_AGE = 86400; // 24 hours

export function createCorsMiddleware(allowedOrigins: readonly string[] = config.api.corsAllowedOrigins) {
  const allowed = new Set(allowedOrigins);

  return (req: Request, res: Response, next: NextFunction): void => {
    const origin = req.headers.origin;

    res.setHeader('Vary', 'Origin');

    // No Origin header = same-origin request or non-browser client
    if (!origin) {
      next();
      return;
    }

    if (origin === 'null') {
      res.status(403).json({ error: 'Null origin not allowed' });
      return;
    }

    if (!allowed.has(origin)) {
      if (req.method === 'OPTIONS') {
        res.status(403).json({ error: 'Origin not allowed' });
        return;
      }
      // Without CORS headers the browser blocks the response
      next();
      return;
    }

    res.setHeader('Access-Control-Allow-Origin', origin);
    res.setHeader('Access-Control-Allow-Credentials', 'true');
    res.setHeader('Access-Control-Allow-Methods', ALLOWED_METHODS.join(', '));
    res.setHeader('Access-Control-Allow-Headers', ALLOWED_HEADERS.join(', '));
    res.setHeader('Access-Control-Expose-Headers', EXPOSED_HEADERS.join(', '));

    if (req.method === 'OPTIONS') {
      res.setHeader('Access-Control-Max-Age', String(PREFLIGHT_MAX_AGE));
      res.status(204).end();
      return;
    }

    next();
  };
}
