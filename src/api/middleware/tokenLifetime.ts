import { Request, Response, NextFunction } from 'express';
import onHeaders from 'on-headers';
import { config } from '../../shared/config';
import { getNow } from '../../shared/clock';
import { getLogger } from '../../shared/log';
import { errorMessage, Logger } from '../../shared/logger';
import { TokenLifetimeContext } from '../../shared/types';
import { extractBearerToken, verifyAccessToken } from '../tokens';

declare global {
  namespace Express {
    interface Request {
      tokenLifetime?: TokenLifetimeContext;
    }
  }
}

export const TOKEN_HEADERS = {
  refreshWarning: 'X-Token-Refresh-Warning',
  expiresIn: 'X-Token-Expires-In',
  refreshUrl: 'X-Token-Refresh-URL',
  accessLifetime: 'X-Access-Token-Lifetime',
  refreshLifetime: 'X-Refresh-Token-Lifetime',
} as const;

export interface TokenLifetimeOptions {
  apiPrefix: string;
  exemptPaths: readonly string[];
  warningThresholdSeconds: number;
  refreshPath: string;
  accessTokenLifetimeSeconds: number;
  refreshTokenLifetimeSeconds: number;
  logger: Logger;
}

// Express routes match case-insensitively and with or without the slash
function normalisePath(path: string): string {
  const lower = path.toLowerCase();
  return lower.endsWith('/') ? lower : `${lower}/`;
}

/**
 * Computes the lifetime context for a token expiring at `expiresAt`
 * (Unix epoch seconds) as seen at `now`.
 */
export function evaluateTokenLifetime(
  expiresAt: number,
  now: Date,
  warningThresholdSeconds: number
): TokenLifetimeContext {
  const remainingSeconds = Math.floor(expiresAt - now.getTime() / 1000);
  return {
    expiresAt,
    remainingSeconds,
    warning: remainingSeconds <= warningThresholdSeconds,
  };
}

function applyTokenHeaders(
  res: Response,
  context: TokenLifetimeContext,
  options: TokenLifetimeOptions
): void {
  if (context.warning) {
    res.setHeader(TOKEN_HEADERS.refreshWarning, 'true');
    res.setHeader(TOKEN_HEADERS.expiresIn, String(context.remainingSeconds));
    res.setHeader(TOKEN_HEADERS.refreshUrl, options.refreshPath);
  }

  if (res.statusCode === 200) {
    res.setHeader(TOKEN_HEADERS.accessLifetime, String(options.accessTokenLifetimeSeconds));
    res.setHeader(TOKEN_HEADERS.refreshLifetime, String(options.refreshTokenLifetimeSeconds));
  }
}

/**
 * Token lifetime guard.
 *
 * Looks at the bearer token of every API request and, when the token is
 * close to expiry, tells the client so through response headers. It never
 * rejects a request: a missing or unverifiable token is left for
 * `authenticate` to turn into a 401.
 */
export function createTokenLifetimeMiddleware(overrides: Partial<TokenLifetimeOptions> = {}) {
  const options: TokenLifetimeOptions = {
    apiPrefix: config.api.prefix,
    exemptPaths: config.auth.tokenPaths,
    warningThresholdSeconds: config.auth.refreshWarningSeconds,
    refreshPath: config.auth.refreshPath,
    accessTokenLifetimeSeconds: config.auth.accessTokenLifetimeSeconds,
    refreshTokenLifetimeSeconds: config.auth.refreshTokenLifetimeSeconds,
    logger: getLogger('token-lifetime'),
    ...overrides,
  };
  const apiPrefix = normalisePath(options.apiPrefix);
  const exempt = new Set(options.exemptPaths.map(normalisePath));
  const { logger } = options;

  return async (req: Request, res: Response, next: NextFunction): Promise<void> => {
    const path = normalisePath(req.path);
    if (!path.startsWith(apiPrefix) || exempt.has(path)) {
      next();
      return;
    }

    const token = extractBearerToken(req.headers.authorization);
    if (!token) {
      next();
      return;
    }

    try {
      const verification = await verifyAccessToken(token);

      if (verification.ok) {
        const context = evaluateTokenLifetime(
          verification.payload.exp,
          getNow(),
          options.warningThresholdSeconds
        );
        req.tokenLifetime = context;

        if (context.warning) {
          logger.debug('Access token close to expiry', {
            sub: verification.payload.sub,
            remainingSeconds: context.remainingSeconds,
          });
        }

        onHeaders(res, () => {
          applyTokenHeaders(res, context, options);
        });
      } else {
        logger.debug('Skipping token lifetime check', { reason: verification.reason });
      }
    } catch (error) {
      logger.error('Token lifetime check failed', { path: req.path, error: errorMessage(error) });
    }

    next();
  };
}
