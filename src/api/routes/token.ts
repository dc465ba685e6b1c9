import { Router, Response } from 'express';
import { z } from 'zod';
import { config } from '../../shared/config';
import { getLogger } from '../../shared/log';
import { SessionStore } from '../store/sessionStore';
import { UserStore, toPublicUser } from '../store/userStore';
import { issueAccessToken, verifyAccessToken } from '../tokens';

const ObtainBodySchema = z.object({
  username: z.string().min(1),
  password: z.string().min(1),
});

const RefreshBodySchema = z.object({
  refresh: z.string().min(1),
});

const VerifyBodySchema = z.object({
  token: z.string().min(1),
});

function toIsoSeconds(epochSeconds: number): string {
  return new Date(epochSeconds * 1000).toISOString();
}

function setTokenResponseHeaders(res: Response): void {
  res.setHeader('X-Token-Type', 'Bearer');
  res.setHeader('X-Access-Token-Lifetime', String(config.auth.accessTokenLifetimeSeconds));
  res.setHeader('X-Refresh-Token-Lifetime', String(config.auth.refreshTokenLifetimeSeconds));
}

/**
 * Token endpoints: obtain a pair, refresh it, verify an access token.
 * Mounted under `/api/token`; the lifetime guard leaves these paths alone.
 */
export function createTokenRoutes(sessionStore: SessionStore, userStore: UserStore): Router {
  const router = Router();
  const logger = getLogger('auth');
  const refreshTtlMs = config.auth.refreshTokenLifetimeSeconds * 1000;

  // POST /api/token/ - exchange credentials for a token pair
  router.post('/', async (req, res, next) => {
    const body = ObtainBodySchema.safeParse(req.body);
    if (!body.success) {
      res.status(400).json({ error: 'Username and password are required' });
      return;
    }

    try {
      const user = await userStore.authenticate(body.data.username, body.data.password);
      if (!user || !user.isActive) {
        logger.info('Rejected login', { username: body.data.username });
        res.status(401).json({ error: 'No active account found with the given credentials' });
        return;
      }

      const { session, refreshToken } = await sessionStore.create(user.id, user.role, refreshTtlMs);
      const access = await issueAccessToken(user, session.id);
      await userStore.recordLogin(user.id);
      const loggedIn = (await userStore.getById(user.id)) ?? user;

      logger.info('User authenticated', { username: user.username, role: user.role });

      setTokenResponseHeaders(res);
      res.json({
        access: access.token,
        refresh: refreshToken,
        access_expires_at: toIsoSeconds(access.expiresAt),
        refresh_expires_at: new Date(session.expiresAt).toISOString(),
        user: toPublicUser(loggedIn),
      });
    } catch (error) {
      next(error);
    }
  });

  // POST /api/token/refresh/ - rotate the refresh token, issue a new access token
  router.post('/refresh', async (req, res, next) => {
    const body = RefreshBodySchema.safeParse(req.body);
    if (!body.success) {
      res.status(400).json({ error: 'Missing refresh token' });
      return;
    }
    const refreshToken = body.data.refresh;

    try {
      // A refresh token works once; a second use is a replay
      if (await sessionStore.isRefreshTokenUsed(refreshToken)) {
        logger.warn('Refresh token replay rejected');
        res.status(401).json({ error: 'Refresh token already used' });
        return;
      }

      const session = await sessionStore.getByRefreshToken(refreshToken);
      if (!session) {
        res.status(401).json({ error: 'Invalid refresh token' });
        return;
      }

      if (session.revoked) {
        res.status(401).json({ error: 'Session revoked' });
        return;
      }

      const user = await userStore.getById(session.userId);
      if (!user || !user.isActive) {
        res.status(401).json({ error: 'User is inactive' });
        return;
      }

      if (!(await sessionStore.markRefreshTokenUsed(refreshToken))) {
        // Lost the race against a concurrent refresh with the same token
        res.status(401).json({ error: 'Refresh token already used' });
        return;
      }

      const newRefreshToken = await sessionStore.rotateRefreshToken(session.id);
      if (!newRefreshToken) {
        res.status(401).json({ error: 'Failed to rotate refresh token' });
        return;
      }

      // The role comes from the session, never from the request
      const access = await issueAccessToken(
        { id: user.id, username: user.username, role: session.role },
        session.id
      );

      logger.info('Token refreshed', { username: user.username });

      setTokenResponseHeaders(res);
      res.json({
        access: access.token,
        refresh: newRefreshToken,
        access_expires_at: toIsoSeconds(access.expiresAt),
        refresh_expires_at: new Date(session.expiresAt).toISOString(),
      });
    } catch (error) {
      next(error);
    }
  });

  // POST /api/token/verify/ - check an access token without using it
  router.post('/verify', async (req, res, next) => {
    const body = VerifyBodySchema.safeParse(req.body);
    if (!body.success) {
      res.status(400).json({ error: 'Missing token' });
      return;
    }

    try {
      const verification = await verifyAccessToken(body.data.token);
      if (!verification.ok) {
        res.status(401).json({ error: 'Token is invalid or expired', code: 'token_not_valid' });
        return;
      }
      res.json({});
    } catch (error) {
      next(error);
    }
  });

  return router;
}
