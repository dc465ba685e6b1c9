import { Request, Response, NextFunction } from 'express';
import { AuthContext } from '../../shared/types';
import { REJECTION_MESSAGES, verifyAccessToken } from '../tokens';

// Extend Express Request to include auth context
declare global {
  namespace Express {
    interface Request {
      authContext?: AuthContext;
    }
  }
}

export function createAuthMiddleware() {
  return async (req: Request, res: Response, next: NextFunction): Promise<void> => {
    const authHeader = req.headers.authorization;

    // Check for missing header
    if (!authHeader) {
      res.status(401).json({ error: 'Missing authorization header' });
      return;
    }

    // Check for malformed header
    if (!authHeader.startsWith('Bearer ')) {
      res.status(401).json({ error: 'Malformed authorization header' });
      return;
    }

    const token = authHeader.slice(7).trim();

    if (!token) {
      res.status(401).json({ error: 'Missing token' });
      return;
    }

    try {
      const verification = await verifyAccessToken(token);

      if (!verification.ok) {
        res.status(401).json({ error: REJECTION_MESSAGES[verification.reason] });
        return;
      }

      const { payload } = verification;

      // Attach auth context to request
      req.authContext = {
        sub: payload.sub,
        username: payload.username,
        role: payload.role,
        sessionId: payload.sid,
        jti: payload.jti,
      };

      next();
    } catch (error) {
      next(error);
    }
  };
}
