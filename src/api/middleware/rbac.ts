import { Request, Response, NextFunction } from 'express';
import { ROLES, Role } from '../../shared/types';

export const STAFF_ROLES: readonly Role[] = ROLES;

export function createRbacMiddleware() {
  return (allowedRoles: readonly Role[]) => {
    return (req: Request, res: Response, next: NextFunction): void => {
      const authContext = req.authContext;

      if (!authContext) {
        res.status(401).json({ error: 'No auth context' });
        return;
      }

      if (!allowedRoles.includes(authContext.role)) {
        res.status(403).json({ error: 'Insufficient role permissions' });
        return;
      }

      next();
    };
  };
}
