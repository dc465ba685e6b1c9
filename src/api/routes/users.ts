import { Router, RequestHandler } from 'express';
import { z } from 'zod';
import { getLogger } from '../../shared/log';
import { ROLES, Role } from '../../shared/types';
import { SessionStore } from '../store/sessionStore';
import { UserStore, UsernameTakenError, toPublicUser } from '../store/userStore';

export const USER_ADMIN_ROLES: readonly Role[] = ['superadmin', 'admin'];

export const CreateUserSchema = z.object({
  username: z
    .string()
    .trim()
    .min(3)
    .max(150)
    .regex(/^[\w.@+-]+$/, 'Letters, digits and @/./+/-/_ only'),
  password: z.string().min(8).max(128),
  role: z.enum(ROLES),
  email: z.string().email().optional(),
  firstName: z.string().trim().max(150).optional(),
  lastName: z.string().trim().max(150).optional(),
});

const RoleFilterSchema = z.enum(ROLES).optional();

export function createUserRoutes(
  sessionStore: SessionStore,
  userStore: UserStore,
  protect: RequestHandler[],
  rbac: (allowedRoles: readonly Role[]) => RequestHandler
): Router {
  const router = Router();
  const logger = getLogger('auth');

  // GET /api/users/?role= - staff accounts by username
  router.get('/', ...protect, rbac(USER_ADMIN_ROLES), async (req, res, next) => {
    const role = RoleFilterSchema.safeParse(req.query.role);
    if (!role.success) {
      res.status(400).json({ error: `role must be one of: ${ROLES.join(', ')}` });
      return;
    }

    const roleFilter = role.data;

    try {
      const users = await userStore.list();
      res.json(users.filter(user => roleFilter === undefined || user.role === roleFilter).map(toPublicUser));
    } catch (error) {
      next(error);
    }
  });

  // POST /api/users/ - create a staff account
  router.post('/', ...protect, rbac(USER_ADMIN_ROLES), async (req, res, next) => {
    const parsed = CreateUserSchema.safeParse(req.body);
    if (!parsed.success) {
      const issue = parsed.error.issues[0];
      res.status(400).json({ error: `${issue.path.join('.') || 'body'}: ${issue.message}` });
      return;
    }
    const input = parsed.data;

    if (input.role === 'superadmin' && req.authContext?.role !== 'superadmin') {
      res.status(403).json({ error: 'Only a superadmin can create superadmin accounts' });
      return;
    }

    try {
      const user = await userStore.create(input);
      logger.info('User created', {
        username: user.username,
        role: user.role,
        createdBy: req.authContext?.username,
      });
      res.status(201).json(toPublicUser(user));
    } catch (error) {
      if (error instanceof UsernameTakenError) {
        res.status(409).json({ error: 'Username already exists' });
        return;
      }
      next(error);
    }
  });

  // GET /api/users/me/ - profile of the token's owner
  router.get('/me', ...protect, async (req, res, next) => {
    const authContext = req.authContext;
    if (!authContext) {
      res.status(401).json({ error: 'No auth context' });
      return;
    }

    try {
      const user = await userStore.getById(authContext.sub);
      if (!user) {
        res.status(404).json({ error: 'User not found' });
        return;
      }
      res.json(toPublicUser(user));
    } catch (error) {
      next(error);
    }
  });

  // POST /api/users/logout/ - revoke the session behind the token
  router.post('/logout', ...protect, async (req, res, next) => {
    const authContext = req.authContext;
    if (!authContext) {
      res.status(401).json({ error: 'No auth context' });
      return;
    }

    try {
      const success = await sessionStore.revoke(authContext.sessionId);
      if (!success) {
        res.status(400).json({ error: 'Failed to revoke session' });
        return;
      }

      logger.info('User logged out', { username: authContext.username });
      res.json({ success: true, message: 'Logged out' });
    } catch (error) {
      next(error);
    }
  });

  return router;
}
