import { Router, RequestHandler } from 'express';
import { z, ZodError } from 'zod';
import { Role } from '../../shared/types';
import { MenuItemNameTakenError, MenuStore } from '../store/menuStore';
import { roundMoney } from '../store/orderStore';

export const MENU_WRITE_ROLES: readonly Role[] = ['superadmin', 'admin'];

const price = z.number().positive().max(100000).transform(roundMoney);

export const CreateMenuItemSchema = z.object({
  name: z.string().trim().min(1).max(200),
  description: z.string().trim().max(1000).default(''),
  price,
  isAvailable: z.boolean().default(true),
});

export const UpdateMenuItemSchema = CreateMenuItemSchema.partial().refine(
  changes => Object.values(changes).some(value => value !== undefined),
  { message: 'Nothing to update' }
);

function firstIssue(error: ZodError): string {
  const issue = error.issues[0];
  return `${issue.path.join('.') || 'body'}: ${issue.message}`;
}

export function createMenuRoutes(
  menuStore: MenuStore,
  protect: RequestHandler[],
  rbac: (allowedRoles: readonly Role[]) => RequestHandler
): Router {
  const router = Router();

  // GET /api/menu/items/?available=true
  router.get('/', ...protect, async (req, res, next) => {
    try {
      res.json(req.query.available === 'true' ? await menuStore.listAvailable() : await menuStore.list());
    } catch (error) {
      next(error);
    }
  });

  // GET /api/menu/items/:id/
  router.get('/:id', ...protect, async (req, res, next) => {
    try {
      const item = await menuStore.getById(req.params.id);
      if (!item) {
        res.status(404).json({ error: 'Menu item not found' });
        return;
      }
      res.json(item);
    } catch (error) {
      next(error);
    }
  });

  // POST /api/menu/items/
  router.post('/', ...protect, rbac(MENU_WRITE_ROLES), async (req, res, next) => {
    const parsed = CreateMenuItemSchema.safeParse(req.body);
    if (!parsed.success) {
      res.status(400).json({ error: firstIssue(parsed.error) });
      return;
    }

    try {
      const item = await menuStore.create({
        ...parsed.data,
        createdBy: req.authContext?.username ?? 'unknown',
      });
      res.status(201).json(item);
    } catch (error) {
      if (error instanceof MenuItemNameTakenError) {
        res.status(409).json({ error: 'A menu item with that name already exists' });
        return;
      }
      next(error);
    }
  });

  // PATCH /api/menu/items/:id/ - edit or take off the menu
  router.patch('/:id', ...protect, rbac(MENU_WRITE_ROLES), async (req, res, next) => {
    const parsed = UpdateMenuItemSchema.safeParse(req.body);
    if (!parsed.success) {
      res.status(400).json({ error: firstIssue(parsed.error) });
      return;
    }

    try {
      const item = await menuStore.update(req.params.id, parsed.data);
      if (!item) {
        res.status(404).json({ error: 'Menu item not found' });
        return;
      }
      res.json(item);
    } catch (error) {
      if (error instanceof MenuItemNameTakenError) {
        res.status(409).json({ error: 'A menu item with that name already exists' });
        return;
      }
      next(error);
    }
  });

  return router;
}
