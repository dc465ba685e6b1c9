import { Router, RequestHandler } from 'express';
import { z } from 'zod';
import { Role } from '../../shared/types';
import { DeliveryLocationStore } from '../store/deliveryLocationStore';

const UpdateLocationSchema = z.object({
  isActive: z.boolean(),
});

export function createDeliveryLocationRoutes(
  locationStore: DeliveryLocationStore,
  protect: RequestHandler[],
  rbac: (allowedRoles: readonly Role[]) => RequestHandler
): Router {
  const router = Router();

  // GET /api/deliveries/locations/
  router.get('/', ...protect, async (_req, res, next) => {
    try {
      res.json(await locationStore.list());
    } catch (error) {
      next(error);
    }
  });

  // GET /api/deliveries/locations/active/
  router.get('/active', ...protect, async (_req, res, next) => {
    try {
      res.json(await locationStore.listActive());
    } catch (error) {
      next(error);
    }
  });

  // PATCH /api/deliveries/locations/:name/ - open or close a location
  router.patch('/:name', ...protect, rbac(['superadmin', 'admin']), async (req, res, next) => {
    const body = UpdateLocationSchema.safeParse(req.body);
    if (!body.success) {
      res.status(400).json({ error: 'isActive must be a boolean' });
      return;
    }

    try {
      const location = await locationStore.setActive(req.params.name, body.data.isActive);
      if (!location) {
        res.status(404).json({ error: 'Delivery location not found' });
        return;
      }
      res.json(location);
    } catch (error) {
      next(error);
    }
  });

  return router;
}
