import { Router, RequestHandler } from 'express';
import { z, ZodError } from 'zod';
import { getNow } from '../../shared/clock';
import { getLogger } from '../../shared/log';
import { ASSIGNMENT_STATUSES, AssignmentStatus, DeliveryAssignment, OrderItem, Role } from '../../shared/types';
import { DeliveryLocationStore } from '../store/deliveryLocationStore';
import { MenuStore } from '../store/menuStore';
import { ACTIVE_ASSIGNMENT_STATUSES, OrderStore, roundMoney } from '../store/orderStore';
import { UserStore } from '../store/userStore';

export const ORDER_WRITE_ROLES: readonly Role[] = ['superadmin', 'admin', 'frontdesk'];
export const ASSIGNMENT_UPDATE_ROLES: readonly Role[] = ['superadmin', 'admin', 'frontdesk', 'delivery'];

export const MAX_CONCURRENT_DELIVERIES = 3;

// Where a delivery may go next; terminal states have no entry
const NEXT_ASSIGNMENT_STATUSES: Partial<Record<AssignmentStatus, readonly AssignmentStatus[]>> = {
  assigned: ['picked_up', 'cancelled'],
  picked_up: ['in_transit', 'returned', 'cancelled'],
  in_transit: ['delivered', 'returned'],
};

export const CreateOrderSchema = z
  .object({
    customerPhone: z.string().regex(/^\+?\d{9,15}$/, 'Invalid phone number'),
    deliveryType: z.enum(['Pickup', 'Delivery']),
    deliveryLocation: z.string().trim().min(1).optional(),
    items: z
      .array(
        z.object({
          menuItemId: z.string().min(1),
          quantity: z.number().int().min(1).max(100).default(1),
        })
      )
      .min(1, 'An order needs at least one item'),
    notes: z.string().max(500).default(''),
  })
  .refine(order => order.deliveryType === 'Pickup' || order.deliveryLocation !== undefined, {
    message: 'Delivery orders need a delivery location',
    path: ['deliveryLocation'],
  });

const AssignRiderSchema = z.object({
  riderId: z.string().min(1),
});

const UpdateAssignmentSchema = z.object({
  status: z.enum(ASSIGNMENT_STATUSES),
});

function firstIssue(error: ZodError): string {
  const issue = error.issues[0];
  return `${issue.path.join('.') || 'body'}: ${issue.message}`;
}

export interface OrderRouteStores {
  orders: OrderStore;
  locations: DeliveryLocationStore;
  menu: MenuStore;
  users: UserStore;
}

export function createOrderRoutes(
  stores: OrderRouteStores,
  protect: RequestHandler[],
  rbac: (allowedRoles: readonly Role[]) => RequestHandler
): Router {
  const router = Router();
  const logger = getLogger('orders');
  const { orders: orderStore, locations: locationStore, menu: menuStore, users: userStore } = stores;

  // GET /api/orders/ - newest first
  router.get('/', ...protect, async (_req, res, next) => {
    try {
      res.json(await orderStore.list());
    } catch (error) {
      next(error);
    }
  });

  // GET /api/orders/:id/
  router.get('/:id', ...protect, async (req, res, next) => {
    try {
      const order = await orderStore.getById(req.params.id);
      if (!order) {
        res.status(404).json({ error: 'Order not found' });
        return;
      }
      res.json(order);
    } catch (error) {
      next(error);
    }
  });

  // POST /api/orders/
  router.post('/', ...protect, rbac(ORDER_WRITE_ROLES), async (req, res, next) => {
    const parsed = CreateOrderSchema.safeParse(req.body);
    if (!parsed.success) {
      res.status(400).json({ error: firstIssue(parsed.error) });
      return;
    }
    const input = parsed.data;

    try {
      let deliveryLocation: string | null = null;
      let deliveryFee = 0;

      if (input.deliveryType === 'Delivery' && input.deliveryLocation !== undefined) {
        const location = await locationStore.getByName(input.deliveryLocation);
        if (!location || !location.isActive) {
          res.status(400).json({ error: `Unknown or inactive delivery location: ${input.deliveryLocation}` });
          return;
        }
        deliveryLocation = location.name;
        deliveryFee = location.fee;
      }

      const items: OrderItem[] = [];
      for (const line of input.items) {
        const menuItem = await menuStore.getById(line.menuItemId);
        if (!menuItem || !menuItem.isAvailable) {
          res.status(400).json({ error: `Unknown or unavailable menu item: ${line.menuItemId}` });
          return;
        }
        items.push({
          menuItemId: menuItem.id,
          name: menuItem.name,
          quantity: line.quantity,
          unitPrice: menuItem.price,
          subtotal: roundMoney(menuItem.price * line.quantity),
        });
      }

      const order = await orderStore.create({
        customerPhone: input.customerPhone,
        deliveryType: input.deliveryType,
        deliveryLocation,
        deliveryFee,
        items,
        notes: input.notes,
        createdBy: req.authContext?.username ?? 'unknown',
      });
      res.status(201).json(order);
    } catch (error) {
      next(error);
    }
  });

  // POST /api/orders/:id/assign/ - hand a delivery order to a rider
  router.post('/:id/assign', ...protect, rbac(ORDER_WRITE_ROLES), async (req, res, next) => {
    const parsed = AssignRiderSchema.safeParse(req.body);
    if (!parsed.success) {
      res.status(400).json({ error: firstIssue(parsed.error) });
      return;
    }
    const { riderId } = parsed.data;

    try {
      const order = await orderStore.getById(req.params.id);
      if (!order) {
        res.status(404).json({ error: 'Order not found' });
        return;
      }
      if (order.deliveryType !== 'Delivery') {
        res.status(400).json({ error: 'Only delivery orders can be assigned a rider' });
        return;
      }
      if (order.status === 'Delivered' || order.status === 'Cancelled') {
        res.status(400).json({ error: `Order is already ${order.status.toLowerCase()}` });
        return;
      }
      // A rider who has picked the order up keeps it
      const current = order.assignment;
      if (current && current.status !== 'assigned' && ACTIVE_ASSIGNMENT_STATUSES.includes(current.status)) {
        res.status(409).json({ error: 'Order is already on its way' });
        return;
      }

      const rider = await userStore.getById(riderId);
      if (!rider || rider.role !== 'delivery' || !rider.isActive) {
        res.status(400).json({ error: 'Rider not found or inactive' });
        return;
      }

      const alreadyAssigned = current?.riderId === riderId && current.status === 'assigned';
      const active = await orderStore.countActiveAssignments(riderId);
      if (!alreadyAssigned && active >= MAX_CONCURRENT_DELIVERIES) {
        res.status(409).json({ error: `Rider already has ${MAX_CONCURRENT_DELIVERIES} active deliveries` });
        return;
      }

      const assignment: DeliveryAssignment = {
        riderId: rider.id,
        riderUsername: rider.username,
        status: 'assigned',
        assignedAt: getNow().toISOString(),
        pickedUpAt: null,
        deliveredAt: null,
      };
      const updated = await orderStore.update(order.id, { assignment });
      logger.info('Rider assigned', {
        orderNumber: order.orderNumber,
        rider: rider.username,
        assignedBy: req.authContext?.username,
      });
      res.json(updated);
    } catch (error) {
      next(error);
    }
  });

  // PATCH /api/orders/:id/assignment/ - move a delivery along
  router.patch('/:id/assignment', ...protect, rbac(ASSIGNMENT_UPDATE_ROLES), async (req, res, next) => {
    const parsed = UpdateAssignmentSchema.safeParse(req.body);
    if (!parsed.success) {
      res.status(400).json({ error: firstIssue(parsed.error) });
      return;
    }
    const { status } = parsed.data;

    try {
      const order = await orderStore.getById(req.params.id);
      if (!order) {
        res.status(404).json({ error: 'Order not found' });
        return;
      }
      const current = order.assignment;
      if (!current) {
        res.status(404).json({ error: 'Order has no rider assignment' });
        return;
      }
      if (req.authContext?.role === 'delivery' && req.authContext.sub !== current.riderId) {
        res.status(403).json({ error: 'Only the assigned rider can update this delivery' });
        return;
      }

      const allowed = NEXT_ASSIGNMENT_STATUSES[current.status] ?? [];
      if (!allowed.includes(status)) {
        res.status(409).json({ error: `Cannot move a delivery from ${current.status} to ${status}` });
        return;
      }

      const now = getNow().toISOString();
      const assignment: DeliveryAssignment = {
        ...current,
        status,
        pickedUpAt: status === 'picked_up' ? now : current.pickedUpAt,
        deliveredAt: status === 'delivered' ? now : current.deliveredAt,
      };
      const updated = await orderStore.update(order.id, {
        assignment,
        status: status === 'delivered' ? 'Delivered' : undefined,
      });
      logger.info('Delivery updated', {
        orderNumber: order.orderNumber,
        from: current.status,
        to: status,
        by: req.authContext?.username,
      });
      res.json(updated);
    } catch (error) {
      next(error);
    }
  });

  return router;
}
