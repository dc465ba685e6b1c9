import express from 'express';
import { config } from '../shared/config';
import { parseTestNowHeader } from '../shared/clock';
import { getLogger } from '../shared/log';
import { errorMessage } from '../shared/logger';
import { createAuthMiddleware } from './middleware/auth';
import { createCorsMiddleware } from './middleware/cors';
import { createErrorHandler } from './middleware/errors';
import { createRbacMiddleware, STAFF_ROLES } from './middleware/rbac';
import { createSessionMiddleware } from './middleware/session';
import { createTokenLifetimeMiddleware } from './middleware/tokenLifetime';
import { createDeliveryLocationRoutes } from './routes/deliveryLocations';
import { createMenuRoutes } from './routes/menu';
import { createOrderRoutes } from './routes/orders';
import { createTokenRoutes } from './routes/token';
import { createUserRoutes } from './routes/users';
import { ensureSuperuser } from './bootstrap';
import { deliveryLocationStore } from './store/deliveryLocationStore';
import { menuStore } from './store/menuStore';
import { orderStore } from './store/orderStore';
import { sessionStore } from './store/sessionStore';
import { userStore } from './store/userStore';

const logger = getLogger('api');

const app = express();
app.use(createCorsMiddleware());
app.use(express.json());

// Test time control middleware
if (config.isTest) {
  app.use((req, _res, next) => {
    parseTestNowHeader(req.get('x-test-now'));
    next();
  });
}

app.use(createTokenLifetimeMiddleware());

// Public routes
app.get('/health', (_req, res) => {
  res.json({ status: 'ok', service: 'frontdesk-api' });
});

app.use('/api/token', createTokenRoutes(sessionStore, userStore));

// Protected route middleware chain
const authenticate = createAuthMiddleware();
const checkSession = createSessionMiddleware(sessionStore);
const rbac = createRbacMiddleware();
const protect = [authenticate, checkSession, rbac(STAFF_ROLES)];

app.use('/api/users', createUserRoutes(sessionStore, userStore, protect, rbac));
app.use('/api/menu/items', createMenuRoutes(menuStore, protect, rbac));
app.use(
  '/api/orders',
  createOrderRoutes(
    { orders: orderStore, locations: deliveryLocationStore, menu: menuStore, users: userStore },
    protect,
    rbac
  )
);
app.use('/api/deliveries/locations', createDeliveryLocationRoutes(deliveryLocationStore, protect, rbac));

app.use('/api', (_req, res) => {
  res.status(404).json({ error: 'Not found' });
});

app.use(createErrorHandler());

// Initialize and start
async function start(): Promise<void> {
  await sessionStore.connect();
  await userStore.connect();
  await deliveryLocationStore.connect();
  await ensureSuperuser(userStore, config.superuser, logger);

  const port = config.api.port;
  app.listen(port, () => {
    logger.info(`frontdesk-api listening on port ${port}`, {
      environment: config.environment,
      debug: config.debug,
    });
  });
}

if (require.main === module) {
  start().catch((error: unknown) => {
    logger.error('Failed to start', { error: errorMessage(error) });
    process.exitCode = 1;
  });
}

export { app, sessionStore, userStore, orderStore, menuStore, deliveryLocationStore };
