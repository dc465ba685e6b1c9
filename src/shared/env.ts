import { z } from 'zod';

const HOUR = 60 * 60;
const DAY = 24 * HOUR;

// Longest delay a Node timer accepts, in whole hours
export const MAX_SYNC_INTERVAL_HOURS = Math.floor(2_147_483_647 / (HOUR * 1000));

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

export const DEFAULT_JWT_SECRET = 'test-secret-key-for-access-tokens';

const booleanFlag = z
  .enum(['true', 'false', '1', '0', 'yes', 'no'])
  .transform(v => v === 'true' || v === '1' || v === 'yes');

export const EnvSchema = z.object({
  NODE_ENV: z.string().default('development'),
  APP_ENVIRONMENT: z.enum(['local', 'development', 'production']).default('local'),
  PORT: z.coerce.number().int().positive().default(8000),
  DEBUG: booleanFlag.default('false'),
  JWT_SECRET: z.string().min(1).default(DEFAULT_JWT_SECRET),
  ACCESS_TOKEN_LIFETIME_SECONDS: z.coerce.number().int().positive().optional(),
  REFRESH_TOKEN_LIFETIME_SECONDS: z.coerce.number().int().positive().optional(),
  TOKEN_REFRESH_WARNING_SECONDS: z.coerce.number().int().nonnegative().default(30 * 60),
  REDIS_URL: z.string().default('redis://localhost:6379'),
  CORS_ALLOWED_ORIGINS: z.string().optional(),
  DELIVERY_LOCATIONS_FILE: z.string().min(1).default('delivery locations.txt'),
  SYNC_INTERVAL_HOURS: z.coerce.number().int().positive().max(MAX_SYNC_INTERVAL_HOURS).default(6),
  LOG_LEVEL: z.enum(['debug', 'info', 'warn', 'error']).optional(),
  LOG_FORMAT: z.enum(['json', 'text']).default('text'),
  SUPERUSER_USERNAME: z.string().min(1).optional(),
  SUPERUSER_PASSWORD: z.string().min(1).optional(),
  SUPERUSER_EMAIL: z.string().email().optional(),
});

// Parse CORS origins from environment variable (comma-separated)
function parseCorsOrigins(origins: string | undefined, isTest: boolean): string[] {
  if (!origins) {
    return isTest ? ['http://localhost:3000', 'https://frontdesk.example.com'] : [];
  }
  return origins.split(',').map(o => o.trim()).filter(Boolean);
}

export function loadConfig(source: NodeJS.ProcessEnv = process.env) {
  const result = EnvSchema.safeParse(source);

  if (!result.success) {
    const firstIssue = result.error.issues[0];
    const field = firstIssue.path.join('.') || 'environment';
    throw new ConfigError(`Invalid config: ${field} - ${firstIssue.message}`);
  }

  const env = result.data;
  const isTest = env.NODE_ENV === 'test';

  return {
    environment: env.APP_ENVIRONMENT,
    debug: env.DEBUG,
    isTest,
    api: {
      port: env.PORT,
      prefix: '/api/',
      corsAllowedOrigins: parseCorsOrigins(env.CORS_ALLOWED_ORIGINS, isTest),
    },
    auth: {
      jwtSecret: env.JWT_SECRET,
      jwtIssuer: 'frontdesk-api',
      jwtAudience: 'frontdesk-api-clients',
      // Debug builds keep staff logged in for a whole shift
      accessTokenLifetimeSeconds: env.ACCESS_TOKEN_LIFETIME_SECONDS ?? (env.DEBUG ? 8 * HOUR : HOUR),
      refreshTokenLifetimeSeconds: env.REFRESH_TOKEN_LIFETIME_SECONDS ?? (env.DEBUG ? 30 * DAY : 7 * DAY),
      refreshWarningSeconds: env.TOKEN_REFRESH_WARNING_SECONDS,
      refreshPath: '/api/token/refresh/',
      tokenPaths: ['/api/token/', '/api/token/refresh/', '/api/token/verify/'],
    },
    redisUrl: env.REDIS_URL,
    deliveries: {
      locationsFile: env.DELIVERY_LOCATIONS_FILE,
      syncIntervalHours: env.SYNC_INTERVAL_HOURS,
    },
    log: {
      level: env.LOG_LEVEL ?? (isTest ? 'error' : env.DEBUG ? 'debug' : 'info'),
      format: env.LOG_FORMAT,
    },
    superuser:
      env.SUPERUSER_USERNAME && env.SUPERUSER_PASSWORD
        ? {
            username: env.SUPERUSER_USERNAME,
            password: env.SUPERUSER_PASSWORD,
            email: env.SUPERUSER_EMAIL ?? '',
          }
        : null,
  } as const;
}

export type Config = ReturnType<typeof loadConfig>;
