import Redis from 'ioredis';
import { v4 as uuidv4 } from 'uuid';
import { config } from '../../shared/config';
import { Role, Session } from '../../shared/types';
import { getNow } from '../../shared/clock';

// How long a rotated-out refresh token is remembered as used
const USED_MARKER_TTL_SECONDS = config.auth.refreshTokenLifetimeSeconds;

export interface SessionStore {
  connect(): Promise<void>;
  disconnect(): Promise<void>;
  create(userId: string, role: Role, ttlMs: number): Promise<{ session: Session; refreshToken: string }>;
  getById(sessionId: string): Promise<Session | null>;
  getByRefreshToken(refreshToken: string): Promise<Session | null>;
  rotateRefreshToken(sessionId: string): Promise<string | null>;
  revoke(sessionId: string): Promise<boolean>;
  markRefreshTokenUsed(refreshToken: string): Promise<boolean>;
  isRefreshTokenUsed(refreshToken: string): Promise<boolean>;
}

function newSession(userId: string, role: Role, ttlMs: number): Session {
  const now = getNow().getTime();
  return {
    id: uuidv4(),
    userId,
    role,
    refreshToken: uuidv4(),
    expiresAt: now + ttlMs,
    revoked: false,
    createdAt: now,
  };
}

export class InMemorySessionStore implements SessionStore {
  private sessions = new Map<string, Session>();
  private refreshTokenToSession = new Map<string, string>();
  private usedRefreshTokens = new Set<string>();

  async connect(): Promise<void> {
    // No-op for in-memory store
  }

  async disconnect(): Promise<void> {
    this.sessions.clear();
    this.refreshTokenToSession.clear();
    this.usedRefreshTokens.clear();
  }

  async create(userId: string, role: Role, ttlMs: number): Promise<{ session: Session; refreshToken: string }> {
    const session = newSession(userId, role, ttlMs);
    this.sessions.set(session.id, session);
    this.refreshTokenToSession.set(session.refreshToken, session.id);
    return { session: { ...session }, refreshToken: session.refreshToken };
  }

  async getById(sessionId: string): Promise<Session | null> {
    const session = this.sessions.get(sessionId);
    return session ? { ...session } : null;
  }

  async getByRefreshToken(refreshToken: string): Promise<Session | null> {
    const sessionId = this.refreshTokenToSession.get(refreshToken);
    if (!sessionId) return null;
    return this.getById(sessionId);
  }

  async rotateRefreshToken(sessionId: string): Promise<string | null> {
    const session = this.sessions.get(sessionId);
    if (!session || session.revoked) return null;
    if (session.expiresAt < getNow().getTime()) return null;

    this.refreshTokenToSession.delete(session.refreshToken);
    session.refreshToken = uuidv4();
    this.refreshTokenToSession.set(session.refreshToken, sessionId);

    return session.refreshToken;
  }

  async revoke(sessionId: string): Promise<boolean> {
    const session = this.sessions.get(sessionId);
    if (!session) return false;

    session.revoked = true;
    this.refreshTokenToSession.delete(session.refreshToken);
    return true;
  }

  async markRefreshTokenUsed(refreshToken: string): Promise<boolean> {
    // Same contract as SETNX: true only for the first caller
    if (this.usedRefreshTokens.has(refreshToken)) {
      return false;
    }
    this.usedRefreshTokens.add(refreshToken);
    return true;
  }

  async isRefreshTokenUsed(refreshToken: string): Promise<boolean> {
    return this.usedRefreshTokens.has(refreshToken);
  }
}

export class RedisSessionStore implements SessionStore {
  private client: Redis | null = null;

  constructor(private readonly redisUrl: string = config.redisUrl) {}

  private requireClient(): Redis {
    if (!this.client) throw new Error('Redis not connected');
    return this.client;
  }

  async connect(): Promise<void> {
    this.client = new Redis(this.redisUrl, {
      maxRetriesPerRequest: 3,
      retryStrategy: (times) => {
        if (times > 3) return null;
        return Math.min(times * 100, 1000);
      },
    });

    await this.client.ping();
  }

  async disconnect(): Promise<void> {
    if (this.client) {
      await this.client.quit();
      this.client = null;
    }
  }

  private async save(session: Session, ttlMs: number): Promise<void> {
    const client = this.requireClient();
    await client
      .multi()
      .set(`session:${session.id}`, JSON.stringify(session), 'PX', ttlMs)
      .set(`refresh:${session.refreshToken}`, session.id, 'PX', ttlMs)
      .exec();
  }

  async create(userId: string, role: Role, ttlMs: number): Promise<{ session: Session; refreshToken: string }> {
    const session = newSession(userId, role, ttlMs);
    await this.save(session, ttlMs);
    return { session, refreshToken: session.refreshToken };
  }

  async getById(sessionId: string): Promise<Session | null> {
    const data = await this.requireClient().get(`session:${sessionId}`);
    if (!data) return null;

    const session: Session = JSON.parse(data);
    return session;
  }

  async getByRefreshToken(refreshToken: string): Promise<Session | null> {
    const sessionId = await this.requireClient().get(`refresh:${refreshToken}`);
    if (!sessionId) return null;

    return this.getById(sessionId);
  }

  async rotateRefreshToken(sessionId: string): Promise<string | null> {
    const client = this.requireClient();

    const session = await this.getById(sessionId);
    if (!session || session.revoked) return null;

    const now = getNow().getTime();
    if (session.expiresAt < now) return null;

    await client.del(`refresh:${session.refreshToken}`);

    session.refreshToken = uuidv4();
    await this.save(session, session.expiresAt - now);

    return session.refreshToken;
  }

  async revoke(sessionId: string): Promise<boolean> {
    const client = this.requireClient();

    const session = await this.getById(sessionId);
    if (!session) return false;

    // Keep the session record so later requests see it as revoked
    session.revoked = true;
    const remainingTtl = Math.max(session.expiresAt - getNow().getTime(), 1000);

    await client.set(`session:${sessionId}`, JSON.stringify(session), 'PX', remainingTtl);
    await client.del(`refresh:${session.refreshToken}`);

    return true;
  }

  async markRefreshTokenUsed(refreshToken: string): Promise<boolean> {
    const result = await this.requireClient().set(
      `used:${refreshToken}`,
      '1',
      'EX',
      USED_MARKER_TTL_SECONDS,
      'NX'
    );
    return result === 'OK';
  }

  async isRefreshTokenUsed(refreshToken: string): Promise<boolean> {
    const result = await this.requireClient().exists(`used:${refreshToken}`);
    return result === 1;
  }
}

// Create the appropriate store based on environment
export function createSessionStore(): SessionStore {
  // Always use in-memory for tests to avoid Redis dependency
  if (config.isTest) {
    return new InMemorySessionStore();
  }
  return new RedisSessionStore();
}

export const sessionStore: SessionStore = createSessionStore();
