import { randomBytes, scrypt, timingSafeEqual } from 'node:crypto';
import Redis from 'ioredis';
import { v4 as uuidv4 } from 'uuid';
import { config } from '../../shared/config';
import { getNow } from '../../shared/clock';
import { PublicUser, Role, User } from '../../shared/types';

const KEY_LENGTH = 64;

function deriveKey(password: string, salt: string, length: number): Promise<Buffer> {
  return new Promise((resolve, reject) => {
    scrypt(password, salt, length, (error, key) => (error ? reject(error) : resolve(key)));
  });
}

export async function hashPassword(password: string): Promise<string> {
  const salt = randomBytes(16).toString('hex');
  const derived = await deriveKey(password, salt, KEY_LENGTH);
  return `scrypt$${salt}$${derived.toString('hex')}`;
}

export async function verifyPassword(password: string, stored: string): Promise<boolean> {
  const [scheme, salt, hash] = stored.split('$');
  if (scheme !== 'scrypt' || !salt || !hash) {
    return false;
  }
  const expected = Buffer.from(hash, 'hex');
  if (expected.length !== KEY_LENGTH) {
    return false;
  }
  const derived = await deriveKey(password, salt, KEY_LENGTH);
  return timingSafeEqual(derived, expected);
}

export function toPublicUser(user: User): PublicUser {
  const { passwordHash: _passwordHash, ...rest } = user;
  return rest;
}

export interface NewUser {
  username: string;
  password: string;
  role: Role;
  email?: string;
  firstName?: string;
  lastName?: string;
  isActive?: boolean;
}

export class UsernameTakenError extends Error {
  constructor(username: string) {
    super(`Username already taken: ${username}`);
    this.name = 'UsernameTakenError';
  }
}

export interface UserStore {
  connect(): Promise<void>;
  disconnect(): Promise<void>;
  list(): Promise<User[]>;
  getById(id: string): Promise<User | null>;
  getByUsername(username: string): Promise<User | null>;
  create(data: NewUser): Promise<User>;
  authenticate(username: string, password: string): Promise<User | null>;
  recordLogin(id: string): Promise<void>;
  countByRole(role: Role): Promise<number>;
}

async function buildUser(data: NewUser): Promise<User> {
  return {
    id: uuidv4(),
    username: data.username,
    email: data.email ?? '',
    firstName: data.firstName ?? '',
    lastName: data.lastName ?? '',
    role: data.role,
    isActive: data.isActive ?? true,
    passwordHash: await hashPassword(data.password),
    lastLogin: null,
    dateJoined: getNow(),
  };
}

function byUsername(a: User, b: User): number {
  return a.username.localeCompare(b.username);
}

export class InMemoryUserStore implements UserStore {
  private users = new Map<string, User>();

  async connect(): Promise<void> {
    // No-op for in-memory store
  }

  async disconnect(): Promise<void> {
    this.users.clear();
  }

  async list(): Promise<User[]> {
    return [...this.users.values()].sort(byUsername);
  }

  async getById(id: string): Promise<User | null> {
    return this.users.get(id) ?? null;
  }

  async getByUsername(username: string): Promise<User | null> {
    for (const user of this.users.values()) {
      if (user.username === username) {
        return user;
      }
    }
    return null;
  }

  async create(data: NewUser): Promise<User> {
    if (await this.getByUsername(data.username)) {
      throw new UsernameTakenError(data.username);
    }

    const user = await buildUser(data);
    this.users.set(user.id, user);
    return user;
  }

  async authenticate(username: string, password: string): Promise<User | null> {
    const user = await this.getByUsername(username);
    if (!user) {
      return null;
    }
    return (await verifyPassword(password, user.passwordHash)) ? user : null;
  }

  async recordLogin(id: string): Promise<void> {
    const user = this.users.get(id);
    if (user) {
      user.lastLogin = getNow();
    }
  }

  async countByRole(role: Role): Promise<number> {
    let count = 0;
    for (const user of this.users.values()) {
      if (user.role === role) count++;
    }
    return count;
  }
}

const USERNAMES_KEY = 'users:by-username';

// Dates travel as ISO strings in Redis
interface StoredUser extends Omit<User, 'lastLogin' | 'dateJoined'> {
  lastLogin: string | null;
  dateJoined: string;
}

function toStored(user: User): string {
  const stored: StoredUser = {
    ...user,
    lastLogin: user.lastLogin ? user.lastLogin.toISOString() : null,
    dateJoined: user.dateJoined.toISOString(),
  };
  return JSON.stringify(stored);
}

function fromStored(data: string): User {
  const stored: StoredUser = JSON.parse(data);
  return {
    ...stored,
    lastLogin: stored.lastLogin ? new Date(stored.lastLogin) : null,
    dateJoined: new Date(stored.dateJoined),
  };
}

export class RedisUserStore implements UserStore {
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

  async list(): Promise<User[]> {
    const client = this.requireClient();
    const ids = await client.hvals(USERNAMES_KEY);
    if (ids.length === 0) return [];

    const records = await client.mget(...ids.map(id => `user:${id}`));
    return records
      .filter((data): data is string => data !== null)
      .map(fromStored)
      .sort(byUsername);
  }

  async getById(id: string): Promise<User | null> {
    const data = await this.requireClient().get(`user:${id}`);
    return data ? fromStored(data) : null;
  }

  async getByUsername(username: string): Promise<User | null> {
    const id = await this.requireClient().hget(USERNAMES_KEY, username);
    return id ? this.getById(id) : null;
  }

  async create(data: NewUser): Promise<User> {
    const client = this.requireClient();
    const user = await buildUser(data);

    // Claim the username first so two concurrent creates cannot both win
    const claimed = await client.hsetnx(USERNAMES_KEY, user.username, user.id);
    if (claimed === 0) {
      throw new UsernameTakenError(user.username);
    }

    await client.set(`user:${user.id}`, toStored(user));
    return user;
  }

  async authenticate(username: string, password: string): Promise<User | null> {
    const user = await this.getByUsername(username);
    if (!user) {
      return null;
    }
    return (await verifyPassword(password, user.passwordHash)) ? user : null;
  }

  async recordLogin(id: string): Promise<void> {
    const user = await this.getById(id);
    if (user) {
      user.lastLogin = getNow();
      await this.requireClient().set(`user:${id}`, toStored(user));
    }
  }

  async countByRole(role: Role): Promise<number> {
    return (await this.list()).filter(user => user.role === role).length;
  }
}

// Create the appropriate store based on environment
export function createUserStore(): UserStore {
  // Always use in-memory for tests to avoid Redis dependency
  if (config.isTest) {
    return new InMemoryUserStore();
  }
  return new RedisUserStore();
}

export const userStore: UserStore = createUserStore();
