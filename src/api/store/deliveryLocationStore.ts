import Redis from 'ioredis';
import { config } from '../../shared/config';
import { getNow } from '../../shared/clock';
import { DeliveryLocation } from '../../shared/types';

const LOCATIONS_KEY = 'delivery:locations';

export type UpsertOutcome = 'created' | 'updated';

export interface DeliveryLocationStore {
  connect(): Promise<void>;
  disconnect(): Promise<void>;
  getByName(name: string): Promise<DeliveryLocation | null>;
  list(): Promise<DeliveryLocation[]>;
  listActive(): Promise<DeliveryLocation[]>;
  /** Inserts the location or, when the name exists, replaces its fee and reactivates it. */
  upsert(name: string, fee: number): Promise<UpsertOutcome>;
  /** Inserts the location unless the name exists. Returns false when it did. */
  createIfAbsent(name: string, fee: number): Promise<boolean>;
  setActive(name: string, isActive: boolean): Promise<DeliveryLocation | null>;
  clear(): Promise<number>;
  count(): Promise<number>;
}

function byName(a: DeliveryLocation, b: DeliveryLocation): number {
  return a.name.localeCompare(b.name);
}

function buildLocation(name: string, fee: number, existing: DeliveryLocation | null): DeliveryLocation {
  const now = getNow().toISOString();
  return {
    name,
    fee,
    isActive: true,
    createdAt: existing?.createdAt ?? now,
    updatedAt: now,
  };
}

export class InMemoryDeliveryLocationStore implements DeliveryLocationStore {
  private locations = new Map<string, DeliveryLocation>();

  async connect(): Promise<void> {
    // No-op for in-memory store
  }

  async disconnect(): Promise<void> {
    // Data outlives the connection, as it would in Redis
  }

  async getByName(name: string): Promise<DeliveryLocation | null> {
    const location = this.locations.get(name);
    return location ? { ...location } : null;
  }

  async list(): Promise<DeliveryLocation[]> {
    return [...this.locations.values()].map(l => ({ ...l })).sort(byName);
  }

  async listActive(): Promise<DeliveryLocation[]> {
    return (await this.list()).filter(l => l.isActive);
  }

  async upsert(name: string, fee: number): Promise<UpsertOutcome> {
    const existing = this.locations.get(name) ?? null;
    this.locations.set(name, buildLocation(name, fee, existing));
    return existing ? 'updated' : 'created';
  }

  async createIfAbsent(name: string, fee: number): Promise<boolean> {
    if (this.locations.has(name)) {
      return false;
    }
    this.locations.set(name, buildLocation(name, fee, null));
    return true;
  }

  async clear(): Promise<number> {
    const count = this.locations.size;
    this.locations.clear();
    return count;
  }

  async count(): Promise<number> {
    return this.locations.size;
  }

  async setActive(name: string, isActive: boolean): Promise<DeliveryLocation | null> {
    const location = this.locations.get(name);
    if (!location) return null;

    location.isActive = isActive;
    location.updatedAt = getNow().toISOString();
    return { ...location };
  }
}

export class RedisDeliveryLocationStore implements DeliveryLocationStore {
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

  async getByName(name: string): Promise<DeliveryLocation | null> {
    const data = await this.requireClient().hget(LOCATIONS_KEY, name);
    if (!data) return null;

    const location: DeliveryLocation = JSON.parse(data);
    return location;
  }

  async list(): Promise<DeliveryLocation[]> {
    const entries = await this.requireClient().hgetall(LOCATIONS_KEY);
    return Object.values(entries)
      .map((data): DeliveryLocation => JSON.parse(data))
      .sort(byName);
  }

  async listActive(): Promise<DeliveryLocation[]> {
    return (await this.list()).filter(l => l.isActive);
  }

  async upsert(name: string, fee: number): Promise<UpsertOutcome> {
    const existing = await this.getByName(name);
    await this.requireClient().hset(LOCATIONS_KEY, name, JSON.stringify(buildLocation(name, fee, existing)));
    return existing ? 'updated' : 'created';
  }

  async createIfAbsent(name: string, fee: number): Promise<boolean> {
    const added = await this.requireClient().hsetnx(
      LOCATIONS_KEY,
      name,
      JSON.stringify(buildLocation(name, fee, null))
    );
    return added === 1;
  }

  async setActive(name: string, isActive: boolean): Promise<DeliveryLocation | null> {
    const location = await this.getByName(name);
    if (!location) return null;

    const updated: DeliveryLocation = { ...location, isActive, updatedAt: getNow().toISOString() };
    await this.requireClient().hset(LOCATIONS_KEY, name, JSON.stringify(updated));
    return updated;
  }

  async clear(): Promise<number> {
    const client = this.requireClient();
    const count = await client.hlen(LOCATIONS_KEY);
    await client.del(LOCATIONS_KEY);
    return count;
  }

  async count(): Promise<number> {
    return this.requireClient().hlen(LOCATIONS_KEY);
  }
}

export function createDeliveryLocationStore(): DeliveryLocationStore {
  if (config.isTest) {
    return new InMemoryDeliveryLocationStore();
  }
  return new RedisDeliveryLocationStore();
}

export const deliveryLocationStore: DeliveryLocationStore = createDeliveryLocationStore();
