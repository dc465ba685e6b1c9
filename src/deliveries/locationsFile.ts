import { readFile } from 'fs/promises';
import { isAbsolute, resolve } from 'path';
import { DeliveryLocationStore } from '../api/store/deliveryLocationStore';
import { Logger } from '../shared/logger';

const PRICE_LINE = /^\{DELIVERY PRICE\}\s*-\s*(\d+(?:\.\d+)?)/;

export class DeliveryLocationsFileError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'DeliveryLocationsFileError';
  }
}

/**
 * Parses the delivery locations file into fee groups.
 *
 * A `{DELIVERY PRICE} - 15` line opens a group; every following non-empty
 * line is a location name charged that fee. Lines before the first price
 * line are ignored and repeated prices share one group.
 */
export function parseDeliveryLocations(content: string): Map<number, string[]> {
  const groups = new Map<number, string[]>();
  let current: string[] | null = null;

  for (const rawLine of content.split(/\r?\n/)) {
    const line = rawLine.trim();
    if (!line) {
      continue;
    }

    const priceMatch = PRICE_LINE.exec(line);
    if (priceMatch) {
      const fee = Number(priceMatch[1]);
      current = groups.get(fee) ?? [];
      groups.set(fee, current);
    } else if (current) {
      current.push(line);
    }
  }

  return groups;
}

export interface LoadLocationsOptions {
  file: string;
  /** Upsert existing names instead of skipping them */
  update?: boolean;
  /** Remove every stored location first */
  clear?: boolean;
  baseDir?: string;
  logger?: Logger;
}

export interface LoadSummary {
  created: number;
  updated: number;
  skipped: number;
  cleared: number;
  total: number;
}

async function readLocationsFile(path: string): Promise<string> {
  try {
    return await readFile(path, 'utf-8');
  } catch (error) {
    if (error instanceof Error && Reflect.get(error, 'code') === 'ENOENT') {
      throw new DeliveryLocationsFileError(`File not found: ${path}`);
    }
    throw error;
  }
}

export function resolveLocationsFile(file: string, baseDir: string = process.cwd()): string {
  return isAbsolute(file) ? file : resolve(baseDir, file);
}

/**
 * Loads the delivery locations file into the store. With `update` this is
 * idempotent: running it twice leaves the store as after the first run.
 */
export async function loadDeliveryLocations(
  store: DeliveryLocationStore,
  options: LoadLocationsOptions
): Promise<LoadSummary> {
  const path = resolveLocationsFile(options.file, options.baseDir);
  const groups = parseDeliveryLocations(await readLocationsFile(path));
  const summary: LoadSummary = { created: 0, updated: 0, skipped: 0, cleared: 0, total: 0 };

  if (options.clear) {
    summary.cleared = await store.clear();
    options.logger?.warn(`Cleared ${summary.cleared} existing locations`);
  }

  for (const [fee, names] of groups) {
    for (const name of names) {
      if (options.update) {
        const outcome = await store.upsert(name, fee);
        summary[outcome]++;
      } else if (await store.createIfAbsent(name, fee)) {
        summary.created++;
      } else {
        summary.skipped++;
        options.logger?.debug(`Skipped existing location: ${name}`);
      }
    }
  }

  summary.total = await store.count();
  options.logger?.info('Delivery locations loaded', { ...summary, file: path });
  return summary;
}
