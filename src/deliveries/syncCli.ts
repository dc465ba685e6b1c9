#!/usr/bin/env node
import { parseArgs } from 'node:util';
import { CliUsageError } from '../shared/cli';
import { config } from '../shared/config';
import { MAX_SYNC_INTERVAL_HOURS } from '../shared/env';
import { getLogger } from '../shared/log';
import { errorMessage } from '../shared/logger';
import { DeliveryLocationStore, deliveryLocationStore } from '../api/store/deliveryLocationStore';
import { loadDeliveryLocations } from './locationsFile';
import { SyncRunRecord, SyncSupervisor } from './syncSupervisor';

export interface SyncCliOptions {
  intervalHours: number;
  runOnce: boolean;
  file: string;
  help: boolean;
}

export const USAGE = `Usage: frontdesk-sync [options]

Keeps delivery locations in step with the locations file.

Options:
  -i, --interval <hours>  Hours between syncs (default: ${config.deliveries.syncIntervalHours})
      --once              Sync once and exit
  -f, --file <path>       Delivery locations file (default: ${config.deliveries.locationsFile})
  -h, --help              Show this help
`;

function readArgs(args: string[]) {
  try {
    return parseArgs({
      args,
      options: {
        interval: { type: 'string', short: 'i' },
        once: { type: 'boolean', default: false },
        file: { type: 'string', short: 'f' },
        help: { type: 'boolean', short: 'h', default: false },
      },
      strict: true,
      allowPositionals: false,
    }).values;
  } catch (error) {
    throw new CliUsageError(errorMessage(error));
  }
}

/**
 * Parses command-line arguments for the sync worker.
 */
export function parseSyncArgs(
  args: string[],
  defaults: { intervalHours: number; file: string } = {
    intervalHours: config.deliveries.syncIntervalHours,
    file: config.deliveries.locationsFile,
  }
): SyncCliOptions {
  const values = readArgs(args);

  let intervalHours = defaults.intervalHours;
  if (values.interval !== undefined) {
    if (!/^\d+$/.test(values.interval)) {
      throw new CliUsageError(`--interval must be a whole number of hours, got "${values.interval}"`);
    }
    intervalHours = parseInt(values.interval, 10);
  }
  if (intervalHours < 1 || intervalHours > MAX_SYNC_INTERVAL_HOURS) {
    throw new CliUsageError(`--interval must be between 1 and ${MAX_SYNC_INTERVAL_HOURS} hours`);
  }

  return {
    intervalHours,
    runOnce: values.once ?? false,
    file: values.file ?? defaults.file,
    help: values.help ?? false,
  };
}

const TERMINATION_SIGNALS: NodeJS.Signals[] = ['SIGINT', 'SIGTERM'];

/**
 * Runs the supervisor until it stops, wiring SIGINT/SIGTERM to a clean
 * shutdown for the duration of the run.
 */
export async function runSyncWorker(
  options: SyncCliOptions,
  store: DeliveryLocationStore = deliveryLocationStore
): Promise<SyncRunRecord[]> {
  const logger = getLogger('delivery-sync');

  const supervisor = new SyncSupervisor({
    intervalHours: options.intervalHours,
    runOnce: options.runOnce,
    logger,
    sync: () => loadDeliveryLocations(store, { file: options.file, update: true, logger }),
  });

  const handlers = TERMINATION_SIGNALS.map(signal => {
    const handler = (): void => supervisor.stop(signal);
    process.once(signal, handler);
    return { signal, handler };
  });

  await store.connect();
  try {
    return await supervisor.run();
  } finally {
    for (const { signal, handler } of handlers) {
      process.removeListener(signal, handler);
    }
    await store.disconnect();
  }
}

export async function main(argv: string[]): Promise<number> {
  let options: SyncCliOptions;
  try {
    options = parseSyncArgs(argv);
  } catch (error) {
    if (error instanceof CliUsageError) {
      console.error(`Error: ${error.message}\n`);
      console.error(USAGE);
      return 2;
    }
    throw error;
  }

  if (options.help) {
    console.log(USAGE);
    return 0;
  }

  // A failed sync does not fail the worker, in run-once mode too
  await runSyncWorker(options);
  return 0;
}

if (require.main === module) {
  main(process.argv.slice(2))
    .then(code => {
      process.exitCode = code;
    })
    .catch((error: unknown) => {
      getLogger('delivery-sync').error('Sync worker crashed', { error: errorMessage(error) });
      process.exitCode = 1;
    });
}
