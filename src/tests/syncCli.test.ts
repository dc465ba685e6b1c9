import { mkdtempSync, rmSync, writeFileSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import { InMemoryDeliveryLocationStore } from '../api/store/deliveryLocationStore';
import { main, parseSyncArgs, runSyncWorker, USAGE } from '../deliveries/syncCli';
import { CliUsageError } from '../shared/cli';

const DEFAULTS = { intervalHours: 6, file: 'delivery locations.txt' };

describe('parseSyncArgs', () => {
  test('falls back to the defaults', () => {
    expect(parseSyncArgs([], DEFAULTS)).toEqual({
      intervalHours: 6,
      runOnce: false,
      file: 'delivery locations.txt',
      help: false,
    });
  });

  test('reads every option', () => {
    expect(parseSyncArgs(['--interval', '12', '--once', '--file', '/srv/zones.txt'], DEFAULTS)).toEqual({
      intervalHours: 12,
      runOnce: true,
      file: '/srv/zones.txt',
      help: false,
    });
  });

  test('reads short options', () => {
    expect(parseSyncArgs(['-i', '2', '-f', 'zones.txt', '-h'], DEFAULTS)).toEqual({
      intervalHours: 2,
      runOnce: false,
      file: 'zones.txt',
      help: true,
    });
  });

  test.each([['0'], ['597'], ['1.5'], ['-3'], ['six']])('rejects --interval %s', value => {
    expect(() => parseSyncArgs([`--interval=${value}`], DEFAULTS)).toThrow(CliUsageError);
  });

  test('rejects unknown options', () => {
    expect(() => parseSyncArgs(['--forever'], DEFAULTS)).toThrow(CliUsageError);
  });

  test('rejects positional arguments', () => {
    expect(() => parseSyncArgs(['zones.txt'], DEFAULTS)).toThrow(CliUsageError);
  });
});

describe('runSyncWorker', () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'frontdesk-sync-'));
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  test('run-once loads the file in update mode', async () => {
    const file = join(dir, 'zones.txt');
    writeFileSync(file, '{DELIVERY PRICE} - 15\nOsu\n{DELIVERY PRICE} - 25\nAirport Residential\n');
    const store = new InMemoryDeliveryLocationStore();
    await store.upsert('Osu', 10);

    const runs = await runSyncWorker({ intervalHours: 6, runOnce: true, file, help: false }, store);

    expect(runs).toHaveLength(1);
    expect(runs[0].summary).toEqual({ created: 1, updated: 1, skipped: 0, cleared: 0, total: 2 });
    expect((await store.getByName('Osu'))?.fee).toBe(15);
  });

  test('removes its signal handlers when done', async () => {
    const sigint = process.listenerCount('SIGINT');
    const sigterm = process.listenerCount('SIGTERM');

    await runSyncWorker(
      { intervalHours: 6, runOnce: true, file: join(dir, 'missing.txt'), help: false },
      new InMemoryDeliveryLocationStore()
    );

    expect(process.listenerCount('SIGINT')).toBe(sigint);
    expect(process.listenerCount('SIGTERM')).toBe(sigterm);
  });

  test('a failed run-once sync still resolves', async () => {
    const runs = await runSyncWorker(
      { intervalHours: 6, runOnce: true, file: join(dir, 'missing.txt'), help: false },
      new InMemoryDeliveryLocationStore()
    );

    expect(runs[0].ok).toBe(false);
    expect(runs[0].error).toBe(`File not found: ${join(dir, 'missing.txt')}`);
  });

  test('SIGTERM stops a periodic worker', async () => {
    const file = join(dir, 'zones.txt');
    writeFileSync(file, '{DELIVERY PRICE} - 15\nOsu\n');
    const store = new InMemoryDeliveryLocationStore();
    const handlersBefore = process.listeners('SIGTERM');

    const running = runSyncWorker({ intervalHours: 6, runOnce: false, file, help: false }, store);
    const handler = process.listeners('SIGTERM').find(listener => !handlersBefore.includes(listener));
    expect(handler).toBeDefined();
    setImmediate(() => handler?.('SIGTERM'));

    const runs = await running;

    expect(runs).toHaveLength(1);
    expect(await store.count()).toBe(1);
  });
});

describe('main', () => {
  afterEach(() => {
    jest.restoreAllMocks();
  });

  test('--help prints usage and exits 0', async () => {
    const log = jest.spyOn(console, 'log').mockImplementation(() => undefined);

    await expect(main(['--help'])).resolves.toBe(0);
    expect(log).toHaveBeenCalledWith(USAGE);
  });

  test('a bad interval exits 2', async () => {
    const error = jest.spyOn(console, 'error').mockImplementation(() => undefined);

    await expect(main(['--interval', '0'])).resolves.toBe(2);
    expect(error).toHaveBeenCalledWith('Error: --interval must be between 1 and 596 hours\n');
  });
});
