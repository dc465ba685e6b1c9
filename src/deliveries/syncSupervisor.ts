import { setTimeout as delay } from 'timers/promises';
import { MAX_SYNC_INTERVAL_HOURS } from '../shared/env';
import { errorMessage, Logger } from '../shared/logger';
import { LoadSummary } from './locationsFile';

export type SupervisorState = 'STARTING' | 'SYNCING' | 'WAITING' | 'STOPPING' | 'STOPPED';

export interface SyncRunRecord {
  startedAt: string;
  finishedAt: string;
  ok: boolean;
  error?: string;
  summary?: LoadSummary;
}

export type SyncOperation = () => Promise<LoadSummary>;

/** Resolves after `ms`, or as soon as `signal` aborts. */
export type IntervalWait = (ms: number, signal: AbortSignal) => Promise<void>;

export interface SyncSupervisorOptions {
  sync: SyncOperation;
  logger: Logger;
  intervalHours?: number;
  runOnce?: boolean;
  wait?: IntervalWait;
  onStateChange?: (state: SupervisorState) => void;
}

export const DEFAULT_SYNC_INTERVAL_HOURS = 6;

export const abortableWait: IntervalWait = async (ms, signal) => {
  try {
    await delay(ms, undefined, { signal });
  } catch (error) {
    if (signal.aborted) {
      return;
    }
    throw error;
  }
};

/**
 * Runs the delivery location sync right away and then every
 * `intervalHours` until stopped.
 *
 * The supervisor owns its stop condition: `stop()` aborts the pending
 * wait, and the loop ends without starting another sync. A failed sync is
 * logged and recorded; it never ends the loop.
 */
export class SyncSupervisor {
  private readonly controller = new AbortController();
  private readonly sync: SyncOperation;
  private readonly logger: Logger;
  private readonly wait: IntervalWait;
  private readonly onStateChange?: (state: SupervisorState) => void;
  private currentState: SupervisorState = 'STARTING';
  private started = false;

  readonly intervalHours: number;
  readonly runOnce: boolean;

  constructor(options: SyncSupervisorOptions) {
    const intervalHours = options.intervalHours ?? DEFAULT_SYNC_INTERVAL_HOURS;
    if (!Number.isInteger(intervalHours) || intervalHours < 1 || intervalHours > MAX_SYNC_INTERVAL_HOURS) {
      throw new RangeError(
        `intervalHours must be an integer between 1 and ${MAX_SYNC_INTERVAL_HOURS}, got ${intervalHours}`
      );
    }

    this.intervalHours = intervalHours;
    this.runOnce = options.runOnce ?? false;
    this.sync = options.sync;
    this.logger = options.logger;
    this.wait = options.wait ?? abortableWait;
    this.onStateChange = options.onStateChange;
  }

  get state(): SupervisorState {
    return this.currentState;
  }

  get intervalMs(): number {
    return this.intervalHours * 60 * 60 * 1000;
  }

  get stopRequested(): boolean {
    return this.controller.signal.aborted;
  }

  /** Requests a clean shutdown; safe to call more than once. */
  stop(reason: string = 'stop request'): void {
    if (this.controller.signal.aborted) {
      return;
    }
    this.logger.warn(`Received ${reason}, shutting down...`);
    this.controller.abort(reason);
  }

  async run(): Promise<SyncRunRecord[]> {
    if (this.started) {
      throw new Error('SyncSupervisor can only run once');
    }
    this.started = true;

    const runs: SyncRunRecord[] = [];
    const { signal } = this.controller;

    this.logger.info(`Starting delivery location sync service (interval: ${this.intervalHours} hours)`, {
      runOnce: this.runOnce,
    });

    while (!signal.aborted) {
      this.transition('SYNCING');
      runs.push(await this.syncOnce());

      if (this.runOnce || signal.aborted) {
        break;
      }

      this.transition('WAITING');
      await this.wait(this.intervalMs, signal);
    }

    if (signal.aborted) {
      this.transition('STOPPING');
    }
    this.transition('STOPPED');
    this.logger.warn('Delivery location sync service stopped', { runs: runs.length });

    return runs;
  }

  private transition(next: SupervisorState): void {
    this.logger.debug(`Supervisor ${this.currentState} -> ${next}`);
    this.currentState = next;
    this.onStateChange?.(next);
  }

  private async syncOnce(): Promise<SyncRunRecord> {
    const startedAt = new Date().toISOString();
    this.logger.info(`[${startedAt}] Syncing delivery locations...`);

    try {
      const summary = await this.sync();
      const record: SyncRunRecord = { startedAt, finishedAt: new Date().toISOString(), ok: true, summary };
      this.logger.info(`[${startedAt}] Sync completed successfully`, { ...summary });
      return record;
    } catch (error) {
      const record: SyncRunRecord = {
        startedAt,
        finishedAt: new Date().toISOString(),
        ok: false,
        error: errorMessage(error),
      };
      this.logger.error(`[${startedAt}] Sync failed: ${record.error}`);
      return record;
    }
  }
}
