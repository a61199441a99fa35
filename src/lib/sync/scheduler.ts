/**
 * Sync Scheduler
 *
 * Runs a sync pass immediately on start(), then another one `intervalMs`
 * after the previous pass settles. triggerNow() runs a pass at once,
 * whatever phase the schedule is in; repositories still syncing from an
 * earlier pass are skipped by the worker. stop() cancels the timer and
 * waits for passes in flight.
 */

import type { Clock, ClockTimer } from './clock.js';
import { SystemClock } from './clock.js';
import type { SyncOutcome } from './sync-worker.js';
import { errorMessage } from '../errors.js';
import { logError, logInfo } from '../fault-logger.js';

export interface SyncSchedulerOptions {
  intervalMs: number;
  clock?: Clock;
  /** Called with the outcomes of every pass. */
  onPass?: (outcomes: SyncOutcome[]) => void;
}

export class SyncScheduler {
  private readonly clock: Clock;
  private timer: ClockTimer | null = null;
  private started = false;
  private readonly inFlight = new Set<Promise<SyncOutcome[]>>();

  constructor(
    private readonly runPass: () => Promise<SyncOutcome[]>,
    private readonly options: SyncSchedulerOptions
  ) {
    this.clock = options.clock ?? new SystemClock();
  }

  get isRunning(): boolean {
    return this.started;
  }

  get passesInFlight(): number {
    return this.inFlight.size;
  }

  start(): void {
    if (this.started) return;
    this.started = true;
    logInfo('scheduler', `Scheduler started, interval ${this.options.intervalMs}ms`);
    this.launch();
  }

  /** Run a pass now and return its outcomes. */
  triggerNow(): Promise<SyncOutcome[]> {
    return this.launch();
  }

  /** Resolves when no pass is in flight. */
  async whenIdle(): Promise<void> {
    while (this.inFlight.size > 0) {
      await Promise.all(this.inFlight);
    }
  }

  async stop(): Promise<void> {
    this.started = false;
    this.cancelTimer();
    await this.whenIdle();
    logInfo('scheduler', 'Scheduler stopped');
  }

  private launch(): Promise<SyncOutcome[]> {
    this.cancelTimer();

    const pass = this.execute().finally(() => {
      this.inFlight.delete(pass);
      if (this.started && this.inFlight.size === 0) {
        this.scheduleNext();
      }
    });
    this.inFlight.add(pass);
    return pass;
  }

  private async execute(): Promise<SyncOutcome[]> {
    try {
      const outcomes = await this.runPass();
      this.options.onPass?.(outcomes);
      return outcomes;
    } catch (err) {
      // A pass only throws when the registry itself is unusable
      logError('scheduler', `Sync pass failed: ${errorMessage(err)}`, err);
      return [];
    }
  }

  private scheduleNext(): void {
    this.cancelTimer();
    this.timer = this.clock.setTimeout(() => {
      this.timer = null;
      // launch() never rejects: execute() catches
      void this.launch();
    }, this.options.intervalMs);
  }

  private cancelTimer(): void {
    if (this.timer !== null) {
      this.clock.clearTimeout(this.timer);
      this.timer = null;
    }
  }
}
