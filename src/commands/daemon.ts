/**
 * Daemon command: run scheduled sync passes until SIGINT/SIGTERM
 * (or SIGHUP on Unix).
 */

import { setConfigOverride } from '../lib/config.js';
import { ValidationError } from '../lib/errors.js';
import { logInfo, setConsoleLogging } from '../lib/fault-logger.js';
import type { SyncOutcome } from '../lib/sync/sync-worker.js';
import { createEngine, reportError } from './engine.js';

export interface DaemonOptions {
  /** Minutes between passes; overrides sync.interval_minutes. */
  interval?: string;
  quiet?: boolean;
  /** Stops the daemon when aborted, in place of a process signal. */
  signal?: AbortSignal;
}

function passSummary(outcomes: SyncOutcome[]): Record<string, number> {
  const summary: Record<string, number> = { synced: 0, failed: 0, skipped: 0 };
  for (const outcome of outcomes) summary[outcome.status] = (summary[outcome.status] ?? 0) + 1;
  return summary;
}

function waitForShutdown(signal?: AbortSignal): Promise<string> {
  return new Promise((resolve) => {
    const signals: NodeJS.Signals[] = process.platform === 'win32' ? ['SIGINT', 'SIGTERM'] : ['SIGINT', 'SIGTERM', 'SIGHUP'];
    const finish = (reason: string) => {
      for (const name of signals) process.off(name, onSignal);
      signal?.removeEventListener('abort', onAbort);
      resolve(reason);
    };
    const onSignal = (name: NodeJS.Signals) => finish(name);
    const onAbort = () => finish('abort');

    if (signal?.aborted) {
      resolve('abort');
      return;
    }
    for (const name of signals) process.on(name, onSignal);
    signal?.addEventListener('abort', onAbort, { once: true });
  });
}

export async function daemon(options: DaemonOptions = {}): Promise<void> {
  if (options.interval !== undefined) {
    const minutes = Number(options.interval);
    if (!Number.isInteger(minutes) || minutes < 1) {
      reportError('daemon', new ValidationError(`Invalid interval "${options.interval}" (whole minutes, at least 1)`));
      return;
    }
    setConfigOverride({ sync: { interval_minutes: minutes } });
  }
  if (!options.quiet) setConsoleLogging('info');

  const engine = createEngine();
  try {
    const report = await engine.initialize();
    if (report.recovered > 0) {
      logInfo('daemon', `Marked ${report.recovered} interrupted sync(s) as failed`);
    }

    engine.startScheduler((outcomes) => logInfo('daemon', 'Pass complete', passSummary(outcomes)));
    logInfo('daemon', `Daemon started (pid ${process.pid})`);

    const reason = await waitForShutdown(options.signal);
    logInfo('daemon', `Shutting down (${reason}), waiting for syncs in flight`);
  } catch (error) {
    reportError('daemon', error);
  } finally {
    await engine.close();
    setConsoleLogging(null);
  }
}
