import { describe, it, expect, vi, beforeEach, type Mock } from 'vitest';
import { SyncScheduler } from './scheduler.js';
import { ManualClock } from './clock.js';
import type { SyncOutcome } from './sync-worker.js';

vi.mock('../fault-logger.js', () => ({
  logInfo: vi.fn(),
  logError: vi.fn(),
}));

const INTERVAL = 5 * 60_000;

function outcome(repository: string): SyncOutcome {
  return { repositoryId: 1, repository, status: 'synced', action: 'updated', commit: 'c1', projects: 1 };
}

describe('ManualClock', () => {
  it('should fire timers in deadline order when advanced', () => {
    const clock = new ManualClock(new Date('2026-01-01T00:00:00.000Z'));
    const fired: string[] = [];
    clock.setTimeout(() => fired.push('late'), 200);
    clock.setTimeout(() => fired.push('early'), 100);

    clock.advance(150);
    expect(fired).toEqual(['early']);
    expect(clock.now().toISOString()).toBe('2026-01-01T00:00:00.150Z');

    clock.advance(50);
    expect(fired).toEqual(['early', 'late']);
  });

  it('should not fire cleared timers', () => {
    const clock = new ManualClock();
    const callback = vi.fn();
    const timer = clock.setTimeout(callback, 10);

    clock.clearTimeout(timer);
    clock.advance(100);

    expect(callback).not.toHaveBeenCalled();
    expect(clock.pending).toBe(0);
  });
});

describe('SyncScheduler', () => {
  let clock: ManualClock;
  let runPass: Mock<() => Promise<SyncOutcome[]>>;
  let scheduler: SyncScheduler;

  beforeEach(() => {
    clock = new ManualClock();
    runPass = vi.fn<() => Promise<SyncOutcome[]>>().mockResolvedValue([outcome('api')]);
    scheduler = new SyncScheduler(runPass, { intervalMs: INTERVAL, clock });
  });

  it('should run a pass immediately on start', async () => {
    scheduler.start();
    await scheduler.whenIdle();

    expect(runPass).toHaveBeenCalledTimes(1);
    expect(clock.pending).toBe(1);
  });

  it('should run the next pass one interval after the previous settles', async () => {
    scheduler.start();
    await scheduler.whenIdle();

    clock.advance(INTERVAL - 1);
    expect(runPass).toHaveBeenCalledTimes(1);

    clock.advance(1);
    await scheduler.whenIdle();
    expect(runPass).toHaveBeenCalledTimes(2);

    clock.advance(INTERVAL);
    await scheduler.whenIdle();
    expect(runPass).toHaveBeenCalledTimes(3);
    await scheduler.stop();
  });

  it('should not schedule while a pass is still running', async () => {
    let finish: (value: SyncOutcome[]) => void = () => undefined;
    runPass.mockImplementationOnce(
      () =>
        new Promise<SyncOutcome[]>((resolve) => {
          finish = resolve;
        })
    );

    scheduler.start();
    clock.advance(INTERVAL * 3);
    expect(runPass).toHaveBeenCalledTimes(1);
    expect(clock.pending).toBe(0);

    finish([]);
    await scheduler.whenIdle();
    expect(clock.pending).toBe(1);
    await scheduler.stop();
  });

  it('should run a pass on triggerNow and restart the interval', async () => {
    scheduler.start();
    await scheduler.whenIdle();
    clock.advance(INTERVAL - 1000);

    const outcomes = await scheduler.triggerNow();

    expect(outcomes).toEqual([outcome('api')]);
    expect(runPass).toHaveBeenCalledTimes(2);

    clock.advance(1000);
    expect(runPass).toHaveBeenCalledTimes(2);
    clock.advance(INTERVAL - 1000);
    await scheduler.whenIdle();
    expect(runPass).toHaveBeenCalledTimes(3);
    await scheduler.stop();
  });

  it('should run triggerNow before start without scheduling', async () => {
    await scheduler.triggerNow();

    expect(runPass).toHaveBeenCalledTimes(1);
    expect(clock.pending).toBe(0);
  });

  it('should wait for the in-flight pass on stop and schedule nothing after', async () => {
    let finish: (value: SyncOutcome[]) => void = () => undefined;
    runPass.mockImplementationOnce(
      () =>
        new Promise<SyncOutcome[]>((resolve) => {
          finish = resolve;
        })
    );
    scheduler.start();

    let stopped = false;
    const stopping = scheduler.stop().then(() => {
      stopped = true;
    });
    await Promise.resolve();
    expect(stopped).toBe(false);

    finish([]);
    await stopping;

    expect(stopped).toBe(true);
    expect(clock.pending).toBe(0);
    expect(scheduler.isRunning).toBe(false);
  });

  it('should keep scheduling after a pass throws', async () => {
    runPass.mockRejectedValueOnce(new Error('database is locked'));

    scheduler.start();
    await scheduler.whenIdle();

    expect(clock.pending).toBe(1);
    clock.advance(INTERVAL);
    await scheduler.whenIdle();
    expect(runPass).toHaveBeenCalledTimes(2);
    await scheduler.stop();
  });

  it('should report outcomes of every pass to onPass', async () => {
    const onPass = vi.fn();
    scheduler = new SyncScheduler(runPass, { intervalMs: INTERVAL, clock, onPass });

    await scheduler.triggerNow();

    expect(onPass).toHaveBeenCalledWith([outcome('api')]);
  });
});
