import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import fs from 'fs';
import os from 'os';
import path from 'path';
import type Database from 'better-sqlite3';
import { openDatabase } from '../lib/db/connection.js';
import { getConfig, setConfigOverride } from '../lib/config.js';
import { RepositoryEngine } from '../lib/engine.js';
import { FakeGitClient } from '../lib/git/fake-git-client.test-utils.js';
import { CredentialVault } from '../lib/vault/credential-vault.js';
import { RepositoryRegistry } from '../lib/registry.js';
import { ManualClock } from '../lib/sync/clock.js';
import { setEngineFactory } from './engine.js';
import { daemon } from './daemon.js';

describe('daemon command', () => {
  let tmp: string;
  let db: Database.Database;
  let engine: RepositoryEngine;
  let errorSpy: ReturnType<typeof vi.spyOn>;

  beforeEach(async () => {
    tmp = fs.mkdtempSync(path.join(os.tmpdir(), 'reposcope-daemon-'));
    db = openDatabase(':memory:');
    const git = new FakeGitClient();
    git.setRemote('https://example.test/api.git', { commit: 'c1', files: { 'requirements.txt': 'flask\n' } });
    const options = {
      db,
      git,
      clock: new ManualClock(new Date('2026-04-01T08:00:00.000Z')),
      vault: new CredentialVault(path.join(tmp, 'credentials')),
      reposDir: path.join(tmp, 'repositories'),
      isProcessAlive: (pid: number) => pid === process.pid,
    };
    engine = new RepositoryEngine(options);
    await engine.register({ name: 'api', url: 'https://example.test/api.git' });
    setEngineFactory(() => new RepositoryEngine(options));
    errorSpy = vi.spyOn(console, 'error').mockImplementation(() => {});
  });

  afterEach(async () => {
    await engine.close();
    setEngineFactory(null);
    setConfigOverride(null);
    process.exitCode = undefined;
    vi.restoreAllMocks();
    db.close();
    fs.rmSync(tmp, { recursive: true, force: true });
  });

  it('should run a pass on start and finish it before shutting down', async () => {
    const controller = new AbortController();
    controller.abort();

    await daemon({ quiet: true, signal: controller.signal });

    expect(engine.getStatus('api')).toMatchObject({ state: 'synced', currentCommit: 'c1' });
    expect(engine.listProjects().map((p) => p.id)).toEqual(['api:python']);
  });

  it('should recover a sync left open by a previous process', async () => {
    const exited = new RepositoryRegistry(db, new CredentialVault(path.join(tmp, 'credentials')), {
      reposDir: path.join(tmp, 'repositories'),
      pid: 424242,
    });
    exited.tryBeginSync(exited.resolve('api').id);
    const controller = new AbortController();
    controller.abort();

    await daemon({ quiet: true, signal: controller.signal });

    expect(engine.getStatus('api').state).toBe('synced');
  });

  it('should leave a sync held by a running process to that process', async () => {
    engine.registry.tryBeginSync(engine.registry.resolve('api').id);
    const controller = new AbortController();
    controller.abort();

    await daemon({ quiet: true, signal: controller.signal });

    expect(engine.getStatus('api').state).toBe('syncing');
  });

  it('should apply the interval option', async () => {
    const controller = new AbortController();
    controller.abort();

    await daemon({ interval: '15', quiet: true, signal: controller.signal });

    expect(getConfig().sync.interval_minutes).toBe(15);
  });

  it('should reject an invalid interval without starting', async () => {
    await daemon({ interval: '0', quiet: true });

    expect(errorSpy).toHaveBeenCalledWith('Error [VALIDATION_ERROR]: Invalid interval "0" (whole minutes, at least 1)');
    expect(process.exitCode).toBe(1);
    expect(engine.getStatus('api').state).toBe('never-synced');
  });
});
