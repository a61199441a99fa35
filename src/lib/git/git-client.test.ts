import { describe, it, expect, beforeAll, afterAll } from 'vitest';
import { execFileSync } from 'child_process';
import fs from 'fs';
import os from 'os';
import path from 'path';
import { glob } from 'glob';
import { CliGitClient, buildSshCommand, classifyGitError } from './git-client.js';
import {
  SyncAuthError,
  SyncConflictError,
  SyncError,
  SyncNetworkError,
  SyncTimeoutError,
} from '../errors.js';

function gitAvailable(): boolean {
  try {
    execFileSync('git', ['--version'], { stdio: 'pipe' });
    return true;
  } catch {
    return false;
  }
}

describe('classifyGitError', () => {
  it('should classify publickey failures as auth errors', () => {
    const stderr = [
      'git@example.test: Permission denied (publickey).',
      'fatal: Could not read from remote repository.',
      '',
      'Please make sure you have the correct access rights',
    ].join('\n');

    const error = classifyGitError('clone', stderr);

    expect(error).toBeInstanceOf(SyncAuthError);
    expect(error.code).toBe('SYNC_AUTH_ERROR');
  });

  it('should classify DNS failures as network errors', () => {
    const error = classifyGitError('fetch', "ssh: Could not resolve hostname example.invalid: Name or service not known\nfatal: Could not read from remote repository.");

    expect(error).toBeInstanceOf(SyncNetworkError);
    expect(error.code).toBe('SYNC_NETWORK_ERROR');
  });

  it('should classify refused fast-forward as conflict', () => {
    const error = classifyGitError('merge', 'hint: Diverging branches can\'t be fast-forwarded\nfatal: Not possible to fast-forward, aborting.');

    expect(error).toBeInstanceOf(SyncConflictError);
    expect(error.message).toBe('fatal: Not possible to fast-forward, aborting.');
  });

  it('should fall back to a generic sync error', () => {
    const error = classifyGitError('clone', '');

    expect(error).toBeInstanceOf(SyncError);
    expect(error.code).toBe('SYNC_GIT_ERROR');
    expect(error.message).toBe('git clone failed');
  });
});

describe('buildSshCommand', () => {
  it('should return undefined without a key', () => {
    expect(buildSshCommand({ timeoutMs: 1000 })).toBeUndefined();
  });

  it('should pin the key and accept new host keys by default', () => {
    expect(buildSshCommand({ timeoutMs: 1000, sshKeyPath: '/tmp/keys/id' })).toBe(
      "ssh -i '/tmp/keys/id' -o IdentitiesOnly=yes -o StrictHostKeyChecking=accept-new -o BatchMode=yes"
    );
  });

  it('should quote paths and honour strict checking', () => {
    expect(
      buildSshCommand({
        timeoutMs: 1000,
        sshKeyPath: "/tmp/it's/id",
        strictHostKeyChecking: true,
        knownHostsFile: '/tmp/known_hosts',
      })
    ).toBe(
      "ssh -i '/tmp/it'\\''s/id' -o IdentitiesOnly=yes -o StrictHostKeyChecking=yes -o BatchMode=yes -o UserKnownHostsFile='/tmp/known_hosts'"
    );
  });
});

describe.skipIf(!gitAvailable())('CliGitClient (local repositories)', () => {
  const options = { timeoutMs: 30_000 };
  const client = new CliGitClient();
  let tmp: string;
  let remote: string;
  let authoring: string;

  function git(cwd: string, ...args: string[]): string {
    return execFileSync('git', ['-c', 'user.name=Test', '-c', 'user.email=test@example.test', ...args], {
      cwd,
      stdio: 'pipe',
      encoding: 'utf-8',
    });
  }

  function commitFile(cwd: string, file: string, content: string): void {
    fs.writeFileSync(path.join(cwd, file), content);
    git(cwd, 'add', file);
    git(cwd, 'commit', '-m', `update ${file}`);
  }

  beforeAll(() => {
    tmp = fs.mkdtempSync(path.join(os.tmpdir(), 'reposcope-git-'));
    remote = path.join(tmp, 'remote.git');
    authoring = path.join(tmp, 'authoring');
    git(tmp, 'init', '--bare', remote);
    git(tmp, 'init', authoring);
    git(authoring, 'symbolic-ref', 'HEAD', 'refs/heads/main');
    commitFile(authoring, 'main.py', 'print("v1")\n');
    git(authoring, 'push', remote, 'main');
  });

  afterAll(() => {
    fs.rmSync(tmp, { recursive: true, force: true });
  });

  it('should clone, fetch and fast-forward', async () => {
    const dest = path.join(tmp, 'clone-ff');
    await client.clone(remote, 'main', dest, options);

    expect(await client.isRepository(dest)).toBe(true);
    expect(fs.readFileSync(path.join(dest, 'main.py'), 'utf-8')).toBe('print("v1")\n');
    const before = await client.headCommit(dest);

    commitFile(authoring, 'main.py', 'print("v2")\n');
    git(authoring, 'push', remote, 'main');

    await client.fetch(dest, 'main', options);
    await client.fastForward(dest, 'main', options);

    expect(fs.readFileSync(path.join(dest, 'main.py'), 'utf-8')).toBe('print("v2")\n');
    expect(await client.headCommit(dest)).not.toBe(before);
  });

  it('should refuse to merge diverged history and keep local state', async () => {
    const dest = path.join(tmp, 'clone-diverged');
    await client.clone(remote, 'main', dest, options);
    commitFile(dest, 'local.txt', 'local work\n');
    const localHead = await client.headCommit(dest);

    commitFile(authoring, 'remote.txt', 'remote work\n');
    git(authoring, 'push', remote, 'main');

    await client.fetch(dest, 'main', options);
    await expect(client.fastForward(dest, 'main', options)).rejects.toThrow(SyncConflictError);

    expect(await client.headCommit(dest)).toBe(localHead);
    expect(fs.existsSync(path.join(dest, 'remote.txt'))).toBe(false);
  });

  it('should fail cloning a missing branch without leaving a directory', async () => {
    const dest = path.join(tmp, 'clone-missing');

    await expect(client.clone(remote, 'no-such-branch', dest, options)).rejects.toBeInstanceOf(SyncError);
    expect(fs.existsSync(dest)).toBe(false);
  });

  it('should return null HEAD outside a repository', async () => {
    expect(await client.headCommit(tmp)).toBeNull();
  });

  it.skipIf(process.platform === 'win32')('should report a timeout when the deadline passes', async () => {
    const slowGit = path.join(tmp, 'slow-git');
    fs.writeFileSync(slowGit, '#!/bin/sh\nexec sleep 5\n', { mode: 0o755 });

    await expect(new CliGitClient(slowGit).fetch(tmp, 'main', { timeoutMs: 100 })).rejects.toBeInstanceOf(
      SyncTimeoutError
    );
  });
});

describe('test doubles', () => {
  it('should stay out of production modules and the build', async () => {
    const root = process.cwd();
    const sources = await glob('src/**/*.ts', { cwd: root, ignore: ['src/**/*.test.ts', 'src/**/*.test-utils.ts'] });
    const importers = sources.filter((file) => fs.readFileSync(path.join(root, file), 'utf-8').includes('.test-utils.js'));

    const build: { exclude?: string[] } = JSON.parse(fs.readFileSync(path.join(root, 'tsconfig.build.json'), 'utf-8'));

    expect(sources.length).toBeGreaterThan(0);
    expect(importers).toEqual([]);
    expect(build.exclude).toEqual(expect.arrayContaining(['src/**/*.test.ts', 'src/**/*.test-utils.ts']));
  });
});
