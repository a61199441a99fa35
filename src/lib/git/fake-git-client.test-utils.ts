/**
 * In-process GitClient for tests.
 *
 * Remotes are file maps keyed by URL. Clones are plain directories with a
 * `.git/` marker holding the origin URL and HEAD commit, so the worker's
 * filesystem behaviour (staging, rename, byte-identical trees on failure)
 * is exercised for real.
 */

import fs from 'fs';
import path from 'path';
import type { GitClient, GitOperationOptions } from './git-client.js';
import { SyncConflictError } from '../errors.js';

export interface FakeRemote {
  commit: string;
  files: Record<string, string>;
  /** Thrown by clone/fetch against this remote. */
  failWith?: Error;
  /** Makes the next fast-forward fail as diverged history. */
  diverged?: boolean;
}

export interface FakeGitCall {
  operation: 'clone' | 'fetch' | 'fastForward';
  target: string;
  options: GitOperationOptions;
  /** Whether the SSH key file existed while the operation ran. */
  keyPresent: boolean;
}

export class FakeGitClient implements GitClient {
  readonly remotes = new Map<string, FakeRemote>();
  readonly calls: FakeGitCall[] = [];
  /** Optional gate awaited inside every operation, to hold a sync open. */
  gate: Promise<void> | null = null;

  setRemote(url: string, remote: FakeRemote): void {
    this.remotes.set(url, remote);
  }

  async clone(url: string, _branch: string, dest: string, options: GitOperationOptions): Promise<void> {
    await this.enter('clone', dest, options);
    const remote = this.remote(url);
    if (remote.failWith) throw remote.failWith;

    if (fs.existsSync(dest)) throw new Error(`destination path '${dest}' already exists`);
    fs.mkdirSync(path.join(dest, '.git'), { recursive: true });
    fs.writeFileSync(path.join(dest, '.git', 'origin'), url);
    writeTree(dest, remote);
  }

  async fetch(dir: string, _branch: string, options: GitOperationOptions): Promise<void> {
    await this.enter('fetch', dir, options);
    const remote = this.remote(this.originOf(dir));
    if (remote.failWith) throw remote.failWith;
  }

  async fastForward(dir: string, branch: string, options: GitOperationOptions): Promise<void> {
    await this.enter('fastForward', dir, options);
    const remote = this.remote(this.originOf(dir));
    if (remote.diverged) {
      throw new SyncConflictError('fatal: Not possible to fast-forward, aborting.', { branch });
    }
    writeTree(dir, remote);
  }

  async headCommit(dir: string): Promise<string | null> {
    const head = path.join(dir, '.git', 'HEAD');
    return fs.existsSync(head) ? fs.readFileSync(head, 'utf-8') : null;
  }

  async isRepository(dir: string): Promise<boolean> {
    return fs.existsSync(path.join(dir, '.git'));
  }

  private async enter(operation: FakeGitCall['operation'], target: string, options: GitOperationOptions): Promise<void> {
    this.calls.push({
      operation,
      target,
      options,
      keyPresent: options.sshKeyPath ? fs.existsSync(options.sshKeyPath) : false,
    });
    if (this.gate) await this.gate;
  }

  private remote(url: string): FakeRemote {
    const remote = this.remotes.get(url);
    if (!remote) throw new Error(`fatal: repository '${url}' does not exist`);
    return remote;
  }

  private originOf(dir: string): string {
    return fs.readFileSync(path.join(dir, '.git', 'origin'), 'utf-8');
  }
}

function writeTree(dir: string, remote: FakeRemote): void {
  for (const [relative, content] of Object.entries(remote.files)) {
    const target = path.join(dir, relative);
    fs.mkdirSync(path.dirname(target), { recursive: true });
    fs.writeFileSync(target, content);
  }
  fs.writeFileSync(path.join(dir, '.git', 'HEAD'), remote.commit);
}
