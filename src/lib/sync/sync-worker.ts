/**
 * Sync Worker
 *
 * Brings each registered repository's working tree up to date with its
 * remote branch, then hands the tree to the analyzer and stores the result.
 *
 * - No clone yet: clone into `<repos>/.incoming/` and rename into place, so a
 *   failed clone never leaves a partial tree where the clone belongs.
 * - Existing clone: fetch, then fast-forward only. Diverged history is a
 *   recorded SyncConflictError; local commits are never discarded.
 * - The repository's `syncing` status is its lock, held through analysis
 *   and the metadata write. Bulk passes skip busy repositories and ones
 *   removed since the pass listed them; on-demand syncs of a busy
 *   repository throw.
 */

import crypto from 'crypto';
import fs from 'fs/promises';
import path from 'path';
import type { GitClient, GitOperationOptions } from '../git/git-client.js';
import type { CredentialVault } from '../vault/credential-vault.js';
import type { RepositoryRegistry } from '../registry.js';
import type { MetadataStore } from '../metadata-store.js';
import type { ProjectMetadata, RepositoryConfig } from '../types.js';
import type { Clock } from './clock.js';
import { SystemClock } from './clock.js';
import { mapWithConcurrency } from './pool.js';
import { RepositoryNotFoundError, SyncInProgressError, errorMessage, isReposcopeError } from '../errors.js';
import { logError, logInfo, logWarn } from '../fault-logger.js';

// ============================================================================
// Types
// ============================================================================

/** Turns a synced working tree into project metadata. */
export interface RepositoryAnalyzer {
  analyze(repo: RepositoryConfig, workingTree: string, commit: string | null, analyzedAt: string): Promise<ProjectMetadata[]>;
}

interface OutcomeBase {
  repositoryId: number;
  repository: string;
}

export type SyncOutcome =
  | (OutcomeBase & {
      status: 'synced';
      action: 'cloned' | 'updated';
      commit: string | null;
      projects: number;
      /** Set when the sync succeeded but analysis did not. */
      analysisError?: string;
    })
  | (OutcomeBase & { status: 'failed'; error: string; code: string })
  | (OutcomeBase & { status: 'skipped'; reason: SkipReason });

export type SkipReason = 'already-in-progress' | 'removed';

export interface SyncWorkerOptions {
  /** Repositories synced in parallel by syncAll(). */
  concurrency: number;
  gitTimeoutMs: number;
  strictHostKeyChecking?: boolean;
  knownHostsFile?: string;
  clock?: Clock;
}

export interface SyncWorkerDeps {
  registry: RepositoryRegistry;
  vault: CredentialVault;
  git: GitClient;
  analyzer: RepositoryAnalyzer;
  metadata: MetadataStore;
}

const INCOMING_DIR = '.incoming';

// ============================================================================
// Worker
// ============================================================================

export class SyncWorker {
  private readonly clock: Clock;

  constructor(
    private readonly deps: SyncWorkerDeps,
    private readonly options: SyncWorkerOptions
  ) {
    this.clock = options.clock ?? new SystemClock();
  }

  /**
   * Sync every registered repository through a bounded pool.
   * Never throws for a single repository; each gets an outcome.
   */
  async syncAll(): Promise<SyncOutcome[]> {
    const repositories = this.deps.registry.list();
    logInfo('sync', `Sync pass started for ${repositories.length} repositories`);

    const outcomes = await mapWithConcurrency(repositories, this.options.concurrency, (repo) =>
      this.run(repo, false)
    );

    const failed = outcomes.filter((o) => o.status === 'failed').length;
    const skipped = outcomes.filter((o) => o.status === 'skipped').length;
    logInfo('sync', 'Sync pass finished', {
      synced: outcomes.length - failed - skipped,
      failed,
      skipped,
    });
    return outcomes;
  }

  /**
   * Sync one repository now. Throws SyncInProgressError if it is already
   * syncing; every other failure is recorded and returned as an outcome.
   */
  async syncRepository(idOrName: number | string): Promise<SyncOutcome> {
    return this.run(this.deps.registry.resolve(idOrName), true);
  }

  private async run(repo: RepositoryConfig, throwIfBusy: boolean): Promise<SyncOutcome> {
    const { registry } = this.deps;
    const base: OutcomeBase = { repositoryId: repo.id, repository: repo.name };

    let acquired: boolean;
    try {
      acquired = registry.tryBeginSync(repo.id);
    } catch (err) {
      if (throwIfBusy || !(err instanceof RepositoryNotFoundError)) throw err;
      logInfo('sync', `Skipping ${repo.name}: removed since the pass started`);
      return { ...base, status: 'skipped', reason: 'removed' };
    }

    if (!acquired) {
      if (throwIfBusy) throw new SyncInProgressError(repo.name);
      logInfo('sync', `Skipping ${repo.name}: already syncing`);
      return { ...base, status: 'skipped', reason: 'already-in-progress' };
    }

    let action: 'cloned' | 'updated';
    let commit: string | null;
    try {
      action = await this.updateWorkingTree(repo);
      commit = await this.deps.git.headCommit(registry.workingTreePath(repo.name));
      registry.recordSyncSuccess(repo.id, commit);
    } catch (err) {
      const code = isReposcopeError(err) ? err.code : 'SYNC_ERROR';
      const message = errorMessage(err);
      registry.failSync(repo.id, message, code);
      logError('sync', `Sync failed for ${repo.name}: ${message}`, err, { repository: repo.name, code });
      return { ...base, status: 'failed', error: message, code };
    }

    logInfo('sync', `Synced ${repo.name}`, { action, commit });

    try {
      const analysis = await this.analyze(repo, commit);
      return { ...base, status: 'synced', action, commit, ...analysis };
    } finally {
      registry.completeSync(repo.id);
    }
  }

  // ==========================================================================
  // Git
  // ==========================================================================

  private async updateWorkingTree(repo: RepositoryConfig): Promise<'cloned' | 'updated'> {
    const { vault } = this.deps;
    if (repo.credentialRef) {
      const ref = repo.credentialRef;
      return vault.withKey(ref, (keyPath) => this.runGit(repo, keyPath));
    }
    return this.runGit(repo);
  }

  private async runGit(repo: RepositoryConfig, sshKeyPath?: string): Promise<'cloned' | 'updated'> {
    const { git, registry } = this.deps;
    const dir = registry.workingTreePath(repo.name);
    const gitOptions: GitOperationOptions = {
      timeoutMs: this.options.gitTimeoutMs,
      sshKeyPath,
      strictHostKeyChecking: this.options.strictHostKeyChecking,
      knownHostsFile: this.options.knownHostsFile,
    };

    if (await git.isRepository(dir)) {
      await git.fetch(dir, repo.defaultBranch, gitOptions);
      await git.fastForward(dir, repo.defaultBranch, gitOptions);
      return 'updated';
    }

    if (await pathExists(dir)) {
      logWarn('sync', `Replacing ${dir}: not a git working tree`, { repository: repo.name });
      await fs.rm(dir, { recursive: true, force: true });
    }

    const incoming = path.join(path.dirname(dir), INCOMING_DIR);
    const staging = path.join(incoming, `${repo.name}-${crypto.randomBytes(4).toString('hex')}`);
    await fs.mkdir(incoming, { recursive: true });
    try {
      await git.clone(repo.url, repo.defaultBranch, staging, gitOptions);
      await fs.rename(staging, dir);
    } finally {
      await fs.rm(staging, { recursive: true, force: true });
    }
    return 'cloned';
  }

  // ==========================================================================
  // Analysis
  // ==========================================================================

  /**
   * Analyze the fresh tree and replace the repository's stored projects.
   * Failures here do not change the sync state; they are recorded beside it.
   */
  private async analyze(
    repo: RepositoryConfig,
    commit: string | null
  ): Promise<{ projects: number; analysisError?: string }> {
    const { registry, analyzer, metadata } = this.deps;
    const analyzedAt = this.analysisTimestamp(repo.id);

    try {
      const projects = await analyzer.analyze(repo, registry.workingTreePath(repo.name), commit, analyzedAt);
      metadata.replaceRepository(repo.name, projects);
      registry.recordAnalysis(repo.id, analyzedAt);
      logInfo('sync', `Analyzed ${repo.name}`, { projects: projects.length });
      return { projects: projects.length };
    } catch (err) {
      const message = errorMessage(err);
      registry.recordAnalysis(repo.id, analyzedAt, message);
      logError('sync', `Analysis failed for ${repo.name}: ${message}`, err, { repository: repo.name });
      return { projects: 0, analysisError: message };
    }
  }

  /** Never earlier than the success it describes, even if the clock stepped back. */
  private analysisTimestamp(repositoryId: number): string {
    const now = this.clock.now().getTime();
    const lastSuccess = this.deps.registry.getStatus(repositoryId).lastSuccessAt;
    const floor = lastSuccess ? Date.parse(lastSuccess) : now;
    return new Date(Math.max(now, floor)).toISOString();
  }
}

async function pathExists(target: string): Promise<boolean> {
  try {
    await fs.access(target);
    return true;
  } catch {
    return false;
  }
}
