/**
 * RepositoryEngine: the query and control facade over registry, sync worker,
 * scheduler and metadata store. The CLI talks to this class only.
 */

import fs from 'fs/promises';
import path from 'path';
import type Database from 'better-sqlite3';
import { getConfig, getCredentialsDir, getReposDir, resolveRepositoryKey } from './config.js';
import { closeDb, getDb } from './db/connection.js';
import { CliGitClient } from './git/git-client.js';
import type { GitClient } from './git/git-client.js';
import { CredentialVault } from './vault/credential-vault.js';
import { RepositoryRegistry } from './registry.js';
import type { RegisterInput, RegisterOptions } from './registry.js';
import { MetadataStore } from './metadata-store.js';
import type { MetadataStats } from './metadata-store.js';
import { ProjectDetector } from './detector/project-detector.js';
import { SyncWorker } from './sync/sync-worker.js';
import type { SyncOutcome } from './sync/sync-worker.js';
import { SyncScheduler } from './sync/scheduler.js';
import { SystemClock } from './sync/clock.js';
import type { Clock } from './sync/clock.js';
import { ManifestNotFoundError, ValidationError, errorMessage } from './errors.js';
import { logInfo } from './fault-logger.js';
import type {
  Ecosystem,
  EntryPoint,
  EntryPointKind,
  ProjectMetadata,
  ProjectType,
  RepositoryWithStatus,
  SyncState,
  SyncStatus,
} from './types.js';

export interface EngineOptions {
  /** Defaults to the shared database at `<data_dir>/reposcope.db`. */
  db?: Database.Database;
  git?: GitClient;
  vault?: CredentialVault;
  detector?: ProjectDetector;
  clock?: Clock;
  reposDir?: string;
  /** Owner recorded on sync locks. Defaults to `process.pid`. */
  pid?: number;
  /** Decides whether a lock owner still runs; stale locks are taken over. */
  isProcessAlive?: (pid: number) => boolean;
}

export interface StartupReport {
  /** Repositories left `syncing` by an exited process, now `failed`. */
  recovered: number;
  /** Leftover ephemeral key files deleted. */
  swept: number;
  /** Configured repositories registered by this start. */
  seeded: string[];
}

export interface ProjectFilter {
  repository?: string;
  ecosystem?: Ecosystem;
  projectType?: ProjectType;
}

export interface EntryPointFilter {
  kind?: EntryPointKind;
}

export interface EngineStats {
  repositories: number;
  byState: Record<SyncState, number>;
  /** Most recent successful sync of any repository. */
  lastSyncAt: string | null;
  schedulerRunning: boolean;
  metadata: MetadataStats;
}

export class RepositoryEngine {
  readonly registry: RepositoryRegistry;
  readonly metadata: MetadataStore;
  readonly worker: SyncWorker;
  private readonly db: Database.Database;
  private readonly ownsDb: boolean;
  private readonly vault: CredentialVault;
  private readonly git: GitClient;
  private readonly detector: ProjectDetector;
  private readonly clock: Clock;
  private scheduler: SyncScheduler | null = null;

  constructor(options: EngineOptions = {}) {
    const config = getConfig();
    this.ownsDb = !options.db;
    this.db = options.db ?? getDb();
    this.clock = options.clock ?? new SystemClock();
    this.vault = options.vault ?? new CredentialVault(getCredentialsDir());
    this.git = options.git ?? new CliGitClient();
    this.detector = options.detector ?? new ProjectDetector();
    this.metadata = new MetadataStore(this.db);
    this.registry = new RepositoryRegistry(this.db, this.vault, {
      reposDir: options.reposDir ?? getReposDir(),
      metadata: this.metadata,
      now: () => this.clock.now(),
      pid: options.pid,
      isProcessAlive: options.isProcessAlive,
    });
    this.worker = new SyncWorker(
      { registry: this.registry, vault: this.vault, git: this.git, analyzer: this.detector, metadata: this.metadata },
      {
        concurrency: config.sync.concurrency,
        gitTimeoutMs: config.sync.git_timeout_ms,
        strictHostKeyChecking: config.sync.strict_host_key_checking,
        knownHostsFile: config.sync.known_hosts_file,
        clock: this.clock,
      }
    );
  }

  /**
   * Bring persisted state back to a consistent start: fail syncs a dead
   * process left open, delete stray key copies, register configured
   * repositories.
   */
  async initialize(): Promise<StartupReport> {
    const recovered = this.registry.recoverInterruptedSyncs();
    const swept = await this.vault.sweepEphemeral();
    const config = getConfig();
    const seeded = await this.registry.seed(config.repositories, (entry) => resolveRepositoryKey(entry, config));
    logInfo('engine', 'Engine initialized', { recovered, swept, seeded });
    return { recovered, swept, seeded };
  }

  // ==========================================================================
  // Repositories
  // ==========================================================================

  listRepositories(): RepositoryWithStatus[] {
    return this.registry.listWithStatus();
  }

  async register(input: RegisterInput, options: RegisterOptions = {}): Promise<RepositoryWithStatus> {
    const id = await this.registry.register(input, options);
    return { ...this.registry.get(id), status: this.registry.getStatus(id) };
  }

  async remove(idOrName: number | string): Promise<void> {
    await this.registry.remove(this.registry.resolve(idOrName).id);
  }

  getStatus(idOrName: number | string): SyncStatus {
    return this.registry.getStatus(this.registry.resolve(idOrName).id);
  }

  /**
   * Sync one repository, or every repository when none is named.
   * A named repository that is already syncing throws SyncInProgressError.
   */
  async triggerSync(idOrName?: number | string): Promise<SyncOutcome[]> {
    if (idOrName !== undefined) {
      return [await this.worker.syncRepository(idOrName)];
    }
    return this.scheduler ? this.scheduler.triggerNow() : this.worker.syncAll();
  }

  // ==========================================================================
  // Projects
  // ==========================================================================

  listProjects(filter: ProjectFilter = {}): ProjectMetadata[] {
    const projects = filter.repository ? this.metadata.listByRepository(filter.repository) : this.metadata.list();
    return projects.filter(
      (project) =>
        (!filter.ecosystem || project.ecosystem === filter.ecosystem) &&
        (!filter.projectType || project.projectType === filter.projectType)
    );
  }

  getProject(id: string): ProjectMetadata {
    return this.metadata.get(id);
  }

  getEntryPoints(projectId: string, filter: EntryPointFilter = {}): EntryPoint[] {
    const entryPoints = this.metadata.listEntryPoints(projectId);
    return filter.kind ? entryPoints.filter((entry) => entry.kind === filter.kind) : entryPoints;
  }

  /**
   * Analyze a local directory without registering or storing anything.
   * @throws ManifestNotFoundError when the directory holds no project
   */
  async analyzePath(directory: string): Promise<ProjectMetadata[]> {
    const root = path.resolve(directory);
    let isDirectory = false;
    try {
      isDirectory = (await fs.stat(root)).isDirectory();
    } catch (err) {
      throw new ValidationError(`Cannot read ${root}: ${errorMessage(err)}`, { path: root });
    }
    if (!isDirectory) throw new ValidationError(`Not a directory: ${root}`, { path: root });

    const commit = (await this.git.isRepository(root)) ? await this.git.headCommit(root) : null;
    const projects = await this.detector.analyzeTree(root, path.basename(root), commit, this.clock.now().toISOString());
    if (projects.length === 0) throw new ManifestNotFoundError(root);
    return projects;
  }

  getStats(): EngineStats {
    const repositories = this.registry.listWithStatus();
    const byState: Record<SyncState, number> = { 'never-synced': 0, syncing: 0, synced: 0, failed: 0 };
    let lastSyncAt: string | null = null;
    for (const repo of repositories) {
      byState[repo.status.state]++;
      const success = repo.status.lastSuccessAt;
      if (success && (!lastSyncAt || success > lastSyncAt)) lastSyncAt = success;
    }
    return {
      repositories: repositories.length,
      byState,
      lastSyncAt,
      schedulerRunning: this.scheduler?.isRunning ?? false,
      metadata: this.metadata.stats(),
    };
  }

  // ==========================================================================
  // Scheduling
  // ==========================================================================

  /** Start periodic passes (the first runs immediately). */
  startScheduler(onPass?: (outcomes: SyncOutcome[]) => void): SyncScheduler {
    if (this.scheduler) return this.scheduler;
    const intervalMs = getConfig().sync.interval_minutes * 60_000;
    this.scheduler = new SyncScheduler(() => this.worker.syncAll(), { intervalMs, clock: this.clock, onPass });
    this.scheduler.start();
    return this.scheduler;
  }

  async stopScheduler(): Promise<void> {
    const scheduler = this.scheduler;
    this.scheduler = null;
    if (scheduler) await scheduler.stop();
  }

  /** Stop scheduling and release the shared database if this engine opened it. */
  async close(): Promise<void> {
    await this.stopScheduler();
    if (this.ownsDb) closeDb();
  }
}
