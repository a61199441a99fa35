/**
 * Repository Registry
 *
 * Source of truth for which repositories exist, how to reach them, and
 * where each one is in the sync state machine:
 *
 *   never-synced → syncing → synced | failed,  failed → syncing on retry
 *
 * The `syncing` state doubles as the per-repository lock, owned by the pid
 * that took it. Every read-check-write of the lock runs in an IMMEDIATE
 * transaction, so two callers (or two processes) never both win the same
 * repository. A lock whose owner is no longer running is stale: the next
 * caller takes it over.
 */

import fs from 'fs/promises';
import path from 'path';
import Database from 'better-sqlite3';
import { z } from 'zod';
import type { CredentialVault } from './vault/credential-vault.js';
import type { MetadataStore } from './metadata-store.js';
import type { RepositoryEntryConfig } from './config-types.js';
import type { ResolvedKeyPair } from './config.js';
import type { RepositoryConfig, RepositoryWithStatus, SyncState, SyncStatus } from './types.js';
import {
  DuplicateRepositoryError,
  RepositoryNotFoundError,
  SyncInProgressError,
  ValidationError,
  errorMessage,
} from './errors.js';
import { logError, logInfo, logWarn } from './fault-logger.js';

// ============================================================================
// Input validation
// ============================================================================

export const RegisterInputSchema = z.object({
  name: z
    .string()
    .max(100)
    .regex(/^[A-Za-z0-9][A-Za-z0-9._-]*$/, 'must start with a letter or digit and contain only letters, digits, ".", "_" or "-"'),
  url: z
    .string()
    .min(1)
    .refine((url) => !/\s/.test(url) && !url.startsWith('-'), 'must be a git URL without whitespace'),
  defaultBranch: z
    .string()
    .regex(/^[A-Za-z0-9._][A-Za-z0-9._/-]*$/, 'is not a valid branch name')
    .default('main'),
  privateKey: z.string().optional(),
  publicKey: z.string().optional(),
});

export type RegisterInput = z.input<typeof RegisterInputSchema>;

export interface RegisterOptions {
  /** Overwrite an existing registration with the same name. */
  replace?: boolean;
}

export interface RegistryOptions {
  /** Parent directory of working-tree clones. */
  reposDir: string;
  /** Project metadata removed together with a repository. */
  metadata?: MetadataStore;
  now?: () => Date;
  /** Recorded as the owner of locks taken here. Defaults to `process.pid`. */
  pid?: number;
  /** Whether a lock owner is still running. Defaults to {@link isProcessAlive}. */
  isProcessAlive?: (pid: number) => boolean;
}

/** Signal 0 checks for existence without delivering anything. */
export function isProcessAlive(pid: number): boolean {
  try {
    process.kill(pid, 0);
    return true;
  } catch (err) {
    // EPERM: running, but owned by another user
    return err instanceof Error && 'code' in err && err.code === 'EPERM';
  }
}

// ============================================================================
// Rows
// ============================================================================

interface RepositoryRow {
  id: number;
  name: string;
  url: string;
  default_branch: string;
  credential_ref: string | null;
  created_at: string;
  updated_at: string;
}

interface StatusRow {
  repository_id: number;
  state: SyncState;
  last_attempt_at: string | null;
  last_success_at: string | null;
  last_error: string | null;
  error_code: string | null;
  current_commit: string | null;
  last_analyzed_at: string | null;
  last_analysis_error: string | null;
  lock_pid: number | null;
}

type LockRow = Pick<StatusRow, 'repository_id' | 'state' | 'lock_pid'>;

type Registration =
  | { kind: 'inserted'; id: number }
  | { kind: 'replaced'; existing: RepositoryConfig; previousState: SyncState; moved: boolean };

function toRepository(row: RepositoryRow): RepositoryConfig {
  return {
    id: row.id,
    name: row.name,
    url: row.url,
    defaultBranch: row.default_branch,
    credentialRef: row.credential_ref,
    createdAt: row.created_at,
    updatedAt: row.updated_at,
  };
}

function toStatus(row: StatusRow): SyncStatus {
  return {
    repositoryId: row.repository_id,
    state: row.state,
    lastAttemptAt: row.last_attempt_at,
    lastSuccessAt: row.last_success_at,
    lastError: row.last_error,
    errorCode: row.error_code,
    currentCommit: row.current_commit,
    lastAnalyzedAt: row.last_analyzed_at,
    lastAnalysisError: row.last_analysis_error,
  };
}

export const INTERRUPTED_ERROR = 'Sync interrupted: process exited while syncing';
export const INTERRUPTED_CODE = 'SYNC_INTERRUPTED';

// ============================================================================
// Registry
// ============================================================================

export class RepositoryRegistry {
  private readonly reposDir: string;
  private readonly metadata?: MetadataStore;
  private readonly now: () => Date;
  private readonly pid: number;
  private readonly isProcessAlive: (pid: number) => boolean;

  constructor(
    private readonly db: Database.Database,
    private readonly vault: CredentialVault,
    options: RegistryOptions
  ) {
    this.reposDir = options.reposDir;
    this.metadata = options.metadata;
    this.now = options.now ?? (() => new Date());
    this.pid = options.pid ?? process.pid;
    this.isProcessAlive = options.isProcessAlive ?? isProcessAlive;
  }

  /** Directory holding the working tree of `name`. */
  workingTreePath(name: string): string {
    return path.join(this.reposDir, name);
  }

  /**
   * Register a repository and return its id.
   * Key material goes to the vault before the row is written; if the write
   * fails the material is revoked again. Name and lock are checked again
   * inside the write transaction, since the vault write yields to other
   * callers.
   */
  async register(input: RegisterInput, options: RegisterOptions = {}): Promise<number> {
    const parsed = RegisterInputSchema.safeParse(input);
    if (!parsed.success) {
      const issues = parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
      throw new ValidationError(`Invalid repository: ${issues.join('; ')}`, { issues });
    }
    const { name, url, defaultBranch, privateKey, publicKey } = parsed.data;

    const known = this.getByName(name);
    if (known && !options.replace) {
      throw new DuplicateRepositoryError(name);
    }
    if (known && this.isLocked(this.lockRow(known.id))) {
      throw new SyncInProgressError(name);
    }

    const credentialRef = privateKey ? await this.vault.store(name, privateKey, publicKey) : null;
    const at = this.now().toISOString();

    let registration: Registration;
    try {
      registration = this.db
        .transaction((): Registration => {
          const existing = this.getByName(name);
          if (!existing) {
            const result = this.db
              .prepare(
                `INSERT INTO repositories (name, url, default_branch, credential_ref, created_at, updated_at)
                 VALUES (?, ?, ?, ?, ?, ?)`
              )
              .run(name, url, defaultBranch, credentialRef, at, at);
            const id = Number(result.lastInsertRowid);
            this.db.prepare('INSERT INTO sync_status (repository_id) VALUES (?)').run(id);
            return { kind: 'inserted', id };
          }

          if (!options.replace) throw new DuplicateRepositoryError(name);
          const lock = this.lockRow(existing.id);
          if (this.isLocked(lock)) throw new SyncInProgressError(name);

          const moved = existing.url !== url || existing.defaultBranch !== defaultBranch;
          this.db
            .prepare(
              'UPDATE repositories SET url = ?, default_branch = ?, credential_ref = ?, updated_at = ? WHERE id = ?'
            )
            .run(url, defaultBranch, credentialRef, at, existing.id);
          // Held until the old key and clone are gone
          this.db
            .prepare(`UPDATE sync_status SET state = 'syncing', lock_pid = ? WHERE repository_id = ?`)
            .run(this.pid, existing.id);
          if (moved) this.metadata?.removeRepository(name);
          return { kind: 'replaced', existing, previousState: lock.state, moved };
        })
        .immediate();
    } catch (err) {
      if (credentialRef) await this.vault.revoke(credentialRef);
      throw err;
    }

    if (registration.kind === 'inserted') {
      logInfo('registry', `Registered repository ${name}`, { id: registration.id });
      return registration.id;
    }

    const { existing, previousState, moved } = registration;
    try {
      if (existing.credentialRef) await this.vault.revoke(existing.credentialRef);
      if (moved) {
        // A clone of another URL or branch cannot be fast-forwarded
        await fs.rm(this.workingTreePath(name), { recursive: true, force: true });
      }
    } finally {
      this.releaseAfterReplace(existing.id, previousState, moved);
    }
    logInfo('registry', `Replaced repository ${name}`, { id: existing.id, moved });
    return existing.id;
  }

  private releaseAfterReplace(id: number, previousState: SyncState, moved: boolean): void {
    if (moved) {
      this.db
        .prepare(
          `UPDATE sync_status SET state = 'never-synced', lock_pid = NULL, last_error = NULL,
             error_code = NULL, current_commit = NULL WHERE repository_id = ?`
        )
        .run(id);
    } else if (previousState === 'syncing') {
      // The stale lock replaced here belonged to a sync that never finished
      this.failSync(id, INTERRUPTED_ERROR, INTERRUPTED_CODE);
    } else {
      this.db
        .prepare('UPDATE sync_status SET state = ?, lock_pid = NULL WHERE repository_id = ?')
        .run(previousState, id);
    }
  }

  list(): RepositoryConfig[] {
    return this.db
      .prepare<[], RepositoryRow>('SELECT * FROM repositories ORDER BY name')
      .all()
      .map(toRepository);
  }

  get(id: number): RepositoryConfig {
    const row = this.db.prepare<[number], RepositoryRow>('SELECT * FROM repositories WHERE id = ?').get(id);
    if (!row) throw new RepositoryNotFoundError(id);
    return toRepository(row);
  }

  getByName(name: string): RepositoryConfig | null {
    const row = this.db
      .prepare<[string], RepositoryRow>('SELECT * FROM repositories WHERE name = ?')
      .get(name);
    return row ? toRepository(row) : null;
  }

  /** Look a repository up by numeric id or by name. */
  resolve(idOrName: number | string): RepositoryConfig {
    if (typeof idOrName === 'number') return this.get(idOrName);
    if (/^\d+$/.test(idOrName)) {
      const byName = this.getByName(idOrName);
      return byName ?? this.get(Number(idOrName));
    }
    const repo = this.getByName(idOrName);
    if (!repo) throw new RepositoryNotFoundError(idOrName);
    return repo;
  }

  getStatus(id: number): SyncStatus {
    const row = this.db
      .prepare<[number], StatusRow>('SELECT * FROM sync_status WHERE repository_id = ?')
      .get(id);
    if (!row) throw new RepositoryNotFoundError(id);
    return toStatus(row);
  }

  listWithStatus(): RepositoryWithStatus[] {
    const rows = this.db
      .prepare<[], RepositoryRow & StatusRow>(
        `SELECT r.*, s.* FROM repositories r
         JOIN sync_status s ON s.repository_id = r.id
         ORDER BY r.name`
      )
      .all();
    return rows.map((row) => ({ ...toRepository(row), status: toStatus(row) }));
  }

  /**
   * Remove a repository with everything it owns: credential material,
   * working tree, project metadata and status row.
   */
  async remove(id: number): Promise<void> {
    const repo = this.db
      .transaction(() => {
        const found = this.get(id);
        if (this.isLocked(this.lockRow(id))) throw new SyncInProgressError(found.name);
        this.metadata?.removeRepository(found.name);
        // sync_status follows via ON DELETE CASCADE
        this.db.prepare('DELETE FROM repositories WHERE id = ?').run(id);
        return found;
      })
      .immediate();

    if (repo.credentialRef) await this.vault.revoke(repo.credentialRef);
    await fs.rm(this.workingTreePath(repo.name), { recursive: true, force: true });
    logInfo('registry', `Removed repository ${repo.name}`, { id });
  }

  // ==========================================================================
  // Sync bookkeeping
  // ==========================================================================

  private lockRow(id: number): LockRow {
    const row = this.db
      .prepare<[number], LockRow>('SELECT repository_id, state, lock_pid FROM sync_status WHERE repository_id = ?')
      .get(id);
    if (!row) throw new RepositoryNotFoundError(id);
    return row;
  }

  /** `syncing` with an owner that is gone. A lock without an owner is stale too. */
  private isStale(row: LockRow): boolean {
    if (row.state !== 'syncing') return false;
    if (row.lock_pid === null) return true;
    if (row.lock_pid === this.pid) return false;
    return !this.isProcessAlive(row.lock_pid);
  }

  private isLocked(row: LockRow): boolean {
    return row.state === 'syncing' && !this.isStale(row);
  }

  /**
   * Atomically move a repository into `syncing`, taking over a stale lock.
   * Returns false if a live process holds it.
   * @throws RepositoryNotFoundError if the repository is gone
   */
  tryBeginSync(id: number): boolean {
    return this.db
      .transaction(() => {
        const lock = this.lockRow(id);
        if (this.isLocked(lock)) return false;
        if (lock.state === 'syncing') {
          logWarn('registry', `Taking over the sync lock of exited process ${lock.lock_pid ?? 'unknown'}`, {
            repositoryId: id,
          });
        }
        this.db
          .prepare(`UPDATE sync_status SET state = 'syncing', lock_pid = ?, last_attempt_at = ? WHERE repository_id = ?`)
          .run(this.pid, this.now().toISOString(), id);
        return true;
      })
      .immediate();
  }

  /**
   * Record a successful fetch. The lock stays held so analysis and the
   * metadata write finish before another sync or a removal can start.
   */
  recordSyncSuccess(id: number, commit: string | null): void {
    this.db
      .prepare(
        `UPDATE sync_status SET last_success_at = ?, last_error = NULL, error_code = NULL,
           current_commit = ? WHERE repository_id = ?`
      )
      .run(this.now().toISOString(), commit, id);
  }

  /** Release the lock of a successful sync. */
  completeSync(id: number): void {
    this.db
      .prepare(`UPDATE sync_status SET state = 'synced', lock_pid = NULL WHERE repository_id = ?`)
      .run(id);
  }

  failSync(id: number, error: string, code: string | null): void {
    this.db
      .prepare(
        `UPDATE sync_status SET state = 'failed', lock_pid = NULL, last_error = ?, error_code = ?
         WHERE repository_id = ?`
      )
      .run(error, code, id);
  }

  /** Record the outcome of the analysis that followed a sync. */
  recordAnalysis(id: number, analyzedAt: string, error: string | null = null): void {
    if (error) {
      this.db
        .prepare('UPDATE sync_status SET last_analysis_error = ? WHERE repository_id = ?')
        .run(error, id);
      return;
    }
    this.db
      .prepare(
        'UPDATE sync_status SET last_analyzed_at = ?, last_analysis_error = NULL WHERE repository_id = ?'
      )
      .run(analyzedAt, id);
  }

  /**
   * Mark rows left in `syncing` by a process that died as failed.
   * Locks held by a running process are left alone, so any process may call this.
   */
  recoverInterruptedSyncs(): number {
    const recovered = this.db
      .transaction(() => {
        const stale = this.db
          .prepare<[], LockRow>(`SELECT repository_id, state, lock_pid FROM sync_status WHERE state = 'syncing'`)
          .all()
          .filter((row) => this.isStale(row));
        for (const row of stale) this.failSync(row.repository_id, INTERRUPTED_ERROR, INTERRUPTED_CODE);
        return stale.length;
      })
      .immediate();
    if (recovered > 0) {
      logWarn('registry', `Recovered ${recovered} interrupted sync(s)`);
    }
    return recovered;
  }

  // ==========================================================================
  // Seeding from configuration
  // ==========================================================================

  /**
   * Register configured repositories that are not registered yet.
   * A bad entry is logged and skipped; the rest still register.
   */
  async seed(
    entries: RepositoryEntryConfig[],
    resolveKey: (entry: RepositoryEntryConfig) => ResolvedKeyPair
  ): Promise<string[]> {
    const added: string[] = [];

    for (const entry of entries) {
      if (this.getByName(entry.name)) continue;
      try {
        const key = resolveKey(entry);
        await this.register({
          name: entry.name,
          url: entry.url,
          defaultBranch: entry.default_branch,
          privateKey: key.privateKey,
          publicKey: key.publicKey,
        });
        added.push(entry.name);
      } catch (err) {
        logError('registry', `Skipping configured repository ${entry.name}: ${errorMessage(err)}`, err);
      }
    }

    return added;
  }
}
