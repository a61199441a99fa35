/**
 * Git access for the sync worker.
 *
 * Everything the worker needs from git goes through the GitClient interface;
 * CliGitClient runs the `git` binary. Arguments are passed as an argv array
 * (execFile, no shell), and every call carries its own deadline.
 */

import { execFile } from 'child_process';
import fs from 'fs';
import path from 'path';
import { promisify } from 'util';
import {
  SyncAuthError,
  SyncConflictError,
  SyncError,
  SyncNetworkError,
  SyncTimeoutError,
} from '../errors.js';

const execFileAsync = promisify(execFile);

// ============================================================================
// Interface
// ============================================================================

export interface GitOperationOptions {
  /** Deadline for this operation; the process is killed when it passes. */
  timeoutMs: number;
  /** Private key file for SSH remotes. */
  sshKeyPath?: string;
  /** false → accept unknown host keys on first contact. */
  strictHostKeyChecking?: boolean;
  knownHostsFile?: string;
}

export interface GitClient {
  /** Clone `branch` of `url` into `dest`, which must not exist yet. */
  clone(url: string, branch: string, dest: string, options: GitOperationOptions): Promise<void>;
  /** Update `origin/<branch>` from the remote. Does not touch the working tree. */
  fetch(dir: string, branch: string, options: GitOperationOptions): Promise<void>;
  /** Fast-forward the checkout to `origin/<branch>`. Throws SyncConflictError if impossible. */
  fastForward(dir: string, branch: string, options: GitOperationOptions): Promise<void>;
  headCommit(dir: string): Promise<string | null>;
  isRepository(dir: string): Promise<boolean>;
}

// ============================================================================
// Error classification
// ============================================================================

const AUTH_PATTERNS = [
  /permission denied/i,
  /authentication failed/i,
  /could not read (username|password)/i,
  /host key verification failed/i,
  /invalid (username|password)/i,
  /repository not found/i,
  /access denied/i,
  /load key .*: invalid format/i,
];

const CONFLICT_PATTERNS = [
  /not possible to fast-forward/i,
  /diverging branches/i,
  /non-fast-forward/i,
  /would be overwritten by merge/i,
  /refusing to merge unrelated histories/i,
  /you have unmerged paths/i,
];

const NETWORK_PATTERNS = [
  /could not resolve host/i,
  /could not resolve hostname/i,
  /connection (refused|timed out|reset)/i,
  /network is unreachable/i,
  /operation timed out/i,
  /unable to access/i,
  /could not read from remote repository/i,
  /the remote end hung up/i,
];

/**
 * Map git's stderr to the sync error taxonomy.
 * Auth is checked first: "Could not read from remote repository" follows
 * "Permission denied (publickey)" in the same message.
 */
export function classifyGitError(operation: string, stderr: string): SyncError {
  const message = lastMeaningfulLines(stderr) || `git ${operation} failed`;
  const context = { operation };

  if (AUTH_PATTERNS.some((p) => p.test(stderr))) return new SyncAuthError(message, context);
  if (CONFLICT_PATTERNS.some((p) => p.test(stderr))) return new SyncConflictError(message, context);
  if (NETWORK_PATTERNS.some((p) => p.test(stderr))) return new SyncNetworkError(message, 'SYNC_NETWORK_ERROR', context);
  return new SyncError(message, 'SYNC_GIT_ERROR', context);
}

function lastMeaningfulLines(stderr: string): string {
  return stderr
    .split('\n')
    .map((line) => line.trim())
    .filter((line) => line.length > 0 && !line.startsWith('hint:'))
    .slice(-3)
    .join(' ');
}

interface ExecFailure {
  stderr: string;
  killed: boolean;
  code: string | number | null;
}

function toExecFailure(err: unknown): ExecFailure {
  const failure: ExecFailure = { stderr: '', killed: false, code: null };
  if (typeof err !== 'object' || err === null) return failure;
  if ('stderr' in err) failure.stderr = String(err.stderr);
  if ('killed' in err) failure.killed = err.killed === true;
  if ('code' in err && (typeof err.code === 'string' || typeof err.code === 'number')) failure.code = err.code;
  return failure;
}

// ============================================================================
// SSH
// ============================================================================

function shellQuote(value: string): string {
  return `'${value.replace(/'/g, `'\\''`)}'`;
}

/** Value for GIT_SSH_COMMAND that pins git to one key. */
export function buildSshCommand(options: GitOperationOptions): string | undefined {
  if (!options.sshKeyPath) return undefined;
  const parts = [
    'ssh',
    '-i',
    shellQuote(options.sshKeyPath),
    '-o',
    'IdentitiesOnly=yes',
    '-o',
    `StrictHostKeyChecking=${options.strictHostKeyChecking ? 'yes' : 'accept-new'}`,
    '-o',
    'BatchMode=yes',
  ];
  if (options.knownHostsFile) {
    parts.push('-o', `UserKnownHostsFile=${shellQuote(options.knownHostsFile)}`);
  }
  return parts.join(' ');
}

// ============================================================================
// CLI implementation
// ============================================================================

export class CliGitClient implements GitClient {
  constructor(private readonly gitBinary: string = 'git') {}

  async clone(url: string, branch: string, dest: string, options: GitOperationOptions): Promise<void> {
    await this.run(
      'clone',
      ['clone', '--branch', branch, '--single-branch', '--', url, dest],
      path.dirname(dest),
      options
    );
  }

  async fetch(dir: string, branch: string, options: GitOperationOptions): Promise<void> {
    await this.run(
      'fetch',
      ['fetch', '--prune', 'origin', `+refs/heads/${branch}:refs/remotes/origin/${branch}`],
      dir,
      options
    );
  }

  async fastForward(dir: string, branch: string, options: GitOperationOptions): Promise<void> {
    await this.run('merge', ['merge', '--ff-only', `origin/${branch}`], dir, options);
  }

  async headCommit(dir: string): Promise<string | null> {
    try {
      const stdout = await this.run('rev-parse', ['rev-parse', 'HEAD'], dir, { timeoutMs: 10_000 });
      return stdout.trim() || null;
    } catch {
      return null;
    }
  }

  async isRepository(dir: string): Promise<boolean> {
    return fs.existsSync(path.join(dir, '.git'));
  }

  private async run(
    operation: string,
    args: string[],
    cwd: string,
    options: GitOperationOptions
  ): Promise<string> {
    const env: NodeJS.ProcessEnv = {
      ...process.env,
      GIT_TERMINAL_PROMPT: '0',
      LC_ALL: 'C',
    };
    const sshCommand = buildSshCommand(options);
    if (sshCommand) env.GIT_SSH_COMMAND = sshCommand;

    try {
      const { stdout } = await execFileAsync(this.gitBinary, args, {
        cwd,
        env,
        timeout: options.timeoutMs,
        killSignal: 'SIGKILL',
        maxBuffer: 10 * 1024 * 1024,
        windowsHide: true,
      });
      return stdout;
    } catch (err) {
      const failure = toExecFailure(err);
      if (failure.killed) {
        throw new SyncTimeoutError(operation, options.timeoutMs);
      }
      if (failure.code === 'ENOENT') {
        throw new SyncError(`git executable not found: ${this.gitBinary}`, 'SYNC_GIT_MISSING', { operation });
      }
      throw classifyGitError(operation, failure.stderr);
    }
  }
}
