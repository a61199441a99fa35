/**
 * Custom error hierarchy for reposcope.
 *
 * Provides programmatic error discrimination without parsing message strings.
 * Each subclass carries a `code` string; sync failures persist that code in
 * the repository's status row so callers can branch on it later.
 */

/** Base error for all reposcope errors. Carries a `code` and optional `context`. */
export class ReposcopeError extends Error {
  readonly code: string;
  readonly context?: Record<string, unknown>;

  constructor(message: string, code: string = 'REPOSCOPE_ERROR', context?: Record<string, unknown>) {
    super(message);
    this.name = 'ReposcopeError';
    this.code = code;
    this.context = context;
  }
}

/** Configuration errors: unreadable config files, invalid values. */
export class ConfigError extends ReposcopeError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, 'CONFIG_ERROR', context);
    this.name = 'ConfigError';
  }
}

/** Storage/database errors: connection failures, query errors, constraint violations. */
export class StorageError extends ReposcopeError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, 'STORAGE_ERROR', context);
    this.name = 'StorageError';
  }
}

/** Validation errors: bad input, precondition failures, argument checks. */
export class ValidationError extends ReposcopeError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, 'VALIDATION_ERROR', context);
    this.name = 'ValidationError';
  }
}

/** Resource not found: projects, files. */
export class NotFoundError extends ReposcopeError {
  constructor(message: string, code: string = 'NOT_FOUND', context?: Record<string, unknown>) {
    super(message, code, context);
    this.name = 'NotFoundError';
  }
}

// ============================================================================
// Credential vault
// ============================================================================

export class CredentialNotFoundError extends NotFoundError {
  constructor(credentialRef: string) {
    super(`Unknown credential reference: ${credentialRef}`, 'CREDENTIAL_NOT_FOUND', { credentialRef });
    this.name = 'CredentialNotFoundError';
  }
}

export class CredentialWriteError extends ReposcopeError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, 'CREDENTIAL_WRITE_ERROR', context);
    this.name = 'CredentialWriteError';
  }
}

// ============================================================================
// Registry
// ============================================================================

export class DuplicateRepositoryError extends ReposcopeError {
  constructor(name: string) {
    super(`Repository "${name}" is already registered`, 'DUPLICATE_REPOSITORY', { name });
    this.name = 'DuplicateRepositoryError';
  }
}

export class RepositoryNotFoundError extends NotFoundError {
  constructor(idOrName: number | string) {
    super(`Repository not found: ${idOrName}`, 'REPOSITORY_NOT_FOUND', { repository: idOrName });
    this.name = 'RepositoryNotFoundError';
  }
}

// ============================================================================
// Sync
// ============================================================================

/** Any failure of a git operation. Subclasses narrow the cause. */
export class SyncError extends ReposcopeError {
  constructor(message: string, code: string = 'SYNC_ERROR', context?: Record<string, unknown>) {
    super(message, code, context);
    this.name = 'SyncError';
  }
}

export class SyncAuthError extends SyncError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, 'SYNC_AUTH_ERROR', context);
    this.name = 'SyncAuthError';
  }
}

export class SyncNetworkError extends SyncError {
  constructor(message: string, code: string = 'SYNC_NETWORK_ERROR', context?: Record<string, unknown>) {
    super(message, code, context);
    this.name = 'SyncNetworkError';
  }
}

/** A git operation exceeded its deadline and was killed. */
export class SyncTimeoutError extends SyncNetworkError {
  readonly timeoutMs: number;

  constructor(operation: string, timeoutMs: number) {
    super(`git ${operation} timed out after ${timeoutMs}ms`, 'SYNC_TIMEOUT', { operation, timeoutMs });
    this.name = 'SyncTimeoutError';
    this.timeoutMs = timeoutMs;
  }
}

/** Local and remote history diverged; fast-forward is impossible. */
export class SyncConflictError extends SyncError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, 'SYNC_CONFLICT', context);
    this.name = 'SyncConflictError';
  }
}

export class SyncInProgressError extends SyncError {
  constructor(name: string) {
    super(`Repository "${name}" is already syncing`, 'SYNC_IN_PROGRESS', { name });
    this.name = 'SyncInProgressError';
  }
}

// ============================================================================
// Analysis
// ============================================================================

/** A single source file could not be parsed. Callers skip the file. */
export class ParseError extends ReposcopeError {
  readonly filePath: string;

  constructor(filePath: string, message: string, context?: Record<string, unknown>) {
    super(`${filePath}: ${message}`, 'PARSE_ERROR', { filePath, ...context });
    this.name = 'ParseError';
    this.filePath = filePath;
  }
}

export class ManifestNotFoundError extends NotFoundError {
  constructor(directory: string) {
    super(`No manifest file in ${directory}`, 'MANIFEST_NOT_FOUND', { directory });
    this.name = 'ManifestNotFoundError';
  }
}

/** Type guard: check if an error is a ReposcopeError or subclass. */
export function isReposcopeError(error: unknown): error is ReposcopeError {
  return error instanceof ReposcopeError;
}

/** Message of any thrown value. */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
