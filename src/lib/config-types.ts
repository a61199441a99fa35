/**
 * Type definitions for reposcope configuration
 *
 * Keys are snake_case to match the JSON config files.
 */

export type LogLevel = 'error' | 'warn' | 'info' | 'debug';

/**
 * One repository in the JSON repository-configuration format.
 * Key material is either inline or read from `ssh_private_key_path`.
 */
export interface RepositoryEntryConfig {
  name: string;
  url: string;
  default_branch?: string;
  ssh_private_key?: string;
  ssh_public_key?: string;
  ssh_private_key_path?: string;
}

export interface SyncConfig {
  interval_minutes: number; // Fixed interval between scheduled passes (default: 5)
  concurrency: number; // Repositories synced in parallel within a pass (default: 4)
  git_timeout_ms: number; // Deadline for each clone/fetch/merge (default: 120000)
  strict_host_key_checking: boolean; // false → accept-new host keys (default: false)
  known_hosts_file?: string; // Passed to ssh as UserKnownHostsFile when set
}

export interface AnalysisConfig {
  max_dependencies: number; // Cap per project (default: 50)
  file_concurrency: number; // Files parsed in parallel per project (default: 8)
  max_file_size_kb: number; // Larger source files are skipped (default: 512)
  ignore_dirs: string[]; // Directory names never walked
  grammars_dir?: string; // Extra directory searched for tree-sitter-*.wasm grammars
}

export interface LoggingConfig {
  enabled: boolean;
  level: LogLevel; // Minimum level written to the log file (default: info)
  max_file_size_mb: number; // Rotate reposcope.log beyond this size (default: 10)
}

/** Key used by repositories that do not carry their own. */
export interface SshConfig {
  private_key?: string;
  private_key_path?: string;
  public_key?: string;
}

export interface ReposcopeConfig {
  data_dir?: string; // Defaults to REPOSCOPE_HOME or ~/.reposcope
  sync: SyncConfig;
  analysis: AnalysisConfig;
  logging: LoggingConfig;
  ssh: SshConfig;
  repositories: RepositoryEntryConfig[];
}

/** Partial config layered over the loaded one (tests, CLI flags). */
export interface ConfigOverride {
  data_dir?: string;
  sync?: Partial<SyncConfig>;
  analysis?: Partial<AnalysisConfig>;
  logging?: Partial<LoggingConfig>;
  ssh?: SshConfig;
  repositories?: RepositoryEntryConfig[];
}
