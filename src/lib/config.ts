/**
 * Configuration system for reposcope
 *
 * Layers, later wins:
 *   defaults → <data dir>/config.json → ./.reposcope/config.json → environment → override
 *
 * Type definitions are in config-types.ts, default values in config-defaults.ts,
 * schema and merge helpers in config-validation.ts.
 */

import fs from 'fs';
import path from 'path';
import os from 'os';
import { deepMerge, isPlainObject, validateConfig } from './config-validation.js';
import { DEFAULT_CONFIG } from './config-defaults.js';
import { ConfigError, errorMessage } from './errors.js';
import type {
  ReposcopeConfig,
  ConfigOverride,
  RepositoryEntryConfig,
  SyncConfig,
  AnalysisConfig,
  LoggingConfig,
} from './config-types.js';

export type {
  ReposcopeConfig,
  ConfigOverride,
  RepositoryEntryConfig,
  SyncConfig,
  AnalysisConfig,
  LoggingConfig,
  SshConfig,
  LogLevel,
} from './config-types.js';
export { DEFAULT_CONFIG, DEFAULT_IGNORE_DIRS } from './config-defaults.js';

// ============================================================================
// Paths
// ============================================================================

/** Home of the global config file; REPOSCOPE_HOME wins over ~/.reposcope. */
export function getHomeDir(): string {
  return process.env.REPOSCOPE_HOME || path.join(os.homedir(), '.reposcope');
}

export function getGlobalConfigPath(): string {
  return path.join(getHomeDir(), 'config.json');
}

export function getProjectConfigPath(): string {
  return path.join(process.cwd(), '.reposcope', 'config.json');
}

// ============================================================================
// Loading
// ============================================================================

// Config cache: avoids re-reading files on every getConfig() call
let configCache: {
  config: ReposcopeConfig;
  globalMtime: number;
  projectMtime: number;
  envKey: string;
} | null = null;

let configOverride: ConfigOverride | null = null;

/** Invalidate config cache (for tests or after config changes) */
export function invalidateConfigCache(): void {
  configCache = null;
}

/**
 * Layer a partial config on top of everything else.
 * Pass null to remove it. Used by tests and CLI flags.
 */
export function setConfigOverride(override: ConfigOverride | null): void {
  configOverride = override;
  configCache = null;
}

function getFileMtime(filePath: string): number {
  try {
    return fs.statSync(filePath).mtimeMs;
  } catch {
    return 0;
  }
}

const ENV_KEYS = [
  'REPOSCOPE_HOME',
  'SYNC_INTERVAL_MINUTES',
  'GIT_REPOSITORIES',
  'GIT_SSH_KEY',
  'GIT_SSH_KEY_PATH',
  'GIT_SSH_PUBLIC_KEY',
];

function readConfigFile(filePath: string): Record<string, unknown> {
  if (!fs.existsSync(filePath)) return {};

  let parsed: unknown;
  try {
    parsed = JSON.parse(fs.readFileSync(filePath, 'utf-8'));
  } catch (err) {
    throw new ConfigError(`Cannot read ${filePath}: ${errorMessage(err)}`, { filePath });
  }

  if (!isPlainObject(parsed)) {
    throw new ConfigError(`${filePath} must contain a JSON object`, { filePath });
  }
  return parsed;
}

/**
 * Environment overrides, in the variable names the deployment manifests use.
 * GIT_REPOSITORIES holds a JSON array of repository entries.
 */
function readEnvironment(): Record<string, unknown> {
  const env: Record<string, unknown> = {};

  if (process.env.SYNC_INTERVAL_MINUTES) {
    env.sync = { interval_minutes: Number(process.env.SYNC_INTERVAL_MINUTES) };
  }

  const ssh: Record<string, string> = {};
  if (process.env.GIT_SSH_KEY) ssh.private_key = process.env.GIT_SSH_KEY;
  if (process.env.GIT_SSH_KEY_PATH) ssh.private_key_path = process.env.GIT_SSH_KEY_PATH;
  if (process.env.GIT_SSH_PUBLIC_KEY) ssh.public_key = process.env.GIT_SSH_PUBLIC_KEY;
  if (Object.keys(ssh).length > 0) env.ssh = ssh;

  if (process.env.GIT_REPOSITORIES) {
    let repositories: unknown;
    try {
      repositories = JSON.parse(process.env.GIT_REPOSITORIES);
    } catch (err) {
      throw new ConfigError(`GIT_REPOSITORIES must be valid JSON: ${errorMessage(err)}`);
    }
    if (!Array.isArray(repositories)) {
      throw new ConfigError('GIT_REPOSITORIES must be a JSON array');
    }
    env.repositories = repositories;
  }

  return env;
}

export function getConfig(): ReposcopeConfig {
  const globalConfigPath = getGlobalConfigPath();
  const projectConfigPath = getProjectConfigPath();
  const envKey = ENV_KEYS.map((key) => process.env[key] ?? '').join('\u0000');

  // Check if cache is still valid (stat is cheaper than read+parse)
  if (configCache) {
    if (
      getFileMtime(globalConfigPath) === configCache.globalMtime &&
      getFileMtime(projectConfigPath) === configCache.projectMtime &&
      envKey === configCache.envKey
    ) {
      return configCache.config;
    }
  }

  const defaults: Record<string, unknown> = { ...DEFAULT_CONFIG };
  let merged = deepMerge(defaults, readConfigFile(globalConfigPath));
  merged = deepMerge(merged, readConfigFile(projectConfigPath));

  // Repositories from the environment are appended, not substituted
  const env = readEnvironment();
  if (Array.isArray(env.repositories) && Array.isArray(merged.repositories)) {
    env.repositories = [...merged.repositories, ...env.repositories];
  }
  merged = deepMerge(merged, env);

  if (configOverride) {
    const override: Record<string, unknown> = { ...configOverride };
    merged = deepMerge(merged, override);
  }

  const config = validateConfig(merged, configOverride ? 'override' : globalConfigPath);

  configCache = {
    config,
    globalMtime: getFileMtime(globalConfigPath),
    projectMtime: getFileMtime(projectConfigPath),
    envKey,
  };

  return config;
}

// ============================================================================
// Section accessors
// ============================================================================

export function getSyncConfig(): SyncConfig {
  return getConfig().sync;
}

export function getAnalysisConfig(): AnalysisConfig {
  return getConfig().analysis;
}

export function getLoggingConfig(): LoggingConfig {
  return getConfig().logging;
}

// ============================================================================
// Data directory layout
// ============================================================================

export function getDataDir(): string {
  return getConfig().data_dir ?? getHomeDir();
}

/** Working-tree clones, one directory per repository name. */
export function getReposDir(): string {
  return path.join(getDataDir(), 'repositories');
}

export function getCredentialsDir(): string {
  return path.join(getDataDir(), 'credentials');
}

export function getDbPath(): string {
  return path.join(getDataDir(), 'reposcope.db');
}

export function getLogPath(): string {
  return path.join(getDataDir(), 'reposcope.log');
}

// ============================================================================
// Repository seeding
// ============================================================================

export interface ResolvedKeyPair {
  privateKey?: string;
  publicKey?: string;
}

/**
 * Resolve the key pair for one configured repository.
 * Resolution: inline key → key file → global ssh key → global ssh key file → none
 */
export function resolveRepositoryKey(
  entry: RepositoryEntryConfig,
  config: ReposcopeConfig = getConfig()
): ResolvedKeyPair {
  const privateKey =
    entry.ssh_private_key ??
    readKeyFile(entry.ssh_private_key_path) ??
    config.ssh.private_key ??
    readKeyFile(config.ssh.private_key_path);

  if (!privateKey) return {};

  return {
    privateKey,
    publicKey: entry.ssh_public_key ?? config.ssh.public_key,
  };
}

function readKeyFile(keyPath: string | undefined): string | undefined {
  if (!keyPath) return undefined;
  try {
    return fs.readFileSync(keyPath, 'utf-8');
  } catch (err) {
    throw new ConfigError(`Cannot read SSH key ${keyPath}: ${errorMessage(err)}`, { keyPath });
  }
}
