/**
 * Config validation (Zod) and deep merge utility.
 *
 * The merged config is validated as a whole after defaults, files and
 * environment overrides are layered. Unknown keys are dropped.
 */

import { z } from 'zod';
import type { ReposcopeConfig } from './config-types.js';
import { ConfigError } from './errors.js';

// ---------- Deep merge ----------

/**
 * Recursively merge `source` into `target`.
 * - Objects are merged recursively (not replaced)
 * - Arrays and primitives from `source` override `target`
 * - `undefined` values in source are skipped
 */
export function deepMerge<T extends Record<string, unknown>>(
  target: T,
  source: Record<string, unknown>
): T {
  const result: Record<string, unknown> = { ...target };

  for (const key of Object.keys(source)) {
    const srcVal = source[key];
    const tgtVal = result[key];

    if (srcVal === undefined) continue;

    if (isPlainObject(srcVal) && isPlainObject(tgtVal)) {
      result[key] = deepMerge(tgtVal, srcVal);
    } else {
      result[key] = srcVal;
    }
  }

  return result as T;
}

export function isPlainObject(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === 'object' && !Array.isArray(value);
}

// ---------- Zod schemas ----------

export const RepositoryEntrySchema = z.object({
  name: z.string().min(1),
  url: z.string().min(1),
  default_branch: z.string().min(1).optional(),
  ssh_private_key: z.string().optional(),
  ssh_public_key: z.string().optional(),
  ssh_private_key_path: z.string().optional(),
});

const SyncSchema = z.object({
  interval_minutes: z.number().positive(),
  concurrency: z.number().int().positive(),
  git_timeout_ms: z.number().int().positive(),
  strict_host_key_checking: z.boolean(),
  known_hosts_file: z.string().min(1).optional(),
});

const AnalysisSchema = z.object({
  max_dependencies: z.number().int().positive(),
  file_concurrency: z.number().int().positive(),
  max_file_size_kb: z.number().positive(),
  ignore_dirs: z.array(z.string()),
  grammars_dir: z.string().optional(),
});

const LoggingSchema = z.object({
  enabled: z.boolean(),
  level: z.enum(['error', 'warn', 'info', 'debug']),
  max_file_size_mb: z.number().positive(),
});

const SshSchema = z.object({
  private_key: z.string().optional(),
  private_key_path: z.string().optional(),
  public_key: z.string().optional(),
});

const ReposcopeConfigSchema = z.object({
  data_dir: z.string().optional(),
  sync: SyncSchema,
  analysis: AnalysisSchema,
  logging: LoggingSchema,
  ssh: SshSchema,
  repositories: z.array(RepositoryEntrySchema),
});

/**
 * Validate a merged config object.
 * Throws ConfigError listing every invalid path.
 */
export function validateConfig(raw: Record<string, unknown>, source: string): ReposcopeConfig {
  const result = ReposcopeConfigSchema.safeParse(raw);

  if (!result.success) {
    const issues = result.error.issues.map((issue) => `"${issue.path.join('.')}": ${issue.message}`);
    throw new ConfigError(`Invalid configuration (${source}): ${issues.join('; ')}`, { issues });
  }

  return result.data;
}
