/**
 * Domain types shared by the registry, sync worker, analyzers and stores.
 */

import type { SyncState } from './db/schema.js';

export type { SyncState } from './db/schema.js';

// ============================================================================
// Repositories
// ============================================================================

export interface RepositoryConfig {
  id: number;
  name: string;
  url: string;
  defaultBranch: string;
  /** Opaque vault reference, null for repositories that need no key. */
  credentialRef: string | null;
  createdAt: string;
  updatedAt: string;
}

export interface SyncStatus {
  repositoryId: number;
  state: SyncState;
  lastAttemptAt: string | null;
  lastSuccessAt: string | null;
  lastError: string | null;
  errorCode: string | null;
  /** HEAD after the last successful sync. */
  currentCommit: string | null;
  lastAnalyzedAt: string | null;
  lastAnalysisError: string | null;
}

export interface RepositoryWithStatus extends RepositoryConfig {
  status: SyncStatus;
}

// ============================================================================
// Analysis results
// ============================================================================

export const ANALYZER_LANGUAGES = [
  'python',
  'javascript',
  'typescript',
  'java',
  'cpp',
  'go',
  'rust',
  'csharp',
] as const;
export type AnalyzerLanguage = (typeof ANALYZER_LANGUAGES)[number];

export const ECOSYSTEMS = ['python', 'node', 'jvm', 'rust', 'go', 'dotnet', 'cmake'] as const;
export type Ecosystem = (typeof ECOSYSTEMS)[number];

export const PROJECT_TYPES = ['web-app', 'api', 'cli', 'library', 'microservice', 'unknown'] as const;
export type ProjectType = (typeof PROJECT_TYPES)[number];

export type EntryPointKind = 'function' | 'class' | 'method' | 'route';

export interface EntryPoint {
  kind: EntryPointKind;
  /** Qualified name, e.g. `Program.Main` or `GET /health`. */
  name: string;
  /** Repository-relative, forward slashes. */
  filePath: string;
  /** 1-based. */
  line: number;
  frameworkHint?: string;
  route?: { method: string; path: string };
  parameters: string[];
}

export type DependencyScope = 'runtime' | 'dev' | 'build';

export interface DependencyDeclaration {
  name: string;
  /** Raw constraint, bare version for exact pins, null when unconstrained. */
  version: string | null;
  /** Repository-relative manifest path. */
  manifest: string;
  scope: DependencyScope;
}

export interface ProjectMetadata {
  id: string;
  name: string;
  repositoryName: string;
  /** Project directory relative to the repository root, '' for the root. */
  relativePath: string;
  ecosystem: Ecosystem;
  manifests: string[];
  projectType: ProjectType;
  primaryLanguage: AnalyzerLanguage | null;
  dependencies: DependencyDeclaration[];
  entryPoints: EntryPoint[];
  frameworks: string[];
  version: string | null;
  description: string | null;
  fileCount: number;
  linesOfCode: number;
  commit: string | null;
  analyzedAt: string;
}
