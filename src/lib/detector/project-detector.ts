/**
 * Project Detector
 *
 * Walks a working tree once, turns manifest files into project roots (one per
 * directory and ecosystem), and aggregates each project's files through the
 * language analyzers.
 *
 * A source file belongs to the nearest enclosing root of each ecosystem its
 * language serves, so a nested `frontend/package.json` takes the JavaScript
 * files below it away from a root `package.json` but not from a root Python
 * project.
 */

import fs from 'fs/promises';
import path from 'path';
import { glob } from 'glob';
import type { AnalysisConfig } from '../config-types.js';
import { getAnalysisConfig } from '../config.js';
import { ManifestNotFoundError, ParseError } from '../errors.js';
import { logDebug, logError, logFault, logInfo } from '../fault-logger.js';
import { MANIFEST_ECOSYSTEM, manifestKindOf, normalizeDependencyName, readManifest } from '../analyzers/manifests.js';
import { ANALYZERS, analyzerForManifest, languageForFile } from '../analyzers/registry.js';
import type { AnalyzerRegistry } from '../analyzers/registry.js';
import { sortEntryPoints } from '../analyzers/syntax.js';
import type { ManifestKind } from '../analyzers/types.js';
import { mapWithConcurrency } from '../sync/pool.js';
import type { RepositoryAnalyzer } from '../sync/sync-worker.js';
import { ANALYZER_LANGUAGES } from '../types.js';
import type {
  AnalyzerLanguage,
  DependencyDeclaration,
  Ecosystem,
  EntryPoint,
  ProjectMetadata,
  RepositoryConfig,
} from '../types.js';
import { classifyProject, loadFrameworkMarkers } from './project-type.js';
import type { FrameworkMarker } from './project-type.js';

const COMPONENT = 'detector';
const README_PATTERN = /^readme(\.(md|markdown|txt|rst))?$/i;
const DESCRIPTION_LIMIT = 200;

// ============================================================================
// Types
// ============================================================================

interface ManifestFile {
  path: string;
  kind: ManifestKind;
}

interface SourceFile {
  path: string;
  language: AnalyzerLanguage;
}

interface ProjectRoot {
  /** Relative to the tree root, '' for the root itself. */
  dir: string;
  ecosystem: Ecosystem;
  manifests: ManifestFile[];
  sources: SourceFile[];
}

interface FileResult {
  language: AnalyzerLanguage;
  lines: number;
  entryPoints: EntryPoint[];
}

interface ManifestSummary {
  name: string | null;
  version: string | null;
  description: string | null;
  dependencies: DependencyDeclaration[];
  markers: string[];
  declaresExecutable: boolean;
  declaresLibrary: boolean;
}

export interface ProjectDetectorOptions {
  analyzers?: AnalyzerRegistry;
  markers?: FrameworkMarker[];
  /** Overrides for the `analysis` config section. */
  config?: Partial<AnalysisConfig>;
}

// ============================================================================
// Path helpers
// ============================================================================

function parentDir(relativePath: string): string {
  const dir = path.posix.dirname(relativePath);
  return dir === '.' ? '' : dir;
}

/** Nearest directory in `roots` that contains `filePath`. */
function ownerDir(filePath: string, roots: ReadonlySet<string>): string | null {
  let dir = parentDir(filePath);
  for (;;) {
    if (roots.has(dir)) return dir;
    if (dir === '') return null;
    dir = parentDir(dir);
  }
}

function rootKey(dir: string, ecosystem: Ecosystem): string {
  return `${dir}\u0000${ecosystem}`;
}

export function projectId(repositoryName: string, dir: string, ecosystem: Ecosystem): string {
  return `${repositoryName}${dir ? `/${dir}` : ''}:${ecosystem}`;
}

function countLines(content: string): number {
  let count = 0;
  for (const line of content.split('\n')) {
    if (line.trim().length > 0) count++;
  }
  return count;
}

/** First prose line of a README: not a heading, badge or short fragment. */
export function readmeDescription(content: string): string | null {
  for (const raw of content.split('\n')) {
    const line = raw.trim();
    if (line.length <= 20 || line.startsWith('#') || line.startsWith('![') || line.startsWith('[![')) continue;
    if (line.startsWith('<') || line.startsWith('=') || line.startsWith('-')) continue;
    return line.slice(0, DESCRIPTION_LIMIT);
  }
  return null;
}

// ============================================================================
// Detector
// ============================================================================

export class ProjectDetector implements RepositoryAnalyzer {
  private readonly analyzers: AnalyzerRegistry;
  private readonly markers: FrameworkMarker[] | undefined;
  private readonly configOverride: Partial<AnalysisConfig>;

  constructor(options: ProjectDetectorOptions = {}) {
    this.analyzers = options.analyzers ?? ANALYZERS;
    this.markers = options.markers;
    this.configOverride = options.config ?? {};
  }

  analyze(repo: RepositoryConfig, workingTree: string, commit: string | null, analyzedAt: string): Promise<ProjectMetadata[]> {
    return this.analyzeTree(workingTree, repo.name, commit, analyzedAt);
  }

  /**
   * Detect and analyze every project under `root`.
   * Returns [] (and logs ManifestNotFoundError) when the tree has no manifest.
   */
  async analyzeTree(
    root: string,
    repositoryName: string,
    commit: string | null,
    analyzedAt: string
  ): Promise<ProjectMetadata[]> {
    const config: AnalysisConfig = { ...getAnalysisConfig(), ...this.configOverride };
    const files = await this.listFiles(root, config.ignore_dirs);
    const projectRoots = this.findProjectRoots(files);

    if (projectRoots.length === 0) {
      const error = new ManifestNotFoundError(root);
      logFault('info', COMPONENT, error.message, { error, context: { repository: repositoryName } });
      return [];
    }

    const projects: ProjectMetadata[] = [];
    for (const projectRoot of projectRoots) {
      projects.push(await this.analyzeProject(root, projectRoot, files, repositoryName, commit, analyzedAt, config));
    }
    logInfo(COMPONENT, `Analyzed ${projects.length} project(s) in ${repositoryName}`, {
      projects: projects.map((project) => project.id),
    });
    return projects;
  }

  private async listFiles(root: string, ignoreDirs: readonly string[]): Promise<string[]> {
    const files = await glob('**/*', {
      cwd: root,
      nodir: true,
      dot: false,
      posix: true,
      ignore: ignoreDirs.map((dir) => `**/${dir}/**`),
    });
    return files.sort();
  }

  private findProjectRoots(files: readonly string[]): ProjectRoot[] {
    const roots = new Map<string, ProjectRoot>();
    const dirsByEcosystem = new Map<Ecosystem, Set<string>>();

    for (const file of files) {
      const kind = manifestKindOf(path.posix.basename(file));
      if (!kind) continue;
      const dir = parentDir(file);
      const ecosystem = MANIFEST_ECOSYSTEM[kind];
      const key = rootKey(dir, ecosystem);
      let projectRoot = roots.get(key);
      if (!projectRoot) {
        projectRoot = { dir, ecosystem, manifests: [], sources: [] };
        roots.set(key, projectRoot);
        const dirs = dirsByEcosystem.get(ecosystem) ?? new Set<string>();
        dirs.add(dir);
        dirsByEcosystem.set(ecosystem, dirs);
      }
      projectRoot.manifests.push({ path: file, kind });
    }

    for (const file of files) {
      const language = languageForFile(file, this.analyzers);
      if (!language) continue;
      for (const ecosystem of this.analyzers[language].ecosystems) {
        const dirs = dirsByEcosystem.get(ecosystem);
        const owner = dirs ? ownerDir(file, dirs) : null;
        if (owner === null) continue;
        roots.get(rootKey(owner, ecosystem))?.sources.push({ path: file, language });
      }
    }

    return [...roots.values()].sort((a, b) => a.dir.localeCompare(b.dir) || a.ecosystem.localeCompare(b.ecosystem));
  }

  private async analyzeProject(
    root: string,
    project: ProjectRoot,
    files: readonly string[],
    repositoryName: string,
    commit: string | null,
    analyzedAt: string,
    config: AnalysisConfig
  ): Promise<ProjectMetadata> {
    const maxBytes = config.max_file_size_kb * 1024;
    const results = await mapWithConcurrency(project.sources, config.file_concurrency, (file) =>
      this.analyzeFile(root, file, maxBytes)
    );
    const analyzed = results.filter((result): result is FileResult => result !== null);

    const manifest = await this.readManifests(root, project, config.max_dependencies);
    const { projectType, frameworks } = classifyProject(
      {
        ecosystem: project.ecosystem,
        dependencies: manifest.dependencies,
        manifestMarkers: manifest.markers,
        declaresExecutable: manifest.declaresExecutable,
        declaresLibrary: manifest.declaresLibrary,
        sourceFileCount: analyzed.length,
      },
      this.markers ?? loadFrameworkMarkers()
    );

    const description = manifest.description ?? (await this.readReadme(root, project.dir, files));

    return {
      id: projectId(repositoryName, project.dir, project.ecosystem),
      name: manifest.name ?? (project.dir ? path.posix.basename(project.dir) : repositoryName),
      repositoryName,
      relativePath: project.dir,
      ecosystem: project.ecosystem,
      manifests: project.manifests.map((file) => file.path),
      projectType,
      primaryLanguage: primaryLanguage(analyzed),
      dependencies: manifest.dependencies,
      entryPoints: sortEntryPoints(analyzed.flatMap((result) => result.entryPoints)),
      frameworks,
      version: manifest.version,
      description,
      fileCount: analyzed.length,
      linesOfCode: analyzed.reduce((sum, result) => sum + result.lines, 0),
      commit,
      analyzedAt,
    };
  }

  /**
   * Read and analyze one source file. Oversized and unreadable files yield
   * null; a file that fails to parse still counts, with no entry points.
   */
  private async analyzeFile(root: string, file: SourceFile, maxBytes: number): Promise<FileResult | null> {
    const absolute = path.join(root, file.path);
    let content: string;
    try {
      const stat = await fs.stat(absolute);
      if (stat.size > maxBytes) {
        logDebug(COMPONENT, `Skipping oversized file ${file.path}`, { bytes: stat.size });
        return null;
      }
      content = (await fs.readFile(absolute, 'utf-8')).replace(/^\uFEFF/, '');
    } catch (error) {
      logError(COMPONENT, `Cannot read ${file.path}`, error);
      return null;
    }

    const lines = countLines(content);
    try {
      const entryPoints = await this.analyzers[file.language].parseEntryPoints(content, file.path);
      return { language: file.language, lines, entryPoints };
    } catch (error) {
      if (error instanceof ParseError) {
        logFault('warn', COMPONENT, `Skipping unparsable file: ${error.message}`, { error });
      } else {
        logError(COMPONENT, `Entry point extraction failed for ${file.path}`, error);
      }
      return { language: file.language, lines, entryPoints: [] };
    }
  }

  private async readManifests(root: string, project: ProjectRoot, maxDependencies: number): Promise<ManifestSummary> {
    const summary: ManifestSummary = {
      name: null,
      version: null,
      description: null,
      dependencies: [],
      markers: [],
      declaresExecutable: false,
      declaresLibrary: false,
    };
    const seen = new Set<string>();

    for (const manifest of project.manifests) {
      let content: string;
      try {
        content = await fs.readFile(path.join(root, manifest.path), 'utf-8');
      } catch (error) {
        logError(COMPONENT, `Cannot read manifest ${manifest.path}`, error);
        continue;
      }

      try {
        const info = readManifest(content, manifest.kind, manifest.path);
        const analyzer = analyzerForManifest(manifest.kind, this.analyzers);
        const dependencies = analyzer ? analyzer.parseManifest(content, manifest.kind, manifest.path) : info.dependencies;

        summary.name ??= info.name ?? null;
        summary.version ??= info.version ?? null;
        summary.description ??= info.description ?? null;
        summary.declaresExecutable ||= info.declaresExecutable;
        summary.declaresLibrary ||= info.declaresLibrary;
        for (const marker of info.markers) {
          if (!summary.markers.includes(marker)) summary.markers.push(marker);
        }

        for (const dependency of dependencies) {
          const key = normalizeDependencyName(project.ecosystem, dependency.name);
          if (seen.has(key) || summary.dependencies.length >= maxDependencies) continue;
          seen.add(key);
          summary.dependencies.push(dependency);
        }
      } catch (error) {
        if (error instanceof ParseError) {
          logFault('warn', COMPONENT, `Skipping unreadable manifest: ${error.message}`, { error });
        } else {
          logError(COMPONENT, `Manifest parsing failed for ${manifest.path}`, error);
        }
      }
    }
    return summary;
  }

  private async readReadme(root: string, dir: string, files: readonly string[]): Promise<string | null> {
    const readme = files.find((file) => parentDir(file) === dir && README_PATTERN.test(path.posix.basename(file)));
    if (!readme) return null;
    try {
      return readmeDescription(await fs.readFile(path.join(root, readme), 'utf-8'));
    } catch (error) {
      logError(COMPONENT, `Cannot read ${readme}`, error);
      return null;
    }
  }
}

/** Language with the most files; ties go to the earlier language. */
function primaryLanguage(results: readonly FileResult[]): AnalyzerLanguage | null {
  const counts = new Map<AnalyzerLanguage, number>();
  for (const result of results) {
    counts.set(result.language, (counts.get(result.language) ?? 0) + 1);
  }
  let best: AnalyzerLanguage | null = null;
  let bestCount = 0;
  for (const language of ANALYZER_LANGUAGES) {
    const count = counts.get(language) ?? 0;
    if (count > bestCount) {
      best = language;
      bestCount = count;
    }
  }
  return best;
}
