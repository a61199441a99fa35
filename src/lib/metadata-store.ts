/**
 * Metadata Store
 *
 * Project metadata keyed by project id. Each record is replaced wholesale;
 * the columns beside the JSON payload exist for filtering and ordering.
 */

import Database from 'better-sqlite3';
import type { EntryPoint, ProjectMetadata } from './types.js';
import { NotFoundError, StorageError, errorMessage } from './errors.js';

interface ProjectRow {
  id: string;
  payload: string;
}

export interface MetadataStats {
  projects: number;
  entryPoints: number;
  dependencies: number;
  byType: Record<string, number>;
  byLanguage: Record<string, number>;
}

function parsePayload(row: ProjectRow): ProjectMetadata {
  try {
    const metadata: ProjectMetadata = JSON.parse(row.payload);
    return metadata;
  } catch (err) {
    throw new StorageError(`Corrupt metadata for ${row.id}: ${errorMessage(err)}`, { id: row.id });
  }
}

export class MetadataStore {
  constructor(private readonly db: Database.Database) {}

  /** Insert or atomically replace one project record. */
  upsert(metadata: ProjectMetadata): void {
    this.write(metadata);
  }

  /**
   * Replace every project of `repositoryName` with `projects` in one
   * transaction. On failure the previous set stays visible.
   */
  replaceRepository(repositoryName: string, projects: ProjectMetadata[]): void {
    try {
      this.db.transaction(() => {
        this.db.prepare('DELETE FROM projects WHERE repository_name = ?').run(repositoryName);
        for (const project of projects) {
          this.write(project);
        }
      })();
    } catch (err) {
      throw new StorageError(`Cannot store projects of ${repositoryName}: ${errorMessage(err)}`, {
        repositoryName,
      });
    }
  }

  get(id: string): ProjectMetadata {
    const row = this.db.prepare<[string], ProjectRow>('SELECT id, payload FROM projects WHERE id = ?').get(id);
    if (!row) throw new NotFoundError(`Project not found: ${id}`, 'PROJECT_NOT_FOUND', { id });
    return parsePayload(row);
  }

  list(): ProjectMetadata[] {
    return this.db
      .prepare<[], ProjectRow>('SELECT id, payload FROM projects ORDER BY repository_name, relative_path, ecosystem')
      .all()
      .map(parsePayload);
  }

  listByRepository(repositoryName: string): ProjectMetadata[] {
    return this.db
      .prepare<[string], ProjectRow>(
        'SELECT id, payload FROM projects WHERE repository_name = ? ORDER BY relative_path, ecosystem'
      )
      .all(repositoryName)
      .map(parsePayload);
  }

  listEntryPoints(id: string): EntryPoint[] {
    return this.get(id).entryPoints;
  }

  removeRepository(repositoryName: string): number {
    return this.db.prepare('DELETE FROM projects WHERE repository_name = ?').run(repositoryName).changes;
  }

  stats(): MetadataStats {
    const stats: MetadataStats = { projects: 0, entryPoints: 0, dependencies: 0, byType: {}, byLanguage: {} };
    for (const project of this.list()) {
      stats.projects++;
      stats.entryPoints += project.entryPoints.length;
      stats.dependencies += project.dependencies.length;
      stats.byType[project.projectType] = (stats.byType[project.projectType] ?? 0) + 1;
      const language = project.primaryLanguage ?? 'none';
      stats.byLanguage[language] = (stats.byLanguage[language] ?? 0) + 1;
    }
    return stats;
  }

  private write(metadata: ProjectMetadata): void {
    this.db
      .prepare(
        `INSERT OR REPLACE INTO projects
           (id, repository_name, relative_path, ecosystem, project_type, primary_language, analyzed_at, payload)
         VALUES (?, ?, ?, ?, ?, ?, ?, ?)`
      )
      .run(
        metadata.id,
        metadata.repositoryName,
        metadata.relativePath,
        metadata.ecosystem,
        metadata.projectType,
        metadata.primaryLanguage,
        metadata.analyzedAt,
        JSON.stringify(metadata)
      );
  }
}
