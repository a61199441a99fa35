import Database from 'better-sqlite3';

export const SYNC_STATES = ['never-synced', 'syncing', 'synced', 'failed'] as const;
export type SyncState = (typeof SYNC_STATES)[number];

/**
 * Initialize database schema
 */
export function initDb(database: Database.Database): void {
  database.exec(`
    CREATE TABLE IF NOT EXISTS repositories (
      id INTEGER PRIMARY KEY AUTOINCREMENT,
      name TEXT NOT NULL UNIQUE,
      url TEXT NOT NULL,
      default_branch TEXT NOT NULL DEFAULT 'main',
      credential_ref TEXT,
      created_at TEXT NOT NULL,
      updated_at TEXT NOT NULL
    );

    CREATE TABLE IF NOT EXISTS sync_status (
      repository_id INTEGER PRIMARY KEY REFERENCES repositories(id) ON DELETE CASCADE,
      state TEXT NOT NULL DEFAULT 'never-synced'
        CHECK (state IN ('never-synced', 'syncing', 'synced', 'failed')),
      last_attempt_at TEXT,
      last_success_at TEXT,
      last_error TEXT,
      error_code TEXT,
      current_commit TEXT,
      last_analyzed_at TEXT,
      last_analysis_error TEXT,
      lock_pid INTEGER
    );

    CREATE TABLE IF NOT EXISTS projects (
      id TEXT PRIMARY KEY,
      repository_name TEXT NOT NULL,
      relative_path TEXT NOT NULL,
      ecosystem TEXT NOT NULL,
      project_type TEXT NOT NULL,
      primary_language TEXT,
      analyzed_at TEXT NOT NULL,
      payload TEXT NOT NULL
    );

    CREATE INDEX IF NOT EXISTS idx_projects_repository ON projects(repository_name);

    CREATE TABLE IF NOT EXISTS metadata (
      key TEXT PRIMARY KEY,
      value TEXT NOT NULL
    );
  `);

  // Migration: owner of the `syncing` lock (databases created before it was tracked)
  const statusColumns = database
    .prepare<[], { name: string }>('PRAGMA table_info(sync_status)')
    .all()
    .map((column) => column.name);
  if (!statusColumns.includes('lock_pid')) {
    database.prepare('ALTER TABLE sync_status ADD COLUMN lock_pid INTEGER').run();
  }

  database
    .prepare("INSERT OR IGNORE INTO metadata (key, value) VALUES ('schema_version', '1')")
    .run();
}
