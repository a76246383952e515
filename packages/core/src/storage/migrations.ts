/**
 * Version-based SQLite migrations.
 */

import type Database from 'better-sqlite3'

interface Migration {
  version: number
  description: string
  up(db: Database.Database): void
}

/** SQLite's own exec for multi-statement DDL. */
function runSQL(db: Database.Database, sql: string): void {
  db.exec(sql)
}

export const migrations: Migration[] = [
  {
    version: 1,
    description: 'Vault notes and embedded chunks',
    up(db) {
      runSQL(
        db,
        `
        CREATE TABLE IF NOT EXISTS vault_notes (
          id TEXT PRIMARY KEY,
          file_path TEXT NOT NULL UNIQUE,
          title TEXT,
          content_hash TEXT NOT NULL,
          file_modified_at TEXT NOT NULL,
          created_at TEXT NOT NULL,
          updated_at TEXT NOT NULL
        );

        CREATE TABLE IF NOT EXISTS note_chunks (
          id TEXT PRIMARY KEY,
          note_id TEXT NOT NULL,
          chunk_index INTEGER NOT NULL,
          chunk_text TEXT NOT NULL,
          start_line INTEGER,
          end_line INTEGER,
          dimensions INTEGER NOT NULL,
          embedding BLOB NOT NULL,
          created_at TEXT NOT NULL,
          UNIQUE (note_id, chunk_index),
          FOREIGN KEY (note_id) REFERENCES vault_notes(id) ON DELETE CASCADE
        );

        CREATE INDEX IF NOT EXISTS idx_note_chunks_note ON note_chunks(note_id);
        `,
      )
    },
  },
]

export function runMigrations(db: Database.Database): void {
  // Ensure schema_version table exists for checking current version
  runSQL(
    db,
    `CREATE TABLE IF NOT EXISTS schema_version (
      version INTEGER PRIMARY KEY,
      applied_at TEXT NOT NULL
    )`,
  )

  const currentVersion = db
    .prepare('SELECT MAX(version) as version FROM schema_version')
    .get() as { version: number | null } | undefined

  const applied = currentVersion?.version ?? 0

  for (const migration of migrations) {
    if (migration.version > applied) {
      db.transaction(() => {
        migration.up(db)
        db.prepare('INSERT INTO schema_version (version, applied_at) VALUES (?, ?)').run(
          migration.version,
          new Date().toISOString(),
        )
      })()
    }
  }
}
