/**
 * Version-based SQLite migrations.
 *
 * `sections` belongs to the structured store, `section_chunks` to the vector store.
 * No foreign key links them: the two tables may live in different database files.
 */

import type Database from 'better-sqlite3'

interface Migration {
  version: number
  description: string
  up(db: Database.Database): void
}

/**
 * Runs SQL statements using the better-sqlite3 Database.exec() method.
 * Note: This is NOT child_process.exec; it is SQLite's native exec for DDL.
 */
function runSQL(db: Database.Database, sql: string): void {
  db.exec(sql)
}

const migrations: Migration[] = [
  {
    version: 1,
    description: 'Sections: hierarchical records with sibling order and slug',
    up(db) {
      runSQL(
        db,
        `
        CREATE TABLE IF NOT EXISTS sections (
          id TEXT PRIMARY KEY,
          collection TEXT NOT NULL,
          parent_id TEXT,
          header TEXT NOT NULL,
          content TEXT NOT NULL DEFAULT '',
          slug TEXT,
          sort_order INTEGER NOT NULL DEFAULT 0,
          created_at TEXT NOT NULL,
          updated_at TEXT NOT NULL
        );

        CREATE INDEX IF NOT EXISTS idx_sections_parent ON sections(collection, parent_id, sort_order);
        CREATE INDEX IF NOT EXISTS idx_sections_slug ON sections(collection, slug);
        CREATE INDEX IF NOT EXISTS idx_sections_header ON sections(collection, header);
      `,
      )
    },
  },
  {
    version: 2,
    description: 'Section chunks: content slices and their embeddings',
    up(db) {
      runSQL(
        db,
        `
        CREATE TABLE IF NOT EXISTS section_chunks (
          id TEXT PRIMARY KEY,
          collection TEXT NOT NULL,
          section_id TEXT NOT NULL,
          chunk_index INTEGER NOT NULL,
          content TEXT NOT NULL,
          content_hash TEXT NOT NULL,
          section_content_hash TEXT NOT NULL,
          char_count INTEGER NOT NULL,
          model_name TEXT NOT NULL,
          dimensions INTEGER NOT NULL,
          embedding BLOB NOT NULL,
          created_at TEXT NOT NULL,
          UNIQUE(collection, section_id, chunk_index)
        );

        CREATE INDEX IF NOT EXISTS idx_section_chunks_section ON section_chunks(collection, section_id);
      `,
      )
    },
  },
  {
    version: 3,
    description: 'Section chunks: provider fingerprint of the embedding model',
    up(db) {
      runSQL(db, `ALTER TABLE section_chunks ADD COLUMN provider_fingerprint TEXT NOT NULL DEFAULT ''`)
    },
  },
]

export const LATEST_SCHEMA_VERSION = migrations[migrations.length - 1].version

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
