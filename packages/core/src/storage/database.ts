/**
 * SQLite database initialization with WAL mode and migrations.
 * Both the structured store and the vector store open their handles through here.
 */

import { mkdirSync } from 'node:fs'
import { dirname } from 'node:path'
import Database from 'better-sqlite3'
import { runMigrations } from './migrations.js'

export const IN_MEMORY = ':memory:'

export function openDatabase(path: string): Database.Database {
  if (path !== IN_MEMORY) {
    mkdirSync(dirname(path), { recursive: true })
  }

  const db = new Database(path)

  if (path !== IN_MEMORY) {
    db.pragma('journal_mode = WAL')
  }

  runMigrations(db)

  return db
}
