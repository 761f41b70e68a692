import { describe, it, expect, afterEach } from 'vitest'
import { mkdtempSync, rmSync, existsSync } from 'node:fs'
import { tmpdir } from 'node:os'
import { join } from 'node:path'
import { openDatabase, runMigrations, LATEST_SCHEMA_VERSION } from '../../src/storage/index.js'

describe('openDatabase', () => {
  let tmp: string | null = null

  afterEach(() => {
    if (tmp) rmSync(tmp, { recursive: true, force: true })
    tmp = null
  })

  it('creates both store tables', () => {
    const db = openDatabase(':memory:')

    const tables = db
      .prepare("SELECT name FROM sqlite_master WHERE type='table' ORDER BY name")
      .all() as { name: string }[]

    expect(tables.map((t) => t.name)).toEqual(['schema_version', 'section_chunks', 'sections'])
    db.close()
  })

  it('in-memory DBs report "memory" journal mode', () => {
    const db = openDatabase(':memory:')
    const result = db.pragma('journal_mode') as { journal_mode: string }[]
    expect(result[0]?.journal_mode).toBe('memory')
    db.close()
  })

  it('creates the parent directory and enables WAL for file DBs', () => {
    tmp = mkdtempSync(join(tmpdir(), 'sectionbase-db-'))
    const path = join(tmp, 'nested', 'sections.db')

    const db = openDatabase(path)
    const result = db.pragma('journal_mode') as { journal_mode: string }[]

    expect(existsSync(path)).toBe(true)
    expect(result[0]?.journal_mode).toBe('wal')
    db.close()
  })

  it('records the latest schema version', () => {
    const db = openDatabase(':memory:')
    const version = db
      .prepare('SELECT MAX(version) as version FROM schema_version')
      .get() as { version: number }

    expect(version.version).toBe(LATEST_SCHEMA_VERSION)
    expect(LATEST_SCHEMA_VERSION).toBe(3)
    db.close()
  })

  it('running migrations again is a no-op', () => {
    const db = openDatabase(':memory:')
    expect(() => runMigrations(db)).not.toThrow()

    const rows = db.prepare('SELECT version FROM schema_version ORDER BY version').all() as { version: number }[]
    expect(rows.map(r => r.version)).toEqual([1, 2, 3])
    db.close()
  })

  it('enforces one chunk per (collection, section, index)', () => {
    const db = openDatabase(':memory:')
    const insert = db.prepare(`
      INSERT INTO section_chunks (id, collection, section_id, chunk_index, content, content_hash,
        section_content_hash, char_count, model_name, dimensions, embedding, created_at)
      VALUES (?, 'c', 's', 0, 'x', 'h', 'h', 1, 'm', 1, ?, '2024-01-01T00:00:00.000Z')
    `)
    insert.run('a', Buffer.alloc(4))
    expect(() => insert.run('b', Buffer.alloc(4))).toThrow(/UNIQUE/)
    db.close()
  })
})
