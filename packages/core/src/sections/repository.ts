/**
 * Section repository: the structured store. CRUD over section rows, sibling
 * ordering and parent/child traversal, scoped to one collection.
 * Follows the repository pattern: constructor(db), methods return Result<T>.
 *
 * Sibling `sort_order` values are kept compact (0..n-1) after every insert,
 * delete and move, so a section's 1-based path position is `sort_order + 1`.
 * Paths are still computed by ranking, never read back from a column.
 */

import type Database from 'better-sqlite3'
import { v4 as uuidv4 } from 'uuid'
import { Ok, Err, KnowledgeBaseError, describeError } from '../common/index.js'
import type { Result } from '../common/index.js'
import type { SectionRecord, NewSectionRecord, SectionFieldUpdate } from './schemas.js'

interface SectionRow {
  id: string
  collection: string
  parent_id: string | null
  header: string
  content: string
  slug: string | null
  sort_order: number
  created_at: string
  updated_at: string
}

const SECTION_COLUMNS = 'id, collection, parent_id, header, content, slug, sort_order, created_at, updated_at'
const SIBLING_ORDER = 'sort_order ASC, created_at ASC, id ASC'

function rowToRecord(row: SectionRow): SectionRecord {
  return {
    id: row.id,
    collection: row.collection,
    parentId: row.parent_id,
    header: row.header,
    content: row.content,
    slug: row.slug,
    order: row.sort_order,
    createdAt: row.created_at,
    updatedAt: row.updated_at,
  }
}

function storeError(action: string, err: unknown, subject?: string): KnowledgeBaseError {
  return KnowledgeBaseError.upstream(`Structured store ${action} failed: ${describeError(err)}`, subject)
}

export class SectionRepository {
  constructor(
    private db: Database.Database,
    readonly collection: string,
  ) {}

  insert(input: NewSectionRecord): Result<SectionRecord, KnowledgeBaseError> {
    const now = new Date().toISOString()
    const id = uuidv4()

    try {
      if (input.parentId !== null && !this.getRow(input.parentId)) {
        return Err(KnowledgeBaseError.notFound('Parent section', input.parentId))
      }

      const record = this.db.transaction((): SectionRecord => {
        const siblings = this.childIds(input.parentId)
        const order = input.position === undefined || input.position > siblings.length
          ? siblings.length
          : input.position

        this.db
          .prepare(`INSERT INTO sections (${SECTION_COLUMNS}) VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?)`)
          .run(id, this.collection, input.parentId, input.header, input.content, input.slug, order, now, now)

        siblings.splice(order, 0, id)
        this.writeOrder(siblings)

        return {
          id,
          collection: this.collection,
          parentId: input.parentId,
          header: input.header,
          content: input.content,
          slug: input.slug,
          order,
          createdAt: now,
          updatedAt: now,
        }
      })()

      return Ok(record)
    } catch (err) {
      return Err(storeError('insert', err))
    }
  }

  findById(id: string): Result<SectionRecord, KnowledgeBaseError> {
    try {
      const row = this.getRow(id)
      if (!row) return Err(KnowledgeBaseError.notFound('Section', id))
      return Ok(rowToRecord(row))
    } catch (err) {
      return Err(storeError('lookup', err, id))
    }
  }

  /** Every section in the collection carrying `slug`. More than one means the slug is ambiguous. */
  findBySlug(slug: string): Result<SectionRecord[], KnowledgeBaseError> {
    try {
      const rows = this.db
        .prepare(`SELECT ${SECTION_COLUMNS} FROM sections WHERE collection = ? AND slug = ? ORDER BY created_at ASC`)
        .all(this.collection, slug) as SectionRow[]
      return Ok(rows.map(rowToRecord))
    } catch (err) {
      return Err(storeError('slug lookup', err, slug))
    }
  }

  findChildBySlug(parentId: string | null, slug: string): Result<SectionRecord | null, KnowledgeBaseError> {
    try {
      const row = this.db
        .prepare(`SELECT ${SECTION_COLUMNS} FROM sections WHERE collection = ? AND parent_id IS ? AND slug = ? ORDER BY ${SIBLING_ORDER} LIMIT 1`)
        .get(this.collection, parentId, slug) as SectionRow | undefined
      return Ok(row ? rowToRecord(row) : null)
    } catch (err) {
      return Err(storeError('slug lookup', err, slug))
    }
  }

  findByHeader(header: string): Result<SectionRecord[], KnowledgeBaseError> {
    try {
      const rows = this.db
        .prepare(`SELECT ${SECTION_COLUMNS} FROM sections WHERE collection = ? AND header = ? ORDER BY created_at ASC, id ASC`)
        .all(this.collection, header) as SectionRow[]
      return Ok(rows.map(rowToRecord))
    } catch (err) {
      return Err(storeError('header lookup', err, header))
    }
  }

  /** Direct children of `parentId` in sibling order; roots when `parentId` is null. */
  findChildren(parentId: string | null): Result<SectionRecord[], KnowledgeBaseError> {
    try {
      const rows = this.db
        .prepare(`SELECT ${SECTION_COLUMNS} FROM sections WHERE collection = ? AND parent_id IS ? ORDER BY ${SIBLING_ORDER}`)
        .all(this.collection, parentId) as SectionRow[]
      return Ok(rows.map(rowToRecord))
    } catch (err) {
      return Err(storeError('children lookup', err, parentId ?? undefined))
    }
  }

  listAll(): Result<SectionRecord[], KnowledgeBaseError> {
    try {
      const rows = this.db
        .prepare(`SELECT ${SECTION_COLUMNS} FROM sections WHERE collection = ? ORDER BY created_at ASC, id ASC`)
        .all(this.collection) as SectionRow[]
      return Ok(rows.map(rowToRecord))
    } catch (err) {
      return Err(storeError('listing', err))
    }
  }

  /** Walk 1-based sibling positions down from the roots. */
  findByPath(positions: number[]): Result<SectionRecord, KnowledgeBaseError> {
    const path = positions.join('.')
    try {
      let parentId: string | null = null
      let current: SectionRow | undefined

      for (const position of positions) {
        // OFFSET must stay an integer SQLite can bind
        if (!Number.isSafeInteger(position) || position < 1) {
          return Err(KnowledgeBaseError.notFound('Section at path', path))
        }
        current = this.db
          .prepare(`SELECT ${SECTION_COLUMNS} FROM sections WHERE collection = ? AND parent_id IS ? ORDER BY ${SIBLING_ORDER} LIMIT 1 OFFSET ?`)
          .get(this.collection, parentId, position - 1) as SectionRow | undefined
        if (!current) return Err(KnowledgeBaseError.notFound('Section at path', path))
        parentId = current.id
      }

      if (!current) return Err(KnowledgeBaseError.notFound('Section at path', path))
      return Ok(rowToRecord(current))
    } catch (err) {
      return Err(storeError('path lookup', err, path))
    }
  }

  /** Walk a chain of slugs down from the roots, one sibling scope per step. */
  findBySlugPath(slugs: string[]): Result<SectionRecord, KnowledgeBaseError> {
    const slugPath = slugs.join('/')
    let parentId: string | null = null
    let current: SectionRecord | null = null

    for (const slug of slugs) {
      const child = this.findChildBySlug(parentId, slug)
      if (!child.ok) return child
      if (!child.value) return Err(KnowledgeBaseError.notFound('Section at slug path', slugPath))
      current = child.value
      parentId = current.id
    }

    if (!current) return Err(KnowledgeBaseError.notFound('Section at slug path', slugPath))
    return Ok(current)
  }

  /**
   * Dotted path of a section: each ancestor's 1-based rank among its siblings,
   * root first. Recomputed on every call.
   */
  computePath(id: string): Result<string, KnowledgeBaseError> {
    try {
      const positions: number[] = []
      const seen = new Set<string>()
      let current = this.getRow(id)
      if (!current) return Err(KnowledgeBaseError.notFound('Section', id))

      while (current) {
        if (seen.has(current.id)) {
          return Err(KnowledgeBaseError.invalidOperation(`Cycle in ancestor chain of section ${id}`, id))
        }
        seen.add(current.id)
        positions.unshift(this.rank(current))

        if (current.parent_id === null) break
        const parentId: string = current.parent_id
        current = this.getRow(parentId)
        if (!current) {
          return Err(KnowledgeBaseError.upstream(`Section ${id} has a missing ancestor ${parentId}`, id))
        }
      }

      return Ok(positions.join('.'))
    } catch (err) {
      return Err(storeError('path computation', err, id))
    }
  }

  /** Ids of the ancestors of `id`, nearest first. */
  ancestorIds(id: string): Result<string[], KnowledgeBaseError> {
    try {
      const ancestors: string[] = []
      let current = this.getRow(id)
      if (!current) return Err(KnowledgeBaseError.notFound('Section', id))

      while (current && current.parent_id !== null) {
        if (ancestors.includes(current.parent_id) || current.parent_id === id) {
          return Err(KnowledgeBaseError.invalidOperation(`Cycle in ancestor chain of section ${id}`, id))
        }
        ancestors.push(current.parent_id)
        current = this.getRow(current.parent_id)
      }

      return Ok(ancestors)
    } catch (err) {
      return Err(storeError('ancestor walk', err, id))
    }
  }

  /** Ids of `id` and all its descendants, depth-first in sibling order, root first. */
  collectSubtree(id: string): Result<string[], KnowledgeBaseError> {
    try {
      if (!this.getRow(id)) return Err(KnowledgeBaseError.notFound('Section', id))

      const ordered: string[] = []
      const seen = new Set<string>()
      const stack = [id]

      while (stack.length > 0) {
        const current = stack.pop()
        if (current === undefined || seen.has(current)) continue
        seen.add(current)
        ordered.push(current)
        stack.push(...this.childIds(current).reverse())
      }

      return Ok(ordered)
    } catch (err) {
      return Err(storeError('subtree walk', err, id))
    }
  }

  isSlugTaken(parentId: string | null, slug: string, exceptId?: string): Result<boolean, KnowledgeBaseError> {
    try {
      const row = this.db
        .prepare('SELECT id FROM sections WHERE collection = ? AND parent_id IS ? AND slug = ? AND id IS NOT ? LIMIT 1')
        .get(this.collection, parentId, slug, exceptId ?? null) as { id: string } | undefined
      return Ok(row !== undefined)
    } catch (err) {
      return Err(storeError('slug check', err, slug))
    }
  }

  updateFields(id: string, fields: SectionFieldUpdate): Result<SectionRecord, KnowledgeBaseError> {
    const existing = this.findById(id)
    if (!existing.ok) return existing

    const now = new Date().toISOString()
    const updated: SectionRecord = {
      ...existing.value,
      header: fields.header ?? existing.value.header,
      content: fields.content ?? existing.value.content,
      slug: fields.slug === undefined ? existing.value.slug : fields.slug,
      updatedAt: now,
    }

    try {
      this.db
        .prepare('UPDATE sections SET header = ?, content = ?, slug = ?, updated_at = ? WHERE id = ? AND collection = ?')
        .run(updated.header, updated.content, updated.slug, now, id, this.collection)
      return Ok(updated)
    } catch (err) {
      return Err(storeError('update', err, id))
    }
  }

  /** Delete a leaf section. Fails with INVALID_OPERATION when it still has children. */
  deleteById(id: string): Result<string[], KnowledgeBaseError> {
    const existing = this.findById(id)
    if (!existing.ok) return existing

    try {
      if (this.childIds(id).length > 0) {
        return Err(KnowledgeBaseError.invalidOperation(
          `Section ${id} has children; delete it recursively to remove them`,
          id,
        ))
      }

      const parentId = existing.value.parentId
      this.db.transaction(() => {
        this.db.prepare('DELETE FROM sections WHERE id = ? AND collection = ?').run(id, this.collection)
        this.writeOrder(this.childIds(parentId))
      })()

      return Ok([id])
    } catch (err) {
      return Err(storeError('delete', err, id))
    }
  }

  /** Delete a section and every descendant in one transaction. Returns the deleted ids, root first. */
  deleteSubtree(id: string): Result<string[], KnowledgeBaseError> {
    const existing = this.findById(id)
    if (!existing.ok) return existing

    const subtree = this.collectSubtree(id)
    if (!subtree.ok) return subtree

    const parentId = existing.value.parentId
    const deletedIds = subtree.value

    try {
      this.db.transaction(() => {
        const stmt = this.db.prepare('DELETE FROM sections WHERE id = ? AND collection = ?')
        for (const sectionId of deletedIds) {
          stmt.run(sectionId, this.collection)
        }
        this.writeOrder(this.childIds(parentId))
      })()

      return Ok(deletedIds)
    } catch (err) {
      return Err(storeError('subtree delete', err, id))
    }
  }

  /**
   * Re-parent a section (null = make it a root) and place it at `position`
   * among its new siblings. The section may not end up under itself.
   */
  move(id: string, newParentId: string | null, position?: number): Result<SectionRecord, KnowledgeBaseError> {
    const existing = this.findById(id)
    if (!existing.ok) return existing

    if (newParentId !== null) {
      if (newParentId === id) {
        return Err(KnowledgeBaseError.invalidOperation(`Section ${id} cannot be its own parent`, id))
      }
      const parent = this.findById(newParentId)
      if (!parent.ok) return parent

      const ancestors = this.ancestorIds(newParentId)
      if (!ancestors.ok) return ancestors
      if (ancestors.value.includes(id)) {
        return Err(KnowledgeBaseError.invalidOperation(
          `Section ${id} cannot move under its own descendant ${newParentId}`,
          id,
        ))
      }
    }

    const oldParentId = existing.value.parentId
    const slug = existing.value.slug
    if (slug !== null && oldParentId !== newParentId) {
      const taken = this.isSlugTaken(newParentId, slug, id)
      if (!taken.ok) return taken
      if (taken.value) {
        return Err(KnowledgeBaseError.conflict(`Slug "${slug}" is already used by a sibling at the destination`, slug))
      }
    }

    try {
      this.db.transaction(() => {
        if (oldParentId !== newParentId) {
          this.writeOrder(this.childIds(oldParentId).filter(siblingId => siblingId !== id))
        }

        const siblings = this.childIds(newParentId).filter(siblingId => siblingId !== id)
        const order = position === undefined || position > siblings.length ? siblings.length : position
        siblings.splice(order, 0, id)

        this.db
          .prepare('UPDATE sections SET parent_id = ?, updated_at = ? WHERE id = ? AND collection = ?')
          .run(newParentId, new Date().toISOString(), id, this.collection)
        this.writeOrder(siblings)
      })()
    } catch (err) {
      return Err(storeError('move', err, id))
    }

    return this.findById(id)
  }

  private getRow(id: string): SectionRow | undefined {
    return this.db
      .prepare(`SELECT ${SECTION_COLUMNS} FROM sections WHERE id = ? AND collection = ?`)
      .get(id, this.collection) as SectionRow | undefined
  }

  private childIds(parentId: string | null): string[] {
    const rows = this.db
      .prepare(`SELECT id FROM sections WHERE collection = ? AND parent_id IS ? ORDER BY ${SIBLING_ORDER}`)
      .all(this.collection, parentId) as Array<{ id: string }>
    return rows.map(row => row.id)
  }

  /** 1-based position of a row among its siblings. */
  private rank(row: SectionRow): number {
    const result = this.db
      .prepare(`
        SELECT COUNT(*) as count FROM sections
        WHERE collection = ? AND parent_id IS ?
        AND (
          sort_order < ?
          OR (sort_order = ? AND created_at < ?)
          OR (sort_order = ? AND created_at = ? AND id < ?)
        )
      `)
      .get(
        this.collection,
        row.parent_id,
        row.sort_order,
        row.sort_order,
        row.created_at,
        row.sort_order,
        row.created_at,
        row.id,
      ) as { count: number }
    return result.count + 1
  }

  private writeOrder(orderedIds: string[]): void {
    const stmt = this.db.prepare('UPDATE sections SET sort_order = ? WHERE id = ?')
    orderedIds.forEach((sectionId, i) => stmt.run(i, sectionId))
  }
}
