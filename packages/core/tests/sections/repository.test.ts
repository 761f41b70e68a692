import { describe, it, expect, beforeEach } from 'vitest'
import type Database from 'better-sqlite3'
import { openDatabase } from '../../src/storage/index.js'
import { SectionRepository } from '../../src/sections/repository.js'
import type { SectionRecord, NewSectionRecord } from '../../src/sections/schemas.js'

describe('SectionRepository', () => {
  let db: Database.Database
  let repo: SectionRepository

  beforeEach(() => {
    db = openDatabase(':memory:')
    repo = new SectionRepository(db, 'test')
  })

  function insert(header: string, overrides: Partial<NewSectionRecord> = {}): SectionRecord {
    const result = repo.insert({ parentId: null, header, content: '', slug: null, ...overrides })
    if (!result.ok) throw result.error
    return result.value
  }

  function childHeaders(parentId: string | null): string[] {
    const result = repo.findChildren(parentId)
    if (!result.ok) throw result.error
    return result.value.map(r => r.header)
  }

  function pathOf(id: string): string {
    const result = repo.computePath(id)
    if (!result.ok) throw result.error
    return result.value
  }

  describe('insert', () => {
    it('assigns id, order and timestamps', () => {
      const record = insert('Intro', { content: 'Hello', slug: 'intro' })

      expect(record.id).toMatch(/^[0-9a-f-]{36}$/)
      expect(record.collection).toBe('test')
      expect(record.parentId).toBeNull()
      expect(record.order).toBe(0)
      expect(record.createdAt).toBe(record.updatedAt)

      const found = repo.findById(record.id)
      expect(found).toEqual({ ok: true, value: record })
    })

    it('appends siblings in insertion order', () => {
      insert('A')
      insert('B')
      insert('C')
      expect(childHeaders(null)).toEqual(['A', 'B', 'C'])
    })

    it('inserts at a position and shifts later siblings', () => {
      const a = insert('A')
      const b = insert('B')
      const first = insert('First', { position: 0 })

      expect(childHeaders(null)).toEqual(['First', 'A', 'B'])
      expect(pathOf(first.id)).toBe('1')
      expect(pathOf(a.id)).toBe('2')
      expect(pathOf(b.id)).toBe('3')
    })

    it('appends when position is past the end', () => {
      insert('A')
      insert('B', { position: 10 })
      expect(childHeaders(null)).toEqual(['A', 'B'])
    })

    it('rejects a missing parent', () => {
      const result = repo.insert({
        parentId: '00000000-0000-4000-8000-000000000000',
        header: 'Orphan',
        content: '',
        slug: null,
      })
      expect(result.ok).toBe(false)
      if (result.ok) return
      expect(result.error.code).toBe('NOT_FOUND')
    })
  })

  describe('lookups', () => {
    it('findById reports NOT_FOUND for an unknown id', () => {
      const result = repo.findById('00000000-0000-4000-8000-000000000000')
      expect(result.ok).toBe(false)
      if (result.ok) return
      expect(result.error.code).toBe('NOT_FOUND')
      expect(result.error.subject).toBe('00000000-0000-4000-8000-000000000000')
    })

    it('findBySlug returns every match in the collection', () => {
      const a = insert('A')
      const b = insert('B')
      insert('Notes', { parentId: a.id, slug: 'notes' })
      insert('Notes', { parentId: b.id, slug: 'notes' })

      const result = repo.findBySlug('notes')
      expect(result.ok && result.value.length).toBe(2)
    })

    it('findByPath walks 1-based positions', () => {
      const root = insert('Root')
      insert('First child', { parentId: root.id })
      const second = insert('Second child', { parentId: root.id })

      const result = repo.findByPath([1, 2])
      expect(result.ok && result.value.id).toBe(second.id)
    })

    it('findByPath rejects zero and out-of-range positions', () => {
      insert('Root')
      for (const positions of [[0], [2], [1, 1]]) {
        const result = repo.findByPath(positions)
        expect(result.ok).toBe(false)
        if (result.ok) continue
        expect(result.error.code).toBe('NOT_FOUND')
        expect(result.error.message).toBe(`Section at path not found: ${positions.join('.')}`)
      }
    })

    it('findByPath reports positions beyond the integer range as NOT_FOUND', () => {
      insert('Root')
      for (const positions of [[1e20], [1, 1e20], [Number.MAX_SAFE_INTEGER + 1]]) {
        const result = repo.findByPath(positions)
        expect(result.ok).toBe(false)
        if (result.ok) continue
        expect(result.error.code).toBe('NOT_FOUND')
      }
    })

    it('findBySlugPath resolves one sibling scope per step', () => {
      const a = insert('A', { slug: 'a' })
      const b = insert('B', { slug: 'b' })
      insert('Notes', { parentId: a.id, slug: 'notes' })
      const bNotes = insert('Notes', { parentId: b.id, slug: 'notes' })

      const result = repo.findBySlugPath(['b', 'notes'])
      expect(result.ok && result.value.id).toBe(bNotes.id)

      const missing = repo.findBySlugPath(['a', 'missing'])
      expect(missing.ok).toBe(false)
    })

    it('findByHeader matches exactly', () => {
      insert('Revenue')
      insert('Revenue Analysis')
      const result = repo.findByHeader('Revenue')
      expect(result.ok && result.value.map(r => r.header)).toEqual(['Revenue'])
    })

    it('scopes everything to the collection', () => {
      insert('Mine', { slug: 'mine' })
      const other = new SectionRepository(db, 'other')

      expect(other.listAll()).toEqual({ ok: true, value: [] })
      expect(other.findBySlug('mine')).toEqual({ ok: true, value: [] })
      const inOther = other.insert({ parentId: null, header: 'Theirs', content: '', slug: null })
      expect(inOther.ok && inOther.value.order).toBe(0)
    })
  })

  describe('computePath', () => {
    it('ranks each ancestor among its siblings', () => {
      insert('One')
      const two = insert('Two')
      insert('Two.One', { parentId: two.id })
      const twoTwo = insert('Two.Two', { parentId: two.id })
      const leaf = insert('Leaf', { parentId: twoTwo.id })

      expect(pathOf(leaf.id)).toBe('2.2.1')
    })
  })

  describe('collectSubtree and ancestorIds', () => {
    it('lists the subtree depth-first in sibling order, root first', () => {
      const root = insert('Root')
      const a = insert('A', { parentId: root.id })
      const b = insert('B', { parentId: root.id })
      const a1 = insert('A1', { parentId: a.id })

      expect(repo.collectSubtree(root.id)).toEqual({ ok: true, value: [root.id, a.id, a1.id, b.id] })
      expect(repo.ancestorIds(a1.id)).toEqual({ ok: true, value: [a.id, root.id] })
    })
  })

  describe('isSlugTaken', () => {
    it('checks the sibling scope only', () => {
      const a = insert('A')
      const child = insert('Child', { parentId: a.id, slug: 'child' })

      expect(repo.isSlugTaken(a.id, 'child')).toEqual({ ok: true, value: true })
      expect(repo.isSlugTaken(null, 'child')).toEqual({ ok: true, value: false })
      expect(repo.isSlugTaken(a.id, 'child', child.id)).toEqual({ ok: true, value: false })
    })
  })

  describe('updateFields', () => {
    it('changes only the given fields', () => {
      const record = insert('Old', { content: 'body', slug: 'old' })
      const result = repo.updateFields(record.id, { header: 'New' })

      expect(result.ok).toBe(true)
      if (!result.ok) return
      expect(result.value.header).toBe('New')
      expect(result.value.content).toBe('body')
      expect(result.value.slug).toBe('old')

      const reread = repo.findById(record.id)
      expect(reread.ok && reread.value.header).toBe('New')
    })
  })

  describe('deleteById', () => {
    it('refuses a section with children and leaves the tree unchanged', () => {
      const root = insert('Root')
      insert('Child', { parentId: root.id })

      const result = repo.deleteById(root.id)
      expect(result.ok).toBe(false)
      if (result.ok) return
      expect(result.error.code).toBe('INVALID_OPERATION')
      expect(childHeaders(root.id)).toEqual(['Child'])
    })

    it('deletes a leaf and compacts its siblings', () => {
      insert('A')
      const b = insert('B')
      const c = insert('C')

      expect(repo.deleteById(b.id)).toEqual({ ok: true, value: [b.id] })
      expect(childHeaders(null)).toEqual(['A', 'C'])
      const reread = repo.findById(c.id)
      expect(reread.ok && reread.value.order).toBe(1)
      expect(pathOf(c.id)).toBe('2')
    })
  })

  describe('deleteSubtree', () => {
    it('removes the section and all descendants', () => {
      const root = insert('Root')
      const child = insert('Child', { parentId: root.id })
      const grandchild = insert('Grandchild', { parentId: child.id })
      const keep = insert('Keep')

      expect(repo.deleteSubtree(root.id)).toEqual({ ok: true, value: [root.id, child.id, grandchild.id] })
      expect(repo.findById(grandchild.id).ok).toBe(false)
      expect(pathOf(keep.id)).toBe('1')
    })
  })

  describe('move', () => {
    it('re-parents and places at a position', () => {
      const a = insert('A')
      const b = insert('B')
      insert('B1', { parentId: b.id })

      const result = repo.move(a.id, b.id, 0)
      expect(result.ok && result.value.parentId).toBe(b.id)
      expect(childHeaders(b.id)).toEqual(['A', 'B1'])
      expect(childHeaders(null)).toEqual(['B'])
      expect(pathOf(a.id)).toBe('1.1')
    })

    it('reorders within the same parent', () => {
      insert('A')
      insert('B')
      const c = insert('C')

      repo.move(c.id, null, 0)
      expect(childHeaders(null)).toEqual(['C', 'A', 'B'])
    })

    it('rejects moving under itself or a descendant', () => {
      const root = insert('Root')
      const child = insert('Child', { parentId: root.id })

      const self = repo.move(root.id, root.id)
      expect(!self.ok && self.error.code).toBe('INVALID_OPERATION')

      const cycle = repo.move(root.id, child.id)
      expect(!cycle.ok && cycle.error.code).toBe('INVALID_OPERATION')
      expect(pathOf(child.id)).toBe('1.1')
    })

    it('rejects a slug already used at the destination', () => {
      const a = insert('A')
      const b = insert('B')
      insert('Notes', { parentId: a.id, slug: 'notes' })
      const bNotes = insert('Notes', { parentId: b.id, slug: 'notes' })

      const result = repo.move(bNotes.id, a.id)
      expect(!result.ok && result.error.code).toBe('CONFLICT')
    })
  })
})
