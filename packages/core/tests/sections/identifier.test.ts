import { describe, it, expect } from 'vitest'
import { classifyIdentifier } from '../../src/sections/identifier.js'

describe('classifyIdentifier', () => {
  it('recognises a UUID and lowercases it', () => {
    expect(classifyIdentifier('3F0C8A5E-1B2C-4D3E-8F9A-0B1C2D3E4F5A')).toEqual({
      kind: 'id',
      id: '3f0c8a5e-1b2c-4d3e-8f9a-0b1c2d3e4f5a',
    })
  })

  it('recognises dotted positions as a path', () => {
    expect(classifyIdentifier('1')).toEqual({ kind: 'path', path: '1', positions: [1] })
    expect(classifyIdentifier('1.2.10')).toEqual({ kind: 'path', path: '1.2.10', positions: [1, 2, 10] })
  })

  it('keeps zero positions for the resolver to reject', () => {
    expect(classifyIdentifier('0.1')).toEqual({ kind: 'path', path: '0.1', positions: [0, 1] })
  })

  it('treats a numeric-only name as a path, not a slug', () => {
    expect(classifyIdentifier('2024').kind).toBe('path')
  })

  it('splits slash-separated slugs into a slug path', () => {
    expect(classifyIdentifier('annual-report/revenue')).toEqual({
      kind: 'slugPath',
      slugs: ['annual-report', 'revenue'],
    })
  })

  it('falls back to a single slug when only one part is left', () => {
    expect(classifyIdentifier('/revenue/')).toEqual({ kind: 'slug', slug: 'revenue' })
  })

  it('classifies anything else as a slug, trimmed', () => {
    expect(classifyIdentifier('  revenue-analysis ')).toEqual({ kind: 'slug', slug: 'revenue-analysis' })
    expect(classifyIdentifier('1.2a')).toEqual({ kind: 'slug', slug: '1.2a' })
  })

  it('prefers a UUID over the other shapes', () => {
    const id = '00000000-0000-4000-8000-000000000000'
    expect(classifyIdentifier(id).kind).toBe('id')
  })
})
