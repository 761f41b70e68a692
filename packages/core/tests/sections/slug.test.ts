import { describe, it, expect } from 'vitest'
import { slugify } from '../../src/sections/slug.js'

describe('slugify', () => {
  it('lowercases and dashes words', () => {
    expect(slugify('Revenue Analysis')).toBe('revenue-analysis')
    expect(slugify('Annual Report 2024')).toBe('annual-report-2024')
  })

  it('folds diacritics and drops punctuation', () => {
    expect(slugify('Café Olé!')).toBe('cafe-ole')
    expect(slugify('Q&A: $100M')).toBe('qa-100m')
  })

  it('collapses separators and trims dashes', () => {
    expect(slugify('  __Hello__World  ')).toBe('hello-world')
    expect(slugify('a - b -- c')).toBe('a-b-c')
  })

  it('returns an empty string when nothing survives', () => {
    expect(slugify('!!!')).toBe('')
    expect(slugify('')).toBe('')
  })
})
