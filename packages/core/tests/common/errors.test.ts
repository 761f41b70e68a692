import { describe, it, expect } from 'vitest'
import { z } from 'zod'
import { KnowledgeBaseError, describeError, validationError } from '../../src/common/index.js'

describe('KnowledgeBaseError', () => {
  it('notFound names the entity and carries the identifier as subject', () => {
    const err = KnowledgeBaseError.notFound('Section', '1.2')
    expect(err).toBeInstanceOf(Error)
    expect(err.name).toBe('KnowledgeBaseError')
    expect(err.code).toBe('NOT_FOUND')
    expect(err.message).toBe('Section not found: 1.2')
    expect(err.subject).toBe('1.2')
  })

  it('factories set their codes', () => {
    expect(KnowledgeBaseError.conflict('x').code).toBe('CONFLICT')
    expect(KnowledgeBaseError.invalidOperation('x').code).toBe('INVALID_OPERATION')
    expect(KnowledgeBaseError.upstream('x', 'abc').code).toBe('UPSTREAM_FAILURE')
    expect(KnowledgeBaseError.validation('x').code).toBe('VALIDATION_ERROR')
    expect(KnowledgeBaseError.io('x').code).toBe('IO_ERROR')
  })

  it('subject is undefined unless given', () => {
    expect(KnowledgeBaseError.conflict('x').subject).toBeUndefined()
    expect(KnowledgeBaseError.upstream('x', 'abc').subject).toBe('abc')
  })
})

describe('describeError', () => {
  it('uses the message of an Error', () => {
    expect(describeError(new Error('disk full'))).toBe('disk full')
  })

  it('stringifies anything else', () => {
    expect(describeError(42)).toBe('42')
  })
})

describe('validationError', () => {
  it('lists every issue and names the first field', () => {
    const schema = z.object({ header: z.string().min(1, 'Header is required'), position: z.number() })
    const parsed = schema.safeParse({ header: '', position: 'x' })
    expect(parsed.success).toBe(false)
    if (parsed.success) return

    const err = validationError(parsed.error, 'Invalid section')
    expect(err.code).toBe('VALIDATION_ERROR')
    expect(err.subject).toBe('header')
    expect(err.message).toBe('Invalid section: header: Header is required; position: Expected number, received string')
  })

  it('leaves subject undefined for a root-level issue', () => {
    const parsed = z.string().safeParse(1)
    if (parsed.success) return
    const err = validationError(parsed.error)
    expect(err.subject).toBeUndefined()
    expect(err.message).toBe('Invalid input: Expected string, received number')
  })
})
