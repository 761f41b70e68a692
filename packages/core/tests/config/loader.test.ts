import { describe, it, expect } from 'vitest'
import { loadConfig, parseConfig, configFromEnv } from '../../src/config/loader.js'

describe('loadConfig', () => {
  it('fills every default from an empty environment', () => {
    const result = loadConfig({})
    expect(result).toEqual({
      ok: true,
      value: {
        structuredStorePath: './.sectionbase/sections.db',
        vectorStorePath: './.sectionbase/vectors.db',
        collection: 'knowledge_base',
        chunking: { maxChunkChars: 500, overlapChars: 0 },
        search: { defaultResults: 5, maxResults: 100 },
        embedding: { provider: 'ollama' },
      },
    })
  })

  it('applies environment overrides', () => {
    const result = loadConfig({
      SECTIONBASE_STRUCTURED_STORE_PATH: '/data/sections.db',
      SECTIONBASE_VECTOR_STORE_PATH: '/data/vectors.db',
      SECTIONBASE_COLLECTION: ' reports ',
      SECTIONBASE_CHUNK_SIZE: '800',
      SECTIONBASE_CHUNK_OVERLAP: '100',
      SECTIONBASE_SEARCH_RESULTS: '10',
      SECTIONBASE_EMBEDDING_PROVIDER: 'openai',
      SECTIONBASE_EMBEDDING_MODEL: 'text-embedding-3-large',
      SECTIONBASE_EMBEDDING_DIMENSIONS: '1024',
      OPENAI_API_KEY: 'test-secret',
    })

    expect(result.ok).toBe(true)
    if (!result.ok) return
    expect(result.value.structuredStorePath).toBe('/data/sections.db')
    expect(result.value.vectorStorePath).toBe('/data/vectors.db')
    expect(result.value.collection).toBe('reports')
    expect(result.value.chunking).toEqual({ maxChunkChars: 800, overlapChars: 100 })
    expect(result.value.search).toEqual({ defaultResults: 10, maxResults: 100 })
    expect(result.value.embedding).toEqual({
      provider: 'openai',
      model: 'text-embedding-3-large',
      dimensions: 1024,
      openaiApiKey: 'test-secret',
    })
  })

  it('ignores blank variables', () => {
    expect(configFromEnv({ SECTIONBASE_COLLECTION: '   ', OLLAMA_BASE_URL: '' })).toEqual({
      chunking: {},
      search: {},
      embedding: {},
    })
  })

  it('rejects a non-numeric chunk size', () => {
    const result = loadConfig({ SECTIONBASE_CHUNK_SIZE: 'big' })
    expect(result.ok).toBe(false)
    if (result.ok) return
    expect(result.error.code).toBe('VALIDATION_ERROR')
    expect(result.error.subject).toBe('chunking.maxChunkChars')
  })

  it('rejects an overlap as large as the chunk size', () => {
    const result = loadConfig({ SECTIONBASE_CHUNK_SIZE: '100', SECTIONBASE_CHUNK_OVERLAP: '100' })
    expect(!result.ok && result.error.subject).toBe('chunking.overlapChars')
  })

  it('rejects an unknown provider', () => {
    const result = loadConfig({ SECTIONBASE_EMBEDDING_PROVIDER: 'acme' })
    expect(!result.ok && result.error.subject).toBe('embedding.provider')
  })

  it('rejects a default result count above the maximum', () => {
    const result = loadConfig({ SECTIONBASE_SEARCH_RESULTS: '20', SECTIONBASE_SEARCH_MAX_RESULTS: '10' })
    expect(!result.ok && result.error.subject).toBe('search.defaultResults')
  })
})

describe('parseConfig', () => {
  it('validates an object given directly', () => {
    const result = parseConfig({ collection: '' })
    expect(!result.ok && result.error.message).toBe('Invalid configuration: collection: Collection name cannot be empty')
  })
})
