import { describe, it, expect } from 'vitest'
import { createEmbeddingClient } from '../../src/embeddings/factory.js'
import { OllamaEmbeddingClient } from '../../src/embeddings/ollama.js'
import { OpenAIEmbeddingClient } from '../../src/embeddings/openai.js'

describe('createEmbeddingClient', () => {
  it('builds an Ollama client with the default model', () => {
    const client = createEmbeddingClient({ provider: 'ollama' })
    expect(client).toBeInstanceOf(OllamaEmbeddingClient)
    expect(client.modelName).toBe('nomic-embed-text')
    expect(client.dimensions).toBe(768)
  })

  it('builds an OpenAI client when a key is given', () => {
    const client = createEmbeddingClient({ provider: 'openai', openaiApiKey: 'test-secret', model: 'text-embedding-3-large' })
    expect(client).toBeInstanceOf(OpenAIEmbeddingClient)
    expect(client.modelName).toBe('text-embedding-3-large')
  })

  it('throws without an OpenAI key', () => {
    expect(() => createEmbeddingClient({ provider: 'openai' })).toThrow('OpenAI API key is required for OpenAI embeddings')
  })
})
