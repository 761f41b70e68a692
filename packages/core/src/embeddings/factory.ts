/**
 * Embedding client factory: builds a provider client from configuration.
 * Throws if required fields are missing (e.g., apiKey for OpenAI).
 */

import type { EmbeddingClient } from '../vectors/embedding-client.js'
import type { EmbeddingConfig, EmbeddingProviderName } from '../config/schemas.js'
import { OllamaEmbeddingClient } from './ollama.js'
import { OpenAIEmbeddingClient } from './openai.js'

export const DEFAULT_EMBEDDING_MODELS: Record<EmbeddingProviderName, string> = {
  ollama: 'nomic-embed-text',
  openai: 'text-embedding-3-small',
}

export const DEFAULT_EMBEDDING_DIMENSIONS: Record<EmbeddingProviderName, number> = {
  ollama: 768,
  openai: 1536,
}

export function createEmbeddingClient(config: EmbeddingConfig): EmbeddingClient {
  const model = config.model ?? DEFAULT_EMBEDDING_MODELS[config.provider]

  switch (config.provider) {
    case 'openai': {
      if (!config.openaiApiKey) throw new Error('OpenAI API key is required for OpenAI embeddings')
      return new OpenAIEmbeddingClient({ apiKey: config.openaiApiKey, model, dimensions: config.dimensions })
    }
    case 'ollama': {
      return new OllamaEmbeddingClient({
        model,
        baseUrl: config.ollamaBaseUrl,
        dimensions: config.dimensions ?? DEFAULT_EMBEDDING_DIMENSIONS.ollama,
      })
    }
  }
}
