/**
 * Embedding providers.
 */

export { OllamaEmbeddingClient, normalizeOllamaUrl, DEFAULT_OLLAMA_URL } from './ollama.js'
export type { OllamaEmbeddingOptions } from './ollama.js'
export { OpenAIEmbeddingClient } from './openai.js'
export { createEmbeddingClient, DEFAULT_EMBEDDING_MODELS, DEFAULT_EMBEDDING_DIMENSIONS } from './factory.js'
