/**
 * Embedding client interface: provider-agnostic contract for vector embeddings.
 * Concrete implementations live in ../embeddings/ (Ollama, OpenAI).
 */

export interface EmbeddingClient {
  /** Embed one or more texts into vectors, one per input, in input order. */
  embed(texts: string[]): Promise<EmbedResult>
  readonly modelName: string
  readonly dimensions: number
  /** Detects silent model changes. Format: "${provider}:${model}:${version}" */
  readonly providerFingerprint: string
}

export interface EmbedResult {
  /** Each vector already L2-normalized by the client. */
  embeddings: number[][]
}
