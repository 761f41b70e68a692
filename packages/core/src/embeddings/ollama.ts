/**
 * Ollama embedding client: calls /api/embed for local vector embeddings.
 */

import type { EmbeddingClient, EmbedResult } from '../vectors/embedding-client.js'
import { embedInBatches } from '../vectors/embedding-pipeline.js'

const TIMEOUT_MS = 30_000

export const DEFAULT_OLLAMA_URL = 'http://localhost:11434'

export function normalizeOllamaUrl(url: string): string {
  let normalized = url.trim().replace(/\/+$/, '')
  // Strip /v1 suffix if accidentally included
  if (normalized.endsWith('/v1')) {
    normalized = normalized.slice(0, -3)
  }
  if (!normalized.startsWith('http://') && !normalized.startsWith('https://')) {
    throw new Error(`Ollama URL must start with http:// or https://, got: ${normalized}`)
  }
  return normalized
}

export interface OllamaEmbeddingOptions {
  model: string
  baseUrl?: string
  dimensions: number
  providerFingerprint?: string
}

export class OllamaEmbeddingClient implements EmbeddingClient {
  readonly modelName: string
  readonly providerFingerprint: string
  /** Follows the width of the vectors the server actually returns. */
  dimensions: number
  private readonly baseUrl: string

  constructor(options: OllamaEmbeddingOptions) {
    this.modelName = options.model
    this.baseUrl = normalizeOllamaUrl(options.baseUrl ?? DEFAULT_OLLAMA_URL)
    this.dimensions = options.dimensions
    this.providerFingerprint = options.providerFingerprint ?? `ollama:${options.model}:unknown`
  }

  async embed(texts: string[]): Promise<EmbedResult> {
    const embeddings = await embedInBatches('Ollama', texts, async input => {
      const { embeddings: batch } = await postEmbed(this.baseUrl, this.modelName, input)
      if (batch.length > 0) this.dimensions = batch[0].length
      return batch
    })
    return { embeddings }
  }

  /**
   * Create an OllamaEmbeddingClient after a smoke test that verifies the model is
   * pulled. Detects the actual dimensions from the first embed call.
   */
  static async create(options: { model: string; baseUrl?: string }): Promise<OllamaEmbeddingClient> {
    const baseUrl = normalizeOllamaUrl(options.baseUrl ?? DEFAULT_OLLAMA_URL)

    let data: OllamaEmbedResponse
    try {
      data = await postEmbed(baseUrl, options.model, ['test'])
    } catch (err) {
      throw new Error(
        `Ollama embedding model "${options.model}" not available. Try: ollama pull ${options.model}\n` +
        (err instanceof Error ? err.message : String(err)),
      )
    }

    const first = data.embeddings[0]
    if (!first) {
      throw new Error(`Ollama returned empty embeddings for model "${options.model}"`)
    }

    return new OllamaEmbeddingClient({
      model: options.model,
      baseUrl,
      dimensions: first.length,
      providerFingerprint: `ollama:${options.model}:${await readModelDigest(baseUrl, options.model) ?? 'unknown'}`,
    })
  }
}

/** First 12 characters of the model digest from /api/show, or null when the server does not say. */
async function readModelDigest(baseUrl: string, model: string): Promise<string | null> {
  try {
    const response = await fetch(`${baseUrl}/api/show`, {
      method: 'POST',
      headers: { 'Content-Type': 'application/json' },
      body: JSON.stringify({ name: model }),
    })
    if (!response.ok) return null
    const data = await response.json() as { digest?: string }
    return data.digest ? data.digest.slice(0, 12) : null
  } catch (err) {
    console.warn(`[embedding] could not read Ollama model digest: ${err instanceof Error ? err.message : String(err)}`)
    return null
  }
}

interface OllamaEmbedResponse {
  embeddings: number[][]
}

async function postEmbed(baseUrl: string, model: string, input: string[]): Promise<OllamaEmbedResponse> {
  const controller = new AbortController()
  const timeout = setTimeout(() => controller.abort(), TIMEOUT_MS)

  try {
    const response = await fetch(`${baseUrl}/api/embed`, {
      method: 'POST',
      headers: { 'Content-Type': 'application/json' },
      body: JSON.stringify({ model, input }),
      signal: controller.signal,
    })

    if (!response.ok) {
      const body = await response.text().catch(() => '')
      throw new Error(`Ollama embed failed (${response.status}): ${body.slice(0, 200)}`)
    }

    const data = await response.json() as Partial<OllamaEmbedResponse>
    if (!data.embeddings || !Array.isArray(data.embeddings)) {
      throw new Error('Ollama embed response missing embeddings array')
    }

    return { embeddings: data.embeddings }
  } finally {
    clearTimeout(timeout)
  }
}
