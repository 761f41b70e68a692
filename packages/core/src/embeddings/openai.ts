/**
 * OpenAI embedding client over the SDK's embeddings endpoint.
 */

import OpenAI from 'openai'
import type { EmbeddingClient, EmbedResult } from '../vectors/embedding-client.js'
import { embedInBatches } from '../vectors/embedding-pipeline.js'

export interface OpenAIEmbeddingOptions {
  apiKey: string
  model?: string
  /** Sent with each request only when set; older models reject the parameter. */
  dimensions?: number
}

export class OpenAIEmbeddingClient implements EmbeddingClient {
  readonly modelName: string
  readonly dimensions: number
  readonly providerFingerprint: string
  private readonly client: OpenAI
  private readonly shape: { dimensions?: number }

  constructor(options: OpenAIEmbeddingOptions) {
    this.modelName = options.model ?? 'text-embedding-3-small'
    this.dimensions = options.dimensions ?? 1536
    this.shape = options.dimensions === undefined ? {} : { dimensions: options.dimensions }
    this.providerFingerprint = `openai:${this.modelName}:${this.dimensions}`
    this.client = new OpenAI({ apiKey: options.apiKey })
  }

  async embed(texts: string[]): Promise<EmbedResult> {
    const embeddings = await embedInBatches('OpenAI', texts, async input => {
      const response = await this.client.embeddings.create({ model: this.modelName, input, ...this.shape })
      // items carry their input index and may arrive out of order
      return [...response.data].sort((a, b) => a.index - b.index).map(item => item.embedding)
    })
    return { embeddings }
  }
}
