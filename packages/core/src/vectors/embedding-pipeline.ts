/**
 * Embedding pipeline: turns a section's chunks into embedded chunks via a
 * provided client. No persistence; the chunk repository does the write.
 */

import { Ok, Err, KnowledgeBaseError, describeError } from '../common/index.js'
import type { Result } from '../common/index.js'
import type { EmbeddingClient } from './embedding-client.js'
import type { EmbeddedChunk, SectionChunkData } from './schemas.js'
import { l2Normalize } from './vector-search.js'

const EMBED_BATCH_SIZE = 50
const EMBED_BATCH_CHARS = 100_000

/** Split texts into batches of at most EMBED_BATCH_SIZE items and EMBED_BATCH_CHARS characters. */
export function planBatches(texts: string[]): Array<[start: number, end: number]> {
  const batches: Array<[number, number]> = []

  let batchStart = 0
  while (batchStart < texts.length) {
    let batchEnd = batchStart
    let batchChars = 0
    while (batchEnd < texts.length && batchEnd - batchStart < EMBED_BATCH_SIZE) {
      const chunkChars = texts[batchEnd].length
      if (batchChars + chunkChars > EMBED_BATCH_CHARS && batchEnd > batchStart) break
      batchChars += chunkChars
      batchEnd++
    }
    batches.push([batchStart, batchEnd])
    batchStart = batchEnd
  }

  return batches
}

/**
 * Send `texts` through `request` one planned batch at a time. Provider clients
 * supply only the transport; the vectors come back unit-length, in input order.
 */
export async function embedInBatches(
  provider: string,
  texts: string[],
  request: (batch: string[]) => Promise<number[][]>,
): Promise<number[][]> {
  const vectors: number[][] = []
  for (const [start, end] of planBatches(texts)) {
    const batch = await request(texts.slice(start, end))
    if (batch.length !== end - start) {
      throw new Error(`${provider} returned ${batch.length} embeddings for ${end - start} inputs`)
    }
    vectors.push(...batch.map(l2Normalize))
  }
  return vectors
}

export async function embedChunks(
  chunks: SectionChunkData[],
  client: EmbeddingClient,
  sectionContentHash: string,
): Promise<Result<EmbeddedChunk[], KnowledgeBaseError>> {
  if (chunks.length === 0) return Ok([])

  const texts = chunks.map(c => c.text)
  const embedded: EmbeddedChunk[] = []

  for (const [start, end] of planBatches(texts)) {
    let vectors: number[][]
    try {
      const result = await client.embed(texts.slice(start, end))
      vectors = result.embeddings
    } catch (err) {
      return Err(KnowledgeBaseError.upstream(`Embedding provider ${client.modelName} failed: ${describeError(err)}`))
    }

    if (vectors.length !== end - start) {
      return Err(KnowledgeBaseError.upstream(
        `Embedding provider ${client.modelName} returned ${vectors.length} vectors for ${end - start} texts`,
      ))
    }

    vectors.forEach((embedding, offset) => {
      const chunk = chunks[start + offset]
      embedded.push({
        ...chunk,
        embedding,
        sectionContentHash,
        modelName: client.modelName,
        providerFingerprint: client.providerFingerprint,
        dimensions: embedding.length,
      })
    })
  }

  return Ok(embedded)
}
