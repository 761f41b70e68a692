/**
 * Zod schemas and types for the chunk/vector side of the knowledge base.
 */

import { z } from 'zod'

export const ChunkingOptionsSchema = z
  .object({
    maxChunkChars: z.number().int().positive().default(500),
    overlapChars: z.number().int().nonnegative().default(0),
  })
  .refine(data => data.overlapChars < data.maxChunkChars, {
    message: 'overlapChars must be smaller than maxChunkChars',
    path: ['overlapChars'],
  })

export type ChunkingOptions = z.infer<typeof ChunkingOptionsSchema>

/** One slice of a section's content, before embedding. */
export interface SectionChunkData {
  chunkIndex: number
  text: string
  contentHash: string
  charCount: number
}

/** A chunk with its vector, ready for the vector store. */
export interface EmbeddedChunk extends SectionChunkData {
  embedding: number[]
  /** Hash of the whole section content the chunk set was cut from. */
  sectionContentHash: string
  modelName: string
  providerFingerprint: string
  dimensions: number
}

/** A chunk row as the vector store holds it. */
export interface StoredChunk extends SectionChunkData {
  id: string
  collection: string
  sectionId: string
  sectionContentHash: string
  modelName: string
  providerFingerprint: string
  dimensions: number
  embedding: Float32Array
  createdAt: string
}

/** One nearest-neighbour result from the vector store. */
export interface VectorHit {
  sectionId: string
  chunkIndex: number
  text: string
  score: number
}
