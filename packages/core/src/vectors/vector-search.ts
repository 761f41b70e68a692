/**
 * Vector search utilities: Float32 packing, normalization, cosine ranking.
 */

import type { VectorHit } from './schemas.js'

/** Pack a number array into a little-endian Float32 Buffer. */
export function packFloat32(vec: number[]): Buffer {
  const buf = Buffer.alloc(vec.length * 4)
  for (let i = 0; i < vec.length; i++) {
    buf.writeFloatLE(vec[i], i * 4)
  }
  return buf
}

/** Unpack a little-endian Float32 Buffer into a Float32Array. Returns null on corrupt data. */
export function unpackFloat32(blob: Buffer, dims: number): Float32Array | null {
  if (blob.byteLength !== dims * 4) {
    console.warn(`[vector-store] corrupt embedding blob: expected ${dims * 4} bytes, got ${blob.byteLength}`)
    return null
  }
  const arr = new Float32Array(dims)
  for (let i = 0; i < dims; i++) {
    arr[i] = blob.readFloatLE(i * 4)
  }
  return arr
}

export function l2Normalize(vec: number[]): number[] {
  let norm = 0
  for (let i = 0; i < vec.length; i++) {
    norm += vec[i] * vec[i]
  }
  norm = Math.sqrt(norm)
  if (norm === 0) return vec
  return vec.map(v => v / norm)
}

/**
 * Cosine similarity. Providers hand back L2-normalized vectors, but the norms are
 * divided out anyway so a stored vector from any source ranks correctly.
 * Zero vectors and mismatched lengths score 0.
 */
export function cosineSimilarity(a: ArrayLike<number>, b: ArrayLike<number>): number {
  if (a.length !== b.length || a.length === 0) return 0

  let dot = 0
  let normA = 0
  let normB = 0
  for (let i = 0; i < a.length; i++) {
    dot += a[i] * b[i]
    normA += a[i] * a[i]
    normB += b[i] * b[i]
  }

  if (normA === 0 || normB === 0) return 0
  return dot / (Math.sqrt(normA) * Math.sqrt(normB))
}

export interface RankCandidate {
  sectionId: string
  chunkIndex: number
  text: string
  embedding: Float32Array
}

/**
 * Score every candidate against the query and keep the `limit` best,
 * by descending similarity. Ties fall back to section id, then chunk index.
 */
export function rankChunks(
  queryEmbedding: ArrayLike<number>,
  candidates: RankCandidate[],
  limit: number,
): VectorHit[] {
  const scored: VectorHit[] = candidates.map(candidate => ({
    sectionId: candidate.sectionId,
    chunkIndex: candidate.chunkIndex,
    text: candidate.text,
    score: cosineSimilarity(queryEmbedding, candidate.embedding),
  }))

  scored.sort((a, b) =>
    b.score - a.score
    || a.sectionId.localeCompare(b.sectionId)
    || a.chunkIndex - b.chunkIndex,
  )

  return scored.slice(0, Math.max(0, limit))
}
