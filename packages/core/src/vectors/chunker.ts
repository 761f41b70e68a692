/**
 * Section chunker: cuts section content into consecutive fixed-size slices.
 * Deterministic and stateless; with no overlap a content of length L yields
 * ceil(L / maxChunkChars) chunks, and empty content yields none.
 *
 * Lengths count code points, so a slice edge never splits a surrogate pair.
 */

import { createHash } from 'node:crypto'
import type { SectionChunkData } from './schemas.js'

export const DEFAULT_MAX_CHUNK_CHARS = 500
export const DEFAULT_OVERLAP_CHARS = 0

export interface ChunkerOptions {
  maxChunkChars?: number
  overlapChars?: number
}

export function hashContent(content: string): string {
  return createHash('sha256').update(content).digest('hex')
}

/** Length of `text` in code points. */
export function charLength(text: string): number {
  return Array.from(text).length
}

export function chunkSectionContent(content: string, options?: ChunkerOptions): SectionChunkData[] {
  const maxChunkChars = options?.maxChunkChars ?? DEFAULT_MAX_CHUNK_CHARS
  const overlapChars = options?.overlapChars ?? DEFAULT_OVERLAP_CHARS

  if (maxChunkChars < 1) {
    throw new RangeError(`maxChunkChars must be positive, got ${maxChunkChars}`)
  }
  if (overlapChars < 0 || overlapChars >= maxChunkChars) {
    throw new RangeError(`overlapChars must be in [0, ${maxChunkChars}), got ${overlapChars}`)
  }

  const chars = Array.from(content)
  if (chars.length === 0) {
    return []
  }

  const step = maxChunkChars - overlapChars
  const chunks: SectionChunkData[] = []

  let offset = 0
  while (offset < chars.length) {
    const end = Math.min(offset + maxChunkChars, chars.length)
    const text = chars.slice(offset, end).join('')

    chunks.push({
      chunkIndex: chunks.length,
      text,
      contentHash: hashContent(text),
      charCount: end - offset,
    })

    if (end === chars.length) break
    offset += step
  }

  return chunks
}

/** Number of chunks `chunkSectionContent` would produce, without cutting them. */
export function expectedChunkCount(content: string, options?: ChunkerOptions): number {
  const contentLength = charLength(content)
  const maxChunkChars = options?.maxChunkChars ?? DEFAULT_MAX_CHUNK_CHARS
  const overlapChars = options?.overlapChars ?? DEFAULT_OVERLAP_CHARS
  if (contentLength === 0) return 0
  if (contentLength <= maxChunkChars) return 1
  return 1 + Math.ceil((contentLength - maxChunkChars) / (maxChunkChars - overlapChars))
}
