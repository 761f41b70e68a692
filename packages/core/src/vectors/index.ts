/**
 * Vector side of the knowledge base: chunking, embedding, the chunk store and similarity ranking.
 */

export { ChunkingOptionsSchema } from './schemas.js'
export type {
  ChunkingOptions,
  SectionChunkData,
  EmbeddedChunk,
  StoredChunk,
  VectorHit,
} from './schemas.js'
export {
  chunkSectionContent,
  expectedChunkCount,
  charLength,
  hashContent,
  DEFAULT_MAX_CHUNK_CHARS,
  DEFAULT_OVERLAP_CHARS,
} from './chunker.js'
export type { ChunkerOptions } from './chunker.js'
export type { EmbeddingClient, EmbedResult } from './embedding-client.js'
export { embedChunks, embedInBatches, planBatches } from './embedding-pipeline.js'
export { ChunkRepository } from './chunk-repository.js'
export type { QueryOptions, IndexStamp } from './chunk-repository.js'
export {
  packFloat32,
  unpackFloat32,
  l2Normalize,
  cosineSimilarity,
  rankChunks,
} from './vector-search.js'
export type { RankCandidate } from './vector-search.js'
