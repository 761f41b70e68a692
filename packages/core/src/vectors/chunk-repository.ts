/**
 * Chunk repository: the vector store. Holds each section's chunk set with its
 * embeddings and answers nearest-neighbour queries, scoped to one collection.
 *
 * The chunk set of a section is always written whole: replaceChunks() swaps
 * the old set for the new one inside a single transaction.
 */

import type Database from 'better-sqlite3'
import { v4 as uuidv4 } from 'uuid'
import { Ok, Err, KnowledgeBaseError, describeError } from '../common/index.js'
import type { Result } from '../common/index.js'
import type { EmbeddedChunk, StoredChunk, VectorHit } from './schemas.js'
import { packFloat32, unpackFloat32, rankChunks } from './vector-search.js'
import type { RankCandidate } from './vector-search.js'

interface ChunkRow {
  id: string
  collection: string
  section_id: string
  chunk_index: number
  content: string
  content_hash: string
  section_content_hash: string
  char_count: number
  model_name: string
  provider_fingerprint: string
  dimensions: number
  embedding: Buffer
  created_at: string
}

const CHUNK_COLUMNS = 'id, collection, section_id, chunk_index, content, content_hash, section_content_hash, char_count, model_name, provider_fingerprint, dimensions, embedding, created_at'

function storeError(action: string, err: unknown, subject?: string): KnowledgeBaseError {
  return KnowledgeBaseError.upstream(`Vector store ${action} failed: ${describeError(err)}`, subject)
}

export interface QueryOptions {
  /** Only chunks of these sections are candidates. */
  sectionIds?: ReadonlySet<string>
}

/** What a section's chunk set was built from. */
export interface IndexStamp {
  sectionContentHash: string
  modelName: string
  providerFingerprint: string
}

export class ChunkRepository {
  constructor(
    private db: Database.Database,
    readonly collection: string,
  ) {}

  /** Replace the whole chunk set of a section. Returns the number of chunks written. */
  replaceChunks(sectionId: string, chunks: EmbeddedChunk[]): Result<number, KnowledgeBaseError> {
    try {
      this.db.transaction(() => {
        this.db
          .prepare('DELETE FROM section_chunks WHERE collection = ? AND section_id = ?')
          .run(this.collection, sectionId)

        const insertStmt = this.db.prepare(`INSERT INTO section_chunks (${CHUNK_COLUMNS}) VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?)`)
        const now = new Date().toISOString()

        for (const chunk of chunks) {
          insertStmt.run(
            uuidv4(),
            this.collection,
            sectionId,
            chunk.chunkIndex,
            chunk.text,
            chunk.contentHash,
            chunk.sectionContentHash,
            chunk.charCount,
            chunk.modelName,
            chunk.providerFingerprint,
            chunk.dimensions,
            packFloat32(chunk.embedding),
            now,
          )
        }
      })()

      return Ok(chunks.length)
    } catch (err) {
      return Err(storeError('chunk replace', err, sectionId))
    }
  }

  /** Delete all chunks of a section. */
  deleteBySection(sectionId: string): Result<number, KnowledgeBaseError> {
    try {
      const info = this.db
        .prepare('DELETE FROM section_chunks WHERE collection = ? AND section_id = ?')
        .run(this.collection, sectionId)
      return Ok(info.changes)
    } catch (err) {
      return Err(storeError('chunk delete', err, sectionId))
    }
  }

  /** Delete all chunks of several sections in one transaction. */
  deleteBySections(sectionIds: string[]): Result<number, KnowledgeBaseError> {
    try {
      let removed = 0
      this.db.transaction(() => {
        const stmt = this.db.prepare('DELETE FROM section_chunks WHERE collection = ? AND section_id = ?')
        for (const sectionId of sectionIds) {
          removed += stmt.run(this.collection, sectionId).changes
        }
      })()
      return Ok(removed)
    } catch (err) {
      return Err(storeError('chunk delete', err, sectionIds[0]))
    }
  }

  getChunks(sectionId: string): Result<StoredChunk[], KnowledgeBaseError> {
    try {
      const rows = this.db
        .prepare(`SELECT ${CHUNK_COLUMNS} FROM section_chunks WHERE collection = ? AND section_id = ? ORDER BY chunk_index ASC`)
        .all(this.collection, sectionId) as ChunkRow[]

      const chunks: StoredChunk[] = []
      for (const row of rows) {
        const embedding = unpackFloat32(row.embedding, row.dimensions)
        if (!embedding) continue
        chunks.push({
          id: row.id,
          collection: row.collection,
          sectionId: row.section_id,
          chunkIndex: row.chunk_index,
          text: row.content,
          contentHash: row.content_hash,
          sectionContentHash: row.section_content_hash,
          charCount: row.char_count,
          modelName: row.model_name,
          providerFingerprint: row.provider_fingerprint,
          dimensions: row.dimensions,
          embedding,
          createdAt: row.created_at,
        })
      }

      return Ok(chunks)
    } catch (err) {
      return Err(storeError('chunk lookup', err, sectionId))
    }
  }

  countBySection(sectionId: string): Result<number, KnowledgeBaseError> {
    try {
      const row = this.db
        .prepare('SELECT COUNT(*) as count FROM section_chunks WHERE collection = ? AND section_id = ?')
        .get(this.collection, sectionId) as { count: number }
      return Ok(row.count)
    } catch (err) {
      return Err(storeError('chunk count', err, sectionId))
    }
  }

  /**
   * The content hash and embedding model the current chunk set was built from,
   * or null when the section has no chunks. A mixed set reports null.
   */
  getIndexStamp(sectionId: string): Result<IndexStamp | null, KnowledgeBaseError> {
    try {
      const rows = this.db
        .prepare('SELECT DISTINCT section_content_hash, model_name, provider_fingerprint FROM section_chunks WHERE collection = ? AND section_id = ?')
        .all(this.collection, sectionId) as Array<Pick<ChunkRow, 'section_content_hash' | 'model_name' | 'provider_fingerprint'>>
      if (rows.length !== 1) return Ok(null)
      const [row] = rows
      return Ok({
        sectionContentHash: row.section_content_hash,
        modelName: row.model_name,
        providerFingerprint: row.provider_fingerprint,
      })
    } catch (err) {
      return Err(storeError('stamp lookup', err, sectionId))
    }
  }

  /** Ids of every section that owns at least one chunk. */
  listSectionIds(): Result<string[], KnowledgeBaseError> {
    try {
      const rows = this.db
        .prepare('SELECT DISTINCT section_id FROM section_chunks WHERE collection = ? ORDER BY section_id ASC')
        .all(this.collection) as Array<{ section_id: string }>
      return Ok(rows.map(row => row.section_id))
    } catch (err) {
      return Err(storeError('listing', err))
    }
  }

  /**
   * The `nResults` chunks nearest to `queryEmbedding` by cosine similarity,
   * best first. Corrupt embeddings are skipped.
   */
  query(queryEmbedding: number[], nResults: number, options: QueryOptions = {}): Result<VectorHit[], KnowledgeBaseError> {
    try {
      const rows = this.db
        .prepare('SELECT section_id, chunk_index, content, dimensions, embedding FROM section_chunks WHERE collection = ?')
        .all(this.collection) as Array<Pick<ChunkRow, 'section_id' | 'chunk_index' | 'content' | 'dimensions' | 'embedding'>>

      const candidates: RankCandidate[] = []
      for (const row of rows) {
        if (options.sectionIds && !options.sectionIds.has(row.section_id)) continue
        const embedding = unpackFloat32(row.embedding, row.dimensions)
        if (!embedding) continue
        if (embedding.length !== queryEmbedding.length) {
          console.warn(`[vector-store] skipping chunk ${row.section_id}#${row.chunk_index}: ${embedding.length} dims, query has ${queryEmbedding.length}`)
          continue
        }
        candidates.push({
          sectionId: row.section_id,
          chunkIndex: row.chunk_index,
          text: row.content,
          embedding,
        })
      }

      return Ok(rankChunks(queryEmbedding, candidates, nResults))
    } catch (err) {
      return Err(storeError('query', err))
    }
  }
}
