/**
 * Opens a knowledge base from configuration: both SQLite stores (migrated)
 * and the embedding provider.
 */

import { openDatabase } from '../storage/database.js'
import { createEmbeddingClient } from '../embeddings/factory.js'
import type { EmbeddingClient } from '../vectors/embedding-client.js'
import type { SectionBaseConfig } from '../config/schemas.js'
import { KnowledgeBase } from './knowledge-base.js'

/**
 * When both store paths are equal the stores share one handle.
 * `embeddingClient` overrides the provider named in `config.embedding`.
 */
export function openKnowledgeBase(config: SectionBaseConfig, embeddingClient?: EmbeddingClient): KnowledgeBase {
  const structuredDb = openDatabase(config.structuredStorePath)
  const vectorDb = config.vectorStorePath === config.structuredStorePath
    ? structuredDb
    : openDatabase(config.vectorStorePath)

  return new KnowledgeBase({
    structuredDb,
    vectorDb,
    embeddingClient: embeddingClient ?? createEmbeddingClient(config.embedding),
    collection: config.collection,
    chunking: config.chunking,
    search: config.search,
  })
}
