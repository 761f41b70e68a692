/**
 * @sectionbase/core
 *
 * Hierarchical document knowledge base: sections in a structured store,
 * their content mirrored into a vector store as embedded chunks.
 */

export * from './common/index.js'
export * from './storage/index.js'
export * from './sections/index.js'
export * from './vectors/index.js'
export * from './embeddings/index.js'
export * from './config/index.js'
export * from './knowledge-base/index.js'
