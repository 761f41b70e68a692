/**
 * Knowledge base facade and tree export.
 */

export { KnowledgeBase, DEFAULT_COLLECTION } from './knowledge-base.js'
export type { KnowledgeBaseOptions } from './knowledge-base.js'
export { openKnowledgeBase } from './open.js'
export { renderSectionTree, flattenTree } from './exporter.js'
export type { SectionTreeNode } from './exporter.js'
export {
  SearchQuerySchema,
  SearchOptionsSchema,
  DeleteOptionsSchema,
  ReindexOptionsSchema,
} from './schemas.js'
export type {
  AddSectionOptions,
  SearchOptions,
  SearchHit,
  DeleteOptions,
  DeleteResult,
  ReindexOptions,
  ReindexSummary,
  ExportSummary,
} from './schemas.js'
