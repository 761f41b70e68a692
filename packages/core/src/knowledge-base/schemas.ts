/**
 * Zod schemas and types for the knowledge base facade.
 */

import { z } from 'zod'
import { IdentifierSchema } from '../common/index.js'
import type { Section } from '../sections/schemas.js'

export const SearchQuerySchema = z.string().trim().min(1, 'Search query cannot be empty')

export const SearchOptionsSchema = z.object({
  nResults: z.number().int().positive().optional(),
  within: IdentifierSchema.optional(),
})

export type SearchOptions = z.infer<typeof SearchOptionsSchema>

export const DeleteOptionsSchema = z.object({
  recursive: z.boolean().default(false),
})

export type DeleteOptions = z.input<typeof DeleteOptionsSchema>

export const ReindexOptionsSchema = z.object({
  root: IdentifierSchema.optional(),
  force: z.boolean().default(false),
})

export type ReindexOptions = z.input<typeof ReindexOptionsSchema>

export interface SearchHit {
  section: Section
  score: number
  /** The best-scoring chunk of the section. */
  chunkIndex: number
  text: string
}

export interface DeleteResult {
  /** Root first, then descendants depth-first. */
  deletedIds: string[]
  removedChunks: number
}

export interface ReindexSummary {
  reindexed: number
  skipped: number
  /** Chunk sets whose section no longer exists. Only purged on a whole-collection reindex. */
  orphansRemoved: number
}

export interface AddSectionOptions {
  /** Identifier of the parent section; omitted for a root. */
  parent?: string
  slug?: string
  /** 0-based index among the new siblings. Appends when omitted. */
  position?: number
}

export interface ExportSummary {
  filepath: string
  sectionCount: number
}
