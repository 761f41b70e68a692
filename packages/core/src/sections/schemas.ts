/**
 * Zod schemas and types for hierarchical sections.
 */

import { z } from 'zod'
import { IdentifierSchema } from '../common/index.js'

export const HeaderSchema = z.string().trim().min(1, 'Section header is required').max(512)

export const SlugInputSchema = z.string().trim().min(1, 'Slug cannot be empty').max(128)

export const PositionSchema = z.number().int().nonnegative()

export const AddSectionInputSchema = z.object({
  header: HeaderSchema,
  content: z.string().default(''),
  parent: IdentifierSchema.optional(),
  slug: SlugInputSchema.optional(),
  position: PositionSchema.optional(),
})

export type AddSectionInput = z.input<typeof AddSectionInputSchema>

export const UpdateSectionInputSchema = z
  .object({
    header: HeaderSchema.optional(),
    content: z.string().optional(),
    slug: SlugInputSchema.optional(),
  })
  .refine(data => data.header !== undefined || data.content !== undefined || data.slug !== undefined, {
    message: 'Nothing to update: pass header, content or slug',
  })

export type UpdateSectionInput = z.infer<typeof UpdateSectionInputSchema>

export const MoveSectionInputSchema = z.object({
  parent: IdentifierSchema.nullable().optional(),
  position: PositionSchema.optional(),
})

export type MoveSectionInput = z.infer<typeof MoveSectionInputSchema>

/** A section row as the structured store holds it. */
export interface SectionRecord {
  id: string
  collection: string
  parentId: string | null
  header: string
  content: string
  slug: string | null
  /** 0-based rank among siblings. */
  order: number
  createdAt: string
  updatedAt: string
}

/**
 * A section as the knowledge base hands it out. `path` and `depth` are computed
 * from the tree shape at read time: a snapshot, not a durable key.
 */
export interface Section extends SectionRecord {
  path: string
  depth: number
}

export interface NewSectionRecord {
  parentId: string | null
  header: string
  content: string
  slug: string | null
  /** 0-based index among the new siblings; appends when omitted or past the end. */
  position?: number
}

export interface SectionFieldUpdate {
  header?: string
  content?: string
  slug?: string | null
}
