/**
 * Sections, the structured store: hierarchical records, slugs, identifier resolution.
 */

export {
  AddSectionInputSchema,
  UpdateSectionInputSchema,
  MoveSectionInputSchema,
  HeaderSchema,
  SlugInputSchema,
  PositionSchema,
} from './schemas.js'
export type {
  AddSectionInput,
  UpdateSectionInput,
  MoveSectionInput,
  SectionRecord,
  Section,
  NewSectionRecord,
  SectionFieldUpdate,
} from './schemas.js'
export { slugify } from './slug.js'
export { classifyIdentifier } from './identifier.js'
export type { SectionRef } from './identifier.js'
export { SectionRepository } from './repository.js'
