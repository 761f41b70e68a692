/**
 * Configuration schema. Every field has a default, so an empty object parses
 * into a working local setup (Ollama embeddings, two SQLite files under .sectionbase/).
 */

import { z } from 'zod'
import { CollectionNameSchema } from '../common/index.js'
import { ChunkingOptionsSchema } from '../vectors/schemas.js'

export const EmbeddingProviderSchema = z.enum(['ollama', 'openai'])

export type EmbeddingProviderName = z.infer<typeof EmbeddingProviderSchema>

export const EmbeddingConfigSchema = z.object({
  provider: EmbeddingProviderSchema.default('ollama'),
  model: z.string().min(1).max(128).optional(),
  dimensions: z.number().int().positive().optional(),
  ollamaBaseUrl: z.string().url().optional(),
  openaiApiKey: z.string().min(1).optional(),
})

export type EmbeddingConfig = z.infer<typeof EmbeddingConfigSchema>

export const SearchConfigSchema = z
  .object({
    defaultResults: z.number().int().positive().default(5),
    maxResults: z.number().int().positive().default(100),
  })
  .refine(data => data.defaultResults <= data.maxResults, {
    message: 'defaultResults cannot exceed maxResults',
    path: ['defaultResults'],
  })

export type SearchConfig = z.infer<typeof SearchConfigSchema>

export const SectionBaseConfigSchema = z.object({
  structuredStorePath: z.string().min(1).default('./.sectionbase/sections.db'),
  vectorStorePath: z.string().min(1).default('./.sectionbase/vectors.db'),
  collection: CollectionNameSchema.default('knowledge_base'),
  chunking: ChunkingOptionsSchema.default({}),
  search: SearchConfigSchema.default({}),
  embedding: EmbeddingConfigSchema.default({}),
})

export type SectionBaseConfig = z.infer<typeof SectionBaseConfigSchema>
export type SectionBaseConfigInput = z.input<typeof SectionBaseConfigSchema>
