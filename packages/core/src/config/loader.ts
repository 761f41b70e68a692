/**
 * Configuration loader: environment variables over schema defaults.
 *
 *   SECTIONBASE_STRUCTURED_STORE_PATH   sections database file (or :memory:)
 *   SECTIONBASE_VECTOR_STORE_PATH       chunk/embedding database file (or :memory:)
 *   SECTIONBASE_COLLECTION              collection name
 *   SECTIONBASE_CHUNK_SIZE              max characters per chunk
 *   SECTIONBASE_CHUNK_OVERLAP           characters shared by consecutive chunks
 *   SECTIONBASE_SEARCH_RESULTS          default number of search results
 *   SECTIONBASE_SEARCH_MAX_RESULTS      upper bound on requested results
 *   SECTIONBASE_EMBEDDING_PROVIDER      ollama | openai
 *   SECTIONBASE_EMBEDDING_MODEL         provider model name
 *   SECTIONBASE_EMBEDDING_DIMENSIONS    vector size
 *   OLLAMA_BASE_URL, OPENAI_API_KEY
 */

import { Ok, Err, validationError } from '../common/index.js'
import type { Result, KnowledgeBaseError } from '../common/index.js'
import { SectionBaseConfigSchema } from './schemas.js'
import type { SectionBaseConfig } from './schemas.js'

export type Environment = Record<string, string | undefined>

function read(env: Environment, key: string): string | undefined {
  const value = env[key]?.trim()
  return value ? value : undefined
}

/** Integers are passed through as NaN when unparseable so the schema reports them. */
function readInt(env: Environment, key: string): number | undefined {
  const value = read(env, key)
  if (value === undefined) return undefined
  return /^-?\d+$/.test(value) ? Number.parseInt(value, 10) : Number.NaN
}

function definedOnly(obj: Record<string, unknown>): Record<string, unknown> {
  return Object.fromEntries(Object.entries(obj).filter(([, v]) => v !== undefined))
}

/** Raw, unvalidated config object built from the environment. */
export function configFromEnv(env: Environment): Record<string, unknown> {
  return definedOnly({
    structuredStorePath: read(env, 'SECTIONBASE_STRUCTURED_STORE_PATH'),
    vectorStorePath: read(env, 'SECTIONBASE_VECTOR_STORE_PATH'),
    collection: read(env, 'SECTIONBASE_COLLECTION'),
    chunking: definedOnly({
      maxChunkChars: readInt(env, 'SECTIONBASE_CHUNK_SIZE'),
      overlapChars: readInt(env, 'SECTIONBASE_CHUNK_OVERLAP'),
    }),
    search: definedOnly({
      defaultResults: readInt(env, 'SECTIONBASE_SEARCH_RESULTS'),
      maxResults: readInt(env, 'SECTIONBASE_SEARCH_MAX_RESULTS'),
    }),
    embedding: definedOnly({
      provider: read(env, 'SECTIONBASE_EMBEDDING_PROVIDER'),
      model: read(env, 'SECTIONBASE_EMBEDDING_MODEL'),
      dimensions: readInt(env, 'SECTIONBASE_EMBEDDING_DIMENSIONS'),
      ollamaBaseUrl: read(env, 'OLLAMA_BASE_URL'),
      openaiApiKey: read(env, 'OPENAI_API_KEY'),
    }),
  })
}

export function parseConfig(input: unknown): Result<SectionBaseConfig, KnowledgeBaseError> {
  const parsed = SectionBaseConfigSchema.safeParse(input)
  if (!parsed.success) {
    return Err(validationError(parsed.error, 'Invalid configuration'))
  }
  return Ok(parsed.data)
}

export function loadConfig(env: Environment = process.env): Result<SectionBaseConfig, KnowledgeBaseError> {
  return parseConfig(configFromEnv(env))
}
