/**
 * Configuration: schema, defaults, environment loading.
 */

export {
  SectionBaseConfigSchema,
  EmbeddingConfigSchema,
  EmbeddingProviderSchema,
  SearchConfigSchema,
} from './schemas.js'
export type {
  SectionBaseConfig,
  SectionBaseConfigInput,
  EmbeddingConfig,
  EmbeddingProviderName,
  SearchConfig,
} from './schemas.js'
export { loadConfig, parseConfig, configFromEnv } from './loader.js'
export type { Environment } from './loader.js'
