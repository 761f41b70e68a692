/**
 * Common utilities: Result pattern, typed errors, shared schemas.
 */

export { Ok, Err, unwrap, isOk, isErr, mapOk, collect } from './result.js'
export type { Result } from './result.js'

export { KnowledgeBaseError, describeError } from './errors.js'
export type { ErrorCode } from './errors.js'

export {
  UUIDSchema,
  IdentifierSchema,
  CollectionNameSchema,
  validationError,
} from './schemas.js'
