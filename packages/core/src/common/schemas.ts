/**
 * Shared Zod schemas used across modules.
 */

import { z } from 'zod'
import { KnowledgeBaseError } from './errors.js'

export const UUIDSchema = z.string().uuid()

export const IdentifierSchema = z.string().trim().min(1, 'Identifier cannot be empty')

export const CollectionNameSchema = z
  .string()
  .trim()
  .min(1, 'Collection name cannot be empty')
  .max(128)

/** First issue's path names the offending field; all issues go into the message. */
export function validationError(error: z.ZodError, context = 'Invalid input'): KnowledgeBaseError {
  const first = error.issues[0]
  const field = first && first.path.length > 0 ? first.path.join('.') : undefined
  const details = error.issues
    .map(issue => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
    .join('; ')
  return KnowledgeBaseError.validation(`${context}: ${details}`, field)
}
