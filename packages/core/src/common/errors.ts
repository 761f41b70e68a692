/**
 * Typed error class for knowledge base operations.
 * `subject` names the identifier, section id or field the failure concerns.
 */

export type ErrorCode =
  | 'NOT_FOUND'
  | 'CONFLICT'
  | 'INVALID_OPERATION'
  | 'UPSTREAM_FAILURE'
  | 'VALIDATION_ERROR'
  | 'IO_ERROR'

export class KnowledgeBaseError extends Error {
  readonly code: ErrorCode
  readonly subject: string | undefined

  constructor(code: ErrorCode, message: string, subject?: string) {
    super(message)
    this.name = 'KnowledgeBaseError'
    this.code = code
    this.subject = subject
  }

  static notFound(entity: string, identifier: string): KnowledgeBaseError {
    return new KnowledgeBaseError('NOT_FOUND', `${entity} not found: ${identifier}`, identifier)
  }

  static conflict(message: string, subject?: string): KnowledgeBaseError {
    return new KnowledgeBaseError('CONFLICT', message, subject)
  }

  static invalidOperation(message: string, subject?: string): KnowledgeBaseError {
    return new KnowledgeBaseError('INVALID_OPERATION', message, subject)
  }

  static upstream(message: string, subject?: string): KnowledgeBaseError {
    return new KnowledgeBaseError('UPSTREAM_FAILURE', message, subject)
  }

  static validation(message: string, subject?: string): KnowledgeBaseError {
    return new KnowledgeBaseError('VALIDATION_ERROR', message, subject)
  }

  static io(message: string, subject?: string): KnowledgeBaseError {
    return new KnowledgeBaseError('IO_ERROR', message, subject)
  }
}

export function describeError(err: unknown): string {
  return err instanceof Error ? err.message : String(err)
}
