import type { ZodError } from 'zod'

/**
 * Field-level validation failure
 */
export interface ValidationIssue {
  field: string
  message: string
}

/**
 * A line on the wire could not be read as a JSON object.
 * Framing is lost once this happens, so the receive sequence ends.
 */
export class ProtocolError extends Error {
  constructor(
    message: string,
    public readonly line?: string
  ) {
    super(message)
    this.name = 'ProtocolError'
  }
}

/**
 * A message decoded as JSON but broke a domain constraint
 * (empty device id, unknown status, non-empty payload on an empty kind...)
 */
export class ValidationError extends Error {
  constructor(
    message: string,
    public readonly issues: ValidationIssue[] = []
  ) {
    super(message)
    this.name = 'ValidationError'
  }

  static fromZod(messageType: string, error: ZodError): ValidationError {
    const issues = error.errors.map((err) => ({
      field: err.path.join('.'),
      message: err.message,
    }))
    const summary = issues.map((issue) => `${issue.field || '(root)'}: ${issue.message}`).join('; ')
    return new ValidationError(`Invalid '${messageType}' message: ${summary}`, issues)
  }
}
