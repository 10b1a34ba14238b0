/** Field-level problem found while checking input against a schema */
export interface FieldIssue {
  path: string
  message: string
}

/**
 * Raised when a patient record or serialized decision does not match its schema.
 */
export class FormatError extends Error {
  public readonly fields: FieldIssue[]

  constructor(message: string, fields: FieldIssue[] = []) {
    super(message)
    this.name = 'FormatError'
    this.fields = fields
  }
}
