/**
 * Aggregated validation failure for one record. Carries every problem
 * found, not just the first.
 */
export class ValidationError extends Error {
  readonly errors: readonly string[]
  readonly warnings: readonly string[]

  constructor(errors: readonly string[], warnings: readonly string[] = []) {
    super(`Validation failed: ${errors.join(', ')}`)
    this.name = 'ValidationError'
    this.errors = errors
    this.warnings = warnings
  }
}

/** A stage tried to write a context slot that an earlier stage already filled */
export class ContextError extends Error {
  readonly slot: string

  constructor(slot: string) {
    super(`Context slot "${slot}" is already set`)
    this.name = 'ContextError'
    this.slot = slot
  }
}
