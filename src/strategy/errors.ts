export type StrategyErrorCode = 'NO_APPLICABLE_STRATEGY' | 'EMPTY_ENSEMBLE'

/** Strategy configuration error with typed error code */
export class StrategySelectionError extends Error {
  readonly code: StrategyErrorCode

  constructor(code: StrategyErrorCode, message: string) {
    super(message)
    this.name = 'StrategySelectionError'
    this.code = code
  }
}
