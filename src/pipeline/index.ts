export { ProcessingContext } from './context.js'
export type {
  ValidationResult,
  EnrichmentResult,
  TriageResult,
  NormalizationResult,
  ContextSlots,
  ContextSlot,
  ProcessingContextInit,
} from './context.js'
export { ChainHandler } from './handler.js'
export type { StageOutcome } from './handler.js'
export { ValidationHandler } from './validation.js'
export { EnrichmentHandler, CRITICAL_HISTORY_KEYWORDS } from './enrichment.js'
export { TriageHandler, BASE_PRIORITY_SCORE, priorityForScore } from './triage.js'
export { NormalizationHandler } from './normalization.js'
export { linkHandlers, createDefaultHandlers } from './chain.js'
export type { DefaultChainOptions } from './chain.js'
export { ValidationError, ContextError } from './errors.js'
