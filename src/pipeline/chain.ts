import type { ObservationLimits } from '../models/observation.js'
import { EnrichmentHandler } from './enrichment.js'
import type { ChainHandler } from './handler.js'
import { TriageHandler } from './triage.js'
import { ValidationHandler } from './validation.js'

export interface DefaultChainOptions {
  limits?: ObservationLimits
  now?: () => Date
}

/**
 * Link handlers in the given order.
 *
 * @returns The head of the chain
 * @throws Error when no handlers are given
 */
export function linkHandlers(handlers: readonly ChainHandler[]): ChainHandler {
  if (handlers.length === 0) {
    throw new Error('At least one handler is required')
  }
  for (let i = 0; i < handlers.length - 1; i++) {
    handlers[i].setNext(handlers[i + 1])
  }
  return handlers[0]
}

/** validate -> enrich -> triage */
export function createDefaultHandlers(options: DefaultChainOptions = {}): ChainHandler[] {
  return [
    new ValidationHandler(options.limits, options.now),
    new EnrichmentHandler(options.now),
    new TriageHandler(),
  ]
}
