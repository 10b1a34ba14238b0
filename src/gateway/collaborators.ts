import type { DecisionSupport } from '../models/decision.js'

/**
 * Narrative generator behind the strategies. Takes formatted patient text
 * and returns free text, which the gateway stores as the explanation.
 */
export interface DiagnosticBackend {
  generate(prompt: string): string
}

/** Persistence for completed decisions. Saving the same request twice is a no-op overwrite. */
export interface DecisionStore {
  save(decision: DecisionSupport): void
  get(requestId: string): DecisionSupport | undefined
}

export class InMemoryDecisionStore implements DecisionStore {
  private readonly decisions = new Map<string, DecisionSupport>()

  save(decision: DecisionSupport): void {
    this.decisions.set(decision.requestId, decision)
  }

  get(requestId: string): DecisionSupport | undefined {
    return this.decisions.get(requestId)
  }

  get size(): number {
    return this.decisions.size
  }
}
