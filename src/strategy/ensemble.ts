import type { PatientRecord } from '../types/patient.js'
import type { DecisionSupport } from '../models/decision.js'
import type { ProcessingContext } from '../pipeline/context.js'
import { StrategySelectionError } from './errors.js'
import type { ModelInfo, ModelStrategy } from './strategy.js'

/**
 * Composite strategy: runs every applicable member, in registration
 * order, against the same decision. Each member appends its own
 * diagnoses and its own name to `modelsUsed`; the ensemble adds neither.
 */
export class EnsembleStrategy implements ModelStrategy {
  readonly name = 'ensemble'
  readonly version = '1.0.0'
  readonly confidenceThreshold = 0.5
  readonly members: readonly ModelStrategy[]

  constructor(members: readonly ModelStrategy[]) {
    if (members.length === 0) {
      throw new StrategySelectionError('EMPTY_ENSEMBLE', 'An ensemble needs at least one member strategy')
    }
    this.members = [...members]
  }

  canHandle(record: PatientRecord, context: ProcessingContext): boolean {
    return this.members.some((s) => s.canHandle(record, context))
  }

  execute(record: PatientRecord, decision: DecisionSupport, context: ProcessingContext): DecisionSupport {
    const applicable = this.members.filter((s) => s.canHandle(record, context))
    let result = decision
    for (const strategy of applicable) {
      result = strategy.execute(record, result, context)
    }
    result.explanation = `Ensemble of ${applicable.length} models`
    return result
  }

  getModelInfo(): ModelInfo {
    return {
      name: this.name,
      version: this.version,
      confidenceThreshold: this.confidenceThreshold,
    }
  }
}
