import type { PatientRecord } from '../types/patient.js'
import type { DecisionSupport } from '../models/decision.js'
import type { ProcessingContext } from '../pipeline/context.js'

export interface ModelInfo {
  name: string
  version: string
  confidenceThreshold: number
}

/**
 * A diagnostic model stand-in. `canHandle` decides applicability from the
 * record's content; `execute` adds diagnoses to the decision and records
 * which model(s) ran in `modelsUsed`.
 */
export interface ModelStrategy {
  readonly name: string
  readonly version: string
  readonly confidenceThreshold: number
  canHandle(record: PatientRecord, context: ProcessingContext): boolean
  execute(record: PatientRecord, decision: DecisionSupport, context: ProcessingContext): DecisionSupport
  getModelInfo(): ModelInfo
}

/**
 * Base for single-model strategies: runs `analyze()` and then records the
 * strategy's name on the decision.
 */
export abstract class BaseModelStrategy implements ModelStrategy {
  readonly version: string = '1.0.0'
  readonly confidenceThreshold: number = 0.5

  constructor(readonly name: string) {}

  abstract canHandle(record: PatientRecord, context: ProcessingContext): boolean

  protected abstract analyze(
    record: PatientRecord,
    decision: DecisionSupport,
    context: ProcessingContext,
  ): void

  execute(record: PatientRecord, decision: DecisionSupport, context: ProcessingContext): DecisionSupport {
    this.analyze(record, decision, context)
    decision.recordModel(this.name)
    return decision
  }

  getModelInfo(): ModelInfo {
    return {
      name: this.name,
      version: this.version,
      confidenceThreshold: this.confidenceThreshold,
    }
  }
}

/** "cardiology" -> "Cardiology" */
export function capitalize(value: string): string {
  return value.length === 0 ? value : value[0].toUpperCase() + value.slice(1).toLowerCase()
}

/** True when any haystack contains any keyword. Haystacks must already be lowercase. */
export function containsAnyKeyword(haystacks: readonly string[], keywords: readonly string[]): boolean {
  return haystacks.some((text) => keywords.some((keyword) => text.includes(keyword)))
}
