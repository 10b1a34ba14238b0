import type { PatientRecord } from '../types/patient.js'
import type { ProcessingContext } from './context.js'
import { ChainHandler, type StageOutcome } from './handler.js'

/** Trims surrounding whitespace from text observations. Optional stage. */
export class NormalizationHandler extends ChainHandler {
  readonly name = 'NormalizationHandler'

  protected process(record: PatientRecord, context: ProcessingContext): StageOutcome {
    const operations: string[] = []
    for (const obs of record.observations) {
      if (obs.kind !== 'text') continue
      const trimmed = obs.content.trim()
      if (trimmed.length !== obs.content.length) {
        obs.content = trimmed
        operations.push(`Trimmed whitespace from text observation ${obs.id}`)
      }
    }
    return this.pass(
      record,
      context.with('normalization', { normalizedCount: operations.length, operations }),
    )
  }
}
