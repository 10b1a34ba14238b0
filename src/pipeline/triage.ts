import type { Priority } from '../types/common.js'
import type { PatientRecord } from '../types/patient.js'
import { outranks } from '../models/priority.js'
import type { ProcessingContext } from './context.js'
import { ChainHandler, type StageOutcome } from './handler.js'

/** Starting score for each incoming priority */
export const BASE_PRIORITY_SCORE: Readonly<Record<Priority, number>> = {
  emergency: 100,
  urgent: 75,
  soon: 50,
  routine: 25,
}

const AGE_BONUS = 15
const COMPLEX_HISTORY_BONUS = 10
const CRITICAL_HISTORY_BONUS = 20
const LOW_QUALITY_BONUS = 10

const COMPLEX_HISTORY_MIN_ENTRIES = 4
const LOW_QUALITY_THRESHOLD = 0.7

/** Map a clamped triage score onto a priority band */
export function priorityForScore(score: number): Priority {
  if (score >= 90) return 'emergency'
  if (score >= 70) return 'urgent'
  if (score >= 40) return 'soon'
  return 'routine'
}

/**
 * Sums the weighted triage factors, clamps the total to [0, 100] and
 * bands it. The record's priority is upgraded to the band when the band
 * outranks it; it is never downgraded. Never fails.
 */
export class TriageHandler extends ChainHandler {
  readonly name = 'TriageHandler'

  protected process(record: PatientRecord, context: ProcessingContext): StageOutcome {
    const { patient } = record
    const enrichment = context.enrichment
    const factors: string[] = []

    let score = BASE_PRIORITY_SCORE[record.priority]
    factors.push(`Base priority: ${record.priority}`)

    if (patient.age !== undefined && (patient.age < 2 || patient.age > 75)) {
      score += AGE_BONUS
      factors.push(`Age factor: ${patient.age}`)
    }

    if (patient.medicalHistory.length >= COMPLEX_HISTORY_MIN_ENTRIES) {
      score += COMPLEX_HISTORY_BONUS
      factors.push('Complex medical history')
    }

    if (enrichment?.hasCriticalHistory) {
      score += CRITICAL_HISTORY_BONUS
      factors.push('Critical medical history')
    }

    if ((enrichment?.averageQuality ?? 1) < LOW_QUALITY_THRESHOLD) {
      score += LOW_QUALITY_BONUS
      factors.push('Low data quality')
    }

    score = Math.min(Math.max(score, 0), 100)
    const priority = priorityForScore(score)

    if (outranks(priority, record.priority)) {
      record.priority = priority
    }

    return this.pass(record, context.with('triage', { score, priority, factors }))
  }
}
