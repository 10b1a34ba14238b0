import type { PatientRecord } from '../types/patient.js'
import { calculateAge } from '../models/patient.js'
import type { ProcessingContext } from './context.js'
import { ChainHandler, type StageOutcome } from './handler.js'

/** History entries containing any of these (case-insensitive) mark a critical history */
export const CRITICAL_HISTORY_KEYWORDS: readonly string[] = [
  'diabetes',
  'hypertension',
  'cancer',
  'cardiac',
  'renal',
]

/** Quality assigned to observations that arrive without a score */
const VALIDATED_QUALITY = 1.0
const UNVALIDATED_QUALITY = 0.5

/**
 * Fills in derived facts: patient age, per-observation quality, presence
 * flags per observation kind and the critical-history flag. Never fails.
 */
export class EnrichmentHandler extends ChainHandler {
  readonly name = 'EnrichmentHandler'

  constructor(private readonly now: () => Date = () => new Date()) {
    super()
  }

  protected process(record: PatientRecord, context: ProcessingContext): StageOutcome {
    const { patient, observations } = record
    const timestamp = this.now()

    const ageCalculated = patient.age === undefined && calculateAge(patient, timestamp) !== undefined

    const qualityScores = observations.map((obs) => {
      if (obs.qualityScore === undefined) {
        obs.qualityScore = obs.validated ? VALIDATED_QUALITY : UNVALIDATED_QUALITY
      }
      return obs.qualityScore
    })
    const averageQuality =
      qualityScores.length > 0
        ? qualityScores.reduce((sum, q) => sum + q, 0) / qualityScores.length
        : undefined

    const hasCriticalHistory = patient.medicalHistory.some((condition) => {
      const lower = condition.toLowerCase()
      return CRITICAL_HISTORY_KEYWORDS.some((keyword) => lower.includes(keyword))
    })

    const next = context.with('enrichment', {
      ageCalculated,
      processingTimestamp: timestamp.toISOString(),
      dataCount: observations.length,
      ...(averageQuality !== undefined ? { averageQuality } : {}),
      hasText: observations.some((o) => o.kind === 'text'),
      hasSignal: observations.some((o) => o.kind === 'signal'),
      hasImage: observations.some((o) => o.kind === 'image'),
      hasCriticalHistory,
    })
    return this.pass(record, next)
  }
}
