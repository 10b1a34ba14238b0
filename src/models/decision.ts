import { Value } from '@sinclair/typebox/value'
import type { UrgencyLevel } from '../types/common.js'
import { DecisionSupportJsonSchema, type DecisionSupportJson } from '../types/decision.js'
import { Diagnosis } from './diagnosis.js'
import { FormatError } from './errors.js'
import { outranks } from './priority.js'

/** Diagnoses above this confidence may escalate the decision's urgency */
const ESCALATION_CONFIDENCE = 0.8

/** Condition terms that escalate urgency, checked in order */
const ESCALATION_RULES: ReadonlyArray<{ terms: readonly string[]; urgency: UrgencyLevel }> = [
  { terms: ['sepsis', 'stroke', 'infarction'], urgency: 'emergency' },
  { terms: ['pneumonia', 'fracture'], urgency: 'urgent' },
]

export interface DecisionSupportInit {
  requestId: string
  patientId: string
  timestamp?: Date
}

/**
 * Decision support output for one request.
 *
 * Created empty by the gateway, populated by the selected strategy (or
 * every member of an ensemble), then frozen before it is returned.
 * Urgency only ever moves up.
 */
export class DecisionSupport {
  readonly requestId: string
  readonly patientId: string
  readonly timestamp: Date

  readonly diagnoses: Diagnosis[] = []
  readonly alerts: string[] = []
  readonly warnings: string[] = []
  readonly clinicalNotes: string[] = []
  readonly modelsUsed: string[] = []

  triageScore = 0
  processingTimeMs = 0
  explanation: string | null = null
  featureImportance: Record<string, number> = {}
  metadata: Record<string, unknown> = {}

  private urgency: UrgencyLevel = 'routine'

  constructor(init: DecisionSupportInit) {
    this.requestId = init.requestId
    this.patientId = init.patientId
    this.timestamp = init.timestamp ?? new Date()
  }

  get urgencyLevel(): UrgencyLevel {
    return this.urgency
  }

  /**
   * Raise urgency to `level` if it outranks the current one.
   *
   * @returns true when the urgency changed
   */
  raiseUrgency(level: UrgencyLevel): boolean {
    if (!outranks(level, this.urgency)) return false
    this.urgency = level
    return true
  }

  /**
   * Append a diagnosis. A diagnosis with confidence above 0.8 whose
   * condition names an acute term escalates urgency.
   */
  addDiagnosis(diagnosis: Diagnosis): void {
    this.diagnoses.push(diagnosis)
    if (diagnosis.confidenceScore > ESCALATION_CONFIDENCE) {
      this.escalateFor(diagnosis)
    }
  }

  private escalateFor(diagnosis: Diagnosis): void {
    const condition = diagnosis.condition.toLowerCase()
    const rule = ESCALATION_RULES.find((r) => r.terms.some((term) => condition.includes(term)))
    if (rule) {
      this.raiseUrgency(rule.urgency)
    }
  }

  /** Highest-confidence diagnosis; the first one wins a tie. */
  getTopDiagnosis(): Diagnosis | undefined {
    let top: Diagnosis | undefined
    for (const d of this.diagnoses) {
      if (top === undefined || d.confidenceScore > top.confidenceScore) {
        top = d
      }
    }
    return top
  }

  addAlert(alert: string): void {
    this.alerts.push(alert)
  }

  addWarning(warning: string): void {
    this.warnings.push(warning)
  }

  addClinicalNote(note: string): void {
    this.clinicalNotes.push(note)
  }

  recordModel(name: string): void {
    this.modelsUsed.push(name)
  }

  get isFrozen(): boolean {
    return Object.isFrozen(this)
  }

  /**
   * Make the decision and everything it holds read-only. Any later
   * mutation throws a TypeError.
   */
  freeze(): this {
    for (const d of this.diagnoses) d.freeze()
    Object.freeze(this.diagnoses)
    Object.freeze(this.alerts)
    Object.freeze(this.warnings)
    Object.freeze(this.clinicalNotes)
    Object.freeze(this.modelsUsed)
    Object.freeze(this.featureImportance)
    Object.freeze(this.metadata)
    Object.freeze(this)
    return this
  }

  toJSON(): DecisionSupportJson {
    return {
      request_id: this.requestId,
      patient_id: this.patientId,
      timestamp: this.timestamp.toISOString(),
      diagnoses: this.diagnoses.map((d) => d.toJSON()),
      urgency_level: this.urgency,
      triage_score: this.triageScore,
      alerts: [...this.alerts],
      warnings: [...this.warnings],
      clinical_notes: [...this.clinicalNotes],
      models_used: [...this.modelsUsed],
      processing_time_ms: this.processingTimeMs,
      explanation: this.explanation,
      feature_importance: { ...this.featureImportance },
      metadata: structuredClone(this.metadata),
    }
  }

  /**
   * Rebuild a decision from its JSON shape. Urgency is restored as stored,
   * without re-running escalation.
   *
   * @throws FormatError when the input does not match the decision schema
   */
  static fromJSON(input: unknown): DecisionSupport {
    if (!Value.Check(DecisionSupportJsonSchema, input)) {
      const fields = [...Value.Errors(DecisionSupportJsonSchema, input)].map((e) => ({
        path: e.path,
        message: e.message,
      }))
      throw new FormatError('Decision support JSON invalid', fields)
    }

    const timestamp = new Date(input.timestamp)
    if (Number.isNaN(timestamp.getTime())) {
      throw new FormatError('Decision support JSON invalid', [
        { path: '/timestamp', message: 'Expected an ISO 8601 date-time' },
      ])
    }

    const decision = new DecisionSupport({
      requestId: input.request_id,
      patientId: input.patient_id,
      timestamp,
    })
    decision.diagnoses.push(...input.diagnoses.map((d) => Diagnosis.fromJSON(d)))
    decision.urgency = input.urgency_level
    decision.triageScore = input.triage_score
    decision.alerts.push(...input.alerts)
    decision.warnings.push(...input.warnings)
    decision.clinicalNotes.push(...input.clinical_notes)
    decision.modelsUsed.push(...input.models_used)
    decision.processingTimeMs = input.processing_time_ms
    decision.explanation = input.explanation
    decision.featureImportance = { ...input.feature_importance }
    decision.metadata = structuredClone(input.metadata)
    return decision
  }
}
