import { Type, type Static } from '@sinclair/typebox'
import { ConfidenceLevel, IsoDateString, Metadata, UrgencyLevel } from './common.js'

/** Serialized diagnosis, as it appears in a decision's `diagnoses[]` */
export const DiagnosisJsonSchema = Type.Object({
  condition: Type.String(),
  icd_code: Type.Union([Type.String(), Type.Null()]),
  confidence_score: Type.Number({ minimum: 0, maximum: 1 }),
  confidence_level: ConfidenceLevel,
  evidence: Type.Array(Type.String()),
  risk_factors: Type.Array(Type.String()),
  differential_diagnoses: Type.Array(Type.String()),
  recommended_tests: Type.Array(Type.String()),
  recommended_specialists: Type.Array(Type.String()),
})
export type DiagnosisJson = Static<typeof DiagnosisJsonSchema>

/** JSON shape of a completed decision support result */
export const DecisionSupportJsonSchema = Type.Object({
  request_id: Type.String(),
  patient_id: Type.String(),
  timestamp: IsoDateString,
  diagnoses: Type.Array(DiagnosisJsonSchema),
  urgency_level: UrgencyLevel,
  triage_score: Type.Number({ minimum: 0, maximum: 100 }),
  alerts: Type.Array(Type.String()),
  warnings: Type.Array(Type.String()),
  clinical_notes: Type.Array(Type.String()),
  models_used: Type.Array(Type.String()),
  processing_time_ms: Type.Number({ minimum: 0 }),
  explanation: Type.Union([Type.String(), Type.Null()]),
  feature_importance: Type.Record(Type.String(), Type.Number()),
  metadata: Metadata,
})
export type DecisionSupportJson = Static<typeof DecisionSupportJsonSchema>
