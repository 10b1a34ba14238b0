export { PRIORITY_RANK, outranks, higherPriority } from './priority.js'
export { FormatError } from './errors.js'
export type { FieldIssue } from './errors.js'
export {
  validateObservation,
  observationsOfKind,
  lowercaseTexts,
  DEFAULT_OBSERVATION_LIMITS,
} from './observation.js'
export type { ObservationLimits, ObservationOfKind } from './observation.js'
export { ageAt, calculateAge, anonymizeRecord, parsePatientRecord } from './patient.js'
export { Diagnosis, confidenceLevelFor } from './diagnosis.js'
export type { DiagnosisInit } from './diagnosis.js'
export { DecisionSupport } from './decision.js'
export type { DecisionSupportInit } from './decision.js'
