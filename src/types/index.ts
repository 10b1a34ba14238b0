// Common types
export {
  IsoDateString,
  Priority,
  UrgencyLevel,
  ConfidenceLevel,
  Metadata,
} from './common.js'

// Patient records
export {
  DataSource,
  ObservationKind,
  TextObservationSchema,
  SignalObservationSchema,
  ImageObservationSchema,
  ClinicalObservationSchema,
  Gender,
  PatientSchema,
  PatientRecordSchema,
} from './patient.js'
export type {
  TextObservation,
  SignalObservation,
  ImageObservation,
  ClinicalObservation,
  Patient,
  PatientRecord,
} from './patient.js'

// Decisions
export { DiagnosisJsonSchema, DecisionSupportJsonSchema } from './decision.js'
export type { DiagnosisJson, DecisionSupportJson } from './decision.js'

// Monitoring
export {
  MonitoringEventTypeSchema,
  RequestStartedDataSchema,
  RequestCompletedDataSchema,
  RequestFailedDataSchema,
} from './monitoring.js'
export type {
  MonitoringEventType,
  MonitoringEventDataMap,
  MonitoringEvent,
  RequestStartedData,
  RequestCompletedData,
  RequestFailedData,
} from './monitoring.js'

// Configuration
export { GatewayConfigSchema } from './config.js'
export type { GatewayConfig } from './config.js'

// Audit
export { AuditEntrySchema } from './audit.js'
export type { AuditEntry } from './audit.js'
