import { Type, type Static } from '@sinclair/typebox'
import { UrgencyLevel } from './common.js'
import { ObservationKind } from './patient.js'

export const MonitoringEventTypeSchema = Type.Union([
  Type.Literal('request_started'),
  Type.Literal('request_completed'),
  Type.Literal('request_failed'),
])
export type MonitoringEventType = Static<typeof MonitoringEventTypeSchema>

export const RequestStartedDataSchema = Type.Object({
  request_id: Type.String(),
  patient_id: Type.String(),
  data_types: Type.Array(ObservationKind),
})
export type RequestStartedData = Static<typeof RequestStartedDataSchema>

export const RequestCompletedDataSchema = Type.Object({
  request_id: Type.String(),
  patient_id: Type.String(),
  processing_time_ms: Type.Number(),
  diagnoses_count: Type.Integer(),
  urgency_level: UrgencyLevel,
})
export type RequestCompletedData = Static<typeof RequestCompletedDataSchema>

export const RequestFailedDataSchema = Type.Object({
  request_id: Type.String(),
  patient_id: Type.String(),
  error: Type.String(),
})
export type RequestFailedData = Static<typeof RequestFailedDataSchema>

/** Payload carried by each lifecycle event type */
export interface MonitoringEventDataMap {
  request_started: RequestStartedData
  request_completed: RequestCompletedData
  request_failed: RequestFailedData
}

/** A lifecycle event; `data` is narrowed by `event_type` */
export type MonitoringEvent = {
  [K in MonitoringEventType]: { event_type: K; data: MonitoringEventDataMap[K] }
}[MonitoringEventType]
