import { Type, type Static } from '@sinclair/typebox'
import { IsoDateString } from './common.js'
import { MonitoringEventTypeSchema } from './monitoring.js'

/** Hash-chained audit log entry schema (one JSONL line) */
export const AuditEntrySchema = Type.Object({
  sequence: Type.Number(),
  timestamp: IsoDateString,
  event_type: MonitoringEventTypeSchema,
  data: Type.Record(Type.String(), Type.Unknown()),
  prev_hash: Type.String(),
  hash: Type.String(),
})

export type AuditEntry = Static<typeof AuditEntrySchema>
