import { Type, type Static } from '@sinclair/typebox'

/** ISO 8601 timestamp string */
export const IsoDateString = Type.String()
export type IsoDateString = Static<typeof IsoDateString>

/** Four-valued urgency band, shared by record priority and decision urgency */
export const Priority = Type.Union([
  Type.Literal('routine'),
  Type.Literal('soon'),
  Type.Literal('urgent'),
  Type.Literal('emergency'),
])
export type Priority = Static<typeof Priority>

export const UrgencyLevel = Priority
export type UrgencyLevel = Priority

/** Banded classification of a diagnosis confidence score */
export const ConfidenceLevel = Type.Union([
  Type.Literal('very_low'),
  Type.Literal('low'),
  Type.Literal('medium'),
  Type.Literal('high'),
  Type.Literal('very_high'),
])
export type ConfidenceLevel = Static<typeof ConfidenceLevel>

/** Free-form string-keyed metadata bag */
export const Metadata = Type.Record(Type.String(), Type.Unknown())
export type Metadata = Static<typeof Metadata>
