import { Type, type Static } from '@sinclair/typebox'
import { IsoDateString, Priority } from './common.js'

/** Origin of a clinical observation */
export const DataSource = Type.Union([
  Type.Literal('electronic_health_record'),
  Type.Literal('laboratory'),
  Type.Literal('imaging'),
  Type.Literal('wearable_device'),
  Type.Literal('manual_entry'),
])
export type DataSource = Static<typeof DataSource>

export const ObservationKind = Type.Union([
  Type.Literal('text'),
  Type.Literal('signal'),
  Type.Literal('image'),
])
export type ObservationKind = Static<typeof ObservationKind>

const observationBase = {
  id: Type.String({ minLength: 1 }),
  patientId: Type.String({ default: '' }),
  timestamp: IsoDateString,
  source: DataSource,
  metadata: Type.Record(Type.String(), Type.Unknown(), { default: {} }),
  /** 0..1; filled in by enrichment when absent */
  qualityScore: Type.Optional(Type.Number({ minimum: 0, maximum: 1 })),
  /** Set only after the kind-specific structural check passes */
  validated: Type.Boolean({ default: false }),
}

/** Clinical notes, reports and transcriptions */
export const TextObservationSchema = Type.Object({
  kind: Type.Literal('text'),
  ...observationBase,
  content: Type.String(),
  language: Type.String({ default: 'en' }),
  documentType: Type.Optional(Type.String()),
})
export type TextObservation = Static<typeof TextObservationSchema>

/** Sampled physiological signals (ECG, EEG, SpO2 ...) */
export const SignalObservationSchema = Type.Object({
  kind: Type.Literal('signal'),
  ...observationBase,
  signalType: Type.String({ minLength: 1 }),
  samplingRate: Type.Number(),
  durationSeconds: Type.Number({ minimum: 0 }),
  units: Type.String({ default: '' }),
  values: Type.Array(Type.Number()),
})
export type SignalObservation = Static<typeof SignalObservationSchema>

/** Imaging studies (X-ray, CT, MRI, pathology slides) */
export const ImageObservationSchema = Type.Object({
  kind: Type.Literal('image'),
  ...observationBase,
  imagePath: Type.String(),
  imageFormat: Type.String({ default: 'DICOM' }),
  modality: Type.String({ minLength: 1 }),
  dimensions: Type.Array(Type.Number()),
  bodyPart: Type.Optional(Type.String()),
  contrastUsed: Type.Boolean({ default: false }),
})
export type ImageObservation = Static<typeof ImageObservationSchema>

export const ClinicalObservationSchema = Type.Union([
  TextObservationSchema,
  SignalObservationSchema,
  ImageObservationSchema,
])
export type ClinicalObservation = Static<typeof ClinicalObservationSchema>

export const Gender = Type.Union([
  Type.Literal('male'),
  Type.Literal('female'),
  Type.Literal('other'),
  Type.Literal('unknown'),
])
export type Gender = Static<typeof Gender>

/** Patient demographics and clinical context */
export const PatientSchema = Type.Object({
  patientId: Type.String(),
  dateOfBirth: IsoDateString,
  gender: Type.Union([...Gender.anyOf], { default: 'unknown' }),
  medicalRecordNumber: Type.String({ default: '' }),
  age: Type.Optional(Type.Integer({ minimum: 0 })),
  chiefComplaint: Type.Optional(Type.String()),
  medicalHistory: Type.Array(Type.String(), { default: [] }),
  currentMedications: Type.Array(Type.String(), { default: [] }),
  allergies: Type.Array(Type.String(), { default: [] }),
})
export type Patient = Static<typeof PatientSchema>

/** One clinical encounter: a patient plus its ordered observations */
export const PatientRecordSchema = Type.Object({
  patient: PatientSchema,
  observations: Type.Array(ClinicalObservationSchema, { default: [] }),
  encounterId: Type.Optional(Type.String()),
  priority: Type.Union([...Priority.anyOf], { default: 'routine' }),
  metadata: Type.Record(Type.String(), Type.Unknown(), { default: {} }),
})
export type PatientRecord = Static<typeof PatientRecordSchema>
