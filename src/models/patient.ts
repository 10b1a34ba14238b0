import { Value } from '@sinclair/typebox/value'
import type { TSchema } from '@sinclair/typebox'
import {
  ImageObservationSchema,
  PatientRecordSchema,
  SignalObservationSchema,
  TextObservationSchema,
  type ClinicalObservation,
  type Patient,
  type PatientRecord,
} from '../types/patient.js'
import { FormatError } from './errors.js'

const ANONYMIZED = 'ANONYMIZED'

/** Image metadata keys that identify the patient */
const IDENTIFYING_IMAGE_TAGS = ['patient_name', 'patient_dob']

/**
 * Whole years between a birth date and `now`, or undefined when the date
 * cannot be parsed or lies after `now`. Dates are compared in UTC.
 */
export function ageAt(dateOfBirth: string, now: Date): number | undefined {
  const dob = new Date(dateOfBirth)
  if (Number.isNaN(dob.getTime()) || dob.getTime() > now.getTime()) return undefined

  let age = now.getUTCFullYear() - dob.getUTCFullYear()
  const beforeBirthday =
    now.getUTCMonth() < dob.getUTCMonth() ||
    (now.getUTCMonth() === dob.getUTCMonth() && now.getUTCDate() < dob.getUTCDate())
  if (beforeBirthday) age -= 1
  return age
}

/**
 * Compute the patient's age from the birth date and store it on the patient.
 *
 * @returns The computed age, or undefined when the birth date is unparseable
 */
export function calculateAge(patient: Patient, now: Date = new Date()): number | undefined {
  const age = ageAt(patient.dateOfBirth, now)
  if (age !== undefined) {
    patient.age = age
  }
  return age
}

function anonymizeObservation(obs: ClinicalObservation): ClinicalObservation {
  const copy = structuredClone(obs)
  copy.patientId = ANONYMIZED
  if (copy.kind === 'image') {
    for (const tag of IDENTIFYING_IMAGE_TAGS) {
      delete copy.metadata[tag]
    }
  }
  return copy
}

/**
 * Copy of a record with direct identifiers removed. The birth date keeps
 * only its year.
 */
export function anonymizeRecord(record: PatientRecord): PatientRecord {
  const copy = structuredClone(record)
  const birthYear = new Date(record.patient.dateOfBirth).getUTCFullYear()
  copy.patient.patientId = ANONYMIZED
  copy.patient.medicalRecordNumber = ANONYMIZED
  copy.patient.dateOfBirth = Number.isNaN(birthYear) ? '' : `${birthYear}-01-01`
  copy.observations = record.observations.map(anonymizeObservation)
  return copy
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === 'object' && !Array.isArray(value)
}

function observationSchemaFor(kind: unknown): TSchema | undefined {
  switch (kind) {
    case 'text':
      return TextObservationSchema
    case 'signal':
      return SignalObservationSchema
    case 'image':
      return ImageObservationSchema
    default:
      return undefined
  }
}

/**
 * Parse untrusted input (a decoded JSON document) into a PatientRecord.
 *
 * Pipeline: clone -> apply schema defaults (record, then each observation
 * by its kind) -> validate against the TypeBox schema -> backfill
 * observation patient ids from the patient.
 *
 * @throws FormatError with field-level details when the input does not match
 */
export function parsePatientRecord(input: unknown): PatientRecord {
  const candidate = Value.Default(PatientRecordSchema, Value.Clone(input))

  if (isPlainObject(candidate) && Array.isArray(candidate.observations)) {
    candidate.observations = candidate.observations.map((obs: unknown) => {
      const schema = isPlainObject(obs) ? observationSchemaFor(obs.kind) : undefined
      return schema ? Value.Default(schema, obs) : obs
    })
  }

  if (!Value.Check(PatientRecordSchema, candidate)) {
    const fields = [...Value.Errors(PatientRecordSchema, candidate)].map((e) => ({
      path: e.path,
      message: e.message,
    }))
    const fieldMessages = fields.map((f) => `  - ${f.path}: ${f.message}`).join('\n')
    throw new FormatError(`Patient record invalid:\n${fieldMessages}`, fields)
  }

  for (const obs of candidate.observations) {
    if (obs.patientId === '') {
      obs.patientId = candidate.patient.patientId
    }
  }
  return candidate
}
