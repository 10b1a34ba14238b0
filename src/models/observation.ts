import type {
  ClinicalObservation,
  ImageObservation,
  ObservationKind,
  SignalObservation,
  TextObservation,
} from '../types/patient.js'

/** Structural limits applied by the per-kind validators */
export interface ObservationLimits {
  maxTextLength: number
}

export const DEFAULT_OBSERVATION_LIMITS: ObservationLimits = {
  maxTextLength: 1_000_000,
}

/** Allowed relative deviation between sample count and duration x rate */
const SAMPLE_COUNT_TOLERANCE = 0.1

export type ObservationOfKind<K extends ObservationKind> = Extract<ClinicalObservation, { kind: K }>

function checkText(obs: TextObservation, limits: ObservationLimits): boolean {
  if (obs.content.trim().length === 0) return false
  return obs.content.length <= limits.maxTextLength
}

function checkSignal(obs: SignalObservation): boolean {
  if (obs.values.length === 0) return false
  if (obs.samplingRate <= 0) return false
  const expected = Math.trunc(obs.durationSeconds * obs.samplingRate)
  return Math.abs(obs.values.length - expected) <= expected * SAMPLE_COUNT_TOLERANCE
}

function checkImage(obs: ImageObservation): boolean {
  if (obs.imagePath.length === 0) return false
  return obs.dimensions.every((d) => d > 0)
}

function assertNever(value: never): never {
  throw new Error(`Unhandled observation kind: ${JSON.stringify(value)}`)
}

/**
 * Run the kind-specific structural check for one observation.
 *
 * Marks the observation as validated when the check passes. A failed
 * check leaves the flag untouched.
 */
export function validateObservation(
  obs: ClinicalObservation,
  limits: ObservationLimits = DEFAULT_OBSERVATION_LIMITS,
): boolean {
  let passed: boolean
  switch (obs.kind) {
    case 'text':
      passed = checkText(obs, limits)
      break
    case 'signal':
      passed = checkSignal(obs)
      break
    case 'image':
      passed = checkImage(obs)
      break
    default:
      return assertNever(obs)
  }
  if (passed) {
    obs.validated = true
  }
  return passed
}

/** Observations of one kind, in record order. */
export function observationsOfKind<K extends ObservationKind>(
  observations: readonly ClinicalObservation[],
  kind: K,
): ObservationOfKind<K>[] {
  return observations.filter((o): o is ObservationOfKind<K> => o.kind === kind)
}

/** Text content of every text observation, lowercased */
export function lowercaseTexts(observations: readonly ClinicalObservation[]): string[] {
  return observationsOfKind(observations, 'text').map((o) => o.content.toLowerCase())
}
