import type { PatientRecord } from '../types/patient.js'
import {
  DEFAULT_OBSERVATION_LIMITS,
  validateObservation,
  type ObservationLimits,
} from '../models/observation.js'
import { describeError } from '../logging/logger.js'
import type { ProcessingContext } from './context.js'
import { ChainHandler, type StageOutcome } from './handler.js'

/**
 * Checks the patient identifier and runs every observation's structural
 * validator. All problems are collected before the stage decides; any
 * error fails the stage and halts the chain.
 */
export class ValidationHandler extends ChainHandler {
  readonly name = 'ValidationHandler'

  constructor(
    private readonly limits: ObservationLimits = DEFAULT_OBSERVATION_LIMITS,
    private readonly now: () => Date = () => new Date(),
  ) {
    super()
  }

  protected process(record: PatientRecord, context: ProcessingContext): StageOutcome {
    const errors: string[] = []
    const warnings: string[] = []

    if (record.patient.patientId.trim().length === 0) {
      errors.push('Missing patient ID')
    }

    record.observations.forEach((obs, idx) => {
      try {
        if (!validateObservation(obs, this.limits)) {
          errors.push(`Observation ${idx} (${obs.kind}) failed validation`)
        }
      } catch (err) {
        errors.push(`Validation error for observation ${idx}: ${describeError(err)}`)
      }
    })

    if (record.observations.length === 0) {
      warnings.push('No clinical data provided')
    }

    const dob = new Date(record.patient.dateOfBirth)
    if (dob.getTime() > this.now().getTime()) {
      warnings.push(`Date of birth ${record.patient.dateOfBirth} is in the future`)
    }

    const next = context.with('validation', {
      isValid: errors.length === 0,
      errors,
      warnings,
    })
    return errors.length === 0 ? this.pass(record, next) : this.fail(errors, next)
  }
}
