import type { PatientRecord } from '../types/patient.js'
import { Diagnosis } from '../models/diagnosis.js'
import type { DecisionSupport } from '../models/decision.js'
import { observationsOfKind } from '../models/observation.js'
import { BaseModelStrategy } from './strategy.js'

/** Signal types each device family reads */
export const DEVICE_SIGNAL_TYPES: Readonly<Record<string, readonly string[]>> = {
  cardiac: ['ECG', 'EKG'],
  neurological: ['EEG'],
  respiratory: ['SpO2', 'Respiration'],
}

const DEVICE_CONFIDENCE = 0.68

/** Monitoring-device model; matches records carrying one of its signal types. */
export class DeviceStrategy extends BaseModelStrategy {
  readonly signalTypes: readonly string[]

  constructor(readonly deviceType: string) {
    super(`device_${deviceType}`)
    this.signalTypes = DEVICE_SIGNAL_TYPES[deviceType] ?? []
  }

  private matchingSignals(record: PatientRecord) {
    return observationsOfKind(record.observations, 'signal').filter((s) =>
      this.signalTypes.includes(s.signalType),
    )
  }

  canHandle(record: PatientRecord): boolean {
    return this.matchingSignals(record).length > 0
  }

  /** One diagnosis per matching signal observation */
  protected analyze(record: PatientRecord, decision: DecisionSupport): void {
    const specialist = this.deviceType === 'cardiac' ? 'Cardiologist' : 'Specialist'
    for (const signal of this.matchingSignals(record)) {
      decision.addDiagnosis(
        new Diagnosis({
          condition: `Abnormal ${signal.signalType} Pattern`,
          confidenceScore: DEVICE_CONFIDENCE,
          evidence: [`${signal.signalType} signal analysis`, 'Pattern recognition'],
          recommendedTests: [`Extended ${signal.signalType} monitoring`],
          recommendedSpecialists: [specialist],
        }),
      )
    }
    decision.explanation = `Device analysis for ${this.deviceType} signals completed`
  }
}
