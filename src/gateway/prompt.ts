import type { PatientRecord } from '../types/patient.js'
import type { DecisionSupport } from '../models/decision.js'

function listOrNone(items: readonly string[]): string {
  return items.length > 0 ? items.join(', ') : 'none'
}

/**
 * Plain-text rendering of a record and the strategy's findings, as input
 * for a diagnostic backend.
 */
export function formatPatientPrompt(record: PatientRecord, decision: DecisionSupport): string {
  const { patient } = record
  const lines = [
    `Patient age: ${patient.age ?? 'unknown'}`,
    `Gender: ${patient.gender}`,
    `Priority: ${record.priority}`,
    `Chief complaint: ${patient.chiefComplaint ?? 'none'}`,
    `Medical history: ${listOrNone(patient.medicalHistory)}`,
    `Current medications: ${listOrNone(patient.currentMedications)}`,
    `Allergies: ${listOrNone(patient.allergies)}`,
  ]

  for (const obs of record.observations) {
    switch (obs.kind) {
      case 'text':
        lines.push(`Note (${obs.documentType ?? 'text'}): ${obs.content}`)
        break
      case 'signal':
        lines.push(`Signal ${obs.signalType}: ${obs.values.length} samples at ${obs.samplingRate} Hz`)
        break
      case 'image':
        lines.push(`Image ${obs.modality}${obs.bodyPart ? ` of ${obs.bodyPart}` : ''}`)
        break
    }
  }

  if (decision.diagnoses.length > 0) {
    lines.push(
      `Candidate findings: ${decision.diagnoses
        .map((d) => `${d.condition} (${d.confidenceScore.toFixed(2)})`)
        .join('; ')}`,
    )
  }
  return lines.join('\n')
}
