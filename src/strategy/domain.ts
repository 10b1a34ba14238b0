import type { PatientRecord } from '../types/patient.js'
import { Diagnosis } from '../models/diagnosis.js'
import type { DecisionSupport } from '../models/decision.js'
import { lowercaseTexts } from '../models/observation.js'
import { BaseModelStrategy, capitalize, containsAnyKeyword } from './strategy.js'

/** Catch-all domain; always applicable */
export const GENERAL_DOMAIN = 'general'

export const DOMAIN_KEYWORDS: Readonly<Record<string, readonly string[]>> = {
  cardiology: ['heart', 'cardiac', 'cardiovascular', 'chest pain', 'ecg'],
  neurology: ['brain', 'neurological', 'seizure', 'stroke', 'headache'],
  pulmonology: ['lung', 'respiratory', 'breathing', 'pneumonia', 'copd'],
  oncology: ['cancer', 'tumor', 'malignancy', 'chemotherapy', 'radiation'],
  radiology: ['x-ray', 'ct', 'mri', 'imaging', 'scan'],
  [GENERAL_DOMAIN]: [],
}

const DOMAIN_CONFIDENCE = 0.72

/**
 * Specialty model selected by keyword. Matches when a domain keyword
 * appears in the chief complaint, a text observation or a history entry.
 * A domain without keywords (including "general") matches every record.
 */
export class DomainStrategy extends BaseModelStrategy {
  readonly keywords: readonly string[]

  constructor(readonly domain: string) {
    super(`domain_${domain}`)
    this.keywords = DOMAIN_KEYWORDS[domain] ?? []
  }

  canHandle(record: PatientRecord): boolean {
    if (this.domain === GENERAL_DOMAIN || this.keywords.length === 0) return true

    const haystacks = [
      ...(record.patient.chiefComplaint ? [record.patient.chiefComplaint.toLowerCase()] : []),
      ...lowercaseTexts(record.observations),
      ...record.patient.medicalHistory.map((c) => c.toLowerCase()),
    ]
    return containsAnyKeyword(haystacks, this.keywords)
  }

  protected analyze(_record: PatientRecord, decision: DecisionSupport): void {
    const label = capitalize(this.domain)
    decision.addDiagnosis(
      new Diagnosis({
        condition: `${label} Condition Detected`,
        confidenceScore: DOMAIN_CONFIDENCE,
        evidence: [`${label} indicators found`, 'Clinical correlation'],
        recommendedTests: [`${label} specialist consultation`],
        recommendedSpecialists: [`${label} specialist`],
      }),
    )
    decision.explanation = `Domain analysis for ${this.domain} completed`
    decision.featureImportance = {
      chief_complaint: 0.3,
      medical_history: 0.2,
      clinical_data: 0.5,
    }
  }
}
