import type { PatientRecord } from '../types/patient.js'
import { Diagnosis } from '../models/diagnosis.js'
import type { DecisionSupport } from '../models/decision.js'
import { lowercaseTexts, observationsOfKind } from '../models/observation.js'
import { BaseModelStrategy, capitalize, containsAnyKeyword } from './strategy.js'

export const PATHOLOGY_MODALITIES: readonly string[] = ['PATHOLOGY', 'MRI', 'CT']

const BASE_PATHOLOGY_KEYWORDS: readonly string[] = ['biopsy', 'tumor', 'lesion', 'pathology']

const PATHOLOGY_CONFIDENCE = 0.75

/**
 * Tissue / cancer analysis model. Matches on pathology-grade imaging or a
 * pathology keyword (including the pathology type itself) in the notes.
 */
export class PathologyStrategy extends BaseModelStrategy {
  readonly keywords: readonly string[]

  constructor(readonly pathologyType: string) {
    super(`pathology_${pathologyType}`)
    this.keywords = [...BASE_PATHOLOGY_KEYWORDS, pathologyType.toLowerCase()]
  }

  canHandle(record: PatientRecord): boolean {
    const images = observationsOfKind(record.observations, 'image')
    if (images.some((img) => PATHOLOGY_MODALITIES.includes(img.modality))) return true
    return containsAnyKeyword(lowercaseTexts(record.observations), this.keywords)
  }

  protected analyze(_record: PatientRecord, decision: DecisionSupport): void {
    decision.addDiagnosis(
      new Diagnosis({
        condition: `${capitalize(this.pathologyType)} Analysis Required`,
        confidenceScore: PATHOLOGY_CONFIDENCE,
        evidence: ['Pathology imaging detected', 'Clinical indicators present'],
        recommendedTests: ['Detailed pathology review', 'Molecular testing'],
        recommendedSpecialists: ['Pathologist', 'Oncologist'],
      }),
    )
    decision.explanation = `Pathology analysis for ${this.pathologyType} completed`
  }
}
