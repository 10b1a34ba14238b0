import type { ConfidenceLevel } from '../types/common.js'
import type { DiagnosisJson } from '../types/decision.js'

/**
 * Band a confidence score. Boundaries are inclusive on the lower edge:
 * exactly 0.9 is very_high, 0.8999 is high.
 */
export function confidenceLevelFor(score: number): ConfidenceLevel {
  if (score >= 0.9) return 'very_high'
  if (score >= 0.7) return 'high'
  if (score >= 0.5) return 'medium'
  if (score >= 0.3) return 'low'
  return 'very_low'
}

export interface DiagnosisInit {
  condition: string
  icdCode?: string
  confidenceScore?: number
  evidence?: string[]
  riskFactors?: string[]
  differentialDiagnoses?: string[]
  recommendedTests?: string[]
  recommendedSpecialists?: string[]
}

/**
 * A single candidate condition with its confidence and supporting evidence.
 *
 * The confidence level is derived from the score and recomputed on every
 * assignment, so the two never disagree.
 */
export class Diagnosis {
  readonly condition: string
  readonly icdCode: string | undefined
  readonly evidence: string[]
  readonly riskFactors: string[]
  readonly differentialDiagnoses: string[]
  readonly recommendedTests: string[]
  readonly recommendedSpecialists: string[]

  private score = 0
  private level: ConfidenceLevel = 'very_low'

  constructor(init: DiagnosisInit) {
    this.condition = init.condition
    this.icdCode = init.icdCode
    this.evidence = [...(init.evidence ?? [])]
    this.riskFactors = [...(init.riskFactors ?? [])]
    this.differentialDiagnoses = [...(init.differentialDiagnoses ?? [])]
    this.recommendedTests = [...(init.recommendedTests ?? [])]
    this.recommendedSpecialists = [...(init.recommendedSpecialists ?? [])]
    this.confidenceScore = init.confidenceScore ?? 0
  }

  get confidenceScore(): number {
    return this.score
  }

  /** @throws RangeError when the score is outside [0, 1] */
  set confidenceScore(value: number) {
    if (!(value >= 0 && value <= 1)) {
      throw new RangeError(`Confidence score must be within [0, 1], got ${value}`)
    }
    this.score = value
    this.level = confidenceLevelFor(value)
  }

  get confidenceLevel(): ConfidenceLevel {
    return this.level
  }

  /** Freeze the diagnosis and its lists. */
  freeze(): this {
    Object.freeze(this.evidence)
    Object.freeze(this.riskFactors)
    Object.freeze(this.differentialDiagnoses)
    Object.freeze(this.recommendedTests)
    Object.freeze(this.recommendedSpecialists)
    Object.freeze(this)
    return this
  }

  toJSON(): DiagnosisJson {
    return {
      condition: this.condition,
      icd_code: this.icdCode ?? null,
      confidence_score: this.score,
      confidence_level: this.level,
      evidence: [...this.evidence],
      risk_factors: [...this.riskFactors],
      differential_diagnoses: [...this.differentialDiagnoses],
      recommended_tests: [...this.recommendedTests],
      recommended_specialists: [...this.recommendedSpecialists],
    }
  }

  static fromJSON(json: DiagnosisJson): Diagnosis {
    return new Diagnosis({
      condition: json.condition,
      icdCode: json.icd_code ?? undefined,
      confidenceScore: json.confidence_score,
      evidence: json.evidence,
      riskFactors: json.risk_factors,
      differentialDiagnoses: json.differential_diagnoses,
      recommendedTests: json.recommended_tests,
      recommendedSpecialists: json.recommended_specialists,
    })
  }
}
