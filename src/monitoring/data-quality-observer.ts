import type { MonitoringEvent } from '../types/monitoring.js'
import type { Observer } from './subject.js'

export interface QualityIssue {
  timestamp: string
  type: 'validation_failure'
  request_id: string
  error: string
}

export interface QualityReport {
  totalRecords: number
  validationFailures: number
  /** 1 - failures / records; 1 before the first record */
  qualityScore: number
  recentIssues: QualityIssue[]
}

const RECENT_ISSUES = 10

/** Tracks how many incoming records fail validation. */
export class DataQualityObserver implements Observer {
  readonly name = 'DataQualityObserver'

  private totalRecords = 0
  private validationFailures = 0
  private readonly issues: QualityIssue[] = []

  constructor(private readonly getNow: () => Date = () => new Date()) {}

  update(event: MonitoringEvent): void {
    if (event.event_type === 'request_started') {
      this.totalRecords++
    } else if (event.event_type === 'request_failed') {
      const { request_id, error } = event.data
      if (!error.toLowerCase().includes('validation')) return
      this.validationFailures++
      this.issues.push({
        timestamp: this.getNow().toISOString(),
        type: 'validation_failure',
        request_id,
        error,
      })
    }
  }

  report(): QualityReport {
    return {
      totalRecords: this.totalRecords,
      validationFailures: this.validationFailures,
      qualityScore:
        this.totalRecords === 0 ? 1 : 1 - this.validationFailures / this.totalRecords,
      recentIssues: this.issues.slice(-RECENT_ISSUES),
    }
  }
}
