import type { UrgencyLevel } from '../types/common.js'
import type { MonitoringEvent } from '../types/monitoring.js'
import type { Observer } from './subject.js'

export interface MetricsSnapshot {
  requestsTotal: number
  requestsCompleted: number
  requestsFailed: number
  totalProcessingTimeMs: number
  avgProcessingTimeMs: number
  diagnosesMade: number
  urgencyLevels: Record<UrgencyLevel, number>
  uptimeSeconds: number
  requestsPerSecond: number
  /** completed / started; 0 before the first request */
  successRate: number
  timestamp: string
}

function emptyHistogram(): Record<UrgencyLevel, number> {
  return { routine: 0, soon: 0, urgent: 0, emergency: 0 }
}

/** Request counters, running average latency and urgency histogram. */
export class MetricsObserver implements Observer {
  readonly name = 'MetricsObserver'

  private started = 0
  private completed = 0
  private failed = 0
  private totalTimeMs = 0
  private diagnoses = 0
  private urgencyLevels = emptyHistogram()
  private startedAt: number

  constructor(private readonly getNow: () => number = Date.now) {
    this.startedAt = getNow()
  }

  update(event: MonitoringEvent): void {
    switch (event.event_type) {
      case 'request_started':
        this.started++
        break
      case 'request_completed':
        this.completed++
        this.totalTimeMs += event.data.processing_time_ms
        this.diagnoses += event.data.diagnoses_count
        this.urgencyLevels[event.data.urgency_level]++
        break
      case 'request_failed':
        this.failed++
        break
    }
  }

  metrics(): MetricsSnapshot {
    const now = this.getNow()
    const uptimeSeconds = (now - this.startedAt) / 1000
    return {
      requestsTotal: this.started,
      requestsCompleted: this.completed,
      requestsFailed: this.failed,
      totalProcessingTimeMs: this.totalTimeMs,
      avgProcessingTimeMs: this.completed > 0 ? this.totalTimeMs / this.completed : 0,
      diagnosesMade: this.diagnoses,
      urgencyLevels: { ...this.urgencyLevels },
      uptimeSeconds,
      requestsPerSecond: uptimeSeconds > 0 ? this.started / uptimeSeconds : 0,
      successRate: this.started > 0 ? this.completed / this.started : 0,
      timestamp: new Date(now).toISOString(),
    }
  }

  reset(): void {
    this.started = 0
    this.completed = 0
    this.failed = 0
    this.totalTimeMs = 0
    this.diagnoses = 0
    this.urgencyLevels = emptyHistogram()
    this.startedAt = this.getNow()
  }
}
