import type { MonitoringEvent } from '../types/monitoring.js'
import { createLogger, type Logger } from '../logging/logger.js'
import { RingBuffer } from './ring-buffer.js'
import type { Observer } from './subject.js'

export interface PerformanceEntry {
  timestamp: string
  request_id: string
  patient_id: string
  processing_time_ms: number
}

export interface PerformanceSummary {
  totalRequests: number
  avgProcessingTimeMs: number
  minProcessingTimeMs: number
  maxProcessingTimeMs: number
  slowRequestsCount: number
  alertsCount: number
}

export interface PerformanceObserverOptions {
  /** Completed requests slower than this are flagged */
  slowThresholdMs?: number
  /** Slow entries and alerts kept for inspection; older ones are evicted */
  maxEntries?: number
  logger?: Logger
  getNow?: () => Date
}

export const DEFAULT_SLOW_THRESHOLD_MS = 5000
export const DEFAULT_PERFORMANCE_MAX_ENTRIES = 1000

/**
 * Flags slow completions and raises an alert for every failed request.
 * Timing statistics are running totals; only the most recent slow entries
 * and alerts are retained.
 */
export class PerformanceObserver implements Observer {
  readonly name = 'PerformanceObserver'
  readonly slowThresholdMs: number

  private completedCount = 0
  private totalTimeMs = 0
  private minTimeMs = Infinity
  private maxTimeMs = -Infinity
  private slowCount = 0
  private alertsRaised = 0
  private readonly slow: RingBuffer<PerformanceEntry>
  private readonly alerts: RingBuffer<string>
  private readonly logger: Logger
  private readonly getNow: () => Date

  constructor(options: PerformanceObserverOptions = {}) {
    const maxEntries = options.maxEntries ?? DEFAULT_PERFORMANCE_MAX_ENTRIES
    this.slowThresholdMs = options.slowThresholdMs ?? DEFAULT_SLOW_THRESHOLD_MS
    this.slow = new RingBuffer(maxEntries)
    this.alerts = new RingBuffer(maxEntries)
    this.logger = options.logger ?? createLogger('performance')
    this.getNow = options.getNow ?? (() => new Date())
  }

  update(event: MonitoringEvent): void {
    if (event.event_type === 'request_completed') {
      const { request_id, patient_id, processing_time_ms } = event.data
      this.completedCount++
      this.totalTimeMs += processing_time_ms
      this.minTimeMs = Math.min(this.minTimeMs, processing_time_ms)
      this.maxTimeMs = Math.max(this.maxTimeMs, processing_time_ms)

      if (processing_time_ms > this.slowThresholdMs) {
        this.slowCount++
        this.slow.push({
          timestamp: this.getNow().toISOString(),
          request_id,
          patient_id,
          processing_time_ms,
        })
        this.raise(
          `Slow request detected: ${request_id} took ${processing_time_ms.toFixed(2)}ms ` +
            `(threshold: ${this.slowThresholdMs}ms)`,
        )
      }
    } else if (event.event_type === 'request_failed') {
      const { request_id, patient_id, error } = event.data
      this.raise(`Request failed: ${request_id} for patient ${patient_id} - ${error}`)
    }
  }

  private raise(message: string): void {
    this.alerts.push(message)
    this.alertsRaised++
    this.logger.warn(message)
  }

  summary(): PerformanceSummary {
    if (this.completedCount === 0) {
      return {
        totalRequests: 0,
        avgProcessingTimeMs: 0,
        minProcessingTimeMs: 0,
        maxProcessingTimeMs: 0,
        slowRequestsCount: 0,
        alertsCount: this.alertsRaised,
      }
    }
    return {
      totalRequests: this.completedCount,
      avgProcessingTimeMs: this.totalTimeMs / this.completedCount,
      minProcessingTimeMs: this.minTimeMs,
      maxProcessingTimeMs: this.maxTimeMs,
      slowRequestsCount: this.slowCount,
      alertsCount: this.alertsRaised,
    }
  }

  /** Retained slow entries, oldest first */
  slowRequests(): PerformanceEntry[] {
    return this.slow.toArray()
  }

  /** The most recent alerts, oldest first */
  recentAlerts(count: number = 10): string[] {
    return count > 0 ? this.alerts.toArray().slice(-count) : []
  }

  clearAlerts(): void {
    this.alerts.clear()
    this.alertsRaised = 0
  }
}
