import type { MonitoringEvent, MonitoringEventType } from '../types/monitoring.js'
import type { AuditLogger } from '../audit/logger.js'
import { createLogger, describeError, type Logger } from '../logging/logger.js'
import { RingBuffer } from './ring-buffer.js'
import type { Observer } from './subject.js'

export interface AuditTrailEntry {
  timestamp: string
  event_type: MonitoringEventType
  data: Record<string, unknown>
}

export interface AuditTrailFilter {
  /** Inclusive lower bound */
  since?: Date
  /** Inclusive upper bound */
  until?: Date
  eventType?: MonitoringEventType
  patientId?: string
}

export interface AuditObserverOptions {
  /** In-memory entries kept before the oldest is evicted */
  maxEntries?: number
  /** Optional durable sink; write failures are logged, never rethrown */
  sink?: AuditLogger
  logger?: Logger
  getNow?: () => Date
}

export const DEFAULT_AUDIT_MAX_ENTRIES = 10_000

/**
 * Audit trail of every lifecycle event: a bounded in-memory buffer for
 * queries plus a best-effort append to the hash-chained audit file.
 */
export class AuditObserver implements Observer {
  readonly name = 'AuditObserver'

  private readonly entries: RingBuffer<AuditTrailEntry>
  private readonly sink: AuditLogger | undefined
  private readonly logger: Logger
  private readonly getNow: () => Date

  constructor(options: AuditObserverOptions = {}) {
    this.entries = new RingBuffer(options.maxEntries ?? DEFAULT_AUDIT_MAX_ENTRIES)
    this.sink = options.sink
    this.logger = options.logger ?? createLogger('audit')
    this.getNow = options.getNow ?? (() => new Date())
  }

  update(event: MonitoringEvent): void {
    const entry: AuditTrailEntry = {
      timestamp: this.getNow().toISOString(),
      event_type: event.event_type,
      data: { ...event.data },
    }
    this.entries.push(entry)
    this.writeToSink(entry)
  }

  private writeToSink(entry: AuditTrailEntry): void {
    if (!this.sink) return
    try {
      this.sink.append(entry)
    } catch (err) {
      this.logger.warn(`Could not append to audit log ${this.sink.auditPath}: ${describeError(err)}`)
    }
  }

  /** Entries matching every given filter, oldest first */
  trail(filter: AuditTrailFilter = {}): AuditTrailEntry[] {
    return this.entries.toArray().filter((e) => {
      if (filter.eventType !== undefined && e.event_type !== filter.eventType) return false
      const at = Date.parse(e.timestamp)
      if (filter.since !== undefined && at < filter.since.getTime()) return false
      if (filter.until !== undefined && at > filter.until.getTime()) return false
      if (filter.patientId !== undefined && e.data.patient_id !== filter.patientId) return false
      return true
    })
  }

  patientTrail(patientId: string): AuditTrailEntry[] {
    return this.trail({ patientId })
  }

  get size(): number {
    return this.entries.size
  }
}
