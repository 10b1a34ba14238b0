import { describe, it, expect, beforeEach, afterEach } from 'vitest'
import { mkdtempSync, mkdirSync, readFileSync, rmSync } from 'node:fs'
import { join } from 'node:path'
import { tmpdir } from 'node:os'
import { MonitoringSubject, type Observer } from './subject.js'
import { MetricsObserver } from './metrics-observer.js'
import { AuditObserver } from './audit-observer.js'
import { PerformanceObserver } from './performance-observer.js'
import { DataQualityObserver } from './data-quality-observer.js'
import { RingBuffer } from './ring-buffer.js'
import { AuditLogger } from '../audit/logger.js'
import { verifyAuditChain } from '../audit/verifier.js'
import type { MonitoringEvent } from '../types/monitoring.js'
import type { UrgencyLevel } from '../types/common.js'
import { recordingLogger } from '../../tests/helpers/records.js'

function started(requestId: string, patientId = 'P-001'): MonitoringEvent {
  return {
    event_type: 'request_started',
    data: { request_id: requestId, patient_id: patientId, data_types: ['text'] },
  }
}

function completed(
  requestId: string,
  processingTimeMs: number,
  urgency: UrgencyLevel = 'routine',
  patientId = 'P-001',
): MonitoringEvent {
  return {
    event_type: 'request_completed',
    data: {
      request_id: requestId,
      patient_id: patientId,
      processing_time_ms: processingTimeMs,
      diagnoses_count: 1,
      urgency_level: urgency,
    },
  }
}

function failed(requestId: string, error: string, patientId = 'P-001'): MonitoringEvent {
  return {
    event_type: 'request_failed',
    data: { request_id: requestId, patient_id: patientId, error },
  }
}

/** Observer that keeps every event it receives */
class CollectingObserver implements Observer {
  readonly events: MonitoringEvent[] = []

  constructor(readonly name: string) {}

  update(event: MonitoringEvent): void {
    this.events.push(event)
  }
}

class ThrowingObserver implements Observer {
  readonly name = 'ThrowingObserver'

  update(): void {
    throw new Error('disk full')
  }
}

describe('MonitoringSubject', () => {
  it('should keep notifying after an observer throws', () => {
    const logger = recordingLogger()
    const after = new CollectingObserver('after')
    const subject = new MonitoringSubject([new ThrowingObserver(), after], logger)

    subject.notify(started('req-1'))

    expect(after.events).toHaveLength(1)
    expect(logger.lines).toEqual(['ERROR Observer ThrowingObserver failed on request_started: disk full'])
  })

  it('should treat attach and detach as idempotent', () => {
    const subject = new MonitoringSubject([], recordingLogger())
    const observer = new CollectingObserver('a')

    expect(subject.attach(observer)).toBe(true)
    expect(subject.attach(observer)).toBe(false)
    expect(subject.size).toBe(1)

    subject.notify(started('req-1'))
    expect(observer.events).toHaveLength(1)

    expect(subject.detach(observer)).toBe(true)
    expect(subject.detach(observer)).toBe(false)
    subject.notify(started('req-2'))
    expect(observer.events).toHaveLength(1)
  })

  it('should notify in attachment order', () => {
    const order: string[] = []
    const make = (name: string): Observer => ({ name, update: () => order.push(name) })
    const subject = new MonitoringSubject([make('first'), make('second')], recordingLogger())
    subject.attach(make('third'))

    subject.notify(started('req-1'))
    expect(order).toEqual(['first', 'second', 'third'])
    expect(subject.list().map((o) => o.name)).toEqual(['first', 'second', 'third'])
  })

  it('should fall back to the class name in failure logs', () => {
    class Anonymous implements Observer {
      update(): void {
        throw new Error('boom')
      }
    }
    const logger = recordingLogger()
    new MonitoringSubject([new Anonymous()], logger).notify(failed('req-1', 'x'))
    expect(logger.lines).toEqual(['ERROR Observer Anonymous failed on request_failed: boom'])
  })
})

describe('MetricsObserver', () => {
  let clock: number
  let metrics: MetricsObserver

  beforeEach(() => {
    clock = 1_000_000
    metrics = new MetricsObserver(() => clock)
  })

  it('should report zeros before any event', () => {
    const snapshot = metrics.metrics()
    expect(snapshot.requestsTotal).toBe(0)
    expect(snapshot.avgProcessingTimeMs).toBe(0)
    expect(snapshot.successRate).toBe(0)
    expect(snapshot.requestsPerSecond).toBe(0)
  })

  it('should count requests and average completion time', () => {
    metrics.update(started('a'))
    metrics.update(completed('a', 100, 'urgent'))
    metrics.update(started('b'))
    metrics.update(completed('b', 300, 'urgent'))
    metrics.update(started('c'))
    metrics.update(failed('c', 'Validation failed: Missing patient ID'))
    metrics.update(started('d'))
    metrics.update(completed('d', 200))
    clock += 2000

    const snapshot = metrics.metrics()
    expect(snapshot.requestsTotal).toBe(4)
    expect(snapshot.requestsCompleted).toBe(3)
    expect(snapshot.requestsFailed).toBe(1)
    expect(snapshot.totalProcessingTimeMs).toBe(600)
    expect(snapshot.avgProcessingTimeMs).toBe(200)
    expect(snapshot.diagnosesMade).toBe(3)
    expect(snapshot.urgencyLevels).toEqual({ routine: 1, soon: 0, urgent: 2, emergency: 0 })
    expect(snapshot.uptimeSeconds).toBe(2)
    expect(snapshot.requestsPerSecond).toBe(2)
    expect(snapshot.successRate).toBe(0.75)
    expect(snapshot.timestamp).toBe(new Date(1_002_000).toISOString())
  })

  it('should clear counters on reset', () => {
    metrics.update(started('a'))
    metrics.update(completed('a', 50))
    metrics.reset()
    const snapshot = metrics.metrics()
    expect(snapshot.requestsTotal).toBe(0)
    expect(snapshot.urgencyLevels).toEqual({ routine: 0, soon: 0, urgent: 0, emergency: 0 })
  })
})

describe('RingBuffer', () => {
  it('should evict the oldest item when full', () => {
    const buffer = new RingBuffer<number>(3)
    for (const n of [1, 2, 3, 4, 5]) buffer.push(n)
    expect(buffer.toArray()).toEqual([3, 4, 5])
    expect(buffer.size).toBe(3)
  })

  it('should reject a non-positive capacity', () => {
    expect(() => new RingBuffer(0)).toThrow(RangeError)
  })

  it('should empty on clear', () => {
    const buffer = new RingBuffer<string>(2)
    buffer.push('a')
    buffer.clear()
    expect(buffer.toArray()).toEqual([])
    buffer.push('b')
    expect(buffer.toArray()).toEqual(['b'])
  })
})

describe('AuditObserver', () => {
  let tempDir: string

  beforeEach(() => {
    tempDir = mkdtempSync(join(tmpdir(), 'gateway-audit-observer-'))
  })

  afterEach(() => {
    rmSync(tempDir, { recursive: true, force: true })
  })

  function steppingClock(startIso: string): () => Date {
    let t = Date.parse(startIso)
    return () => {
      const now = new Date(t)
      t += 60_000
      return now
    }
  }

  it('should keep only the most recent maxEntries events', () => {
    const observer = new AuditObserver({ maxEntries: 2, logger: recordingLogger() })
    observer.update(started('a'))
    observer.update(started('b'))
    observer.update(started('c'))

    expect(observer.size).toBe(2)
    expect(observer.trail().map((e) => e.data.request_id)).toEqual(['b', 'c'])
  })

  it('should filter by event type, patient and time window', () => {
    const observer = new AuditObserver({
      logger: recordingLogger(),
      getNow: steppingClock('2026-03-01T10:00:00.000Z'),
    })
    observer.update(started('a', 'P-001')) // 10:00
    observer.update(completed('a', 10, 'routine', 'P-001')) // 10:01
    observer.update(started('b', 'P-002')) // 10:02
    observer.update(failed('b', 'Validation failed: x', 'P-002')) // 10:03

    expect(observer.trail({ eventType: 'request_started' }).map((e) => e.data.request_id)).toEqual(['a', 'b'])
    expect(observer.patientTrail('P-002').map((e) => e.event_type)).toEqual([
      'request_started',
      'request_failed',
    ])
    const window = observer.trail({
      since: new Date('2026-03-01T10:01:00.000Z'),
      until: new Date('2026-03-01T10:02:00.000Z'),
    })
    expect(window.map((e) => e.timestamp)).toEqual([
      '2026-03-01T10:01:00.000Z',
      '2026-03-01T10:02:00.000Z',
    ])
  })

  it('should append every event to the hash-chained sink', () => {
    const auditPath = join(tempDir, 'audit.jsonl')
    const observer = new AuditObserver({ sink: new AuditLogger(auditPath), logger: recordingLogger() })
    observer.update(started('a'))
    observer.update(completed('a', 12))

    const lines = readFileSync(auditPath, 'utf-8').trim().split('\n')
    expect(lines).toHaveLength(2)
    expect(JSON.parse(lines[1])).toMatchObject({ sequence: 2, event_type: 'request_completed' })
    expect(verifyAuditChain(auditPath)).toEqual({ valid: true, entries: 2, errors: [] })
  })

  it('should log sink failures and keep the in-memory entry', () => {
    const auditPath = join(tempDir, 'audit.jsonl')
    const sink = new AuditLogger(auditPath)
    // A directory at the file path makes every append fail
    mkdirSync(auditPath)
    const logger = recordingLogger()
    const observer = new AuditObserver({ sink, logger })

    expect(() => observer.update(started('a'))).not.toThrow()
    expect(observer.size).toBe(1)
    expect(logger.lines).toHaveLength(1)
    expect(logger.lines[0]).toMatch(/^WARN Could not append to audit log .*audit\.jsonl: /)
  })
})

describe('PerformanceObserver', () => {
  it('should flag completions above the threshold', () => {
    const logger = recordingLogger()
    const observer = new PerformanceObserver({ slowThresholdMs: 100, logger })
    observer.update(completed('fast', 40))
    observer.update(completed('edge', 100))
    observer.update(completed('slow', 250.5))

    expect(observer.slowRequests().map((e) => e.request_id)).toEqual(['slow'])
    expect(observer.recentAlerts()).toEqual([
      'Slow request detected: slow took 250.50ms (threshold: 100ms)',
    ])
    expect(logger.lines).toEqual(['WARN Slow request detected: slow took 250.50ms (threshold: 100ms)'])
  })

  it('should raise an alert for every failure', () => {
    const observer = new PerformanceObserver({ logger: recordingLogger() })
    observer.update(failed('req-9', 'Validation failed: Missing patient ID', 'P-009'))
    expect(observer.recentAlerts()).toEqual([
      'Request failed: req-9 for patient P-009 - Validation failed: Missing patient ID',
    ])
  })

  it('should summarize recorded completions', () => {
    const observer = new PerformanceObserver({ slowThresholdMs: 100, logger: recordingLogger() })
    expect(observer.summary()).toEqual({
      totalRequests: 0,
      avgProcessingTimeMs: 0,
      minProcessingTimeMs: 0,
      maxProcessingTimeMs: 0,
      slowRequestsCount: 0,
      alertsCount: 0,
    })

    observer.update(completed('a', 20))
    observer.update(completed('b', 40))
    observer.update(completed('c', 150))
    observer.update(failed('d', 'boom'))

    expect(observer.summary()).toEqual({
      totalRequests: 3,
      avgProcessingTimeMs: 70,
      minProcessingTimeMs: 20,
      maxProcessingTimeMs: 150,
      slowRequestsCount: 1,
      alertsCount: 2,
    })
  })

  it('should return the last n alerts and clear them', () => {
    const observer = new PerformanceObserver({ logger: recordingLogger() })
    for (const id of ['a', 'b', 'c']) observer.update(failed(id, 'boom'))

    expect(observer.recentAlerts(2)).toEqual([
      'Request failed: b for patient P-001 - boom',
      'Request failed: c for patient P-001 - boom',
    ])
    expect(observer.recentAlerts(0)).toEqual([])
    observer.clearAlerts()
    expect(observer.recentAlerts()).toEqual([])
  })

  it('should summarize a long run of completions from running totals', () => {
    const observer = new PerformanceObserver({ logger: recordingLogger() })
    for (let i = 0; i < 300_000; i++) observer.update(completed(`r${i}`, i % 1000))

    expect(observer.summary()).toEqual({
      totalRequests: 300_000,
      avgProcessingTimeMs: 499.5,
      minProcessingTimeMs: 0,
      maxProcessingTimeMs: 999,
      slowRequestsCount: 0,
      alertsCount: 0,
    })
  })

  it('should keep only the newest slow entries and alerts', () => {
    const observer = new PerformanceObserver({ slowThresholdMs: 10, maxEntries: 2, logger: recordingLogger() })
    for (const id of ['a', 'b', 'c']) observer.update(completed(id, 50))

    expect(observer.slowRequests().map((e) => e.request_id)).toEqual(['b', 'c'])
    expect(observer.recentAlerts()).toEqual([
      'Slow request detected: b took 50.00ms (threshold: 10ms)',
      'Slow request detected: c took 50.00ms (threshold: 10ms)',
    ])
    expect(observer.summary().slowRequestsCount).toBe(3)
    expect(observer.summary().alertsCount).toBe(3)
  })
})

describe('DataQualityObserver', () => {
  it('should count only validation failures against started records', () => {
    const observer = new DataQualityObserver(() => new Date('2026-03-01T12:00:00.000Z'))
    expect(observer.report().qualityScore).toBe(1)

    for (const id of ['a', 'b', 'c', 'd']) observer.update(started(id))
    observer.update(failed('a', 'Validation failed: Missing patient ID'))
    observer.update(failed('b', 'No applicable strategy found and no default strategy set'))

    expect(observer.report()).toEqual({
      totalRecords: 4,
      validationFailures: 1,
      qualityScore: 0.75,
      recentIssues: [
        {
          timestamp: '2026-03-01T12:00:00.000Z',
          type: 'validation_failure',
          request_id: 'a',
          error: 'Validation failed: Missing patient ID',
        },
      ],
    })
  })
})
