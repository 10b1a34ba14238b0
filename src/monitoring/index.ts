export { MonitoringSubject } from './subject.js'
export type { Observer } from './subject.js'
export { MetricsObserver } from './metrics-observer.js'
export type { MetricsSnapshot } from './metrics-observer.js'
export { AuditObserver, DEFAULT_AUDIT_MAX_ENTRIES } from './audit-observer.js'
export type { AuditTrailEntry, AuditTrailFilter, AuditObserverOptions } from './audit-observer.js'
export { PerformanceObserver, DEFAULT_SLOW_THRESHOLD_MS } from './performance-observer.js'
export type {
  PerformanceEntry,
  PerformanceSummary,
  PerformanceObserverOptions,
} from './performance-observer.js'
export { DataQualityObserver } from './data-quality-observer.js'
export type { QualityIssue, QualityReport } from './data-quality-observer.js'
export { RingBuffer } from './ring-buffer.js'
