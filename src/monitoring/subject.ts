import type { MonitoringEvent } from '../types/monitoring.js'
import { createLogger, describeError, type Logger } from '../logging/logger.js'

/** Receives every lifecycle event emitted by a gateway */
export interface Observer {
  /** Shown in failure logs; defaults to the class name */
  readonly name?: string
  update(event: MonitoringEvent): void
}

function observerName(observer: Observer): string {
  return observer.name ?? observer.constructor.name
}

/**
 * Ordered set of observers owned by one gateway.
 *
 * Attach and detach are idempotent and identity-based. `notify` calls
 * observers in attachment order; an observer that throws is logged and
 * skipped, and the remaining observers are still notified.
 */
export class MonitoringSubject {
  private readonly observers: Observer[] = []

  constructor(
    observers: Iterable<Observer> = [],
    private readonly logger: Logger = createLogger('monitoring'),
  ) {
    for (const observer of observers) {
      this.attach(observer)
    }
  }

  /** @returns false when the observer was already attached */
  attach(observer: Observer): boolean {
    if (this.observers.includes(observer)) return false
    this.observers.push(observer)
    return true
  }

  /** @returns false when the observer was not attached */
  detach(observer: Observer): boolean {
    const idx = this.observers.indexOf(observer)
    if (idx === -1) return false
    this.observers.splice(idx, 1)
    return true
  }

  notify(event: MonitoringEvent): void {
    // Snapshot: an observer detaching itself mid-notify must not shift the rest
    for (const observer of [...this.observers]) {
      try {
        observer.update(event)
      } catch (err) {
        this.logger.error(
          `Observer ${observerName(observer)} failed on ${event.event_type}: ${describeError(err)}`,
        )
      }
    }
  }

  get size(): number {
    return this.observers.length
  }

  list(): readonly Observer[] {
    return [...this.observers]
  }
}
