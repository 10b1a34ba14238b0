/**
 * Per-request processing context.
 *
 * Immutable: every stage gets a context and hands a new one to the next
 * link. Each typed slot can be written once; a second write throws
 * ContextError instead of replacing what an earlier stage recorded.
 */

import type { Priority } from '../types/common.js'
import { ContextError } from './errors.js'

export interface ValidationResult {
  isValid: boolean
  errors: string[]
  warnings: string[]
}

export interface EnrichmentResult {
  ageCalculated: boolean
  processingTimestamp: string
  dataCount: number
  /** Mean observation quality; absent when the record has no observations */
  averageQuality?: number
  hasText: boolean
  hasSignal: boolean
  hasImage: boolean
  hasCriticalHistory: boolean
}

export interface TriageResult {
  /** 0..100 */
  score: number
  priority: Priority
  factors: string[]
}

export interface NormalizationResult {
  normalizedCount: number
  operations: string[]
}

export interface ContextSlots {
  validation: ValidationResult
  enrichment: EnrichmentResult
  triage: TriageResult
  normalization: NormalizationResult
}

export type ContextSlot = keyof ContextSlots

export interface ProcessingContextInit {
  requestId: string
  startedAt?: Date
  requestContext?: Record<string, unknown>
}

function freezeResult<T extends object>(value: T): Readonly<T> {
  for (const inner of Object.values(value)) {
    if (Array.isArray(inner)) Object.freeze(inner)
  }
  return Object.freeze(value)
}

export class ProcessingContext {
  readonly requestId: string
  readonly startedAt: Date
  /** Caller-supplied options for this request */
  readonly requestContext: Readonly<Record<string, unknown>>
  /** Elapsed milliseconds per handler name */
  readonly processingTimes: Readonly<Record<string, number>>

  private readonly slots: Readonly<Partial<ContextSlots>>

  private constructor(
    requestId: string,
    startedAt: Date,
    requestContext: Readonly<Record<string, unknown>>,
    processingTimes: Readonly<Record<string, number>>,
    slots: Readonly<Partial<ContextSlots>>,
  ) {
    this.requestId = requestId
    this.startedAt = startedAt
    this.requestContext = requestContext
    this.processingTimes = processingTimes
    this.slots = slots
    Object.freeze(this)
  }

  static create(init: ProcessingContextInit): ProcessingContext {
    return new ProcessingContext(
      init.requestId,
      init.startedAt ?? new Date(),
      Object.freeze({ ...(init.requestContext ?? {}) }),
      Object.freeze({}),
      Object.freeze({}),
    )
  }

  get validation(): Readonly<ValidationResult> | undefined {
    return this.slots.validation
  }

  get enrichment(): Readonly<EnrichmentResult> | undefined {
    return this.slots.enrichment
  }

  get triage(): Readonly<TriageResult> | undefined {
    return this.slots.triage
  }

  get normalization(): Readonly<NormalizationResult> | undefined {
    return this.slots.normalization
  }

  has(slot: ContextSlot): boolean {
    return this.slots[slot] !== undefined
  }

  /**
   * New context with `slot` filled in.
   *
   * @throws ContextError when the slot already holds a value
   */
  with<K extends ContextSlot>(slot: K, value: ContextSlots[K]): ProcessingContext {
    if (this.has(slot)) {
      throw new ContextError(slot)
    }
    return new ProcessingContext(
      this.requestId,
      this.startedAt,
      this.requestContext,
      this.processingTimes,
      Object.freeze({ ...this.slots, [slot]: freezeResult(value) }),
    )
  }

  /** New context with the elapsed time recorded for `handlerName`. */
  withTiming(handlerName: string, elapsedMs: number): ProcessingContext {
    return new ProcessingContext(
      this.requestId,
      this.startedAt,
      this.requestContext,
      Object.freeze({ ...this.processingTimes, [handlerName]: elapsedMs }),
      this.slots,
    )
  }

  /** Plain-object copy of the filled slots, for decision metadata. */
  snapshot(): Partial<ContextSlots> & { processingTimes: Record<string, number> } {
    return {
      ...structuredClone(this.slots),
      processingTimes: { ...this.processingTimes },
    }
  }
}
