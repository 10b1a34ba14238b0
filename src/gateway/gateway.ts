/**
 * Clinical gateway: the per-request orchestrator.
 *
 * Flow for one record:
 * 1. emit request_started
 * 2. run the handler chain (validate -> enrich -> triage)
 * 3. select a strategy and let it populate a fresh DecisionSupport
 * 4. fold in triage score/urgency, optional backend narrative, persistence
 * 5. freeze the decision, emit request_completed, return it
 *
 * Validation and strategy-selection failures emit request_failed and are
 * rethrown to the caller. Backend and store failures are logged and the
 * request still completes.
 */

import { randomUUID } from 'node:crypto'
import type { PatientRecord } from '../types/patient.js'
import { DecisionSupport } from '../models/decision.js'
import { ProcessingContext } from '../pipeline/context.js'
import type { ChainHandler, StageOutcome } from '../pipeline/handler.js'
import { createDefaultHandlers, linkHandlers } from '../pipeline/chain.js'
import { ValidationError } from '../pipeline/errors.js'
import { StrategySelector } from '../strategy/selector.js'
import { MonitoringSubject, type Observer } from '../monitoring/subject.js'
import { createLogger, describeError, type Logger } from '../logging/logger.js'
import type { DecisionStore, DiagnosticBackend } from './collaborators.js'
import { formatPatientPrompt } from './prompt.js'

export interface ClinicalGatewayOptions {
  /** Processing chain, in order; defaults to validate -> enrich -> triage */
  handlers?: ChainHandler[]
  /** `null` runs without strategies; defaults to the stock selector */
  selector?: StrategySelector | null
  observers?: Iterable<Observer>
  backend?: DiagnosticBackend
  store?: DecisionStore
  logger?: Logger
  generateId?: () => string
  now?: () => Date
}

export interface GatewayStatistics {
  totalRequests: number
  failedRequests: number
  chainHandlers: string[]
  strategies: string[]
  observersCount: number
}

export interface HealthReport {
  status: 'healthy' | 'degraded'
  timestamp: string
  components: {
    chainHandlers: boolean
    strategySelector: boolean
    observers: number
  }
  warnings: string[]
}

export class ClinicalGateway {
  private handlers: ChainHandler[] = []
  private head: ChainHandler | null = null
  private selector: StrategySelector | null
  private readonly subject: MonitoringSubject
  private readonly backend: DiagnosticBackend | undefined
  private readonly store: DecisionStore | undefined
  private readonly logger: Logger
  private readonly generateId: () => string
  private readonly now: () => Date
  private completed = 0
  private failed = 0

  constructor(options: ClinicalGatewayOptions = {}) {
    this.logger = options.logger ?? createLogger('gateway')
    this.now = options.now ?? (() => new Date())
    this.generateId = options.generateId ?? randomUUID
    this.selector = options.selector === undefined ? StrategySelector.createDefault() : options.selector
    this.subject = new MonitoringSubject(options.observers ?? [], this.logger)
    this.backend = options.backend
    this.store = options.store
    this.setProcessingChain(options.handlers ?? createDefaultHandlers({ now: this.now }))
  }

  /**
   * Replace the processing chain. Handlers are linked in the given order.
   *
   * @throws Error when the list is empty
   */
  setProcessingChain(handlers: ChainHandler[]): void {
    this.head = linkHandlers(handlers)
    this.handlers = [...handlers]
  }

  setStrategySelector(selector: StrategySelector | null): void {
    this.selector = selector
  }

  attach(observer: Observer): boolean {
    return this.subject.attach(observer)
  }

  detach(observer: Observer): boolean {
    return this.subject.detach(observer)
  }

  /**
   * Run one record through the gateway.
   *
   * @param record - Owned by this request for its duration; enrichment and
   *   triage update it in place
   * @param requestContext - Caller options, visible to every stage
   * @returns The frozen decision
   * @throws ValidationError when the record fails validation
   * @throws StrategySelectionError when no strategy applies and none is the default
   */
  process(record: PatientRecord, requestContext: Record<string, unknown> = {}): DecisionSupport {
    const requestId = this.generateId()
    const patientId = record.patient.patientId
    const started = performance.now()
    const context = ProcessingContext.create({ requestId, startedAt: this.now(), requestContext })

    this.subject.notify({
      event_type: 'request_started',
      data: {
        request_id: requestId,
        patient_id: patientId,
        data_types: record.observations.map((o) => o.kind),
      },
    })

    try {
      const outcome = this.runChain(record, context)
      if (!outcome.ok) {
        throw new ValidationError(outcome.errors, outcome.context.validation?.warnings ?? [])
      }

      const decision = this.decide(outcome.record, outcome.context)
      decision.processingTimeMs = performance.now() - started
      this.persist(decision)
      decision.freeze()

      this.completed++
      this.subject.notify({
        event_type: 'request_completed',
        data: {
          request_id: requestId,
          patient_id: outcome.record.patient.patientId,
          processing_time_ms: decision.processingTimeMs,
          diagnoses_count: decision.diagnoses.length,
          urgency_level: decision.urgencyLevel,
        },
      })
      return decision
    } catch (err) {
      this.failed++
      this.subject.notify({
        event_type: 'request_failed',
        data: { request_id: requestId, patient_id: patientId, error: describeError(err) },
      })
      throw err
    }
  }

  private runChain(record: PatientRecord, context: ProcessingContext): StageOutcome {
    return this.head ? this.head.handle(record, context) : { ok: true, record, context }
  }

  private decide(record: PatientRecord, context: ProcessingContext): DecisionSupport {
    let decision = new DecisionSupport({
      requestId: context.requestId,
      patientId: record.patient.patientId,
      timestamp: this.now(),
    })

    if (this.selector) {
      const strategy = this.selector.select(record, context)
      decision = strategy.execute(record, decision, context)
    } else {
      decision.addClinicalNote('No model strategy configured - using default processing')
    }

    for (const warning of context.validation?.warnings ?? []) {
      decision.addWarning(warning)
    }

    const triage = context.triage
    if (triage) {
      decision.triageScore = triage.score
      decision.raiseUrgency(triage.priority)
    }

    this.narrate(record, decision)

    decision.metadata.context = context.snapshot()
    return decision
  }

  private narrate(record: PatientRecord, decision: DecisionSupport): void {
    if (!this.backend) return
    try {
      decision.explanation = this.backend.generate(formatPatientPrompt(record, decision))
    } catch (err) {
      this.logger.warn(`Diagnostic backend failed for ${decision.requestId}: ${describeError(err)}`)
      decision.addWarning('Diagnostic narrative unavailable')
    }
  }

  private persist(decision: DecisionSupport): void {
    if (!this.store) return
    try {
      this.store.save(decision)
    } catch (err) {
      this.logger.warn(`Could not store decision ${decision.requestId}: ${describeError(err)}`)
    }
  }

  statistics(): GatewayStatistics {
    return {
      totalRequests: this.completed,
      failedRequests: this.failed,
      chainHandlers: this.handlers.map((h) => h.name),
      strategies: this.selector?.availableStrategies() ?? [],
      observersCount: this.subject.size,
    }
  }

  healthCheck(): HealthReport {
    const warnings: string[] = []
    if (!this.selector) warnings.push('No strategy selector configured')
    return {
      status: warnings.length === 0 ? 'healthy' : 'degraded',
      timestamp: this.now().toISOString(),
      components: {
        chainHandlers: this.handlers.length > 0,
        strategySelector: this.selector !== null,
        observers: this.subject.size,
      },
      warnings,
    }
  }
}
