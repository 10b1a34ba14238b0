import type { PatientRecord } from '../types/patient.js'
import type { ProcessingContext } from './context.js'

/** Result of running one stage, or a chain of stages */
export type StageOutcome =
  | { ok: true; record: PatientRecord; context: ProcessingContext }
  | { ok: false; stage: string; errors: string[]; context: ProcessingContext }

/**
 * One link in the processing chain.
 *
 * `handle()` times the stage's `process()`, records the elapsed time in
 * the context under the handler's name, then forwards to the next link.
 * A failed outcome halts the chain: later links never see the record.
 */
export abstract class ChainHandler {
  abstract readonly name: string

  private next: ChainHandler | null = null

  /**
   * Link `handler` after this one.
   *
   * @returns The handler passed in, so links can be chained fluently
   */
  setNext(handler: ChainHandler): ChainHandler {
    this.next = handler
    return handler
  }

  get successor(): ChainHandler | null {
    return this.next
  }

  handle(record: PatientRecord, context: ProcessingContext): StageOutcome {
    const started = performance.now()
    const outcome = this.process(record, context)
    const timed = outcome.context.withTiming(this.name, performance.now() - started)

    if (!outcome.ok) {
      return { ...outcome, context: timed }
    }
    if (this.next === null) {
      return { ok: true, record: outcome.record, context: timed }
    }
    return this.next.handle(outcome.record, timed)
  }

  protected abstract process(record: PatientRecord, context: ProcessingContext): StageOutcome

  protected pass(record: PatientRecord, context: ProcessingContext): StageOutcome {
    return { ok: true, record, context }
  }

  protected fail(errors: string[], context: ProcessingContext): StageOutcome {
    return { ok: false, stage: this.name, errors, context }
  }
}
