import type { PatientRecord } from '../types/patient.js'
import type { ProcessingContext } from '../pipeline/context.js'
import { DeviceStrategy } from './device.js'
import { DomainStrategy, GENERAL_DOMAIN } from './domain.js'
import { EnsembleStrategy } from './ensemble.js'
import { StrategySelectionError } from './errors.js'
import { PathologyStrategy } from './pathology.js'
import type { ModelStrategy } from './strategy.js'

export interface DefaultSelectorOptions {
  /** Wrap multiple matches in an ensemble */
  ensemble?: boolean
  /** Domain of the fallback strategy */
  defaultDomain?: string
}

/**
 * Picks the strategy to run for a record.
 *
 * 1. Keep registered strategies whose `canHandle` is true.
 * 2. None: fall back to the default strategy, or fail.
 * 3. Ensemble mode and more than one match: run them all as an ensemble.
 * 4. Otherwise the first match in registration order wins.
 */
export class StrategySelector {
  private readonly strategies: ModelStrategy[] = []
  private fallback: ModelStrategy | null = null
  private ensemble = false

  register(strategy: ModelStrategy): this {
    this.strategies.push(strategy)
    return this
  }

  setDefault(strategy: ModelStrategy): this {
    this.fallback = strategy
    return this
  }

  enableEnsemble(enabled: boolean = true): this {
    this.ensemble = enabled
    return this
  }

  get ensembleEnabled(): boolean {
    return this.ensemble
  }

  get defaultStrategy(): ModelStrategy | null {
    return this.fallback
  }

  /** @throws StrategySelectionError when nothing matches and no default is set */
  select(record: PatientRecord, context: ProcessingContext): ModelStrategy {
    const applicable = this.strategies.filter((s) => s.canHandle(record, context))

    if (applicable.length === 0) {
      if (this.fallback) return this.fallback
      throw new StrategySelectionError(
        'NO_APPLICABLE_STRATEGY',
        'No applicable strategy found and no default strategy set',
      )
    }

    if (this.ensemble && applicable.length > 1) {
      return new EnsembleStrategy(applicable)
    }

    return applicable[0]
  }

  /** Registered strategies, in registration order */
  list(): readonly ModelStrategy[] {
    return [...this.strategies]
  }

  /** Registered strategy names, in registration order */
  availableStrategies(): string[] {
    return this.strategies.map((s) => s.name)
  }

  /**
   * Selector with the stock strategies: five specialty domains, three
   * device families, two pathology models, and the default domain
   * (general unless configured), registered last unless already listed.
   */
  static createDefault(options: DefaultSelectorOptions = {}): StrategySelector {
    const selector = new StrategySelector()

    for (const domain of ['cardiology', 'neurology', 'pulmonology', 'oncology', 'radiology']) {
      selector.register(new DomainStrategy(domain))
    }
    for (const device of ['cardiac', 'neurological', 'respiratory']) {
      selector.register(new DeviceStrategy(device))
    }
    for (const pathology of ['cancer', 'tissue']) {
      selector.register(new PathologyStrategy(pathology))
    }

    const fallback = new DomainStrategy(options.defaultDomain ?? GENERAL_DOMAIN)
    if (!selector.availableStrategies().includes(fallback.name)) {
      selector.register(fallback)
    }
    selector.setDefault(fallback)
    selector.enableEnsemble(options.ensemble ?? false)
    return selector
  }
}
