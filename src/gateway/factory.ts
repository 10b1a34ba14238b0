import type { GatewayConfig } from '../types/config.js'
import { AuditLogger } from '../audit/logger.js'
import { createDefaultHandlers } from '../pipeline/chain.js'
import { StrategySelector } from '../strategy/selector.js'
import { AuditObserver } from '../monitoring/audit-observer.js'
import { DataQualityObserver } from '../monitoring/data-quality-observer.js'
import { MetricsObserver } from '../monitoring/metrics-observer.js'
import { PerformanceObserver } from '../monitoring/performance-observer.js'
import { ClinicalGateway, type ClinicalGatewayOptions } from './gateway.js'

/** The stock observers wired into a configured gateway */
export interface GatewayObservers {
  metrics: MetricsObserver
  audit: AuditObserver
  performance: PerformanceObserver
  quality: DataQualityObserver
}

export interface ConfiguredGateway {
  gateway: ClinicalGateway
  observers: GatewayObservers
}

export type CreateGatewayOptions = Omit<ClinicalGatewayOptions, 'handlers' | 'selector' | 'observers'>

/**
 * Build a gateway from configuration: stock chain with the configured text
 * limit, stock selector, and the metrics / audit / performance / quality
 * observers. The audit file is opened only when audit is enabled.
 */
export function createGateway(config: GatewayConfig, options: CreateGatewayOptions = {}): ConfiguredGateway {
  const { audit, performance } = config.monitoring

  const observers: GatewayObservers = {
    metrics: new MetricsObserver(),
    audit: new AuditObserver({
      maxEntries: audit.maxEntries,
      sink: audit.enabled ? new AuditLogger(audit.path) : undefined,
      logger: options.logger,
    }),
    performance: new PerformanceObserver({
      slowThresholdMs: performance.slowThresholdMs,
      logger: options.logger,
    }),
    quality: new DataQualityObserver(),
  }

  const gateway = new ClinicalGateway({
    ...options,
    handlers: createDefaultHandlers({
      limits: { maxTextLength: config.validation.maxTextLength },
      now: options.now,
    }),
    selector: StrategySelector.createDefault({
      ensemble: config.strategies.ensemble,
      defaultDomain: config.strategies.defaultDomain,
    }),
    observers: [observers.metrics, observers.audit, observers.performance, observers.quality],
  })

  return { gateway, observers }
}
