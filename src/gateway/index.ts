export { ClinicalGateway } from './gateway.js'
export type { ClinicalGatewayOptions, GatewayStatistics, HealthReport } from './gateway.js'
export { createGateway } from './factory.js'
export type { GatewayObservers, ConfiguredGateway, CreateGatewayOptions } from './factory.js'
export { InMemoryDecisionStore } from './collaborators.js'
export type { DiagnosticBackend, DecisionStore } from './collaborators.js'
export { formatPatientPrompt } from './prompt.js'
