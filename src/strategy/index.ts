export { BaseModelStrategy, capitalize, containsAnyKeyword } from './strategy.js'
export type { ModelStrategy, ModelInfo } from './strategy.js'
export { DomainStrategy, DOMAIN_KEYWORDS, GENERAL_DOMAIN } from './domain.js'
export { DeviceStrategy, DEVICE_SIGNAL_TYPES } from './device.js'
export { PathologyStrategy, PATHOLOGY_MODALITIES } from './pathology.js'
export { EnsembleStrategy } from './ensemble.js'
export { StrategySelector } from './selector.js'
export type { DefaultSelectorOptions } from './selector.js'
export { StrategySelectionError } from './errors.js'
export type { StrategyErrorCode } from './errors.js'
