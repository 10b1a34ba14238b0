export * from './types/index.js'
export * from './models/index.js'
export * from './pipeline/index.js'
export * from './strategy/index.js'
export * from './monitoring/index.js'
export * from './gateway/index.js'
export * from './audit/index.js'
export * from './config/index.js'
export * from './logging/index.js'
