export { createLogger, silentLogger, describeError } from './logger.js'
export type { Logger, LogLevel } from './logger.js'
