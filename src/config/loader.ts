import { readFileSync } from 'node:fs'
import { Value } from '@sinclair/typebox/value'
import { GatewayConfigSchema, type GatewayConfig } from '../types/config.js'
import { DEFAULT_CONFIG, ENV_PREFIX } from './defaults.js'

/**
 * Configuration validation error with field-level details.
 */
export class ConfigError extends Error {
  public readonly fields: Array<{ path: string; message: string }>

  constructor(message: string, fields: Array<{ path: string; message: string }> = []) {
    super(message)
    this.name = 'ConfigError'
    this.fields = fields
  }
}

type PlainObject = Record<string, unknown>

function isPlainObject(value: unknown): value is PlainObject {
  return value !== null && typeof value === 'object' && !Array.isArray(value)
}

/**
 * Deep merge `source` over `target` into a new object. Arrays and scalars
 * from source replace what target had.
 */
function deepMerge(target: PlainObject, source: PlainObject): PlainObject {
  const result: PlainObject = { ...target }
  for (const [key, sourceVal] of Object.entries(source)) {
    const targetVal = result[key]
    result[key] =
      isPlainObject(sourceVal) && isPlainObject(targetVal)
        ? deepMerge(targetVal, sourceVal)
        : sourceVal
  }
  return result
}

/** Environment values are strings; turn "true"/"false" and numerals into their types. */
function coerceValue(value: string): string | number | boolean {
  const lower = value.toLowerCase()
  if (lower === 'true') return true
  if (lower === 'false') return false
  if (/^-?\d+$/.test(value)) return parseInt(value, 10)
  if (/^-?\d+\.\d+$/.test(value)) return parseFloat(value)
  return value
}

/**
 * Set `value` at `path`, matching each segment against existing keys
 * case-insensitively (env var names are upper case, config keys camelCase).
 */
function setPath(obj: PlainObject, path: string[], value: unknown): void {
  const resolve = (current: PlainObject, segment: string): string =>
    Object.keys(current).find((k) => k.toLowerCase() === segment.toLowerCase()) ?? segment

  let current = obj
  for (const segment of path.slice(0, -1)) {
    const key = resolve(current, segment)
    const child = current[key]
    if (isPlainObject(child)) {
      current = child
    } else {
      const created: PlainObject = {}
      current[key] = created
      current = created
    }
  }
  const last = path[path.length - 1]
  current[resolve(current, last)] = value
}

/**
 * Apply GATEWAY_ prefixed environment overrides. Double underscores
 * separate nesting levels:
 *   GATEWAY_MONITORING__PERFORMANCE__SLOWTHRESHOLDMS=250
 *     -> config.monitoring.performance.slowThresholdMs = 250
 */
function applyEnvOverrides(config: PlainObject, env: NodeJS.ProcessEnv): PlainObject {
  for (const [key, value] of Object.entries(env)) {
    if (!key.startsWith(ENV_PREFIX) || value === undefined) continue
    const path = key.slice(ENV_PREFIX.length).toLowerCase().split('__')
    setPath(config, path, coerceValue(value))
  }
  return config
}

function deepFreeze<T extends object>(obj: T): Readonly<T> {
  for (const value of Object.values(obj)) {
    if (value !== null && typeof value === 'object' && !Object.isFrozen(value)) {
      deepFreeze(value)
    }
  }
  return Object.freeze(obj)
}

function readConfigFile(configPath: string): PlainObject {
  let rawContent: string
  try {
    rawContent = readFileSync(configPath, 'utf-8')
  } catch (err) {
    if (err && typeof err === 'object' && 'code' in err && err.code === 'ENOENT') {
      throw new ConfigError(`Configuration file not found: ${configPath}`)
    }
    throw new ConfigError(`Failed to read configuration file: ${configPath}`)
  }

  let parsed: unknown
  try {
    parsed = JSON.parse(rawContent)
  } catch {
    throw new ConfigError(`Invalid JSON in configuration file: ${configPath}`)
  }
  if (!isPlainObject(parsed)) {
    throw new ConfigError(`Configuration file must contain a JSON object: ${configPath}`)
  }
  return parsed
}

/**
 * Merge overrides over the defaults, apply environment overrides, validate
 * and freeze.
 *
 * @throws ConfigError with field-level details on validation failure
 */
export function resolveConfig(
  overrides: PlainObject = {},
  env: NodeJS.ProcessEnv = process.env,
): GatewayConfig {
  const merged = applyEnvOverrides(
    deepMerge(structuredClone(DEFAULT_CONFIG), structuredClone(overrides)),
    env,
  )

  if (!Value.Check(GatewayConfigSchema, merged)) {
    const fields = [...Value.Errors(GatewayConfigSchema, merged)].map((e) => ({
      path: e.path,
      message: e.message,
    }))
    const fieldMessages = fields.map((f) => `  - ${f.path}: ${f.message}`).join('\n')
    throw new ConfigError(`Configuration invalid:\n${fieldMessages}`, fields)
  }
  return deepFreeze(merged)
}

/**
 * Load, validate, and return a frozen GatewayConfig.
 *
 * Pipeline: read file (when a path is given) -> parse JSON -> merge over
 * defaults -> apply env overrides -> validate against TypeBox schema -> freeze
 *
 * @param configPath - Path to gateway.config.json; defaults only when omitted
 * @throws ConfigError when the file is missing, unreadable or invalid
 */
export function loadConfig(configPath?: string, env: NodeJS.ProcessEnv = process.env): GatewayConfig {
  const userConfig = configPath === undefined ? {} : readConfigFile(configPath)
  return resolveConfig(userConfig, env)
}
