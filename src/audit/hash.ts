import { createHash } from 'node:crypto'

/** prev_hash of the first entry in a chain */
export const GENESIS_HASH = '0'.repeat(64)

/**
 * Deterministic JSON with object keys sorted at every depth. Array order
 * is kept; undefined object members are dropped.
 */
export function canonicalize(value: unknown): string {
  if (value === null || value === undefined) return 'null'
  if (Array.isArray(value)) {
    return '[' + value.map((el) => canonicalize(el)).join(',') + ']'
  }
  if (typeof value === 'object') {
    const pairs = Object.entries(value)
      .filter(([, v]) => v !== undefined)
      .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))
      .map(([k, v]) => JSON.stringify(k) + ':' + canonicalize(v))
    return '{' + pairs.join(',') + '}'
  }
  return JSON.stringify(value)
}

/** SHA-256 (hex) of the canonical form of an entry without its own hash */
export function hashEntry(entryWithoutHash: Record<string, unknown>): string {
  return createHash('sha256').update(canonicalize(entryWithoutHash)).digest('hex')
}
