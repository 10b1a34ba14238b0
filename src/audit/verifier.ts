import { existsSync, readFileSync } from 'node:fs'
import { Value } from '@sinclair/typebox/value'
import { AuditEntrySchema } from '../types/audit.js'
import { GENESIS_HASH, hashEntry } from './hash.js'

export interface VerificationIssue {
  line: number
  error: string
}

/** Result of audit chain verification */
export interface VerificationResult {
  valid: boolean
  /** Number of lines checked */
  entries: number
  errors: VerificationIssue[]
}

/**
 * Verify a hash-chained JSONL audit file.
 *
 * For each line: the entry matches the audit schema, its hash matches its
 * content, its prev_hash links to the previous line, and its sequence
 * increases. A missing or empty file is a valid, empty chain.
 */
export function verifyAuditChain(auditPath: string): VerificationResult {
  if (!existsSync(auditPath)) {
    return { valid: true, entries: 0, errors: [] }
  }
  const content = readFileSync(auditPath, 'utf-8').trim()
  if (content.length === 0) {
    return { valid: true, entries: 0, errors: [] }
  }

  const lines = content.split('\n')
  const errors: VerificationIssue[] = []
  let previousHash = GENESIS_HASH
  let previousSequence = 0

  lines.forEach((raw, i) => {
    const line = i + 1

    let parsed: unknown
    try {
      parsed = JSON.parse(raw)
    } catch {
      errors.push({ line, error: `Invalid JSON on line ${line}` })
      return
    }
    if (!Value.Check(AuditEntrySchema, parsed)) {
      errors.push({ line, error: `Malformed audit entry on line ${line}` })
      return
    }

    const { hash, ...withoutHash } = parsed
    const computed = hashEntry(withoutHash)
    if (hash !== computed) {
      errors.push({ line, error: `Hash mismatch on line ${line}: recorded ${hash}, computed ${computed}` })
    }
    if (parsed.prev_hash !== previousHash) {
      errors.push({
        line,
        error: `prev_hash mismatch on line ${line}: expected ${previousHash}, found ${parsed.prev_hash}`,
      })
    }
    if (parsed.sequence <= previousSequence) {
      errors.push({
        line,
        error: `Sequence not increasing on line ${line}: expected > ${previousSequence}, found ${parsed.sequence}`,
      })
    }

    previousHash = hash
    previousSequence = parsed.sequence
  })

  return { valid: errors.length === 0, entries: lines.length, errors }
}
