import { appendFileSync, existsSync, mkdirSync, readFileSync } from 'node:fs'
import { dirname } from 'node:path'
import type { AuditEntry } from '../types/audit.js'
import type { MonitoringEventType } from '../types/monitoring.js'
import { GENESIS_HASH, hashEntry } from './hash.js'

/** Event data for one audit line */
export interface AuditEvent {
  event_type: MonitoringEventType
  data: Record<string, unknown>
  /** Defaults to the time of the append */
  timestamp?: string
}

/**
 * Append-only hash-chained JSONL audit file.
 *
 * Every line carries the SHA-256 of its canonical JSON (hash field
 * excluded) and the hash of the line before it, so an edited or dropped
 * line breaks the chain. Reopening an existing file resumes the chain
 * from its last readable line.
 */
export class AuditLogger {
  private lastHash = GENESIS_HASH
  private sequence = 0

  constructor(readonly auditPath: string) {
    if (!existsSync(auditPath)) {
      mkdirSync(dirname(auditPath), { recursive: true })
      return
    }

    const lines = readFileSync(auditPath, 'utf-8').trim().split('\n')
    for (let i = lines.length - 1; i >= 0; i--) {
      const last = parseEntry(lines[i])
      if (last) {
        this.lastHash = last.hash
        this.sequence = last.sequence
        break
      }
    }
  }

  append(event: AuditEvent): AuditEntry {
    const entryWithoutHash: Omit<AuditEntry, 'hash'> = {
      sequence: this.sequence + 1,
      timestamp: event.timestamp ?? new Date().toISOString(),
      event_type: event.event_type,
      data: event.data,
      prev_hash: this.lastHash,
    }
    const entry: AuditEntry = { ...entryWithoutHash, hash: hashEntry(entryWithoutHash) }

    appendFileSync(this.auditPath, JSON.stringify(entry) + '\n')

    this.sequence = entry.sequence
    this.lastHash = entry.hash
    return entry
  }
}

// Torn trailing lines from a crash are skipped
function parseEntry(line: string): Pick<AuditEntry, 'hash' | 'sequence'> | null {
  try {
    const parsed: unknown = JSON.parse(line)
    if (
      parsed !== null &&
      typeof parsed === 'object' &&
      'hash' in parsed &&
      typeof parsed.hash === 'string' &&
      'sequence' in parsed &&
      typeof parsed.sequence === 'number'
    ) {
      return { hash: parsed.hash, sequence: parsed.sequence }
    }
    return null
  } catch {
    return null
  }
}
