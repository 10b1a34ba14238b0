/**
 * E2E: record in, decision out.
 *
 * Drives whole records through a configured gateway (stock chain, stock
 * selector, stock observers, audit file in a temp dir) and checks the
 * resulting decision, the observer state and the audit chain.
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest'
import { mkdtempSync, rmSync } from 'node:fs'
import { join } from 'node:path'
import { tmpdir } from 'node:os'
import { createGateway, type ConfiguredGateway } from '../src/gateway/index.js'
import { resolveConfig } from '../src/config/index.js'
import { DecisionSupport, PRIORITY_RANK, parsePatientRecord } from '../src/models/index.js'
import { verifyAuditChain } from '../src/audit/index.js'
import type { Priority } from '../src/types/index.js'
import {
  FIXED_NOW,
  makeRecord,
  recordingLogger,
  signalObservation,
  textObservation,
} from './helpers/records.js'

describe('E2E: decision support', () => {
  let tempDir: string
  let auditPath: string
  let configured: ConfiguredGateway

  beforeEach(() => {
    tempDir = mkdtempSync(join(tmpdir(), 'gateway-e2e-'))
    auditPath = join(tempDir, 'audit.jsonl')
    const config = resolveConfig({ monitoring: { audit: { path: auditPath } } }, {})
    configured = createGateway(config, { logger: recordingLogger(), now: () => FIXED_NOW })
  })

  afterEach(() => {
    rmSync(tempDir, { recursive: true, force: true })
  })

  it('should escalate an elderly urgent patient with a complex critical history to emergency', () => {
    const record = makeRecord({
      priority: 'urgent',
      patient: { age: 80, medicalHistory: ['Diabetes', 'Asthma', 'Gout', 'Migraine'] },
      observations: [
        textObservation({ id: 'n1', qualityScore: 0.9 }),
        textObservation({ id: 'n2', qualityScore: 0.9 }),
      ],
    })

    const decision = configured.gateway.process(record)

    expect(decision.triageScore).toBe(100)
    expect(decision.urgencyLevel).toBe('emergency')
    expect(record.priority).toBe('emergency')
    expect(decision.metadata.context).toMatchObject({
      enrichment: { averageQuality: 0.9, hasCriticalHistory: true },
      triage: {
        score: 100,
        priority: 'emergency',
        factors: [
          'Base priority: urgent',
          'Age factor: 80',
          'Complex medical history',
          'Critical medical history',
        ],
      },
    })
  })

  it('should process a record without clinical data', () => {
    const record = makeRecord({ observations: [] })

    const decision = configured.gateway.process(record)

    expect(decision.warnings).toEqual(['No clinical data provided'])
    expect(record.patient.age).toBe(55)
    expect(decision.triageScore).toBe(25)
    expect(decision.urgencyLevel).toBe('routine')
    expect(decision.metadata.context).toMatchObject({
      validation: { isValid: true, warnings: ['No clinical data provided'] },
      enrichment: { ageCalculated: true, dataCount: 0 },
      triage: { score: 25, priority: 'routine' },
    })
  })

  it('should never lower the record priority', () => {
    const priorities: Priority[] = ['routine', 'soon', 'urgent', 'emergency']
    for (const priority of priorities) {
      for (const age of [0, 40, 90]) {
        const record = makeRecord({ priority, patient: { age } })
        configured.gateway.process(record)
        expect(PRIORITY_RANK[record.priority]).toBeGreaterThanOrEqual(PRIORITY_RANK[priority])
      }
    }
  })

  it('should round-trip a gateway decision through JSON', () => {
    const record = makeRecord({
      patient: { chiefComplaint: 'Chest pain on exertion' },
      observations: [textObservation(), signalObservation({ signalType: 'ECG' })],
    })
    const decision = configured.gateway.process(record)

    const restored = DecisionSupport.fromJSON(JSON.parse(JSON.stringify(decision.toJSON())))

    expect(restored.diagnoses).toHaveLength(decision.diagnoses.length)
    expect(restored.diagnoses.map((d) => d.condition)).toEqual(['Cardiology Condition Detected'])
    expect(restored.urgencyLevel).toBe(decision.urgencyLevel)
    expect(restored.modelsUsed).toEqual(['domain_cardiology'])
  })

  it('should accept a record decoded from JSON', () => {
    const record = parsePatientRecord({
      patient: { patientId: 'P-300', dateOfBirth: '2025-09-01' },
      priority: 'soon',
      observations: [
        {
          kind: 'signal',
          id: 'spo2-1',
          timestamp: '2026-03-01T08:00:00.000Z',
          source: 'wearable_device',
          signalType: 'SpO2',
          samplingRate: 1,
          durationSeconds: 5,
          values: [97, 96, 96, 95, 97],
        },
      ],
    })

    const decision = configured.gateway.process(record)

    // age 0: 50 + 15
    expect(decision.triageScore).toBe(65)
    expect(decision.modelsUsed).toEqual(['device_respiratory'])
    expect(decision.diagnoses[0].condition).toBe('Abnormal SpO2 Pattern')
  })

  it('should feed every observer and keep the audit chain intact', () => {
    const { gateway, observers } = configured
    gateway.process(makeRecord())
    expect(() => gateway.process(makeRecord({ patient: { patientId: '' } }))).toThrow('Validation failed')

    expect(observers.metrics.metrics()).toMatchObject({
      requestsTotal: 2,
      requestsCompleted: 1,
      requestsFailed: 1,
      successRate: 0.5,
    })
    expect(observers.quality.report()).toMatchObject({ totalRecords: 2, validationFailures: 1, qualityScore: 0.5 })
    expect(observers.performance.recentAlerts()).toHaveLength(1)
    expect(observers.audit.trail({ eventType: 'request_failed' })).toHaveLength(1)
    expect(verifyAuditChain(auditPath)).toEqual({ valid: true, entries: 4, errors: [] })
  })
})
