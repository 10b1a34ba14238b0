import { describe, it, expect } from 'vitest'
import { DomainStrategy, DOMAIN_KEYWORDS } from './domain.js'
import { DeviceStrategy } from './device.js'
import { PathologyStrategy } from './pathology.js'
import { EnsembleStrategy } from './ensemble.js'
import { StrategySelector } from './selector.js'
import { StrategySelectionError } from './errors.js'
import { capitalize } from './strategy.js'
import { DecisionSupport } from '../models/decision.js'
import { ProcessingContext } from '../pipeline/context.js'
import {
  FIXED_NOW,
  imageObservation,
  makeRecord,
  signalObservation,
  textObservation,
} from '../../tests/helpers/records.js'

const context = ProcessingContext.create({ requestId: 'req-1', startedAt: FIXED_NOW })

function emptyDecision(): DecisionSupport {
  return new DecisionSupport({ requestId: 'req-1', patientId: 'P-001', timestamp: FIXED_NOW })
}

describe('DomainStrategy', () => {
  it('should match a keyword in the chief complaint', () => {
    const record = makeRecord({ patient: { chiefComplaint: 'Chest pain on exertion' } })
    expect(new DomainStrategy('cardiology').canHandle(record)).toBe(true)
    expect(new DomainStrategy('neurology').canHandle(record)).toBe(false)
  })

  it('should match keywords in text observations and history, ignoring case', () => {
    const byText = makeRecord({ observations: [textObservation({ content: 'Recurrent SEIZURE overnight' })] })
    const byHistory = makeRecord({ patient: { medicalHistory: ['COPD'] } })
    expect(new DomainStrategy('neurology').canHandle(byText)).toBe(true)
    expect(new DomainStrategy('pulmonology').canHandle(byHistory)).toBe(true)
  })

  it('should always match for general and unknown domains', () => {
    const record = makeRecord()
    expect(new DomainStrategy('general').canHandle(record)).toBe(true)
    expect(DOMAIN_KEYWORDS.dermatology).toBeUndefined()
    expect(new DomainStrategy('dermatology').canHandle(record)).toBe(true)
  })

  it('should add a domain diagnosis and record its name', () => {
    const decision = new DomainStrategy('neurology').execute(makeRecord(), emptyDecision(), context)
    expect(decision.diagnoses).toHaveLength(1)
    expect(decision.diagnoses[0].condition).toBe('Neurology Condition Detected')
    expect(decision.diagnoses[0].confidenceScore).toBe(0.72)
    expect(decision.diagnoses[0].confidenceLevel).toBe('high')
    expect(decision.explanation).toBe('Domain analysis for neurology completed')
    expect(decision.featureImportance).toEqual({
      chief_complaint: 0.3,
      medical_history: 0.2,
      clinical_data: 0.5,
    })
    expect(decision.modelsUsed).toEqual(['domain_neurology'])
  })
})

describe('DeviceStrategy', () => {
  it('should match only its own signal types', () => {
    const record = makeRecord({ observations: [signalObservation({ signalType: 'EEG' })] })
    expect(new DeviceStrategy('neurological').canHandle(record)).toBe(true)
    expect(new DeviceStrategy('cardiac').canHandle(record)).toBe(false)
    expect(new DeviceStrategy('cardiac').canHandle(makeRecord())).toBe(false)
  })

  it('should add one diagnosis per matching signal', () => {
    const record = makeRecord({
      observations: [
        signalObservation({ id: 's1', signalType: 'ECG' }),
        signalObservation({ id: 's2', signalType: 'EKG' }),
        signalObservation({ id: 's3', signalType: 'EEG' }),
      ],
    })
    const decision = new DeviceStrategy('cardiac').execute(record, emptyDecision(), context)

    expect(decision.diagnoses.map((d) => d.condition)).toEqual(['Abnormal ECG Pattern', 'Abnormal EKG Pattern'])
    expect(decision.diagnoses[0].confidenceScore).toBe(0.68)
    expect(decision.diagnoses[0].recommendedSpecialists).toEqual(['Cardiologist'])
    expect(decision.explanation).toBe('Device analysis for cardiac signals completed')
  })

  it('should recommend a generic specialist outside cardiac devices', () => {
    const record = makeRecord({ observations: [signalObservation({ signalType: 'SpO2' })] })
    const decision = new DeviceStrategy('respiratory').execute(record, emptyDecision(), context)
    expect(decision.diagnoses[0].recommendedSpecialists).toEqual(['Specialist'])
  })
})

describe('PathologyStrategy', () => {
  it('should match pathology-grade imaging modalities', () => {
    const strategy = new PathologyStrategy('cancer')
    expect(strategy.canHandle(makeRecord({ observations: [imageObservation({ modality: 'MRI' })] }))).toBe(true)
    expect(strategy.canHandle(makeRecord({ observations: [imageObservation({ modality: 'XRAY' })] }))).toBe(false)
  })

  it('should match its own type as a keyword in notes', () => {
    const record = makeRecord({ observations: [textObservation({ content: 'Soft tissue swelling' })] })
    expect(new PathologyStrategy('tissue').canHandle(record)).toBe(true)
    expect(new PathologyStrategy('cancer').canHandle(record)).toBe(false)
  })

  it('should add an analysis diagnosis at 0.75', () => {
    const decision = new PathologyStrategy('cancer').execute(makeRecord(), emptyDecision(), context)
    expect(decision.diagnoses[0].condition).toBe('Cancer Analysis Required')
    expect(decision.diagnoses[0].confidenceScore).toBe(0.75)
    expect(decision.explanation).toBe('Pathology analysis for cancer completed')
    expect(decision.modelsUsed).toEqual(['pathology_cancer'])
  })
})

describe('EnsembleStrategy', () => {
  it('should refuse an empty member list', () => {
    expect(() => new EnsembleStrategy([])).toThrow(StrategySelectionError)
  })

  it('should run only applicable members and record each of them', () => {
    const record = makeRecord({ observations: [signalObservation({ signalType: 'ECG' })] })
    const ensemble = new EnsembleStrategy([
      new DeviceStrategy('cardiac'),
      new DeviceStrategy('neurological'),
      new DomainStrategy('general'),
    ])
    const decision = ensemble.execute(record, emptyDecision(), context)

    expect(decision.modelsUsed).toEqual(['device_cardiac', 'domain_general'])
    expect(decision.diagnoses.map((d) => d.condition)).toEqual([
      'Abnormal ECG Pattern',
      'General Condition Detected',
    ])
    expect(decision.explanation).toBe('Ensemble of 2 models')
    expect(ensemble.getModelInfo()).toEqual({ name: 'ensemble', version: '1.0.0', confidenceThreshold: 0.5 })
  })
})

describe('StrategySelector', () => {
  it('should register the stock strategies in order', () => {
    expect(StrategySelector.createDefault().availableStrategies()).toEqual([
      'domain_cardiology',
      'domain_neurology',
      'domain_pulmonology',
      'domain_oncology',
      'domain_radiology',
      'device_cardiac',
      'device_neurological',
      'device_respiratory',
      'pathology_cancer',
      'pathology_tissue',
      'domain_general',
    ])
    expect(StrategySelector.createDefault().defaultStrategy?.name).toBe('domain_general')
  })

  it('should pick the first match in registration order', () => {
    const record = makeRecord({ observations: [imageObservation({ modality: 'MRI' })] })
    expect(StrategySelector.createDefault().select(record, context).name).toBe('pathology_cancer')
  })

  it('should reach the general domain when no specific strategy matches', () => {
    const selector = StrategySelector.createDefault()
    expect(selector.select(makeRecord(), context).name).toBe('domain_general')
  })

  it('should fall back to the default when no registered strategy matches', () => {
    const selector = new StrategySelector()
      .register(new DeviceStrategy('cardiac'))
      .setDefault(new DomainStrategy('general'))
    expect(selector.select(makeRecord(), context).name).toBe('domain_general')
  })

  it('should use the configured default domain without listing it twice', () => {
    const selector = StrategySelector.createDefault({ defaultDomain: 'pulmonology' })
    expect(selector.defaultStrategy?.name).toBe('domain_pulmonology')
    expect(selector.availableStrategies().filter((n) => n === 'domain_pulmonology')).toHaveLength(1)
    expect(selector.availableStrategies()).toHaveLength(10)
  })

  it('should register a new default domain last', () => {
    const names = StrategySelector.createDefault({ defaultDomain: 'triage' }).availableStrategies()
    expect(names[names.length - 1]).toBe('domain_triage')
    expect(names).not.toContain('domain_general')
  })

  it('should throw when nothing matches and no default is set', () => {
    const selector = new StrategySelector().register(new DeviceStrategy('cardiac'))
    try {
      selector.select(makeRecord(), context)
      expect.fail('Should have thrown')
    } catch (err) {
      expect(err).toBeInstanceOf(StrategySelectionError)
      expect((err as StrategySelectionError).code).toBe('NO_APPLICABLE_STRATEGY')
      expect((err as StrategySelectionError).message).toBe(
        'No applicable strategy found and no default strategy set',
      )
    }
  })

  it('should pair a single specific match with the general domain in ensemble mode', () => {
    const record = makeRecord({ patient: { chiefComplaint: 'Chest pain on exertion' } })
    const strategy = StrategySelector.createDefault({ ensemble: true }).select(record, context)
    expect(strategy.name).toBe('ensemble')

    const decision = strategy.execute(record, emptyDecision(), context)
    expect(decision.modelsUsed).toEqual(['domain_cardiology', 'domain_general'])
    expect(decision.explanation).toBe('Ensemble of 2 models')
  })

  it('should return the general domain alone in ensemble mode when nothing else matches', () => {
    const selector = StrategySelector.createDefault({ ensemble: true })
    expect(selector.select(makeRecord(), context).name).toBe('domain_general')
  })

  it('should wrap multiple matches in an ensemble that records N models', () => {
    const record = makeRecord({
      patient: { chiefComplaint: 'Chest pain on exertion' },
      observations: [textObservation(), signalObservation({ signalType: 'ECG' })],
    })
    const selector = StrategySelector.createDefault({ ensemble: true })
    const strategy = selector.select(record, context)
    expect(strategy.name).toBe('ensemble')

    const decision = strategy.execute(record, emptyDecision(), context)
    expect(decision.modelsUsed).toEqual(['domain_cardiology', 'device_cardiac', 'domain_general'])
    expect(decision.diagnoses).toHaveLength(3)
    expect(decision.explanation).toBe('Ensemble of 3 models')
  })

  it('should return a copy from list()', () => {
    const selector = StrategySelector.createDefault()
    const listed = selector.list()
    expect(listed).toHaveLength(11)
    expect(listed[0].getModelInfo()).toEqual({
      name: 'domain_cardiology',
      version: '1.0.0',
      confidenceThreshold: 0.5,
    })
  })
})

describe('capitalize', () => {
  it('should uppercase the first letter only', () => {
    expect(capitalize('cardiology')).toBe('Cardiology')
    expect(capitalize('')).toBe('')
  })
})
