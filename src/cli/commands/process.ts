import { readFileSync } from 'node:fs'
import type { Command } from 'commander'
import { loadConfig } from '../../config/index.js'
import { createGateway, type ClinicalGateway } from '../../gateway/index.js'
import { createLogger, describeError } from '../../logging/index.js'
import { parsePatientRecord, FormatError } from '../../models/index.js'
import { ValidationError } from '../../pipeline/index.js'
import type { PatientRecord } from '../../types/index.js'
import { output } from '../output.js'

interface ProcessOptions {
  config?: string
  ensemble?: boolean
}

function readRecord(recordPath: string): PatientRecord {
  let raw: string
  try {
    raw = readFileSync(recordPath, 'utf-8')
  } catch {
    throw new FormatError(`Could not read record file: ${recordPath}`)
  }
  let parsed: unknown
  try {
    parsed = JSON.parse(raw)
  } catch {
    throw new FormatError(`Invalid JSON in record file: ${recordPath}`)
  }
  return parsePatientRecord(parsed)
}

/**
 * Register the `process` command.
 *
 * Runs one patient record file through a configured gateway and prints
 * the decision JSON. Exit code 1 when the config or record cannot be
 * loaded, or the gateway rejects the record.
 */
export function registerProcessCommand(program: Command): void {
  program
    .command('process')
    .description('Run a patient record through the gateway and print the decision')
    .argument('<record>', 'patient record JSON file')
    .option('-c, --config <path>', 'configuration file path (defaults only when omitted)')
    .option('-e, --ensemble', 'combine every applicable strategy')
    .action((recordPath: string, options: ProcessOptions) => {
      let record: PatientRecord
      let gateway: ClinicalGateway
      try {
        const config = loadConfig(options.config)
        record = readRecord(recordPath)
        gateway = createGateway(
          options.ensemble
            ? { ...config, strategies: { ...config.strategies, ensemble: true } }
            : config,
          { logger: createLogger('gateway', 'warn') },
        ).gateway
      } catch (err) {
        output.error(describeError(err))
        if (err instanceof FormatError) {
          for (const f of err.fields) output.error(`  ${f.path}: ${f.message}`)
        }
        process.exit(1)
        return
      }

      try {
        const decision = gateway.process(record)
        output.json(decision.toJSON())
      } catch (err) {
        if (err instanceof ValidationError) {
          output.error('Record rejected by validation')
          for (const e of err.errors) output.error(`  ${e}`)
        } else {
          output.error(describeError(err))
        }
        process.exit(1)
      }
    })
}
