import type { Command } from 'commander'
import { verifyAuditChain } from '../../audit/index.js'
import { loadConfig } from '../../config/index.js'
import { describeError } from '../../logging/index.js'
import { output } from '../output.js'

/**
 * Register the `verify-audit` command.
 *
 * Checks the audit chain named by `--path`, or by the configuration.
 * Exit code 0 on an intact or empty chain, 1 on any integrity failure.
 */
export function registerVerifyAuditCommand(program: Command): void {
  program
    .command('verify-audit')
    .description('Verify audit log chain integrity')
    .option('-c, --config <path>', 'configuration file path')
    .option('-p, --path <path>', 'explicit audit log file path (overrides config)')
    .action((options: { config?: string; path?: string }) => {
      let auditPath: string
      try {
        auditPath = options.path ?? loadConfig(options.config).monitoring.audit.path
      } catch (err) {
        output.error(`Could not determine audit log path: ${describeError(err)}`)
        process.exit(1)
        return
      }

      const result = verifyAuditChain(auditPath)

      if (result.entries === 0) {
        output.info('Audit log is empty (no entries)')
        return
      }
      if (result.valid) {
        output.success(`Audit chain verified: ${result.entries} entries, chain intact`)
        return
      }

      output.error('Audit chain BROKEN')
      for (const e of result.errors) {
        output.error(`  Line ${e.line}: ${e.error}`)
      }
      output.info(`${result.entries} entries checked, ${result.errors.length} error(s) found`)
      process.exit(1)
    })
}
