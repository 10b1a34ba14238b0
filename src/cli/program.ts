import { Command } from 'commander'
import { registerInitCommand } from './commands/init.js'
import { registerProcessCommand } from './commands/process.js'
import { registerStrategiesCommand } from './commands/strategies.js'
import { registerVerifyAuditCommand } from './commands/verify-audit.js'

/** Build the command tree without parsing argv */
export function createProgram(): Command {
  const program = new Command()

  program
    .name('clinical-gateway')
    .description('Clinical decision support gateway')
    .version('0.1.0')

  registerInitCommand(program)
  registerProcessCommand(program)
  registerStrategiesCommand(program)
  registerVerifyAuditCommand(program)

  return program
}
