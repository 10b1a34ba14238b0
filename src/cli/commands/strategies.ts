import type { Command } from 'commander'
import { StrategySelector, DomainStrategy, DeviceStrategy, PathologyStrategy } from '../../strategy/index.js'
import type { ModelStrategy } from '../../strategy/index.js'
import { output } from '../output.js'

function describeMatch(strategy: ModelStrategy): string {
  if (strategy instanceof DomainStrategy) {
    return strategy.keywords.length > 0 ? `keywords: ${strategy.keywords.join(', ')}` : 'any record'
  }
  if (strategy instanceof DeviceStrategy) {
    return `signals: ${strategy.signalTypes.join(', ')}`
  }
  if (strategy instanceof PathologyStrategy) {
    return `keywords: ${strategy.keywords.join(', ')}`
  }
  return ''
}

/**
 * Register the `strategies` command: lists the stock strategies in
 * selection order, then the fallback.
 */
export function registerStrategiesCommand(program: Command): void {
  program
    .command('strategies')
    .description('List the registered diagnostic strategies in selection order')
    .action(() => {
      const selector = StrategySelector.createDefault()
      const rows = selector.list().map((s) => ({
        Name: s.name,
        Version: s.version,
        Matches: describeMatch(s),
      }))
      output.table(rows)
      const fallback = selector.defaultStrategy
      output.info('')
      output.info(`Default: ${fallback ? fallback.name : 'none'}`)
    })
}
