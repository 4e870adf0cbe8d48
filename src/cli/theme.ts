import chalk from 'chalk'

import { Outcome } from '../types.js'

export const t = {
  head:  chalk.bold,
  dim:   chalk.gray,
  green: chalk.green,
  amber: chalk.yellow,
  red:   chalk.red,
  blue:  chalk.cyan,
} as const

export function outcomeSymbol(o: Outcome): string {
  switch (o.status) {
    case 'no_change':
      return t.dim('○')
    case 'created':
    case 'modified':
    case 'removed':
      return t.green('✓')
    case 'failed':
      return t.red('✗')
    case 'skipped':
      return t.amber('⊘')
  }
}
