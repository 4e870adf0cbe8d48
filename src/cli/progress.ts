import { ProgressReporter } from '../core/executor.js'
import { formatOutcome } from '../core/state.js'
import { Outcome } from '../types.js'
import { outcomeSymbol, t } from './theme.js'

export interface TextSink {
  write(text: string): void
}

/**
 * One line when a resource starts and one when it completes.
 */
export class ConsoleProgress implements ProgressReporter {
  constructor(private readonly out: TextSink) {}

  onBatchStart(count: number, privileged: boolean): void {
    const label = privileged ? t.amber('privileged') : 'unprivileged'
    this.out.write(`${t.head('Applying')} ${count} ${label} change${count === 1 ? '' : 's'}\n`)
  }

  onResourceStart(id: string, description: string): void {
    this.out.write(`  ${t.blue('→')} ${id} ${t.dim(description)}\n`)
  }

  onResourceComplete(id: string, outcome: Outcome): void {
    this.out.write(`  ${outcomeSymbol(outcome)} ${id}: ${formatOutcome(outcome)}\n`)
  }

  onBatchComplete(): void {}

  onPostAction(service: string, outcome: Outcome): void {
    this.out.write(`  ${outcomeSymbol(outcome)} restart ${service}: ${formatOutcome(outcome)}\n`)
  }
}
