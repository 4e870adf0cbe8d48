import { CommandRunner } from '../core/command.js'
import { changed, DRY_RUN, present, skipped } from '../core/state.js'
import { ApplyContext, Outcome, PrivilegeHint, Resource, ResourceState } from '../types.js'

/**
 * Restart of a user-session process. `current` and `desired` never match, so it always diffs;
 * it is only ever scheduled as a post-action.
 */
export class ServiceResource implements Resource {
  readonly kind = 'service' as const
  readonly description: string
  readonly privilegeHint: PrivilegeHint = { type: 'none' }
  readonly parallelSafe = false

  constructor(readonly id: string, private readonly runner: CommandRunner) {
    this.description = `restart ${id}`
  }

  desiredState(): ResourceState {
    return present('restarted')
  }

  async currentState(): Promise<ResourceState> {
    return present('running')
  }

  async apply(ctx: ApplyContext): Promise<Outcome> {
    if (ctx.dryRun) return DRY_RUN
    const res = await this.runner.run('killall', [this.id])
    if (res.code !== 0) return skipped(`${this.id} was not running`)
    return changed()
  }
}

export function serviceRestarter(runner: CommandRunner) {
  return (service: string, ctx: ApplyContext): Promise<Outcome> => new ServiceResource(service, runner).apply(ctx)
}
