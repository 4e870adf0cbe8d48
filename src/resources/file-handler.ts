import { CommandRunner, commandLine } from '../core/command.js'
import { classifyToolError, ConvergeError } from '../core/errors.js'
import { absent, changed, created, DRY_RUN, failed, modified, noChange, present } from '../core/state.js'
import { ApplyContext, Outcome, PrivilegeHint, Resource, ResourceState } from '../types.js'

/**
 * Default application for a uniform type identifier, managed through duti.
 */
export class FileHandlerResource implements Resource {
  readonly id: string
  readonly kind = 'file-handler' as const
  readonly description: string
  readonly privilegeHint: PrivilegeHint = { type: 'none' }
  readonly parallelSafe = false

  constructor(readonly bundleId: string, readonly uti: string, private readonly runner: CommandRunner) {
    this.id = `handler:${bundleId}:${uti}`
    this.description = `Set ${bundleId} as handler for ${uti}`
  }

  desiredState(): ResourceState {
    return present()
  }

  async currentState(): Promise<ResourceState> {
    let res
    try {
      res = await this.runner.run('duti', ['-x', this.uti])
    } catch (e) {
      if (e instanceof ConvergeError && e.kind === 'tool_missing') {
        throw new ConvergeError({ kind: 'unsupported', feature: 'file handlers without duti' })
      }
      throw e
    }
    if (res.code !== 0) return absent()
    if (res.stdout.includes(this.bundleId)) return present()
    // `duti -x` prints name, path, then bundle id.
    const other = res.stdout.split(/\r?\n/).map(l => l.trim()).filter(Boolean)[2]
    return other ? modified(other, this.bundleId) : absent()
  }

  async apply(ctx: ApplyContext): Promise<Outcome> {
    if (ctx.dryRun) return DRY_RUN
    const before = await this.currentState()
    if (before.state === 'present') return noChange()
    const args = ['-s', this.bundleId, this.uti, 'all']
    const res = await this.runner.run('duti', args)
    if (res.code !== 0) {
      const err = classifyToolError(res.stderr, this.id, commandLine('duti', args))
      return failed(err.message, err)
    }
    return before.state === 'absent' ? created() : changed()
  }
}
