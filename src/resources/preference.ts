import { CommandRunner, commandLine } from '../core/command.js'
import { ConvergeError, classifyToolError } from '../core/errors.js'
import { absent, changed, created, DRY_RUN, failed, modified, noChange, present, statesEqual } from '../core/state.js'
import { ApplyContext, Outcome, PrivilegeHint, Resource, ResourceState } from '../types.js'

export type PreferenceValue =
  | { type: 'bool'; value: boolean }
  | { type: 'int'; value: number }
  | { type: 'float'; value: number }
  | { type: 'string'; value: string }

export const GLOBAL_DOMAIN = 'NSGlobalDomain'

export function canonicalValue(v: PreferenceValue): string {
  switch (v.type) {
    case 'bool':
      return v.value ? 'true' : 'false'
    case 'int':
    case 'float':
      return String(v.value)
    case 'string':
      return v.value
  }
}

/**
 * Parse `defaults read` output as the desired variant. Undefined when it does not fit.
 */
export function parseValue(type: PreferenceValue['type'], raw: string): PreferenceValue | undefined {
  const s = type === 'string' ? raw.replace(/\r?\n$/, '') : raw.trim()
  switch (type) {
    case 'bool':
      if (s === '1' || s.toLowerCase() === 'true' || s.toLowerCase() === 'yes') return { type, value: true }
      if (s === '0' || s.toLowerCase() === 'false' || s.toLowerCase() === 'no') return { type, value: false }
      return undefined
    case 'int':
      return /^-?\d+$/.test(s) ? { type, value: Number.parseInt(s, 10) } : undefined
    case 'float': {
      if (!s) return undefined
      const n = Number(s)
      return Number.isFinite(n) ? { type, value: n } : undefined
    }
    case 'string':
      return { type, value: s }
  }
}

function writeFlag(v: PreferenceValue): string {
  return `-${v.type}`
}

export interface PreferenceOptions {
  privileged?: boolean
  /**
   * Process restarted after a change to this key.
   */
  restart?: string
}

export class PreferenceResource implements Resource {
  readonly id: string
  readonly kind = 'preference' as const
  readonly description: string
  readonly privilegeHint: PrivilegeHint
  readonly parallelSafe = true
  readonly postAction?: string

  constructor(
    readonly domain: string,
    readonly key: string,
    readonly value: PreferenceValue,
    private readonly runner: CommandRunner,
    opts: PreferenceOptions = {},
  ) {
    this.id = `${domain}.${key}`
    this.description = `${domain} ${key} = ${canonicalValue(value)}`
    this.privilegeHint = opts.privileged
      ? { type: 'required', reason: `${this.id} is on the privilege allowlist` }
      : { type: 'none' }
    if (opts.restart) this.postAction = opts.restart
  }

  private domainArgs(): string[] {
    return this.domain === GLOBAL_DOMAIN ? ['-g'] : [this.domain]
  }

  desiredState(): ResourceState {
    return present(canonicalValue(this.value))
  }

  async currentState(): Promise<ResourceState> {
    const args = ['read', ...this.domainArgs(), this.key]
    let res
    try {
      res = await this.runner.run('defaults', args)
    } catch (e) {
      if (e instanceof ConvergeError && e.kind === 'tool_missing') {
        throw new ConvergeError({ kind: 'unsupported', feature: 'preferences on this platform' })
      }
      throw e
    }
    // A missing key exits non-zero.
    if (res.code !== 0) return absent()
    const parsed = parseValue(this.value.type, res.stdout)
    if (!parsed) return absent()
    const current = canonicalValue(parsed)
    const desired = canonicalValue(this.value)
    return current === desired ? present(current) : modified(current, desired)
  }

  async apply(ctx: ApplyContext): Promise<Outcome> {
    if (ctx.dryRun) return DRY_RUN
    const before = await this.currentState()
    if (statesEqual(before, this.desiredState())) return noChange()

    const runner = this.privilegeHint.type === 'required' ? ctx.privilegedRunner : this.runner
    if (!runner) {
      const err = new ConvergeError({ kind: 'not_validated' })
      return failed(err.message, err)
    }

    const args = ['write', ...this.domainArgs(), this.key, writeFlag(this.value), canonicalValue(this.value)]
    const res = await runner.run('defaults', args)
    if (res.code !== 0) {
      const err = classifyToolError(res.stderr, this.id, commandLine('defaults', args))
      return failed(err.message, err)
    }
    return before.state === 'absent' ? created() : changed()
  }
}
