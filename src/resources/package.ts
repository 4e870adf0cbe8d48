import { z } from 'zod'

import { CommandRunner, commandLine } from '../core/command.js'
import { ConvergeError, classifyToolError } from '../core/errors.js'
import { DEFAULT_RETRY_POLICY, RetryPolicy, withRetry } from '../core/retry.js'
import { absent, created, DRY_RUN, failed, noChange, present } from '../core/state.js'
import {
  ApplyContext,
  CommandOutput,
  Outcome,
  PackageKind,
  PrivilegeHint,
  Resource,
  ResourceState,
} from '../types.js'

interface PackageDriver {
  tool: string
  label: string
  inspectArgs(name: string): string[]
  /**
   * Throws on output that cannot be understood.
   */
  isInstalled(stdout: string, name: string): boolean
  installArgs(name: string): string[]
}

const brewInfoSchema = z.object({
  formulae: z.array(z.object({ installed: z.array(z.unknown()).default([]) }).passthrough()).default([]),
  casks: z.array(z.object({ installed: z.string().nullable().default(null) }).passthrough()).default([]),
})

function parseBrewInfo(stdout: string): z.infer<typeof brewInfoSchema> {
  const parsed = brewInfoSchema.safeParse(JSON.parse(stdout))
  if (!parsed.success) throw new Error(`unexpected brew info output: ${parsed.error.issues[0]?.message ?? 'invalid'}`)
  return parsed.data
}

const pnpmListSchema = z.array(
  z.object({ dependencies: z.record(z.unknown()).optional() }).passthrough(),
)

function lines(stdout: string): string[] {
  return stdout.split(/\r?\n/).map(l => l.trim()).filter(Boolean)
}

const DRIVERS: Record<PackageKind, PackageDriver> = {
  formula: {
    tool: 'brew',
    label: 'Homebrew formula',
    inspectArgs: name => ['info', '--json=v2', '--formula', name],
    isInstalled: stdout => {
      const first = parseBrewInfo(stdout).formulae[0]
      return first !== undefined && first.installed.length > 0
    },
    installArgs: name => ['install', '--formula', name],
  },
  cask: {
    tool: 'brew',
    label: 'Homebrew cask',
    inspectArgs: name => ['info', '--json=v2', '--cask', name],
    isInstalled: stdout => {
      const first = parseBrewInfo(stdout).casks[0]
      return first !== undefined && first.installed !== null
    },
    installArgs: name => ['install', '--cask', name],
  },
  tap: {
    tool: 'brew',
    label: 'Homebrew tap',
    inspectArgs: () => ['tap'],
    isInstalled: (stdout, name) => lines(stdout).some(l => l.toLowerCase() === name.toLowerCase()),
    installArgs: name => ['tap', name],
  },
  'store-app': {
    tool: 'mas',
    label: 'App Store app',
    inspectArgs: () => ['list'],
    isInstalled: (stdout, name) => lines(stdout).some(l => l.split(/\s+/)[0] === name),
    installArgs: name => ['install', name],
  },
  'editor-extension': {
    tool: 'code',
    label: 'editor extension',
    inspectArgs: () => ['--list-extensions'],
    isInstalled: (stdout, name) => lines(stdout).some(l => l.toLowerCase() === name.toLowerCase()),
    installArgs: name => ['--install-extension', name],
  },
  'cli-extension': {
    tool: 'gh',
    label: 'gh extension',
    inspectArgs: () => ['extension', 'list'],
    isInstalled: (stdout, name) => lines(stdout).some(l => l.split(/\s+/).includes(name)),
    installArgs: name => ['extension', 'install', name],
  },
  'node-global': {
    tool: 'pnpm',
    label: 'global node package',
    inspectArgs: () => ['list', '-g', '--depth=0', '--json'],
    isInstalled: (stdout, name) => {
      const parsed = pnpmListSchema.safeParse(JSON.parse(stdout))
      if (!parsed.success) throw new Error('unexpected pnpm list output')
      return parsed.data.some(entry => entry.dependencies !== undefined && name in entry.dependencies)
    },
    installArgs: name => ['add', '-g', name],
  },
}

export interface PackageOptions {
  privileged?: boolean
  retry?: RetryPolicy
}

/**
 * One installable package of any package-manager kind.
 */
export class PackageResource implements Resource {
  readonly id: string
  readonly description: string
  readonly privilegeHint: PrivilegeHint
  readonly parallelSafe = true
  private readonly driver: PackageDriver
  private readonly retry: RetryPolicy

  constructor(
    readonly kind: PackageKind,
    readonly name: string,
    private readonly runner: CommandRunner,
    opts: PackageOptions = {},
  ) {
    this.id = name
    this.driver = DRIVERS[kind]
    this.description = `${this.driver.label} ${name}`
    this.privilegeHint = opts.privileged
      ? { type: 'required', reason: `${name} is on the privilege allowlist` }
      : { type: 'none' }
    this.retry = opts.retry ?? DEFAULT_RETRY_POLICY
  }

  desiredState(): ResourceState {
    return present()
  }

  async currentState(): Promise<ResourceState> {
    const { tool } = this.driver
    const args = this.driver.inspectArgs(this.name)
    let res: CommandOutput
    try {
      res = await this.runner.run(tool, args)
    } catch (e) {
      if (e instanceof ConvergeError && e.kind === 'tool_missing') {
        throw new ConvergeError({ kind: 'unsupported', feature: `${this.driver.label}s (${tool} is not installed)` })
      }
      throw e
    }
    if (res.code !== 0) {
      // Unknown packages make most read verbs exit non-zero; only a network failure is an error.
      const err = classifyToolError(res.stderr, this.name, commandLine(tool, args))
      if (err.kind === 'network') {
        throw new ConvergeError({ kind: 'inspection_failed', resourceKind: this.kind, cause: err.message })
      }
      return absent()
    }
    try {
      return this.driver.isInstalled(res.stdout, this.name) ? present() : absent()
    } catch (e) {
      const cause = e instanceof Error ? e.message : String(e)
      throw new ConvergeError({ kind: 'inspection_failed', resourceKind: this.kind, cause })
    }
  }

  async apply(ctx: ApplyContext): Promise<Outcome> {
    if (ctx.dryRun) return DRY_RUN
    if ((await this.currentState()).state === 'present') return noChange()

    const runner = this.privilegeHint.type === 'required' ? ctx.privilegedRunner : this.runner
    if (!runner) {
      const err = new ConvergeError({ kind: 'not_validated' })
      return failed(err.message, err)
    }

    const { tool } = this.driver
    const args = this.driver.installArgs(this.name)
    const cmd = commandLine(tool, args)
    try {
      await withRetry(
        this.retry,
        async () => {
          const res: CommandOutput = await runner.run(tool, args)
          if (res.code !== 0) throw classifyToolError(res.stderr || res.stdout, this.name, cmd)
        },
        (attempt, max, err, delayMs) => {
          ctx.logger?.warn(`[homestate] ${cmd}: ${err.message} (attempt ${attempt}/${max}, retrying in ${delayMs}ms)`)
        },
      )
    } catch (e) {
      if (!(e instanceof ConvergeError)) throw e
      if (e.ignorable) return noChange()
      return failed(e.message, e)
    }
    return created()
  }
}
