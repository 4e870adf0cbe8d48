#!/usr/bin/env node
import os from 'os'
import path from 'path'
import { fileURLToPath } from 'url'

import { CommandRunner, nodeRunner } from './core/command.js'
import { computeDiffs } from './core/diff.js'
import { ConvergeError } from './core/errors.js'
import { Confirmer, execute, isSuccess } from './core/executor.js'
import { FS } from './core/fs.js'
import { buildPlan, filterPlan, matchesTarget, parseTarget } from './core/planner.js'
import { PrivilegeContext } from './core/privilege.js'
import { RetryPolicy } from './core/retry.js'
import { loadConfig } from './config/load.js'
import { buildResources, serviceRestarter } from './resources/index.js'
import { SettingsFile } from './cli/config.js'
import { autoConfirm, promptConfirmer } from './cli/confirm.js'
import { createCliLogger } from './cli/logger.js'
import { ConsoleProgress, TextSink } from './cli/progress.js'
import { diffsToJson, renderDiffs, renderStatus, renderSummary } from './cli/render.js'
import type { DiffRecord, Logger, PrivilegeSession } from './types.js'

type Argv = string[]

export const EXIT_OK = 0
export const EXIT_FAILURE = 1
export const EXIT_CONFIG = 2
export const EXIT_PRIVILEGE = 3

const DEFAULT_JOBS = 4

/**
 * Everything the CLI touches outside its own process. Tests replace any of it.
 */
export interface CliEnv {
  runner: CommandRunner
  stdout: TextSink
  stderr: TextSink
  env: NodeJS.ProcessEnv
  homeDir: string
  /**
   * Used unless `--yes` is given.
   */
  confirm?: Confirmer
  acquirePrivilege?: (reason: string) => Promise<PrivilegeSession>
  fs?: FS
  retry?: RetryPolicy
}

export function defaultCliEnv(): CliEnv {
  return {
    runner: nodeRunner,
    stdout: process.stdout,
    stderr: process.stderr,
    env: process.env,
    homeDir: os.homedir(),
  }
}

class CliExit extends Error {
  exitCode: number
  constructor(message: string, exitCode = EXIT_FAILURE) {
    super(message)
    this.exitCode = exitCode
  }
}

function die(msg: string, code = EXIT_FAILURE): never {
  throw new CliExit(msg, code)
}

function popFlagValue(args: Argv, names: string[]): string | undefined {
  for (let i = 0; i < args.length; i++) {
    const a = args[i]
    if (!names.includes(a)) continue
    const v = args[i + 1]
    if (!v || v.startsWith('-')) die(`${a} requires a value`)
    args.splice(i, 2)
    return v
  }
  return undefined
}

function hasFlag(args: Argv, names: string[]): boolean {
  const idx = args.findIndex(a => names.includes(a))
  if (idx >= 0) {
    args.splice(idx, 1)
    return true
  }
  return false
}

function parseJobs(raw: string | undefined): number {
  if (raw === undefined) return DEFAULT_JOBS
  if (!/^\d+$/.test(raw) || Number(raw) < 1) die(`Invalid --jobs: ${raw} (expected a positive integer)`)
  return Number(raw)
}

function noExtraArgs(args: Argv): void {
  if (args.length) die(`Unknown arguments: ${args.join(' ')}`)
}

const HELP = `
homestate

Usage:
  homestate config set <path>
  homestate config show
  homestate config clear

  homestate status [-c <config>] [--target <t>]
  homestate diff   [-c <config>] [--target <t>] [--json]
  homestate apply  [-c <config>] [--target <t>] [--dry-run] [--yes] [--jobs N] [--verbose]

Targets: <kind> or <kind>.<id-fragment>; kinds include packages, brew, defaults,
symlinks, services, dock, handlers and every resource kind name.
`

async function resolveConfigPath(args: Argv, env: CliEnv): Promise<string> {
  const c = popFlagValue(args, ['-c', '--config'])
  if (c) return path.resolve(c)
  const d = await new SettingsFile({ env: env.env, homeDir: env.homeDir }).defaultConfigPath()
  if (d) return d
  die('No config specified. Please run `homestate config set <path>` or pass `--config <path>`.', EXIT_CONFIG)
}

async function loadDiffs(configPath: string, target: string | undefined, env: CliEnv, logger: Logger, jobs = DEFAULT_JOBS) {
  const loaded = await loadConfig(configPath)
  const built = buildResources(loaded.config, {
    runner: env.runner,
    baseDir: loaded.baseDir,
    expand: { env: env.env, homeDir: env.homeDir },
    fs: env.fs,
    retry: env.retry,
  })
  for (const w of [...loaded.warnings, ...built.warnings]) logger.warn(`[homestate] ${w}`)

  let diffs: DiffRecord[] = await computeDiffs(built.resources, built.classify, jobs)
  if (target !== undefined) {
    const t = parseTarget(target)
    diffs = diffs.filter(d => matchesTarget(d.resource, t))
  }
  return { diffs, classify: built.classify }
}

async function runConfig(args: Argv, env: CliEnv): Promise<number> {
  const settings = new SettingsFile({ env: env.env, homeDir: env.homeDir })
  const sub = args.shift()
  if (sub === 'set') {
    const p = args.shift()
    if (!p) die('config set requires a path')
    const abs = await settings.setDefaultConfigPath(p)
    env.stdout.write(abs + '\n')
    return EXIT_OK
  }
  if (sub === 'show') {
    const p = await settings.defaultConfigPath()
    if (!p) die('No default config set. Run `homestate config set <path>`.', EXIT_CONFIG)
    env.stdout.write(p + '\n')
    return EXIT_OK
  }
  if (sub === 'clear') {
    await settings.clear()
    return EXIT_OK
  }
  die('Unknown config subcommand. Expected: set|show|clear')
}

async function runStatus(args: Argv, env: CliEnv, logger: Logger): Promise<number> {
  const configPath = await resolveConfigPath(args, env)
  const target = popFlagValue(args, ['--target'])
  noExtraArgs(args)
  const { diffs } = await loadDiffs(configPath, target, env, logger)
  env.stdout.write(renderStatus(diffs) + '\n')
  return EXIT_OK
}

async function runDiff(args: Argv, env: CliEnv, logger: Logger): Promise<number> {
  const configPath = await resolveConfigPath(args, env)
  const target = popFlagValue(args, ['--target'])
  const json = hasFlag(args, ['--json'])
  noExtraArgs(args)
  const { diffs } = await loadDiffs(configPath, target, env, logger)
  const out = json ? JSON.stringify(diffsToJson(diffs), null, 2) : renderDiffs(diffs)
  env.stdout.write(out + '\n')
  return EXIT_OK
}

async function runApply(args: Argv, env: CliEnv, logger: Logger, verbose: boolean): Promise<number> {
  const configPath = await resolveConfigPath(args, env)
  const target = popFlagValue(args, ['--target'])
  const dryRun = hasFlag(args, ['--dry-run', '-n'])
  const yes = hasFlag(args, ['--yes', '-y'])
  const parallelism = parseJobs(popFlagValue(args, ['--jobs', '-j']))
  noExtraArgs(args)

  const { diffs, classify } = await loadDiffs(configPath, target, env, logger, parallelism)
  let plan = buildPlan(diffs, classify)
  if (target !== undefined) plan = filterPlan(plan, target)

  env.stdout.write(renderDiffs(diffs) + '\n')
  if (!diffs.length) return EXIT_OK

  const summary = await execute(plan, { dryRun, parallelism, verbose }, {
    progress: new ConsoleProgress(env.stdout),
    confirm: yes ? autoConfirm : env.confirm ?? promptConfirmer(),
    acquirePrivilege: env.acquirePrivilege
      ?? (reason => PrivilegeContext.acquire(reason, env.runner, line => env.stderr.write(line + '\n'))),
    restartService: serviceRestarter(env.runner),
    classify,
    logger,
  })

  if (dryRun) {
    env.stdout.write('Dry run: no changes applied.\n')
    return EXIT_OK
  }
  env.stdout.write(renderSummary(summary) + '\n')
  if (summary.privilegeDenied) return EXIT_PRIVILEGE
  return isSuccess(summary) ? EXIT_OK : EXIT_FAILURE
}

export async function main(argv: string[] = process.argv.slice(2), overrides: Partial<CliEnv> = {}): Promise<number> {
  const env: CliEnv = { ...defaultCliEnv(), ...overrides }
  const args = [...argv]
  const verbose = hasFlag(args, ['-v', '--verbose'])
  const logger = createCliLogger(env.stderr, verbose)
  try {
    if (args.length === 0 || hasFlag(args, ['-h', '--help'])) {
      env.stdout.write(HELP.trimStart())
      return EXIT_OK
    }

    const cmd = args.shift()
    if (cmd === 'config') return await runConfig(args, env)
    if (cmd === 'status') return await runStatus(args, env, logger)
    if (cmd === 'diff') return await runDiff(args, env, logger)
    if (cmd === 'apply') return await runApply(args, env, logger, verbose)

    die(`Unknown command: ${cmd}`)
  } catch (e) {
    if (e instanceof CliExit) {
      const msg = e.message || 'Command failed'
      env.stderr.write(msg.endsWith('\n') ? msg : msg + '\n')
      return e.exitCode
    }
    if (e instanceof ConvergeError) {
      env.stderr.write(`error: ${e.message}\n`)
      if (e.kind === 'invalid_config') return EXIT_CONFIG
      if (e.kind === 'privilege_denied') return EXIT_PRIVILEGE
      return EXIT_FAILURE
    }
    throw e
  }
}

// Only run when executed as a script, not when imported (e.g., tests).
const isEntry =
  process.argv[1] &&
  path.resolve(process.argv[1]) === path.resolve(fileURLToPath(import.meta.url))

if (isEntry) {
  main().then(
    (code) => process.exit(code),
    (err: unknown) => {
      const msg = err instanceof Error && err.stack ? err.stack : String(err)
      process.stderr.write(msg.endsWith('\n') ? msg : msg + '\n')
      process.exit(1)
    },
  )
}
