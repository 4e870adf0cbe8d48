import type { ConvergeError } from './core/errors.js'

export type PackageKind =
  | 'formula'
  | 'cask'
  | 'tap'
  | 'store-app'
  | 'editor-extension'
  | 'cli-extension'
  | 'node-global'

export type ResourceKind =
  | PackageKind
  | 'preference'
  | 'symlink'
  | 'service'
  | 'file-handler'
  | 'dock-app'
  | 'dock-folder'

export const PACKAGE_KINDS: readonly PackageKind[] = [
  'formula',
  'cask',
  'tap',
  'store-app',
  'editor-extension',
  'cli-extension',
  'node-global',
]

export const RESOURCE_KINDS: readonly ResourceKind[] = [
  ...PACKAGE_KINDS,
  'preference',
  'symlink',
  'service',
  'file-handler',
  'dock-app',
  'dock-folder',
]

export function isPackageKind(kind: string): kind is PackageKind {
  return (PACKAGE_KINDS as readonly string[]).includes(kind)
}

export type ResourceState =
  | { state: 'absent' }
  /**
   * `details` is an opaque fingerprint (version, link destination, value) compared byte for byte.
   */
  | { state: 'present'; details?: string }
  | { state: 'modified'; from: string; to: string }
  | { state: 'unknown' }

export type Outcome =
  | { status: 'no_change' }
  | { status: 'created' }
  | { status: 'modified' }
  | { status: 'removed' }
  | { status: 'failed'; message: string; error?: ConvergeError }
  | { status: 'skipped'; reason: string }

export type OutcomeStatus = Outcome['status']

export type PrivilegeHint =
  | { type: 'none' }
  | { type: 'required'; reason: string }

export interface CommandOutput {
  code: number
  stdout: string
  stderr: string
}

/**
 * Runs a command with elevated rights. Only the privileged batch ever holds one.
 */
export interface PrivilegedRunner {
  run(cmd: string, args: readonly string[]): Promise<CommandOutput>
}

/**
 * A live elevation token. `release` is idempotent; `run` fails once released.
 */
export interface PrivilegeSession extends PrivilegedRunner {
  readonly valid: boolean
  release(): Promise<void>
}

export interface Logger {
  info(msg: string): void
  warn(msg: string): void
  error(msg: string): void
}

export interface ApplyContext {
  /**
   * If true, resources must not mutate anything and answer `skipped`.
   */
  dryRun: boolean
  verbose: boolean
  privilegedRunner: PrivilegedRunner | null
  logger?: Logger
}

export interface Resource {
  /**
   * Stable, unique within its kind.
   */
  readonly id: string
  readonly kind: ResourceKind
  readonly description: string
  readonly privilegeHint: PrivilegeHint
  /**
   * False for resources that write a single serialized OS registry (dock, handler map, services).
   */
  readonly parallelSafe: boolean
  /**
   * Service to restart once this resource has changed.
   */
  readonly postAction?: string
  desiredState(): ResourceState
  currentState(): Promise<ResourceState>
  apply(ctx: ApplyContext): Promise<Outcome>
}

export interface DiffRecord {
  resourceId: string
  kind: ResourceKind
  description: string
  current: ResourceState
  desired: ResourceState
  privileged: boolean
  /**
   * Set when inspection failed; `current` is then `unknown`.
   */
  error?: ConvergeError
  resource: Resource
}

export interface ExecutionPlan {
  unprivileged: Resource[]
  privileged: Resource[]
  /**
   * Ordered, unique service names restarted after both batches.
   */
  postActions: string[]
}

export interface ExecuteOptions {
  dryRun: boolean
  /**
   * Worker count for the unprivileged batch, at least 1.
   */
  parallelism: number
  verbose: boolean
}

export interface ResourceResult {
  id: string
  kind: ResourceKind
  privileged: boolean
  outcome: Outcome
}

export interface PostActionResult {
  service: string
  outcome: Outcome
}

export interface ExecuteSummary {
  created: number
  modified: number
  removed: number
  skipped: number
  failed: number
  noChange: number
  /**
   * True when the privileged batch could not acquire credentials.
   */
  privilegeDenied: boolean
  results: ResourceResult[]
  /**
   * Service restarts; not counted in the totals above.
   */
  postActions: PostActionResult[]
}
