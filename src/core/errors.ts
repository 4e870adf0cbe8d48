export type ConvergeErrorDetail =
  | { kind: 'network'; message: string }
  | { kind: 'not_found'; name: string }
  | { kind: 'conflict'; message: string }
  | { kind: 'permission'; path: string }
  | { kind: 'already_installed'; name: string }
  | { kind: 'tool_missing'; tool: string }
  | { kind: 'inspection_failed'; resourceKind: string; cause: string }
  | { kind: 'invalid_config'; where: string; why: string }
  | { kind: 'privilege_denied' }
  | { kind: 'not_validated' }
  | { kind: 'command_failed'; cmd: string; stderrTail: string }
  | { kind: 'unsupported'; feature: string }

export type ConvergeErrorKind = ConvergeErrorDetail['kind']

const STDERR_TAIL_LINES = 5
const STDERR_TAIL_CHARS = 500

export function stderrTail(stderr: string): string {
  const lines = stderr.trim().split(/\r?\n/).filter(l => l.trim().length > 0)
  const tail = lines.slice(-STDERR_TAIL_LINES).join('\n')
  return tail.length > STDERR_TAIL_CHARS ? tail.slice(tail.length - STDERR_TAIL_CHARS) : tail
}

function describe(detail: ConvergeErrorDetail): string {
  switch (detail.kind) {
    case 'network':
      return `network error: ${detail.message}`
    case 'not_found':
      return `not found: ${detail.name}`
    case 'conflict':
      return `conflict: ${detail.message}`
    case 'permission':
      return `permission denied: ${detail.path}`
    case 'already_installed':
      return `already installed: ${detail.name}`
    case 'tool_missing':
      return `required tool not found: ${detail.tool}`
    case 'inspection_failed':
      return `could not inspect ${detail.resourceKind}: ${detail.cause}`
    case 'invalid_config':
      return `invalid config at ${detail.where}: ${detail.why}`
    case 'privilege_denied':
      return 'privilege acquisition was refused'
    case 'not_validated':
      return 'privileged command requested without valid credentials'
    case 'command_failed':
      return detail.stderrTail ? `${detail.cmd} failed: ${detail.stderrTail}` : `${detail.cmd} failed`
    case 'unsupported':
      return `unsupported: ${detail.feature}`
    default: {
      const _exhaustive: never = detail
      return `unknown error: ${String(_exhaustive)}`
    }
  }
}

export class ConvergeError extends Error {
  readonly detail: ConvergeErrorDetail

  constructor(detail: ConvergeErrorDetail) {
    super(describe(detail))
    this.name = 'ConvergeError'
    this.detail = detail
  }

  get kind(): ConvergeErrorKind {
    return this.detail.kind
  }

  /**
   * Only network failures are worth another attempt.
   */
  get retryable(): boolean {
    return this.detail.kind === 'network'
  }

  /**
   * The requested end state already holds.
   */
  get ignorable(): boolean {
    return this.detail.kind === 'already_installed'
  }

  get stderrTail(): string | undefined {
    switch (this.detail.kind) {
      case 'command_failed':
        return this.detail.stderrTail
      case 'network':
      case 'conflict':
        return this.detail.message
      default:
        return undefined
    }
  }
}

export function invalidConfig(where: string, why: string): ConvergeError {
  return new ConvergeError({ kind: 'invalid_config', where, why })
}

export function isConvergeError(e: unknown): e is ConvergeError {
  return e instanceof ConvergeError
}

export function errorMessage(e: unknown): string {
  if (e instanceof Error) return e.message
  return String(e)
}

type Classifier = (stderr: string, name: string, cmd: string) => ConvergeError

interface ErrorPattern {
  patterns: string[]
  build: Classifier
}

// Order matters: the first matching row wins.
const ERROR_PATTERNS: ErrorPattern[] = [
  {
    patterns: [
      'curl',
      'could not resolve',
      'connection refused',
      'timed out',
      'network',
      'ssl',
      'certificate',
      'failed to download',
      'sha256 mismatch',
    ],
    build: stderr => new ConvergeError({ kind: 'network', message: stderrTail(stderr) }),
  },
  {
    patterns: [
      'no available formula',
      'no formulae found',
      'no cask with this name',
      'no such keg',
      "couldn't find",
      'not found',
      'unknown',
    ],
    build: (_stderr, name) => new ConvergeError({ kind: 'not_found', name }),
  },
  {
    patterns: ['already installed', 'is already an installed'],
    build: (_stderr, name) => new ConvergeError({ kind: 'already_installed', name }),
  },
  {
    patterns: ['permission denied', 'operation not permitted', 'cannot write'],
    build: (stderr, name) => new ConvergeError({ kind: 'permission', path: extractPath(stderr) ?? name }),
  },
  {
    patterns: ['conflicts with', 'conflict', 'depends on', 'dependency'],
    build: stderr => new ConvergeError({ kind: 'conflict', message: stderrTail(stderr) }),
  },
]

function extractPath(stderr: string): string | undefined {
  const m = stderr.match(/(\/[^\s'"`:]+)/)
  return m ? m[1] : undefined
}

/**
 * Turn the stderr of a failed external tool into a typed error.
 */
export function classifyToolError(stderr: string, name: string, cmd: string): ConvergeError {
  const lower = stderr.toLowerCase()
  for (const row of ERROR_PATTERNS) {
    if (row.patterns.some(p => lower.includes(p))) {
      return row.build(stderr, name, cmd)
    }
  }
  return new ConvergeError({ kind: 'command_failed', cmd, stderrTail: stderrTail(stderr) })
}
