import { PrivilegeClassifier } from './classifier.js'
import { isPrivileged } from './diff.js'
import { DiffRecord, ExecutionPlan, PACKAGE_KINDS, Resource, RESOURCE_KINDS, ResourceKind } from '../types.js'

export function emptyPlan(): ExecutionPlan {
  return { unprivileged: [], privileged: [], postActions: [] }
}

function pushUnique(list: string[], value: string): void {
  if (!list.includes(value)) list.push(value)
}

/**
 * Partition diffed resources into the two buckets. Every diff lands in exactly one.
 */
export function buildPlan(diffs: readonly DiffRecord[], classify: PrivilegeClassifier): ExecutionPlan {
  const plan = emptyPlan()
  for (const d of diffs) {
    const r = d.resource
    if (d.privileged || isPrivileged(r, classify)) plan.privileged.push(r)
    else plan.unprivileged.push(r)
    if (r.postAction) pushUnique(plan.postActions, r.postAction)
  }
  return plan
}

export function planSize(plan: ExecutionPlan): number {
  return plan.unprivileged.length + plan.privileged.length
}

export interface Target {
  /**
   * Undefined means any kind.
   */
  kinds?: readonly ResourceKind[]
  fragment?: string
}

const TARGET_ALIASES = new Map<string, readonly ResourceKind[]>([
  ['packages', PACKAGE_KINDS],
  ['package', PACKAGE_KINDS],
  ['brew', ['formula', 'cask', 'tap']],
  ['defaults', ['preference']],
  ['preferences', ['preference']],
  ['symlinks', ['symlink']],
  ['services', ['service']],
  ['dock', ['dock-app', 'dock-folder']],
  ['handlers', ['file-handler']],
])

function kindsFor(word: string): readonly ResourceKind[] | undefined {
  const alias = TARGET_ALIASES.get(word)
  if (alias) return alias
  const exact = RESOURCE_KINDS.filter(k => k === word)
  return exact.length ? exact : undefined
}

/**
 * `kind`, `kind.fragment`, or a bare id fragment when the prefix names no kind.
 * Only the first `.` separates, so `defaults.com.x.Y` keeps `com.x.Y` whole.
 */
export function parseTarget(target: string): Target {
  const trimmed = target.trim()
  if (!trimmed) return {}
  const dot = trimmed.indexOf('.')
  const head = dot === -1 ? trimmed : trimmed.slice(0, dot)
  const kinds = kindsFor(head)
  if (!kinds) return { fragment: trimmed }
  const fragment = dot === -1 ? '' : trimmed.slice(dot + 1)
  return fragment ? { kinds, fragment } : { kinds }
}

export function matchesTarget(resource: Pick<Resource, 'kind' | 'id'>, target: Target): boolean {
  if (target.kinds && !target.kinds.includes(resource.kind)) return false
  if (target.fragment !== undefined && !resource.id.includes(target.fragment)) return false
  return true
}

/**
 * Keep only resources matching `target`. Order and bucket membership are preserved.
 */
export function filterPlan(plan: ExecutionPlan, target: string | Target): ExecutionPlan {
  const t = typeof target === 'string' ? parseTarget(target) : target
  const unprivileged = plan.unprivileged.filter(r => matchesTarget(r, t))
  const privileged = plan.privileged.filter(r => matchesTarget(r, t))

  const contributed = new Set<string>()
  for (const r of [...unprivileged, ...privileged]) {
    if (r.postAction) contributed.add(r.postAction)
  }
  const namesServices = t.kinds?.includes('service') ?? false
  const postActions = plan.postActions.filter(s =>
    contributed.has(s) || (namesServices && matchesTarget({ kind: 'service', id: s }, t)),
  )

  return { unprivileged, privileged, postActions }
}
