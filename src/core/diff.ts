import { ConvergeError, errorMessage } from './errors.js'
import { PrivilegeClassifier } from './classifier.js'
import { runPool } from './pool.js'
import { statesEqual, unknown } from './state.js'
import { DiffRecord, Resource, ResourceKind } from '../types.js'

export function isPrivileged(resource: Resource, classify: PrivilegeClassifier): boolean {
  return resource.privilegeHint.type === 'required' || classify(resource.kind, resource.id)
}

function inspectionError(resource: Resource, e: unknown): ConvergeError {
  if (e instanceof ConvergeError && (e.kind === 'inspection_failed' || e.kind === 'unsupported')) return e
  return new ConvergeError({ kind: 'inspection_failed', resourceKind: resource.kind, cause: errorMessage(e) })
}

/**
 * Compare one resource against the live system. Resolves undefined when nothing would change.
 */
export async function diffResource(resource: Resource, classify: PrivilegeClassifier): Promise<DiffRecord | undefined> {
  const desired = resource.desiredState()
  const base = {
    resourceId: resource.id,
    kind: resource.kind,
    description: resource.description,
    desired,
    privileged: isPrivileged(resource, classify),
    resource,
  }

  let current
  try {
    current = await resource.currentState()
  } catch (e) {
    return { ...base, current: unknown(), error: inspectionError(resource, e) }
  }

  if (statesEqual(current, desired)) return undefined
  return { ...base, current }
}

export const DEFAULT_INSPECT_LIMIT = 4

/**
 * Diff every resource, keeping input order, with at most `limit` inspections in flight.
 * Inspection failures are kept as diffs carrying `error`.
 */
export async function computeDiffs(
  resources: readonly Resource[],
  classify: PrivilegeClassifier,
  limit = DEFAULT_INSPECT_LIMIT,
): Promise<DiffRecord[]> {
  const diffs = await runPool(resources, limit, r => diffResource(r, classify))
  return diffs.filter((d): d is DiffRecord => d !== undefined)
}

export interface DiffSummary {
  additions: number
  removals: number
  modifications: number
  privileged: number
  failed: number
}

export function isAddition(d: DiffRecord): boolean {
  return d.current.state === 'absent' && d.desired.state === 'present'
}

export function isRemoval(d: DiffRecord): boolean {
  return d.current.state === 'present' && d.desired.state === 'absent'
}

export function summarizeDiffs(diffs: readonly DiffRecord[]): DiffSummary {
  const summary: DiffSummary = { additions: 0, removals: 0, modifications: 0, privileged: 0, failed: 0 }
  for (const d of diffs) {
    if (isAddition(d)) summary.additions++
    else if (isRemoval(d)) summary.removals++
    else summary.modifications++
    if (d.privileged) summary.privileged++
    if (d.error) summary.failed++
  }
  return summary
}

export function totalChanges(summary: DiffSummary): number {
  return summary.additions + summary.removals + summary.modifications
}

export function groupByKind(diffs: readonly DiffRecord[]): Map<ResourceKind, DiffRecord[]> {
  const groups = new Map<ResourceKind, DiffRecord[]>()
  for (const d of diffs) {
    const list = groups.get(d.kind)
    if (list) list.push(d)
    else groups.set(d.kind, [d])
  }
  return groups
}
