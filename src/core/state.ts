import type { ConvergeError } from './errors.js'
import { Outcome, ResourceState } from '../types.js'

export const absent = (): ResourceState => ({ state: 'absent' })
export const unknown = (): ResourceState => ({ state: 'unknown' })

export function present(details?: string): ResourceState {
  return details === undefined ? { state: 'present' } : { state: 'present', details }
}

export function modified(from: string, to: string): ResourceState {
  return { state: 'modified', from, to }
}

/**
 * Variants must match; `present` details must be byte-equal.
 * `modified` and `unknown` never compare equal, so they always surface as a diff.
 */
export function statesEqual(a: ResourceState, b: ResourceState): boolean {
  if (a.state === 'absent' && b.state === 'absent') return true
  if (a.state === 'present' && b.state === 'present') return a.details === b.details
  return false
}

export function formatState(s: ResourceState): string {
  switch (s.state) {
    case 'absent':
      return 'absent'
    case 'present':
      return s.details === undefined ? 'present' : `present (${s.details})`
    case 'modified':
      return `${s.from} → ${s.to}`
    case 'unknown':
      return 'unknown'
  }
}

export const noChange = (): Outcome => ({ status: 'no_change' })
export const created = (): Outcome => ({ status: 'created' })
export const changed = (): Outcome => ({ status: 'modified' })
export const skipped = (reason: string): Outcome => ({ status: 'skipped', reason })
export const DRY_RUN: Outcome = { status: 'skipped', reason: 'dry-run' }

export function failed(message: string, error?: ConvergeError): Outcome {
  return error ? { status: 'failed', message, error } : { status: 'failed', message }
}

export function isChange(o: Outcome): boolean {
  return o.status === 'created' || o.status === 'modified' || o.status === 'removed'
}

export function formatOutcome(o: Outcome): string {
  switch (o.status) {
    case 'no_change':
      return 'no change'
    case 'created':
      return 'created'
    case 'modified':
      return 'modified'
    case 'removed':
      return 'removed'
    case 'failed':
      return `failed: ${o.message}`
    case 'skipped':
      return `skipped: ${o.reason}`
  }
}
