import { formatState, formatOutcome } from '../core/state.js'
import { groupByKind, isAddition, isRemoval, summarizeDiffs, totalChanges } from '../core/diff.js'
import { DiffRecord, ExecuteSummary } from '../types.js'
import { outcomeSymbol, t } from './theme.js'

function changeSymbol(d: DiffRecord): string {
  if (d.error) return t.red('?')
  if (isAddition(d)) return t.green('+')
  if (isRemoval(d)) return t.red('-')
  return t.amber('~')
}

function describeChange(d: DiffRecord): string {
  if (d.error) return `unknown (${d.error.message})`
  if (d.current.state === 'modified') return formatState(d.current)
  return `${formatState(d.current)} → ${formatState(d.desired)}`
}

export function renderDiffs(diffs: readonly DiffRecord[]): string {
  if (!diffs.length) return 'No changes.'
  const lines: string[] = []
  for (const [kind, group] of groupByKind(diffs)) {
    lines.push(t.head(kind))
    for (const d of group) {
      const priv = d.privileged ? ` ${t.amber('[privileged]')}` : ''
      lines.push(`  ${changeSymbol(d)} ${d.resourceId}: ${describeChange(d)}${priv}`)
    }
  }
  return lines.join('\n')
}

export function renderStatus(diffs: readonly DiffRecord[]): string {
  const s = summarizeDiffs(diffs)
  const n = totalChanges(s)
  if (n === 0) return 'Everything is up to date.'
  const extra: string[] = []
  if (s.privileged) extra.push(`${s.privileged} privileged`)
  if (s.failed) extra.push(`${s.failed} failed inspection`)
  const tail = extra.length ? ` (${extra.join(', ')})` : ''
  return `${n} change${n === 1 ? '' : 's'}: ${s.additions} to add, ${s.modifications} to modify, ${s.removals} to remove${tail}`
}

export interface DiffJson {
  id: string
  kind: string
  description: string
  current: DiffRecord['current']
  desired: DiffRecord['desired']
  privileged: boolean
  error?: { kind: string; message: string }
}

export function diffsToJson(diffs: readonly DiffRecord[]): DiffJson[] {
  return diffs.map(d => {
    const base: DiffJson = {
      id: d.resourceId,
      kind: d.kind,
      description: d.description,
      current: d.current,
      desired: d.desired,
      privileged: d.privileged,
    }
    return d.error ? { ...base, error: { kind: d.error.kind, message: d.error.message } } : base
  })
}

export function renderSummary(summary: ExecuteSummary): string {
  const lines = [
    t.head('Summary: ') +
      [
        `created ${summary.created}`,
        `modified ${summary.modified}`,
        `removed ${summary.removed}`,
        `skipped ${summary.skipped}`,
        `failed ${summary.failed}`,
        `no change ${summary.noChange}`,
      ].join(', '),
  ]
  if (summary.privilegeDenied) lines.push(t.red('Privileged changes were not applied: administrator rights were refused.'))

  const failures = summary.results.filter(r => r.outcome.status === 'failed')
  if (failures.length) {
    lines.push(t.head('Failures:'))
    for (const r of failures) {
      if (r.outcome.status !== 'failed') continue
      const kind = r.outcome.error?.kind ?? 'error'
      lines.push(`  ${outcomeSymbol(r.outcome)} ${r.kind} ${r.id}: ${kind} (${r.outcome.message})`)
      const tail = r.outcome.error?.stderrTail
      if (tail) {
        for (const l of tail.split('\n')) lines.push(`      ${t.dim(l)}`)
      }
    }
  }

  const restarted = summary.postActions.map(p => `${p.service} ${formatOutcome(p.outcome)}`)
  if (restarted.length) lines.push(`${t.head('Restarts:')} ${restarted.join(', ')}`)
  return lines.join('\n')
}
