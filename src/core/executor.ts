import { PrivilegeClassifier, neverPrivileged } from './classifier.js'
import { computeDiffs } from './diff.js'
import { ConvergeError, errorMessage } from './errors.js'
import { runPool } from './pool.js'
import { withPrivilege } from './privilege.js'
import { failed } from './state.js'
import {
  ApplyContext,
  DiffRecord,
  ExecuteOptions,
  ExecuteSummary,
  ExecutionPlan,
  Logger,
  Outcome,
  PrivilegedRunner,
  PrivilegeSession,
  ResourceResult,
} from '../types.js'

export interface ProgressReporter {
  onBatchStart(count: number, privileged: boolean): void
  onResourceStart(id: string, description: string): void
  onResourceComplete(id: string, outcome: Outcome): void
  onBatchComplete(): void
  onPostAction(service: string, outcome: Outcome): void
}

export interface Confirmer {
  confirm(prompt: string): Promise<boolean>
}

export interface ExecuteDeps {
  progress: ProgressReporter
  confirm: Confirmer
  acquirePrivilege: (reason: string) => Promise<PrivilegeSession>
  restartService: (service: string, ctx: ApplyContext) => Promise<Outcome>
  /**
   * Used only for the privilege flag on re-computed diffs; buckets are never reshuffled.
   */
  classify?: PrivilegeClassifier
  logger?: Logger
}

const noopLogger: Logger = { info() {}, warn() {}, error() {} }

export const silentProgress: ProgressReporter = {
  onBatchStart() {},
  onResourceStart() {},
  onResourceComplete() {},
  onBatchComplete() {},
  onPostAction() {},
}

export function emptySummary(): ExecuteSummary {
  return {
    created: 0,
    modified: 0,
    removed: 0,
    skipped: 0,
    failed: 0,
    noChange: 0,
    privilegeDenied: false,
    results: [],
    postActions: [],
  }
}

export function record(summary: ExecuteSummary, result: ResourceResult): void {
  summary.results.push(result)
  switch (result.outcome.status) {
    case 'no_change':
      summary.noChange++
      break
    case 'created':
      summary.created++
      break
    case 'modified':
      summary.modified++
      break
    case 'removed':
      summary.removed++
      break
    case 'failed':
      summary.failed++
      break
    case 'skipped':
      summary.skipped++
      break
    default: {
      const _exhaustive: never = result.outcome
      throw new Error(`Unknown outcome: ${String(_exhaustive)}`)
    }
  }
}

export function isSuccess(summary: ExecuteSummary): boolean {
  return summary.failed === 0
}

interface BatchRun {
  diffs: readonly DiffRecord[]
  privileged: boolean
  parallelism: number
  runner: PrivilegedRunner | null
}

/**
 * Drive a plan to completion: unprivileged batch, then privileged batch, then post-actions.
 * Resource failures are recorded and never stop a batch.
 */
export async function execute(plan: ExecutionPlan, opts: ExecuteOptions, deps: ExecuteDeps): Promise<ExecuteSummary> {
  const logger = deps.logger ?? noopLogger
  const classify = deps.classify ?? neverPrivileged
  const summary = emptySummary()

  // Live state may have moved since the plan was built.
  const inspectLimit = Math.max(1, opts.parallelism)
  const unprivileged = await computeDiffs(plan.unprivileged, classify, inspectLimit)
  const privileged = await computeDiffs(plan.privileged, classify, inspectLimit)
  const total = unprivileged.length + privileged.length
  if (total === 0) return summary

  // Dry runs stop before any apply; there is nothing to confirm.
  if (opts.dryRun) return summary

  if (!await deps.confirm.confirm('Apply changes?')) {
    summary.skipped = total
    return summary
  }

  const applyOne = async (d: DiffRecord, runner: PrivilegedRunner | null, isPrivileged: boolean): Promise<ResourceResult> => {
    const r = d.resource
    deps.progress.onResourceStart(r.id, r.description)
    let outcome: Outcome
    if (d.error) {
      outcome = failed(d.error.message, d.error)
    } else {
      const ctx: ApplyContext = { dryRun: false, verbose: opts.verbose, privilegedRunner: runner, logger }
      try {
        outcome = await r.apply(ctx)
      } catch (e) {
        outcome = e instanceof ConvergeError ? failed(e.message, e) : failed(errorMessage(e))
      }
    }
    deps.progress.onResourceComplete(r.id, outcome)
    return { id: r.id, kind: r.kind, privileged: isPrivileged, outcome }
  }

  const runBatch = async (batch: BatchRun): Promise<void> => {
    if (!batch.diffs.length) return
    deps.progress.onBatchStart(batch.diffs.length, batch.privileged)
    const pooled = batch.diffs.filter(d => d.resource.parallelSafe)
    const serial = batch.diffs.filter(d => !d.resource.parallelSafe)
    const results = await runPool(pooled, batch.parallelism, d => applyOne(d, batch.runner, batch.privileged))
    for (const d of serial) results.push(await applyOne(d, batch.runner, batch.privileged))
    for (const res of results) record(summary, res)
    deps.progress.onBatchComplete()
  }

  await runBatch({ diffs: unprivileged, privileged: false, parallelism: Math.max(1, opts.parallelism), runner: null })

  if (privileged.length) {
    const n = privileged.length
    // With nothing unprivileged, the first prompt already covered this batch.
    const ok = !unprivileged.length || await deps.confirm.confirm(`Apply ${n} privileged change${n === 1 ? '' : 's'}?`)
    if (!ok) {
      summary.skipped += n
    } else {
      let session: PrivilegeSession | undefined
      try {
        session = await deps.acquirePrivilege(`${n} ${n === 1 ? 'change needs' : 'changes need'} administrator rights`)
      } catch (e) {
        const err = e instanceof ConvergeError ? e : new ConvergeError({ kind: 'privilege_denied' })
        logger.error(`[homestate] privilege acquisition failed: ${errorMessage(e)}`)
        summary.privilegeDenied = true
        for (const d of privileged) {
          record(summary, { id: d.resourceId, kind: d.kind, privileged: true, outcome: failed(err.message, err) })
        }
      }
      if (session) {
        await withPrivilege(session, s => runBatch({ diffs: privileged, privileged: true, parallelism: 1, runner: s }))
      }
    }
  }

  const postCtx: ApplyContext = { dryRun: false, verbose: opts.verbose, privilegedRunner: null, logger }
  for (const service of plan.postActions) {
    let outcome: Outcome
    try {
      outcome = await deps.restartService(service, postCtx)
    } catch (e) {
      outcome = failed(errorMessage(e))
    }
    if (outcome.status === 'failed') logger.warn(`[homestate] restart of ${service} failed: ${outcome.message}`)
    summary.postActions.push({ service, outcome })
    deps.progress.onPostAction(service, outcome)
  }

  return summary
}
