import path from 'path'

import { ConvergeError } from '../core/errors.js'
import { FS, nodeFS } from '../core/fs.js'
import { canonicalize, moveAside, readLinkDestination, replaceWithSymlink } from '../core/fs-ops.js'
import { absent, changed, created, DRY_RUN, failed, modified, noChange, present, skipped } from '../core/state.js'
import { ApplyContext, Outcome, PrivilegeHint, Resource, ResourceState } from '../types.js'

type LinkProbe =
  | { type: 'missing' }
  | { type: 'correct' }
  | { type: 'wrong'; actual: string }
  | { type: 'file' }

function errnoCode(e: unknown): string | undefined {
  if (typeof e === 'object' && e !== null && 'code' in e && typeof e.code === 'string') return e.code
  return undefined
}

export interface SymlinkOptions {
  force?: boolean
  fs?: FS
}

/**
 * `target` is a symlink to `source`. Both paths are absolute once the config is expanded.
 */
export class SymlinkResource implements Resource {
  readonly id: string
  readonly kind = 'symlink' as const
  readonly description: string
  readonly privilegeHint: PrivilegeHint = { type: 'none' }
  readonly parallelSafe = true
  readonly source: string
  readonly target: string
  readonly force: boolean
  private readonly fs: FS

  constructor(source: string, target: string, opts: SymlinkOptions = {}) {
    this.source = path.resolve(source)
    this.target = path.resolve(target)
    this.id = this.target
    this.description = `${this.target} → ${this.source}`
    this.force = opts.force ?? false
    this.fs = opts.fs ?? nodeFS
  }

  private async probe(): Promise<LinkProbe> {
    let st
    try {
      st = await this.fs.lstat(this.target)
    } catch (e) {
      if (errnoCode(e) === 'ENOENT') return { type: 'missing' }
      throw e
    }
    if (!st.isSymbolicLink()) return { type: 'file' }
    const actual = await readLinkDestination(this.fs, this.target)
    const [a, b] = await Promise.all([canonicalize(this.fs, actual), canonicalize(this.fs, this.source)])
    return a === b ? { type: 'correct' } : { type: 'wrong', actual }
  }

  desiredState(): ResourceState {
    return present(this.source)
  }

  async currentState(): Promise<ResourceState> {
    const p = await this.probe()
    switch (p.type) {
      case 'missing':
        return absent()
      case 'correct':
        return present(this.source)
      case 'wrong':
        return modified(p.actual, this.source)
      case 'file':
        return modified('regular', `symlink→${this.source}`)
    }
  }

  async apply(ctx: ApplyContext): Promise<Outcome> {
    if (ctx.dryRun) return DRY_RUN
    if (!await this.fs.pathExists(this.source)) {
      const err = new ConvergeError({ kind: 'not_found', name: this.source })
      return failed(`source does not exist: ${this.source}`, err)
    }

    try {
      const p = await this.probe()
      switch (p.type) {
        case 'correct':
          return noChange()
        case 'missing':
          await replaceWithSymlink(this.fs, this.source, this.target)
          return created()
        case 'wrong':
          await replaceWithSymlink(this.fs, this.source, this.target)
          return changed()
        case 'file': {
          if (!this.force) return skipped(`File exists at ${this.target}`)
          const backup = await moveAside(this.fs, this.target)
          ctx.logger?.info(`[homestate] moved ${this.target} to ${backup}`)
          await replaceWithSymlink(this.fs, this.source, this.target)
          return changed()
        }
      }
    } catch (e) {
      const code = errnoCode(e)
      if (code === 'EACCES' || code === 'EPERM') {
        const err = new ConvergeError({ kind: 'permission', path: this.target })
        return failed(err.message, err)
      }
      throw e
    }
  }
}
