import path from 'path'

import { CommandRunner, commandLine } from '../core/command.js'
import { classifyToolError, ConvergeError } from '../core/errors.js'
import { absent, created, DRY_RUN, failed, noChange, present } from '../core/state.js'
import { ApplyContext, Outcome, PrivilegeHint, Resource, ResourceState } from '../types.js'

export const DOCK_SERVICE = 'Dock'

type DockSection = 'persistent-apps' | 'persistent-others'

async function dockContains(runner: CommandRunner, section: DockSection, needle: string): Promise<boolean> {
  const res = await runner.run('defaults', ['read', 'com.apple.dock', section])
  // An empty section is reported as a missing key.
  if (res.code !== 0) return false
  return res.stdout.includes(needle)
}

abstract class DockEntry implements Resource {
  abstract readonly id: string
  abstract readonly kind: 'dock-app' | 'dock-folder'
  abstract readonly description: string
  readonly privilegeHint: PrivilegeHint = { type: 'none' }
  readonly parallelSafe = false
  readonly postAction?: string
  protected abstract readonly section: DockSection

  constructor(readonly path: string, protected readonly runner: CommandRunner, restart: boolean) {
    if (restart) this.postAction = DOCK_SERVICE
  }

  protected abstract addArgs(): string[]

  desiredState(): ResourceState {
    return present()
  }

  async currentState(): Promise<ResourceState> {
    try {
      return await dockContains(this.runner, this.section, this.path) ? present() : absent()
    } catch (e) {
      if (e instanceof ConvergeError && e.kind === 'tool_missing') {
        throw new ConvergeError({ kind: 'unsupported', feature: 'dock layout on this platform' })
      }
      throw e
    }
  }

  async apply(ctx: ApplyContext): Promise<Outcome> {
    if (ctx.dryRun) return DRY_RUN
    if ((await this.currentState()).state === 'present') return noChange()
    const args = this.addArgs()
    const res = await this.runner.run('dockutil', args)
    if (res.code !== 0) {
      const err = classifyToolError(res.stderr, this.path, commandLine('dockutil', args))
      return failed(err.message, err)
    }
    return created()
  }
}

export interface DockAppOptions {
  /**
   * 1-based slot in the Dock.
   */
  position?: number
  restart?: boolean
}

export class DockAppResource extends DockEntry {
  readonly id: string
  readonly kind = 'dock-app' as const
  readonly description: string
  protected readonly section = 'persistent-apps'
  readonly position?: number

  constructor(appPath: string, runner: CommandRunner, opts: DockAppOptions = {}) {
    super(appPath, runner, opts.restart ?? true)
    this.id = `dock:app:${appPath}`
    this.position = opts.position
    this.description = opts.position === undefined
      ? `Add ${appPath} to Dock`
      : `Add ${appPath} to Dock at position ${opts.position}`
  }

  protected addArgs(): string[] {
    const args = ['--add', this.path, '--no-restart']
    if (this.position !== undefined) args.push('--position', String(this.position))
    return args
  }
}

export interface DockFolderOptions {
  view?: string
  display?: string
  sort?: string
  restart?: boolean
}

export class DockFolderResource extends DockEntry {
  readonly id: string
  readonly kind = 'dock-folder' as const
  readonly description: string
  protected readonly section = 'persistent-others'
  readonly view: string
  readonly display: string
  readonly sort: string

  constructor(folderPath: string, runner: CommandRunner, opts: DockFolderOptions = {}) {
    super(path.resolve(folderPath), runner, opts.restart ?? true)
    this.id = `dock:folder:${this.path}`
    this.description = `Add folder ${this.path} to Dock`
    this.view = opts.view ?? 'grid'
    this.display = opts.display ?? 'stack'
    this.sort = opts.sort ?? 'dateadded'
  }

  protected addArgs(): string[] {
    return ['--add', this.path, '--no-restart', '--view', this.view, '--display', this.display, '--sort', this.sort]
  }
}
