import { PrivilegeConfig, classifierFor, PrivilegeClassifier } from '../core/classifier.js'
import { CommandRunner } from '../core/command.js'
import { invalidConfig } from '../core/errors.js'
import { FS } from '../core/fs.js'
import { RetryPolicy } from '../core/retry.js'
import { Config } from '../config/schema.js'
import { ExpandEnv, expandPath, expandString } from '../config/expand.js'
import { Resource } from '../types.js'
import { DOCK_SERVICE, DockAppResource, DockFolderResource } from './dock.js'
import { FileHandlerResource } from './file-handler.js'
import { PackageResource } from './package.js'
import { PreferenceResource } from './preference.js'
import { SymlinkResource } from './symlink.js'

export { PackageResource } from './package.js'
export { PreferenceResource } from './preference.js'
export { SymlinkResource } from './symlink.js'
export { ServiceResource, serviceRestarter } from './service.js'
export { DockAppResource, DockFolderResource } from './dock.js'
export { FileHandlerResource } from './file-handler.js'

/**
 * Processes restarted after a change in their preference domain.
 */
export const DOMAIN_RESTARTS: ReadonlyMap<string, string> = new Map([
  ['com.apple.finder', 'Finder'],
  ['com.apple.dock', DOCK_SERVICE],
  ['com.apple.systemuiserver', 'SystemUIServer'],
])

export interface BuildOptions {
  runner: CommandRunner
  /**
   * Directory relative paths resolve against.
   */
  baseDir: string
  expand: Omit<ExpandEnv, 'locations'>
  fs?: FS
  retry?: RetryPolicy
}

export interface BuiltResources {
  resources: Resource[]
  privilege: PrivilegeConfig
  classify: PrivilegeClassifier
  warnings: string[]
}

/**
 * Turn a validated config into resources, in document order: packages, preferences,
 * symlinks, dock, handlers.
 */
export function buildResources(config: Config, opts: BuildOptions): BuiltResources {
  const warnings: string[] = []
  const ctx: ExpandEnv = { ...opts.expand, locations: config.locations }
  const services = new Set(config.services)

  const privilegedPackages = new Set(config.privilege_allowlist.packages)
  const privilegedPreferences = new Set(config.privilege_allowlist.preferences)
  for (const p of config.packages) if (p.privileged) privilegedPackages.add(p.name)
  for (const p of config.preferences) if (p.privileged) privilegedPreferences.add(`${p.domain}.${p.key}`)
  const privilege: PrivilegeConfig = { privilegedPackages, privilegedPreferences }
  const classify = classifierFor(privilege)

  const warnedServices = new Set<string>()
  const allowedRestart = (service: string | undefined, why: string): string | undefined => {
    if (!service) return undefined
    if (services.has(service)) return service
    if (!warnedServices.has(service)) {
      warnedServices.add(service)
      warnings.push(`restart of ${service} (${why}) skipped: not listed in services`)
    }
    return undefined
  }

  const resources: Resource[] = []
  const seen = new Set<string>()
  const add = (r: Resource, where: string) => {
    const key = `${r.kind}:${r.id}`
    if (seen.has(key)) throw invalidConfig(where, `duplicate ${r.kind} "${r.id}"`)
    seen.add(key)
    resources.push(r)
  }

  config.packages.forEach((p, i) => {
    add(new PackageResource(p.kind, p.name, opts.runner, {
      privileged: classify(p.kind, p.name),
      retry: opts.retry,
    }), `packages[${i}]`)
  })

  config.preferences.forEach((p, i) => {
    const where = `preferences[${i}]`
    const id = `${p.domain}.${p.key}`
    const value = p.type === 'string'
      ? { type: p.type, value: expandString(p.value, ctx, `${where}.value`) }
      : p
    add(new PreferenceResource(p.domain, p.key, value, opts.runner, {
      privileged: classify('preference', id),
      restart: allowedRestart(p.restart ?? DOMAIN_RESTARTS.get(p.domain), id),
    }), where)
  })

  config.symlinks.forEach((s, i) => {
    const where = `symlinks[${i}]`
    const source = expandPath(s.source, ctx, opts.baseDir, `${where}.source`)
    const target = expandPath(s.target, ctx, opts.baseDir, `${where}.target`)
    add(new SymlinkResource(source, target, { force: s.force, fs: opts.fs }), where)
  })

  config.dock.apps.forEach((a, i) => {
    const where = `dock.apps[${i}]`
    const entry = typeof a === 'string' ? { path: a, position: undefined } : a
    const appPath = expandPath(entry.path, ctx, opts.baseDir, `${where}.path`)
    const restart = allowedRestart(DOCK_SERVICE, appPath) !== undefined
    add(new DockAppResource(appPath, opts.runner, { position: entry.position, restart }), where)
  })

  config.dock.folders.forEach((f, i) => {
    const where = `dock.folders[${i}]`
    const folderPath = expandPath(f.path, ctx, opts.baseDir, `${where}.path`)
    const restart = allowedRestart(DOCK_SERVICE, folderPath) !== undefined
    add(new DockFolderResource(folderPath, opts.runner, { view: f.view, display: f.display, sort: f.sort, restart }), where)
  })

  config.handlers.forEach((h, i) => {
    add(new FileHandlerResource(h.bundle_id, h.uti, opts.runner), `handlers[${i}]`)
  })

  return { resources, privilege, classify, warnings }
}
