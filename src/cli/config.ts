import fs from 'fs-extra'
import os from 'os'
import path from 'path'
import { z } from 'zod'

import { errorMessage, invalidConfig } from '../core/errors.js'

const settingsSchema = z.object({
  configPath: z.string().min(1).optional(),
})

export type Settings = z.infer<typeof settingsSchema>

export interface SettingsEnv {
  env?: NodeJS.ProcessEnv
  homeDir?: string
}

export function getSettingsPath(opts: SettingsEnv = {}): string {
  const env = opts.env ?? process.env
  const base = env.XDG_CONFIG_HOME || path.join(opts.homeDir ?? os.homedir(), '.config')
  return path.join(base, 'homestate', 'settings.json')
}

/**
 * Per-user CLI state under the XDG config dir. Holds the config file used when `--config` is omitted.
 */
export class SettingsFile {
  readonly path: string

  constructor(opts: SettingsEnv = {}) {
    this.path = getSettingsPath(opts)
  }

  /**
   * An absent file reads as empty settings; an unreadable or malformed one is a config error.
   */
  async read(): Promise<Settings> {
    if (!await fs.pathExists(this.path)) return {}
    let raw: unknown
    try {
      raw = JSON.parse(await fs.readFile(this.path, 'utf8'))
    } catch (e) {
      throw invalidConfig(this.path, `not valid JSON (${errorMessage(e)})`)
    }
    const parsed = settingsSchema.safeParse(raw)
    if (!parsed.success) {
      const issue = parsed.error.issues[0]
      const at = issue.path.length ? `${this.path}: ${issue.path.join('.')}` : this.path
      throw invalidConfig(at, issue.message)
    }
    return parsed.data
  }

  async update(patch: Settings): Promise<Settings> {
    const next = { ...await this.read(), ...patch }
    await fs.outputJson(this.path, next, { spaces: 2 })
    return next
  }

  async defaultConfigPath(): Promise<string | undefined> {
    return (await this.read()).configPath
  }

  async setDefaultConfigPath(configPath: string): Promise<string> {
    const abs = path.resolve(configPath)
    await this.update({ configPath: abs })
    return abs
  }

  async clear(): Promise<void> {
    await fs.remove(this.path)
  }
}
