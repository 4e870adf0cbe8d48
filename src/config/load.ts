import fs from 'fs-extra'
import path from 'path'
import type { ZodIssue } from 'zod'

import { errorMessage, invalidConfig } from '../core/errors.js'
import { Config, configSchema } from './schema.js'

export interface LoadedConfig {
  path: string
  baseDir: string
  config: Config
  /**
   * Unknown fields that were dropped.
   */
  warnings: string[]
}

type IssuePath = ZodIssue['path']

export function formatIssuePath(p: IssuePath): string {
  let out = ''
  for (const seg of p) {
    out += typeof seg === 'number' ? `[${seg}]` : out ? `.${seg}` : seg
  }
  return out || '<root>'
}

function isRecord(v: unknown): v is Record<string, unknown> {
  return typeof v === 'object' && v !== null && !Array.isArray(v)
}

function nodeAt(root: unknown, p: IssuePath): unknown {
  let node = root
  for (const seg of p) {
    if (Array.isArray(node) && typeof seg === 'number') node = node[seg]
    else if (isRecord(node) && typeof seg === 'string') node = node[seg]
    else return undefined
  }
  return node
}

/**
 * Validate a parsed document. Unknown keys are removed and reported; anything else is fatal.
 */
export function parseConfig(raw: unknown, where = 'config'): { config: Config; warnings: string[] } {
  const doc: unknown = structuredClone(raw)
  const warnings: string[] = []

  const first = configSchema.safeParse(doc)
  if (first.success) return { config: first.data, warnings }

  const hard = first.error.issues.filter(i => i.code !== 'unrecognized_keys')
  if (hard.length) {
    const issue = hard[0]
    throw invalidConfig(`${where}: ${formatIssuePath(issue.path)}`, issue.message)
  }

  for (const issue of first.error.issues) {
    if (issue.code !== 'unrecognized_keys') continue
    const node = nodeAt(doc, issue.path)
    if (!isRecord(node)) continue
    for (const key of issue.keys) {
      delete node[key]
      const at = formatIssuePath([...issue.path, key])
      warnings.push(`unknown field "${at}" ignored`)
    }
  }

  const second = configSchema.safeParse(doc)
  if (!second.success) {
    const issue = second.error.issues[0]
    throw invalidConfig(`${where}: ${formatIssuePath(issue.path)}`, issue.message)
  }
  return { config: second.data, warnings }
}

export async function loadConfig(configPath: string): Promise<LoadedConfig> {
  const abs = path.resolve(configPath)
  if (!await fs.pathExists(abs)) throw invalidConfig(abs, 'file does not exist')

  let raw: unknown
  try {
    raw = await fs.readJson(abs)
  } catch (e) {
    throw invalidConfig(abs, `not valid JSON (${errorMessage(e)})`)
  }

  const { config, warnings } = parseConfig(raw, abs)
  return { path: abs, baseDir: path.dirname(abs), config, warnings }
}
