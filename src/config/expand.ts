import path from 'path'

import { invalidConfig } from '../core/errors.js'

export const MAX_EXPANSION_DEPTH = 8

export interface ExpandEnv {
  env: NodeJS.ProcessEnv
  homeDir: string
  locations: Readonly<Record<string, string>>
}

const VARIABLE = /\$\{locations\.([^}]+)\}|\$\{([A-Za-z_][A-Za-z0-9_]*)\}|\$([A-Za-z_][A-Za-z0-9_]*)/g

function expandOnce(input: string, ctx: ExpandEnv, where: string): string {
  let out = input.replace(VARIABLE, (match, location: string | undefined, braced: string | undefined, bare: string | undefined) => {
    if (location !== undefined) {
      if (!Object.prototype.hasOwnProperty.call(ctx.locations, location)) {
        throw invalidConfig(where, `unknown location "${location}"`)
      }
      return ctx.locations[location]
    }
    const varName = braced ?? bare
    if (varName === undefined) return match
    // Unset variables stay literal.
    return ctx.env[varName] ?? match
  })
  if (out === '~' || out.startsWith('~/')) out = ctx.homeDir + out.slice(1)
  return out
}

/**
 * Expand `~`, `$VAR`, `${VAR}` and `${locations.NAME}` until the string stops changing.
 * A value still changing after MAX_EXPANSION_DEPTH passes is treated as a reference cycle.
 */
export function expandString(input: string, ctx: ExpandEnv, where: string): string {
  let current = input
  for (let depth = 0; depth < MAX_EXPANSION_DEPTH; depth++) {
    const next = expandOnce(current, ctx, where)
    if (next === current) return next
    current = next
  }
  if (expandOnce(current, ctx, where) !== current) {
    throw invalidConfig(where, `variable expansion exceeds depth ${MAX_EXPANSION_DEPTH}`)
  }
  return current
}

/**
 * Expand, then make absolute against `baseDir` (the config file's directory).
 */
export function expandPath(input: string, ctx: ExpandEnv, baseDir: string, where: string): string {
  const expanded = expandString(input, ctx, where)
  return path.isAbsolute(expanded) ? path.normalize(expanded) : path.resolve(baseDir, expanded)
}
