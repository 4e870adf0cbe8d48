import path from 'path'

import { FS } from './fs.js'

function rand() {
  return Math.random().toString(16).slice(2)
}

export function tmpPathForTarget(targetAbs: string) {
  return `${targetAbs}.tmp.${rand()}`
}

export function backupPathForTarget(targetAbs: string, n = 0) {
  return n === 0 ? `${targetAbs}.bak` : `${targetAbs}.bak.${n}`
}

/**
 * Resolve a path through every symlink, or return it normalized when it does not exist.
 */
export async function canonicalize(fs: FS, p: string): Promise<string> {
  try {
    return await fs.realpath(p)
  } catch {
    return path.normalize(p)
  }
}

/**
 * Where the link at `targetAbs` points, made absolute against the link's own directory.
 */
export async function readLinkDestination(fs: FS, targetAbs: string): Promise<string> {
  const link = await fs.readlink(targetAbs)
  return path.resolve(path.dirname(targetAbs), link)
}

/**
 * Point `targetAbs` at `sourceAbs`: the link is created at a temp path, then renamed over the target,
 * so a reader never sees the target missing.
 */
export async function replaceWithSymlink(fs: FS, sourceAbs: string, targetAbs: string) {
  await fs.ensureDir(path.dirname(targetAbs))
  const tmp = tmpPathForTarget(targetAbs)
  await fs.symlink(sourceAbs, tmp)
  try {
    await fs.rename(tmp, targetAbs)
  } catch (e) {
    await fs.unlink(tmp).catch(() => undefined)
    throw e
  }
}

/**
 * Move an existing entry aside to `<target>.bak`, or `<target>.bak.N` for the first N not yet taken.
 * Earlier backups are left alone.
 */
export async function moveAside(fs: FS, targetAbs: string): Promise<string> {
  let n = 0
  while (await entryExists(fs, backupPathForTarget(targetAbs, n))) n++
  const backup = backupPathForTarget(targetAbs, n)
  await fs.rename(targetAbs, backup)
  return backup
}

async function entryExists(fs: FS, p: string): Promise<boolean> {
  try {
    await fs.lstat(p)
    return true
  } catch (e) {
    if (e instanceof Error && 'code' in e && e.code === 'ENOENT') return false
    throw e
  }
}
