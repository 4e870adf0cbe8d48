import fs from 'fs-extra'

export interface EntryStat {
  isSymbolicLink(): boolean
  isDirectory(): boolean
}

export interface FS {
  pathExists(p: string): Promise<boolean>
  lstat(p: string): Promise<EntryStat>
  readlink(p: string): Promise<string>
  realpath(p: string): Promise<string>
  ensureDir(p: string): Promise<void>
  symlink(source: string, target: string): Promise<void>
  rename(from: string, to: string): Promise<void>
  unlink(p: string): Promise<void>
}

export const nodeFS: FS = {
  pathExists: p => fs.pathExists(p),
  lstat: p => fs.lstat(p),
  readlink: p => fs.readlink(p),
  realpath: p => fs.realpath(p),
  ensureDir: p => fs.ensureDir(p),
  symlink: (source, target) => fs.symlink(source, target),
  rename: (from, to) => fs.rename(from, to),
  unlink: p => fs.unlink(p),
}
