import { z } from 'zod'

const name = z.string().min(1)

export const packageKindSchema = z.enum([
  'formula',
  'cask',
  'tap',
  'store-app',
  'editor-extension',
  'cli-extension',
  'node-global',
])

export const packageEntrySchema = z.object({
  kind: packageKindSchema,
  name,
  privileged: z.boolean().optional(),
}).strict()

const preferenceBase = {
  domain: name,
  key: name,
  privileged: z.boolean().optional(),
  restart: name.optional(),
}

export const preferenceEntrySchema = z.discriminatedUnion('type', [
  z.object({ ...preferenceBase, type: z.literal('bool'), value: z.boolean() }).strict(),
  z.object({ ...preferenceBase, type: z.literal('int'), value: z.number().int() }).strict(),
  z.object({ ...preferenceBase, type: z.literal('float'), value: z.number().finite() }).strict(),
  z.object({ ...preferenceBase, type: z.literal('string'), value: z.string() }).strict(),
])

export const symlinkEntrySchema = z.object({
  source: name,
  target: name,
  force: z.boolean().optional(),
}).strict()

export const dockAppSchema = z.union([
  name,
  z.object({ path: name, position: z.number().int().positive().optional() }).strict(),
])

export const dockFolderSchema = z.object({
  path: name,
  view: z.enum(['grid', 'fan', 'list', 'auto']).optional(),
  display: z.enum(['folder', 'stack']).optional(),
  sort: z.enum(['name', 'dateadded', 'datemodified', 'datecreated', 'kind']).optional(),
}).strict()

export const handlerEntrySchema = z.object({
  bundle_id: name,
  uti: name,
}).strict()

export const configSchema = z.object({
  version: z.literal(1).optional(),
  locations: z.record(z.string()).default({}),
  packages: z.array(packageEntrySchema).default([]),
  preferences: z.array(preferenceEntrySchema).default([]),
  symlinks: z.array(symlinkEntrySchema).default([]),
  services: z.array(name).default([]),
  privilege_allowlist: z.object({
    packages: z.array(name).default([]),
    preferences: z.array(name).default([]),
  }).strict().default({}),
  dock: z.object({
    apps: z.array(dockAppSchema).default([]),
    folders: z.array(dockFolderSchema).default([]),
  }).strict().default({}),
  handlers: z.array(handlerEntrySchema).default([]),
}).strict()

export type Config = z.infer<typeof configSchema>
export type PackageEntry = z.infer<typeof packageEntrySchema>
export type PreferenceEntry = z.infer<typeof preferenceEntrySchema>
export type SymlinkEntry = z.infer<typeof symlinkEntrySchema>
export type DockFolderEntry = z.infer<typeof dockFolderSchema>
export type HandlerEntry = z.infer<typeof handlerEntrySchema>
