import { isPackageKind, ResourceKind } from '../types.js'

export interface PrivilegeConfig {
  /**
   * Package names whose install needs elevation.
   */
  privilegedPackages: ReadonlySet<string>
  /**
   * `domain.key` strings whose write needs elevation.
   */
  privilegedPreferences: ReadonlySet<string>
}

export type PrivilegeClassifier = (kind: ResourceKind, id: string) => boolean

export function emptyPrivilegeConfig(): PrivilegeConfig {
  return { privilegedPackages: new Set(), privilegedPreferences: new Set() }
}

export function requiresPrivilege(kind: ResourceKind, id: string, config: PrivilegeConfig): boolean {
  if (isPackageKind(kind)) return config.privilegedPackages.has(id)
  if (kind === 'preference') return config.privilegedPreferences.has(id)
  return false
}

export function classifierFor(config: PrivilegeConfig): PrivilegeClassifier {
  return (kind, id) => requiresPrivilege(kind, id, config)
}

export const neverPrivileged: PrivilegeClassifier = () => false
