export type {
  ApplyContext,
  CommandOutput,
  DiffRecord,
  ExecuteOptions,
  ExecuteSummary,
  ExecutionPlan,
  Logger,
  Outcome,
  OutcomeStatus,
  PackageKind,
  PostActionResult,
  PrivilegedRunner,
  PrivilegeHint,
  PrivilegeSession,
  Resource,
  ResourceKind,
  ResourceResult,
  ResourceState,
} from './types.js'
export { PACKAGE_KINDS, RESOURCE_KINDS, isPackageKind } from './types.js'

export type { ConvergeErrorDetail, ConvergeErrorKind } from './core/errors.js'
export { ConvergeError, classifyToolError, invalidConfig, isConvergeError } from './core/errors.js'
export { absent, present, modified, unknown, statesEqual, formatState, formatOutcome } from './core/state.js'
export type { PrivilegeClassifier, PrivilegeConfig } from './core/classifier.js'
export { requiresPrivilege, classifierFor, emptyPrivilegeConfig } from './core/classifier.js'
export type { DiffSummary } from './core/diff.js'
export { computeDiffs, summarizeDiffs } from './core/diff.js'
export type { Target } from './core/planner.js'
export { buildPlan, filterPlan, parseTarget } from './core/planner.js'
export type { Confirmer, ExecuteDeps, ProgressReporter } from './core/executor.js'
export { execute, silentProgress } from './core/executor.js'
export { PrivilegeContext, withPrivilege } from './core/privilege.js'
export type { CommandRunner } from './core/command.js'
export { nodeRunner } from './core/command.js'
export type { RetryPolicy } from './core/retry.js'
export { DEFAULT_RETRY_POLICY, withRetry } from './core/retry.js'

export type { Config } from './config/schema.js'
export { loadConfig, parseConfig } from './config/load.js'
export type { BuildOptions, BuiltResources } from './resources/index.js'
export {
  buildResources,
  PackageResource,
  PreferenceResource,
  SymlinkResource,
  ServiceResource,
  DockAppResource,
  DockFolderResource,
  FileHandlerResource,
} from './resources/index.js'
