export type VersionIncrement = 'major' | 'minor' | 'patch' | 'prerelease'

export interface ConventionalCommit {
  type: string
  scope?: string
  breaking: boolean
  message: string
  hash: string
}

export type DependencyKind =
  | 'dependencies'
  | 'devDependencies'
  | 'peerDependencies'
  | 'optionalDependencies'

export const DEPENDENCY_KINDS: readonly DependencyKind[] = [
  'dependencies',
  'devDependencies',
  'peerDependencies',
  'optionalDependencies'
]

export interface PackageDependency {
  name: string
  kind: DependencyKind
  /** Requirement exactly as written in package.json. */
  requirement: string
  /** Semver range, when the requirement pins an explicit version. */
  range?: string
  /** Directory of the workspace package the dependency resolves to. */
  localPath?: string
}

export interface WorkspacePackage {
  name: string
  version: string
  /** Absolute directory of the package. */
  path: string
  manifestPath: string
  dependencies: PackageDependency[]
  versionInherited: boolean
  isPrivate: boolean
  isLibrary: boolean
  hasExecutable: boolean
}

export interface PackageJson {
  name?: string
  version?: string
  private?: boolean
  main?: string
  module?: string
  types?: string
  typings?: string
  exports?: unknown
  bin?: string | Record<string, string>
  workspaces?: string[] | { packages?: string[] }
  dependencies?: Record<string, string>
  devDependencies?: Record<string, string>
  peerDependencies?: Record<string, string>
  optionalDependencies?: Record<string, string>
  [key: string]: unknown
}

export interface Signature {
  name?: string
  email?: string
  /** Seconds since the epoch. */
  timestamp?: number
}

export interface RemoteContributor {
  username?: string
  prNumber?: number
  prTitle?: string
  prLabels?: string[]
}

export interface Commit {
  id: string
  message: string
  author: Signature
  committer: Signature
  remote: RemoteContributor
}

/** Id of synthetic commits that have no counterpart in git. */
export const NO_COMMIT_ID = '0000000'

export type CompatibilityCheck =
  | { status: 'compatible' }
  | { status: 'incompatible'; details: string }
  | { status: 'skipped' }

/** Relative path to sha256 of the content; undefined when not hashable. */
export type PackagedFiles = Map<string, string | undefined>

export interface UpdateResult {
  version: string
  /** Whole changelog after the update. */
  changelog?: string
  /** Absolute path the changelog is written to. */
  changelogPath?: string
  /** The section rendered for this release. */
  changelogEntry?: string
  compatibility: CompatibilityCheck
  /** Last published version, when the local one was bumped by hand. */
  registryVersion?: string
  commits: Commit[]
}

export interface PackageUpdate {
  package: WorkspacePackage
  result: UpdateResult
}

export type UpdateStage = 'snapshot' | 'diff' | 'compatibility' | 'changelog'

export interface PackageFailure {
  package: string
  stage: UpdateStage
  error: Error
}

export interface UpdatePlan {
  updates: PackageUpdate[]
  workspaceVersion?: string
  failures: PackageFailure[]
}

export interface Workspace {
  root: string
  /** Version of the root package.json, shared by inheriting packages. */
  version?: string
  packages: WorkspacePackage[]
  isMultiPackage: boolean
}
