import { NO_COMMIT_ID, type Commit, type CompatibilityCheck } from './types.js'
import {
  applyIncrement,
  determineVersionIncrement,
  type VersionPolicy
} from './version.js'

/** What changed in a package since its last published release. */
export class Diff {
  commits: Commit[] = []
  /** Whether the package has ever been published. */
  registryPackageExists: boolean
  /**
   * False when the local version was bumped by hand and never published,
   * in which case the version must not be bumped again.
   */
  isVersionPublished = true
  compatibility: CompatibilityCheck = { status: 'skipped' }
  /** Latest published version, set when the local one differs from it. */
  registryVersion?: string

  constructor(registryPackageExists: boolean) {
    this.registryPackageExists = registryPackageExists
  }

  shouldUpdateVersion(): boolean {
    return (
      this.registryPackageExists &&
      this.commits.length > 0 &&
      this.isVersionPublished
    )
  }

  setVersionUnpublished(registryVersion: string): void {
    this.isVersionPublished = false
    this.registryVersion = registryVersion
  }

  setCompatibility(compatibility: CompatibilityCheck): void {
    this.compatibility = compatibility
  }

  /** Appends commits, skipping those already recorded (same id and message). */
  addCommits(commits: Commit[]): void {
    for (const commit of commits) {
      const known = this.commits.some(
        (existing) =>
          existing.id === commit.id && existing.message === commit.message
      )
      if (!known) {
        this.commits.push(commit)
      }
    }
  }

  anyCommitMatches(pattern: RegExp): boolean {
    return this.commits.some((commit) => pattern.test(commit.message))
  }
}

export function nextVersionFromDiff(
  currentVersion: string,
  diff: Diff,
  policy: VersionPolicy
): string {
  if (!diff.shouldUpdateVersion()) {
    return currentVersion
  }
  const increment = determineVersionIncrement(
    currentVersion,
    diff.commits.map((commit) => commit.message),
    policy
  )
  return increment ? applyIncrement(currentVersion, increment) : currentVersion
}

/** A commit standing for a change that has no commit of its own. */
export function syntheticCommit(message: string): Commit {
  return { id: NO_COMMIT_ID, message, author: {}, committer: {}, remote: {} }
}
