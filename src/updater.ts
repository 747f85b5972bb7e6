import * as core from '@actions/core'
import * as path from 'node:path'
import {
  buildChangelog,
  changelogTitle,
  type BuiltChangelog
} from './changelog.js'
import {
  CompatibilityRun,
  compatibilitySummary,
  type CompatibilityChecker,
  type CompatibilityJob
} from './compat.js'
import {
  getPackageConfig,
  versionPolicyFor,
  type CommitSort,
  type PackageSettings,
  type ReleaseConfig
} from './config.js'
import { coordinateVersions } from './coordinator.js'
import { propagateUpdates } from './dependencies.js'
import { nextVersionFromDiff, type Diff } from './diff.js'
import { DiffEngine } from './diff-engine.js'
import {
  errorMessage,
  PackageError,
  ReleaseError,
  toError,
  type ReleaseErrorCode
} from './errors.js'
import type { SourceControlGateway } from './git.js'
import type { PackageReader } from './package-files.js'
import {
  defaultTagTemplate,
  renderTagName,
  type PublishedSnapshot,
  type SnapshotLocator
} from './snapshot.js'
import {
  NO_COMMIT_ID,
  type Commit,
  type CompatibilityCheck,
  type PackageFailure,
  type PackageUpdate,
  type RemoteContributor,
  type UpdatePlan,
  type UpdateStage,
  type Workspace,
  type WorkspacePackage
} from './types.js'
import { compileRegex } from './version.js'

/** Looks up who contributed a commit on the forge hosting the repository. */
export interface ContributorLookup {
  remoteContributor(sha: string): Promise<RemoteContributor>
}

export interface UpdaterOptions {
  workspace: Workspace
  config: ReleaseConfig
  gateway: SourceControlGateway
  reader: PackageReader
  locator: SnapshotLocator
  compatChecker?: CompatibilityChecker
  contributors?: ContributorLookup
  /** Checked between packages. */
  signal?: AbortSignal
  /** Release date written to the changelogs. */
  date?: Date
}

const LOCKFILE = 'package-lock.json'
const DEFAULT_CHANGELOG = 'CHANGELOG.md'

/** Errors that stop the whole run instead of a single package. */
const FATAL_CODES: ReleaseErrorCode[] = [
  'DIRTY_WORKING_TREE',
  'TAG_WITHOUT_ARTIFACT',
  'VERSION_MISMATCH'
]

function isFatal(error: unknown): boolean {
  return error instanceof ReleaseError && FATAL_CODES.includes(error.code)
}

export function releaseTagTemplate(
  settings: PackageSettings,
  workspace: Workspace
): string {
  return (
    settings.tagNameTemplate ?? defaultTagTemplate(workspace.isMultiPackage)
  )
}

/** Commits are discovered newest first. */
export function sortCommits(commits: Commit[], order: CommitSort): Commit[] {
  return order === 'oldest' ? [...commits].reverse() : [...commits]
}

interface PackageDiff {
  pkg: WorkspacePackage
  settings: PackageSettings
  diff: Diff
  snapshot?: PublishedSnapshot
}

interface ReleaseContent {
  commits: Commit[]
  compatibility: CompatibilityCheck
  registryVersion?: string
}

interface PlannedUpdate {
  pkg: WorkspacePackage
  settings: PackageSettings
  version: string
  content: ReleaseContent
}

/** Computes what every package of the workspace should release next. */
export class Updater {
  private readonly engine: DiffEngine
  private readonly compat?: CompatibilityRun
  private readonly contributors = new Map<string, Promise<RemoteContributor>>()
  private oldChangelogs = new Map<string, string | undefined>()
  private failures: PackageFailure[] = []

  constructor(private readonly options: UpdaterOptions) {
    this.engine = new DiffEngine(options.gateway, options.reader)
    if (options.compatChecker) {
      this.compat = new CompatibilityRun(
        options.compatChecker,
        options.config.workspace.compatConcurrency
      )
    }
  }

  async computePlan(): Promise<UpdatePlan> {
    this.oldChangelogs = new Map()
    this.failures = []

    await this.preflight()
    try {
      return await this.assemble()
    } finally {
      await this.options.gateway.restoreStash()
    }
  }

  private async preflight(): Promise<void> {
    const { gateway, config } = this.options
    if (await gateway.isClean()) {
      return
    }
    if (!config.workspace.allowDirty) {
      throw new ReleaseError(
        `The working tree at ${gateway.root} has uncommitted changes. Commit them or set allow_dirty.`,
        'DIRTY_WORKING_TREE',
        { root: gateway.root }
      )
    }
    await gateway.stash()
  }

  private async assemble(): Promise<UpdatePlan> {
    const { workspace, config } = this.options
    const diffs = await this.checkCompatibility(await this.packagesDiffs())

    const releaseCommits = compileRegex(config.workspace.releaseCommits)
    const releasable = diffs.filter(({ pkg, diff }) => {
      if (releaseCommits && !diff.anyCommitMatches(releaseCommits)) {
        core.info(`${pkg.name}: no commit matches the release_commits regex`)
        return false
      }
      return true
    })

    const { planned, workspaceVersion } = this.planVersions(diffs, releasable)

    const updates: PackageUpdate[] = []
    for (const { pkg, settings, version, content } of planned.values()) {
      const update = await this.packageUpdate(pkg, settings, version, content)
      if (update) {
        updates.push(update)
      }
    }

    return {
      updates,
      workspaceVersion:
        workspaceVersion !== workspace.version ? workspaceVersion : undefined,
      failures: this.failures
    }
  }

  /**
   * Coordinates the versions, then propagates them to the dependents, until
   * neither moves a package. Version groups and the workspace version take
   * in the propagated bumps, so their members keep sharing one version.
   */
  private planVersions(
    diffs: PackageDiff[],
    releasable: PackageDiff[]
  ): { planned: Map<string, PlannedUpdate>; workspaceVersion?: string } {
    const { workspace, config } = this.options
    const ownVersions = new Map(
      diffs.map(({ pkg, settings, diff }) => [
        pkg.name,
        nextVersionFromDiff(pkg.version, diff, versionPolicyFor(settings))
      ])
    )
    const planned = new Map<string, PlannedUpdate>()
    let workspaceVersion: string | undefined
    let waves = 0
    let moved = true

    while (moved) {
      moved = false
      const coordinated = coordinateVersions(
        diffs.map(({ pkg, settings }) => ({
          name: pkg.name,
          candidate:
            planned.get(pkg.name)?.version ??
            ownVersions.get(pkg.name) ??
            pkg.version,
          versionGroup: settings.versionGroup,
          inheritsWorkspaceVersion: pkg.versionInherited
        })),
        workspace.version
      )
      workspaceVersion = coordinated.workspaceVersion

      for (const { pkg, settings, diff } of releasable) {
        const version = coordinated.versions.get(pkg.name) ?? pkg.version
        const current = planned.get(pkg.name)
        if (current) {
          if (current.version !== version) {
            core.info(`${pkg.name}: next version raised to ${version}`)
            current.version = version
            moved = true
          }
        } else if (version !== pkg.version || !diff.registryPackageExists) {
          core.info(
            `${pkg.name}: next version is ${version}${compatibilitySummary(diff.compatibility)}`
          )
          planned.set(pkg.name, { pkg, settings, version, content: diff })
          moved = true
        }
      }

      const propagation = propagateUpdates(
        [...planned.values()].map(({ pkg, version }) => ({ pkg, version })),
        releasable
          .filter(
            ({ pkg, diff }) => !planned.has(pkg.name) && diff.isVersionPublished
          )
          .map(({ pkg }) => pkg)
      )
      waves += propagation.waves
      for (const { pkg, version, commits } of propagation.updates) {
        planned.set(pkg.name, {
          pkg,
          settings: getPackageConfig(config, pkg.name),
          version,
          content: { commits, compatibility: { status: 'skipped' } }
        })
        moved = true
      }
    }

    core.debug(`dependency updates settled after ${waves} waves`)
    return { planned, workspaceVersion }
  }

  private async packagesDiffs(): Promise<PackageDiff[]> {
    const { workspace, config, locator, signal } = this.options
    const diffs: PackageDiff[] = []

    for (const pkg of workspace.packages) {
      signal?.throwIfAborted()
      const settings = getPackageConfig(config, pkg.name)
      if (!settings.release) {
        core.debug(`${pkg.name}: release disabled, skipping`)
        continue
      }

      let snapshot: PublishedSnapshot | undefined
      try {
        snapshot = await locator.locate(pkg, settings.gitOnly)
      } catch (error) {
        if (isFatal(error)) {
          throw error
        }
        this.fail(pkg.name, 'snapshot', error)
        continue
      }

      try {
        const diff = await this.engine.diff({
          pkg,
          snapshot,
          tagName: renderTagName(
            releaseTagTemplate(settings, workspace),
            pkg.name,
            pkg.version
          ),
          readme: settings.readme
            ? path.resolve(pkg.path, settings.readme)
            : undefined,
          lockfile: path.join(workspace.root, LOCKFILE)
        })
        diff.commits = await this.withRemoteContributors(diff.commits)
        diffs.push({ pkg, settings, diff, snapshot })
      } catch (error) {
        if (isFatal(error)) {
          throw error
        }
        this.fail(pkg.name, 'diff', error)
      }
    }

    includeChangelogCommits(diffs)
    return diffs
  }

  private async withRemoteContributors(commits: Commit[]): Promise<Commit[]> {
    const lookup = this.options.contributors
    if (!lookup) {
      return commits
    }
    const enriched: Commit[] = []
    for (const commit of commits) {
      if (commit.id === NO_COMMIT_ID) {
        enriched.push(commit)
        continue
      }
      let remote = this.contributors.get(commit.id)
      if (!remote) {
        remote = lookup.remoteContributor(commit.id)
        this.contributors.set(commit.id, remote)
      }
      enriched.push({ ...commit, remote: await remote })
    }
    return enriched
  }

  /** Runs the API checks of the libraries about to be released. */
  private async checkCompatibility(diffs: PackageDiff[]): Promise<PackageDiff[]> {
    if (!this.compat) {
      return diffs
    }
    const jobs = diffs.flatMap(
      ({ pkg, settings, diff, snapshot }): CompatibilityJob[] =>
        snapshot &&
        pkg.isLibrary &&
        settings.compatCheck &&
        diff.shouldUpdateVersion()
          ? [
              {
                packageName: pkg.name,
                localDir: pkg.path,
                publishedDir: snapshot.directory
              }
            ]
          : []
    )

    const { checks, failures } = await this.compat.checkAll(jobs)
    for (const [name, error] of failures) {
      this.fail(name, 'compatibility', error)
    }
    return diffs.filter(({ pkg, diff }) => {
      const check = checks.get(pkg.name)
      if (check) {
        diff.setCompatibility(check)
      }
      return !failures.has(pkg.name)
    })
  }

  private async packageUpdate(
    pkg: WorkspacePackage,
    settings: PackageSettings,
    version: string,
    content: ReleaseContent
  ): Promise<PackageUpdate | undefined> {
    const commits = sortCommits(
      content.commits,
      this.options.config.workspace.sortCommits
    )

    let changelog: BuiltChangelog | undefined
    let changelogPath: string | undefined
    if (settings.changelogUpdate) {
      changelogPath = settings.changelogPath
        ? path.resolve(this.options.workspace.root, settings.changelogPath)
        : path.join(pkg.path, DEFAULT_CHANGELOG)
      try {
        changelog = await this.changelog(
          pkg,
          settings,
          version,
          commits,
          changelogPath
        )
      } catch (error) {
        this.fail(pkg.name, 'changelog', error)
        return undefined
      }
    }

    return {
      package: pkg,
      result: {
        version,
        changelog: changelog?.changelog,
        changelogPath,
        changelogEntry: changelog?.entry,
        compatibility: content.compatibility,
        registryVersion: content.registryVersion,
        commits
      }
    }
  }

  /** Old changelogs are cached by path, so packages can share one file. */
  private async changelog(
    pkg: WorkspacePackage,
    settings: PackageSettings,
    version: string,
    commits: Commit[],
    file: string
  ): Promise<BuiltChangelog> {
    const { workspace, reader, config, date } = this.options
    const oldChangelog = this.oldChangelogs.has(file)
      ? this.oldChangelogs.get(file)
      : await reader.readText(file)

    const repoUrl = config.workspace.repoUrl?.replace(/\/+$/, '')
    const template = releaseTagTemplate(settings, workspace)
    const built = buildChangelog({
      title: changelogTitle(pkg.name, pkg.path === workspace.root),
      currentVersion: pkg.version,
      nextVersion: version,
      commits,
      oldChangelog,
      compareLink: repoUrl
        ? (previous, next) =>
            `${repoUrl}/compare/${renderTagName(template, pkg.name, previous)}...${renderTagName(template, pkg.name, next)}`
        : undefined,
      date
    })
    this.oldChangelogs.set(file, built.changelog)
    return built
  }

  private fail(packageName: string, stage: UpdateStage, error: unknown): void {
    const failure: PackageFailure = {
      package: packageName,
      stage: error instanceof PackageError ? error.stage : stage,
      error: toError(error)
    }
    core.error(
      error instanceof PackageError
        ? error.message
        : `${packageName}: ${stage} failed: ${errorMessage(error)}`
    )
    this.failures.push(failure)
  }
}

/** Adds the commits of the packages listed in `changelog_include`. */
function includeChangelogCommits(diffs: PackageDiff[]): void {
  const ownCommits = new Map(
    diffs.map(({ pkg, diff }) => [pkg.name, [...diff.commits]])
  )
  for (const { settings, diff } of diffs) {
    if (!diff.registryPackageExists) {
      continue
    }
    for (const name of settings.changelogInclude) {
      const commits = ownCommits.get(name)
      if (commits) {
        diff.addCommits(commits)
      }
    }
  }
}
