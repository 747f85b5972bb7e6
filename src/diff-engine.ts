import * as core from '@actions/core'
import * as path from 'node:path'
import PQueue from 'p-queue'
import semver from 'semver'
import {
  areLockedVersionsUpdated,
  areManifestDependenciesUpdated,
  areManifestsEqual,
  arePackagedFilesEqual
} from './compare.js'
import { Diff, syntheticCommit } from './diff.js'
import { errorMessage, PackageError, ReleaseError } from './errors.js'
import type { SourceControlGateway } from './git.js'
import { lockedVersions, type PackageReader } from './package-files.js'
import type { PublishedSnapshot } from './snapshot.js'
import type {
  Commit,
  PackageJson,
  PackagedFiles,
  WorkspacePackage
} from './types.js'

export interface DiffRequest {
  pkg: WorkspacePackage
  snapshot?: PublishedSnapshot
  /** Release tag of the version currently in the package manifest. */
  tagName: string
  /** Absolute path of a README published with the package from elsewhere. */
  readme?: string
  /** Absolute path of the workspace lockfile. */
  lockfile?: string
}

export type WalkState =
  | { kind: 'at-head' }
  | { kind: 'walking'; packageName: string; commit: string }
  | { kind: 'restoring' }

const SHRINKWRAP = 'npm-shrinkwrap.json'

/**
 * Walks the history of a package back to its last release and collects the
 * commits that changed what would be published. Walks check out commits in
 * the working copy, so they run one at a time.
 */
export class DiffEngine {
  private readonly queue = new PQueue({ concurrency: 1 })
  private walkState: WalkState = { kind: 'at-head' }

  constructor(
    private readonly gateway: SourceControlGateway,
    private readonly reader: PackageReader
  ) {}

  get state(): WalkState {
    return this.walkState
  }

  async diff(request: DiffRequest): Promise<Diff> {
    return this.queue.add(() => this.walk(request), { throwOnTimeout: true })
  }

  private async walk(request: DiffRequest): Promise<Diff> {
    const { pkg, snapshot } = request
    const diff = new Diff(snapshot !== undefined)

    await this.gateway.checkoutHead()
    try {
      const tagCommit = await this.gateway.tagCommit(request.tagName)
      if (tagCommit) {
        this.assertTagPublished(request, snapshot)
      }
      const headLockfile = request.lockfile
        ? await this.reader.readText(request.lockfile)
        : undefined

      const paths = this.relevantPaths(request)
      let commit: string | undefined =
        await this.gateway.checkoutLastCommitAt(paths)

      while (commit) {
        this.walkState = { kind: 'walking', packageName: pkg.name, commit }
        const step = new CommitStep(this.reader, pkg)

        if (snapshot) {
          const reachedRelease =
            (await this.isPackageEqual(request, snapshot, step)) ||
            (await this.isCommitTooOld(
              commit,
              tagCommit,
              snapshot.publishedAt
            ))
          if (reachedRelease) {
            core.debug(
              `${pkg.name}: next version calculated from the commits after ${commit}`
            )
            if (diff.commits.length === 0) {
              await this.addDependenciesUpdate(
                diff,
                request,
                snapshot,
                headLockfile
              )
            }
            break
          }
          if (semver.gt(pkg.version, snapshot.version)) {
            core.info(
              `${pkg.name}: the local version ${pkg.version} is ahead of the published ${snapshot.version}, it won't be bumped again`
            )
            diff.setVersionUnpublished(snapshot.version)
            break
          }
        }

        if (await this.touchesPackage(commit, request, step)) {
          diff.addCommits([await this.commitAt(commit)])
        }

        commit = await this.gateway.checkoutPrevious(paths)
        if (!commit) {
          core.debug(`${pkg.name}: reached the first commit of the package`)
        }
      }
    } catch (error) {
      if (error instanceof ReleaseError || error instanceof PackageError) {
        throw error
      }
      throw new PackageError(
        pkg.name,
        'diff',
        error,
        this.walkState.kind === 'walking' ? this.walkState.commit : undefined
      )
    } finally {
      this.walkState = { kind: 'restoring' }
      await this.gateway.checkoutHead()
      this.walkState = { kind: 'at-head' }
    }

    return diff
  }

  private assertTagPublished(
    { pkg, tagName }: DiffRequest,
    snapshot: PublishedSnapshot | undefined
  ): void {
    if (!snapshot) {
      throw new ReleaseError(
        `${pkg.name}: the tag ${tagName} exists but no published artifact was found. Publish ${pkg.name}@${pkg.version} manually.`,
        'TAG_WITHOUT_ARTIFACT',
        { package: pkg.name, tag: tagName }
      )
    }
    if (!semver.eq(snapshot.version, pkg.version)) {
      throw new ReleaseError(
        `${pkg.name}: the local version ${pkg.version} differs from the published ${snapshot.version}, but the tag ${tagName} exists. Publish ${pkg.name}@${pkg.version} manually.`,
        'VERSION_MISMATCH',
        { package: pkg.name, tag: tagName, published: snapshot.version }
      )
    }
  }

  private relevantPaths({ pkg, readme }: DiffRequest): string[] {
    const paths = [this.repoPath(pkg.path)]
    if (readme) {
      paths.push(this.repoPath(readme))
    }
    return paths
  }

  private repoPath(absolute: string): string {
    const relative = path.relative(this.gateway.root, absolute)
    return relative.split(path.sep).join('/') || '.'
  }

  private async isPackageEqual(
    { pkg, readme }: DiffRequest,
    snapshot: PublishedSnapshot,
    step: CommitStep
  ): Promise<boolean> {
    if (readme) {
      const [local, published] = await Promise.all([
        this.reader.readText(readme),
        this.reader.readText(path.join(snapshot.directory, 'README.md'))
      ])
      if (local !== published) {
        core.debug(`${pkg.name}: README updated`)
        return false
      }
    }

    const manifest = await step.manifest()
    if (!manifest || !areManifestsEqual(manifest, snapshot.manifest)) {
      return false
    }
    const files = await step.packedFiles()
    return files !== undefined && arePackagedFilesEqual(files, snapshot.files)
  }

  private async isCommitTooOld(
    commit: string,
    tagCommit: string | undefined,
    publishedAt: string | undefined
  ): Promise<boolean> {
    for (const release of [tagCommit, publishedAt]) {
      if (release && (await this.isAncestorOrUnknown(commit, release))) {
        core.debug(
          `stopping at ${commit}: it is an ancestor of the released commit ${release}`
        )
        return true
      }
    }
    return false
  }

  private async isAncestorOrUnknown(
    commit: string,
    release: string
  ): Promise<boolean> {
    try {
      return await this.gateway.isAncestor(commit, release)
    } catch (error) {
      core.warning(
        `Cannot tell whether ${commit} is an ancestor of ${release}: ${errorMessage(error)}`
      )
      return false
    }
  }

  /** Whether a file changed by the commit ends up in the published package. */
  private async touchesPackage(
    commit: string,
    { pkg, readme }: DiffRequest,
    step: CommitStep
  ): Promise<boolean> {
    const packed = await step.packedFiles()
    if (!packed) {
      return true
    }

    let changed: string[]
    try {
      changed = await this.gateway.filesChangedIn(commit)
    } catch (error) {
      core.warning(
        `${pkg.name}: cannot list the files changed in ${commit}, assuming it changes the package: ${errorMessage(error)}`
      )
      return true
    }

    const packageDir = this.repoPath(pkg.path)
    const published = new Set(
      [...packed.keys()].map((file) => path.posix.join(packageDir, file))
    )
    if (readme) {
      published.add(this.repoPath(readme))
    }
    return changed.some((file) => published.has(file))
  }

  private async addDependenciesUpdate(
    diff: Diff,
    { pkg }: DiffRequest,
    snapshot: PublishedSnapshot,
    headLockfile: string | undefined
  ): Promise<void> {
    if (
      areManifestDependenciesUpdated(
        snapshot.manifest,
        declaredDependencies(pkg)
      )
    ) {
      diff.addCommits([
        syntheticCommit('chore: update package.json dependencies')
      ])
      return
    }

    if (pkg.hasExecutable && headLockfile) {
      const shrinkwrap = await this.reader.readText(
        path.join(snapshot.directory, SHRINKWRAP)
      )
      const names = pkg.dependencies
        .filter(({ kind }) => kind !== 'devDependencies')
        .map(({ name }) => name)
      if (
        shrinkwrap &&
        areLockedVersionsUpdated(
          lockedVersions(shrinkwrap, names),
          lockedVersions(headLockfile, names, this.repoPath(pkg.path))
        )
      ) {
        diff.addCommits([
          syntheticCommit('chore: update lockfile dependencies')
        ])
        return
      }
    }

    core.info(`${pkg.name}: already up to date`)
  }

  private async commitAt(id: string): Promise<Commit> {
    const info = await this.gateway.commitInfo(id)
    return {
      id: info.id,
      message: info.message,
      author: info.author,
      committer: info.committer,
      remote: {}
    }
  }
}

/** Dependency requirements of the package at head, shaped like a manifest. */
function declaredDependencies(pkg: WorkspacePackage): PackageJson {
  const manifest: PackageJson = {}
  for (const { kind, name, requirement } of pkg.dependencies) {
    manifest[kind] = { ...manifest[kind], [name]: requirement }
  }
  return manifest
}

/** Package content at the commit being looked at, read at most once. */
class CommitStep {
  private manifestRead?: Promise<PackageJson | undefined>
  private filesRead?: Promise<PackagedFiles | undefined>

  constructor(
    private readonly reader: PackageReader,
    private readonly pkg: WorkspacePackage
  ) {}

  /** Undefined when the manifest can't be read, e.g. before it existed. */
  manifest(): Promise<PackageJson | undefined> {
    this.manifestRead ??= this.reader
      .readManifest(this.pkg.path)
      .catch((error: unknown) => this.unreadable('manifest', error))
    return this.manifestRead
  }

  /** Undefined when the files `npm pack` would ship can't be listed. */
  packedFiles(): Promise<PackagedFiles | undefined> {
    this.filesRead ??= this.reader
      .packedFiles(this.pkg.path)
      .catch((error: unknown) => this.unreadable('packaged files', error))
    return this.filesRead
  }

  private unreadable(what: string, error: unknown): undefined {
    core.debug(`${this.pkg.name}: cannot read the ${what}: ${errorMessage(error)}`)
    return undefined
  }
}
