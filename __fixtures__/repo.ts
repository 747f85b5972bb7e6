import * as path from 'node:path'
import type { CommitInfo, SourceControlGateway } from '../src/git.js'
import { ReleaseError } from '../src/errors.js'
import {
  hashContent,
  parseManifest,
  type PackageReader
} from '../src/package-files.js'
import type { ArtifactResolver, RegistrySnapshot } from '../src/snapshot.js'
import type {
  PackageJson,
  PackagedFiles,
  WorkspacePackage
} from '../src/types.js'

/** Repository-relative path to content; a full snapshot of the tree. */
export type Tree = Record<string, string>

interface FakeCommit {
  id: string
  message: string
  tree: Tree
}

export const ROOT = '/repo'
const WORKTREES = '/worktrees'

export function manifest(fields: PackageJson): string {
  return JSON.stringify(fields, null, 2) + '\n'
}

/**
 * In-memory linear history checked out at `/repo`. Each commit stores the
 * whole tree, tags point at commits and materialized commits show up under
 * `/worktrees/<commit>`. Directories added with `addDirectory` stand for
 * extracted registry artifacts.
 */
export class FakeRepository implements SourceControlGateway, PackageReader {
  readonly root = ROOT
  readonly checkouts: string[] = []
  clean = true
  stashed = false
  failingChangedFiles = new Set<string>()

  private readonly commits: FakeCommit[] = []
  private readonly tagged = new Map<string, string>()
  private readonly directories = new Map<string, Tree>()
  private current = -1

  /** Applies `changes` on top of the last commit; `null` deletes a file. */
  commit(message: string, changes: Record<string, string | null>): string {
    const tree: Tree = { ...this.commits.at(-1)?.tree }
    for (const [file, content] of Object.entries(changes)) {
      if (content === null) {
        delete tree[file]
      } else {
        tree[file] = content
      }
    }
    const id = `${this.commits.length + 1}`.padStart(7, 'c')
    this.commits.push({ id, message, tree })
    this.current = this.commits.length - 1
    return id
  }

  tag(name: string, commit: string = this.head.id): void {
    this.tagged.set(name, commit)
  }

  addDirectory(dir: string, tree: Tree): void {
    this.directories.set(dir, tree)
  }

  /** Files of `dir` (repository-relative) at `commit`, relative to `dir`. */
  treeAt(commit: string, dir: string): Tree {
    const tree: Tree = {}
    for (const [file, content] of Object.entries(this.find(commit).tree)) {
      if (file.startsWith(`${dir}/`)) {
        tree[file.slice(dir.length + 1)] = content
      }
    }
    return tree
  }

  get head(): FakeCommit {
    const head = this.commits.at(-1)
    if (!head) {
      throw new Error('empty repository')
    }
    return head
  }

  get checkedOut(): string {
    return this.commits[this.current].id
  }

  async currentCommit(): Promise<string> {
    return this.checkedOut
  }

  async checkout(commit: string): Promise<void> {
    this.current = this.indexOf(commit)
    this.checkouts.push(commit)
  }

  async checkoutHead(): Promise<void> {
    this.current = this.commits.length - 1
  }

  async checkoutLastCommitAt(paths: string[]): Promise<string> {
    const commit = this.lastTouching(paths, this.commits.length - 1)
    if (!commit) {
      throw new ReleaseError('No commit touches the paths', 'CHECKOUT_FAILED')
    }
    await this.checkout(commit)
    return commit
  }

  async checkoutPrevious(paths: string[]): Promise<string | undefined> {
    const commit = this.lastTouching(paths, this.current - 1)
    if (commit) {
      await this.checkout(commit)
    }
    return commit
  }

  async filesChangedIn(commit: string): Promise<string[]> {
    if (this.failingChangedFiles.has(commit)) {
      throw new Error(`bad object ${commit}`)
    }
    return this.changedFiles(this.indexOf(commit))
  }

  async isAncestor(ancestor: string, descendant: string): Promise<boolean> {
    return this.indexOf(ancestor) <= this.indexOf(descendant)
  }

  async tagCommit(tag: string): Promise<string | undefined> {
    return this.tagged.get(tag)
  }

  async tags(): Promise<string[]> {
    return [...this.tagged.keys()]
  }

  async commitInfo(commit: string): Promise<CommitInfo> {
    const index = this.indexOf(commit)
    const signature = {
      name: 'Test Author',
      email: 'author@example.com',
      timestamp: 1700000000 + index
    }
    return {
      id: commit,
      message: this.commits[index].message,
      author: signature,
      committer: signature
    }
  }

  async isClean(): Promise<boolean> {
    return this.clean
  }

  async stash(): Promise<void> {
    this.stashed = true
  }

  async restoreStash(): Promise<void> {
    this.stashed = false
  }

  async materialize(commit: string): Promise<string> {
    this.indexOf(commit)
    return path.posix.join(WORKTREES, commit)
  }

  async dispose(): Promise<void> {}

  async readManifest(dir: string): Promise<PackageJson> {
    const file = path.posix.join(dir, 'package.json')
    const content = await this.readText(file)
    if (content === undefined) {
      throw new ReleaseError(`${file} not found`, 'MANIFEST_READ', { file })
    }
    return parseManifest(content, file)
  }

  async packedFiles(dir: string): Promise<PackagedFiles> {
    const files = this.filesBelow(dir)
    if (!files.has('package.json')) {
      throw new Error(`no package.json in ${dir}`)
    }
    return files
  }

  async listFiles(dir: string): Promise<PackagedFiles> {
    return this.filesBelow(dir)
  }

  async readText(file: string): Promise<string | undefined> {
    const [tree, relative] = this.locate(file)
    return tree[relative]
  }

  private filesBelow(dir: string): PackagedFiles {
    const [tree, relative] = this.locate(dir)
    const prefix = relative === '' ? '' : `${relative}/`
    const files: PackagedFiles = new Map()
    for (const file of Object.keys(tree).sort()) {
      if (file.startsWith(prefix) && !file.includes('node_modules/')) {
        files.set(file.slice(prefix.length), hashContent(tree[file]))
      }
    }
    return files
  }

  /** The tree an absolute path lives in, and the path within it. */
  private locate(absolute: string): [Tree, string] {
    for (const [dir, tree] of this.directories) {
      if (absolute === dir || absolute.startsWith(`${dir}/`)) {
        return [tree, path.posix.relative(dir, absolute)]
      }
    }
    if (absolute.startsWith(`${WORKTREES}/`)) {
      const [commit = '', ...rest] = absolute
        .slice(WORKTREES.length + 1)
        .split('/')
      return [this.find(commit).tree, rest.join('/')]
    }
    const tree = this.current >= 0 ? this.commits[this.current].tree : {}
    return [tree, path.posix.relative(ROOT, absolute)]
  }

  private changedFiles(index: number): string[] {
    const tree = this.commits[index].tree
    const parent = index > 0 ? this.commits[index - 1].tree : {}
    const files = new Set([...Object.keys(tree), ...Object.keys(parent)])
    return [...files].filter((file) => tree[file] !== parent[file]).sort()
  }

  private lastTouching(paths: string[], from: number): string | undefined {
    for (let index = from; index >= 0; index--) {
      const changed = this.changedFiles(index)
      const touches = paths.some(
        (p) =>
          p === '.' ||
          changed.some((file) => file === p || file.startsWith(`${p}/`))
      )
      if (touches) {
        return this.commits[index].id
      }
    }
    return undefined
  }

  private find(commit: string): FakeCommit {
    return this.commits[this.indexOf(commit)]
  }

  private indexOf(commit: string): number {
    const index = this.commits.findIndex(({ id }) => id === commit)
    if (index === -1) {
      throw new Error(`unknown commit ${commit}`)
    }
    return index
  }
}

/**
 * Registry holding artifacts built from the repository: publishing copies the
 * package directory at a commit into `/registry/<name>@<version>`.
 */
export class FakeRegistry implements ArtifactResolver<RegistrySnapshot> {
  private readonly published = new Map<string, RegistrySnapshot[]>()

  constructor(private readonly repo: FakeRepository) {}

  async publish(
    name: string,
    dir: string,
    commit: string,
    overrides: Tree = {}
  ): Promise<RegistrySnapshot> {
    const directory = `/registry/${name}@${commit}`
    this.repo.addDirectory(directory, {
      ...this.repo.treeAt(commit, dir),
      ...overrides
    })
    const packageJson = await this.repo.readManifest(directory)
    const snapshot: RegistrySnapshot = {
      kind: 'registry',
      version: packageJson.version ?? '0.0.0',
      manifest: packageJson,
      files: await this.repo.listFiles(directory),
      directory,
      publishedAt: commit
    }
    this.published.set(name, [...(this.published.get(name) ?? []), snapshot])
    return snapshot
  }

  async resolve(pkg: WorkspacePackage): Promise<RegistrySnapshot | undefined> {
    return this.published.get(pkg.name)?.at(-1)
  }
}

/** Package `name` in `/repo/<dir>` as the workspace loader would build it. */
export function workspacePackage(
  name: string,
  dir: string,
  fields: Partial<WorkspacePackage> = {}
): WorkspacePackage {
  const packagePath = path.posix.join(ROOT, dir)
  return {
    name,
    version: '0.1.0',
    path: packagePath,
    manifestPath: path.posix.join(packagePath, 'package.json'),
    dependencies: [],
    versionInherited: false,
    isPrivate: false,
    isLibrary: false,
    hasExecutable: false,
    ...fields
  }
}
