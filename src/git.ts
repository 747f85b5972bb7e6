import * as core from '@actions/core'
import { mkdtemp, rm } from 'node:fs/promises'
import { tmpdir } from 'node:os'
import * as path from 'node:path'
import { simpleGit, type SimpleGit } from 'simple-git'
import { ReleaseError, errorMessage } from './errors.js'
import type { Signature } from './types.js'

export interface CommitInfo {
  id: string
  message: string
  author: Signature
  committer: Signature
}

/**
 * Read access to the repository history, plus the checkouts the diff engine
 * walks through. Paths are relative to `root`.
 */
export interface SourceControlGateway {
  readonly root: string
  currentCommit(): Promise<string>
  checkout(commit: string): Promise<void>
  /** Back to the branch (or commit) checked out when the gateway was opened. */
  checkoutHead(): Promise<void>
  /** Checks out the last commit reachable from head that touched `paths`. */
  checkoutLastCommitAt(paths: string[]): Promise<string>
  /**
   * Checks out the commit before the current one that touched `paths`.
   * Returns undefined, without moving, when there is none.
   */
  checkoutPrevious(paths: string[]): Promise<string | undefined>
  filesChangedIn(commit: string): Promise<string[]>
  isAncestor(ancestor: string, descendant: string): Promise<boolean>
  tagCommit(tag: string): Promise<string | undefined>
  tags(): Promise<string[]>
  commitInfo(commit: string): Promise<CommitInfo>
  isClean(): Promise<boolean>
  stash(): Promise<void>
  /** Applies back the changes of the last `stash()`, if any. */
  restoreStash(): Promise<void>
  /** Separate checkout of `commit`, leaving the working copy alone. */
  materialize(commit: string): Promise<string>
  dispose(): Promise<void>
}

const FIELD_SEPARATOR = '%x00'
const COMMIT_FORMAT = ['%H', '%an', '%ae', '%at', '%cn', '%ce', '%ct', '%B']
  .join(FIELD_SEPARATOR)

export function parseCommitInfo(output: string): CommitInfo {
  const [id, authorName, authorEmail, authorTime, name, email, time, ...body] =
    output.split('\0')
  return {
    id: id.trim(),
    message: body.join('\0').trim(),
    author: {
      name: authorName,
      email: authorEmail,
      timestamp: Number(authorTime)
    },
    committer: { name, email, timestamp: Number(time) }
  }
}

function lines(output: string): string[] {
  return output
    .split('\n')
    .map((line) => line.trim())
    .filter((line) => line.length > 0)
}

export class SimpleGitGateway implements SourceControlGateway {
  private readonly git: SimpleGit
  private head?: string
  private stashed = false
  private readonly worktrees = new Map<string, string>()

  constructor(readonly root: string) {
    this.git = simpleGit(root)
  }

  /** Opens the repository containing `dir`. */
  static async open(dir: string): Promise<SimpleGitGateway> {
    const root = (await simpleGit(dir).revparse(['--show-toplevel'])).trim()
    return new SimpleGitGateway(root)
  }

  async currentCommit(): Promise<string> {
    return (await this.git.revparse(['HEAD'])).trim()
  }

  async checkout(commit: string): Promise<void> {
    await this.rememberHead()
    try {
      await this.git.checkout(commit)
    } catch (error) {
      if (errorMessage(error).includes('would be overwritten')) {
        throw new ReleaseError(
          `The working tree at ${this.root} has local changes that block checking out ${commit}, the allow-dirty option can't be used here`,
          'DIRTY_WORKING_TREE',
          { root: this.root, commit },
          { cause: error }
        )
      }
      throw new ReleaseError(
        `Cannot checkout ${commit}: ${errorMessage(error)}`,
        'CHECKOUT_FAILED',
        { commit },
        { cause: error }
      )
    }
  }

  async checkoutHead(): Promise<void> {
    const head = await this.rememberHead()
    await this.git.checkout(head)
  }

  async checkoutLastCommitAt(paths: string[]): Promise<string> {
    const head = await this.rememberHead()
    const [commit] = lines(
      await this.git.raw(['log', '-1', '--format=%H', head, '--', ...paths])
    )
    if (!commit) {
      throw new ReleaseError(
        `No commit touches ${paths.join(', ')}`,
        'CHECKOUT_FAILED',
        { paths }
      )
    }
    await this.checkout(commit)
    return commit
  }

  async checkoutPrevious(paths: string[]): Promise<string | undefined> {
    const current = await this.currentCommit()
    const candidates = lines(
      await this.git.raw(['log', '-2', '--format=%H', current, '--', ...paths])
    )
    // The current commit is only listed when it touched the paths itself
    const previous = candidates[0] === current ? candidates[1] : candidates[0]
    if (!previous) {
      return undefined
    }
    await this.checkout(previous)
    return previous
  }

  async filesChangedIn(commit: string): Promise<string[]> {
    return lines(
      await this.git.raw([
        'diff-tree',
        '--no-commit-id',
        '--name-only',
        '-r',
        '--root',
        commit
      ])
    )
  }

  async isAncestor(ancestor: string, descendant: string): Promise<boolean> {
    const [base, resolved] = await Promise.all([
      this.git.raw(['merge-base', ancestor, descendant]),
      this.git.revparse([ancestor])
    ])
    return base.trim() === resolved.trim()
  }

  async tagCommit(tag: string): Promise<string | undefined> {
    const tags = await this.tags()
    if (!tags.includes(tag)) {
      return undefined
    }
    return (await this.git.raw(['rev-list', '-n', '1', tag])).trim()
  }

  async tags(): Promise<string[]> {
    return (await this.git.tags()).all
  }

  async commitInfo(commit: string): Promise<CommitInfo> {
    const output = await this.git.raw([
      'log',
      '-1',
      `--format=${COMMIT_FORMAT}`,
      commit
    ])
    return parseCommitInfo(output)
  }

  async isClean(): Promise<boolean> {
    return (await this.git.status()).isClean()
  }

  async stash(): Promise<void> {
    core.info('Stashing local changes')
    await this.git.stash(['push', '--include-untracked'])
    this.stashed = true
  }

  async restoreStash(): Promise<void> {
    if (!this.stashed) {
      return
    }
    core.info('Restoring local changes')
    await this.git.stash(['pop'])
    this.stashed = false
  }

  async materialize(commit: string): Promise<string> {
    const existing = this.worktrees.get(commit)
    if (existing) {
      return existing
    }
    const dir = await mkdtemp(path.join(tmpdir(), 'release-worktree-'))
    await this.git.raw(['worktree', 'add', '--detach', dir, commit])
    this.worktrees.set(commit, dir)
    return dir
  }

  async dispose(): Promise<void> {
    for (const dir of this.worktrees.values()) {
      await this.git.raw(['worktree', 'remove', '--force', dir])
      await rm(dir, { recursive: true, force: true })
    }
    this.worktrees.clear()
  }

  /** Branch checked out before the first checkout, or its commit if detached. */
  private async rememberHead(): Promise<string> {
    if (this.head === undefined) {
      const branch = (await this.git.revparse(['--abbrev-ref', 'HEAD'])).trim()
      this.head = branch === 'HEAD' ? await this.currentCommit() : branch
    }
    return this.head
  }
}
