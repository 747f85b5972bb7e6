import { context } from '@actions/github'
import * as core from '@actions/core'
import { Octokit } from '@octokit/rest'
import { errorMessage } from './errors.js'
import type { ContributorLookup } from './updater.js'
import type { PackageUpdate, RemoteContributor, UpdatePlan } from './types.js'
import { firstLine } from './version.js'

export const RELEASE_LABEL = 'release-me'

export interface RepositoryRef {
  owner: string
  repo: string
}

export interface ReleaseFile {
  /** Path relative to the repository root. */
  path: string
  content: string
}

export interface ReleasePullRequestOptions {
  branch: string
  base: string
  label?: string
}

export class GitHubService implements ContributorLookup {
  private octokit: Octokit
  private repository: RepositoryRef

  constructor(token: string, repository: RepositoryRef = context.repo) {
    this.octokit = new Octokit({ auth: token })
    this.repository = repository
  }

  get repoUrl(): string {
    return `https://github.com/${this.repository.owner}/${this.repository.repo}`
  }

  /**
   * Author and pull request of a commit. Lookup failures are reported as a
   * warning and leave the contributor unknown.
   */
  async remoteContributor(sha: string): Promise<RemoteContributor> {
    try {
      const { data: prs } =
        await this.octokit.repos.listPullRequestsAssociatedWithCommit({
          ...this.repository,
          commit_sha: sha
        })

      const merged = prs
        .flatMap((pr) => (pr.merged_at ? [{ pr, mergedAt: pr.merged_at }] : []))
        .sort(
          (a, b) =>
            new Date(b.mergedAt).getTime() - new Date(a.mergedAt).getTime()
        )
      const latest = merged[0]?.pr
      if (latest) {
        return {
          username: latest.user?.login,
          prNumber: latest.number,
          prTitle: latest.title,
          prLabels: latest.labels.map((label) => label.name)
        }
      }

      const { data: commit } = await this.octokit.repos.getCommit({
        ...this.repository,
        ref: sha
      })
      const login: unknown = commit.author?.login
      return { username: typeof login === 'string' ? login : undefined }
    } catch (error) {
      core.warning(
        `Failed to get the contributor of commit ${sha}: ${errorMessage(error)}`
      )
      return {}
    }
  }

  /**
   * Commits `files` on top of `base` to the release branch and opens the
   * release pull request, or updates the one already open.
   */
  async createReleasePullRequest(
    plan: UpdatePlan,
    files: ReleaseFile[],
    { branch, base, label = RELEASE_LABEL }: ReleasePullRequestOptions
  ): Promise<number> {
    const title = generatePullRequestTitle(plan)
    const baseSha = await this.getBranchSha(base)

    const treeItems = []
    for (const file of files) {
      const { data: blob } = await this.octokit.git.createBlob({
        ...this.repository,
        content: file.content,
        encoding: 'utf-8'
      })
      treeItems.push({
        path: file.path,
        mode: '100644' as const,
        type: 'blob' as const,
        sha: blob.sha
      })
    }

    const { data: tree } = await this.octokit.git.createTree({
      ...this.repository,
      base_tree: baseSha,
      tree: treeItems
    })
    const { data: commit } = await this.octokit.git.createCommit({
      ...this.repository,
      message: title,
      tree: tree.sha,
      parents: [baseSha]
    })
    await this.pushBranch(branch, commit.sha)

    const { data: existingPRs } = await this.octokit.pulls.list({
      ...this.repository,
      state: 'open',
      head: `${this.repository.owner}:${branch}`
    })
    const body = generatePullRequestBody(plan)

    const existing = existingPRs[0]
    if (existing) {
      core.info(`Updating release pull request #${existing.number}`)
      await this.octokit.pulls.update({
        ...this.repository,
        pull_number: existing.number,
        title,
        body
      })
      if (!existing.labels.some(({ name }) => name === label)) {
        await this.addLabel(label, existing.number)
      }
      return existing.number
    }

    const { data: pr } = await this.octokit.pulls.create({
      ...this.repository,
      title,
      body,
      head: branch,
      base
    })
    core.info(`Created release pull request #${pr.number}`)
    await this.addLabel(label, pr.number)
    return pr.number
  }

  async addLabel(label: string, prNumber: number): Promise<void> {
    await this.octokit.issues.addLabels({
      ...this.repository,
      issue_number: prNumber,
      labels: [label]
    })
  }

  private async getBranchSha(branch: string): Promise<string> {
    const { data } = await this.octokit.repos.getBranch({
      ...this.repository,
      branch
    })
    return data.commit.sha
  }

  /** Points the branch at `sha`, creating it when needed. */
  private async pushBranch(branch: string, sha: string): Promise<void> {
    try {
      await this.octokit.git.createRef({
        ...this.repository,
        ref: `refs/heads/${branch}`,
        sha
      })
    } catch (error) {
      if (!errorMessage(error).includes('Reference already exists')) {
        throw error
      }
      await this.octokit.git.updateRef({
        ...this.repository,
        ref: `heads/${branch}`,
        sha,
        force: true
      })
    }
  }
}

export function generatePullRequestTitle(plan: UpdatePlan): string {
  const [only, ...others] = plan.updates
  if (only && others.length === 0) {
    return `chore: release ${only.package.name}@${only.result.version}`
  }
  return plan.workspaceVersion
    ? `chore: release v${plan.workspaceVersion}`
    : 'chore: release'
}

function packageSection({ package: pkg, result }: PackageUpdate): string {
  const heading = `## ${pkg.name} (${result.registryVersion ?? pkg.version} -> ${result.version})`
  const changes =
    result.changelogEntry ??
    result.commits.map((commit) => `- ${firstLine(commit.message)}`).join('\n')

  const parts = [heading, changes]
  if (result.compatibility.status === 'incompatible') {
    parts.push(
      `<details><summary>⚠ API breaking changes</summary>\n\n\`\`\`\n${result.compatibility.details}\n\`\`\`\n\n</details>`
    )
  }
  return parts.join('\n\n')
}

export function generatePullRequestBody(plan: UpdatePlan): string {
  return plan.updates.map(packageSection).join('\n\n')
}
