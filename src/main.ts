import * as core from '@actions/core'
import { readFile } from 'node:fs/promises'
import * as path from 'node:path'
import { CommandCompatibilityChecker } from './compat.js'
import { getPackageConfig, loadConfig, type ReleaseConfig } from './config.js'
import { SimpleGitGateway } from './git.js'
import { GitHubService } from './github.js'
import { parseIndentation, writeUpdatePlan } from './manifest.js'
import { NpmPackageReader } from './package-files.js'
import { NpmRegistryResolver, TagSnapshotResolver } from './registry.js'
import { SnapshotLocator } from './snapshot.js'
import type { UpdatePlan, Workspace } from './types.js'
import { releaseTagTemplate, Updater } from './updater.js'
import { loadWorkspace } from './workspace.js'

export interface ReleaseSummary {
  name: string
  path: string
  previousVersion: string
  version: string
}

export function summarizePlan(
  plan: UpdatePlan,
  workspace: Workspace
): ReleaseSummary[] {
  return plan.updates.map(({ package: pkg, result }) => ({
    name: pkg.name,
    path: path.relative(workspace.root, pkg.path) || '.',
    previousVersion: pkg.version,
    version: result.version
  }))
}

/** Settings from the action inputs win over the configuration file. */
function applyInputs(config: ReleaseConfig, repoUrl?: string): ReleaseConfig {
  return {
    ...config,
    workspace: {
      ...config.workspace,
      allowDirty:
        config.workspace.allowDirty || core.getInput('allow-dirty') === 'true',
      repoUrl: config.workspace.repoUrl ?? repoUrl
    }
  }
}

/**
 * The main function for the action.
 *
 * @returns Resolves when the action is complete.
 */
export async function run(): Promise<void> {
  try {
    const token = core.getInput('token')
    const rootDir = path.resolve(core.getInput('root-dir') || '.')
    const configFile = core.getInput('config-file') || 'release.toml'
    const dryRun = core.getInput('dry-run') === 'true'
    const createPr = core.getInput('create-pr') === 'true'
    const baseBranch = core.getInput('base-branch') || 'main'
    const indentation = parseIndentation(core.getInput('indentation'))

    // default outputs
    core.setOutput('releases', '[]')
    core.setOutput('workspace-version', '')
    core.setOutput('pr-number', '')

    if (createPr && !token) {
      throw new Error('create-pr requires a token')
    }

    const github = token ? new GitHubService(token) : undefined
    const config = applyInputs(
      await loadConfig(path.resolve(rootDir, configFile)),
      github?.repoUrl
    )

    const reader = new NpmPackageReader()
    const workspace = await loadWorkspace(rootDir, config, reader)
    const gateway = await SimpleGitGateway.open(rootDir)
    const registry = new NpmRegistryResolver(reader)
    const { compatCommand, compatArgs } = config.workspace

    let plan: UpdatePlan
    try {
      plan = await new Updater({
        workspace,
        config,
        gateway,
        reader,
        locator: new SnapshotLocator({
          registry,
          tags: new TagSnapshotResolver(gateway, reader, (pkg) =>
            releaseTagTemplate(getPackageConfig(config, pkg.name), workspace)
          )
        }),
        compatChecker: compatCommand
          ? new CommandCompatibilityChecker(compatCommand, compatArgs)
          : undefined,
        contributors: github
      }).computePlan()
    } finally {
      await registry.dispose()
      await gateway.dispose()
    }

    core.setOutput('releases', JSON.stringify(summarizePlan(plan, workspace)))
    core.setOutput('workspace-version', plan.workspaceVersion ?? '')

    if (plan.updates.length === 0) {
      core.info('All packages are up to date')
    } else if (dryRun) {
      core.info('Dry run, leaving the working copy untouched')
    } else {
      const written = await writeUpdatePlan(workspace, plan, { indentation })
      core.info(`Updated ${written.length} files`)

      if (github && createPr) {
        const files = await Promise.all(
          written.map(async (file) => ({
            path: path.relative(gateway.root, file).split(path.sep).join('/'),
            content: await readFile(file, 'utf-8')
          }))
        )
        const prNumber = await github.createReleasePullRequest(plan, files, {
          branch: config.workspace.prBranch,
          base: baseBranch
        })
        core.setOutput('pr-number', String(prNumber))
      }
    }

    if (plan.failures.length > 0) {
      core.setFailed(
        `Failed to compute the release of ${plan.failures.map((failure) => failure.package).join(', ')}`
      )
    }
  } catch (error) {
    if (error instanceof Error) {
      core.setFailed(error.message)
    } else {
      core.setFailed('An unknown error occurred')
    }
  }
}
