import * as core from '@actions/core'
import * as toml from '@iarna/toml'
import { readFile } from 'node:fs/promises'
import { z } from 'zod'
import {
  ConfigError,
  errorMessage,
  formatIssues,
  isNotFoundError
} from './errors.js'
import { createVersionPolicy, type VersionPolicy } from './version.js'

export type CommitSort = 'newest' | 'oldest'

/** Settings every package has, defaulted by `[workspace]`. */
export interface PackageSettings {
  changelogUpdate: boolean
  changelogPath?: string
  changelogInclude: string[]
  compatCheck: boolean
  featuresAlwaysIncrementMinor: boolean
  breakingAlwaysIncrementMajor: boolean
  customMinorIncrementRegex?: string
  customMajorIncrementRegex?: string
  /** Only look at release tags, never at the registry. */
  gitOnly: boolean
  inheritVersion: boolean
  release: boolean
  tagNameTemplate?: string
  versionGroup?: string
  /** README published with the package that lives outside its directory. */
  readme?: string
}

export interface WorkspaceSettings extends PackageSettings {
  allowDirty: boolean
  compatCommand?: string
  compatArgs: string[]
  compatConcurrency: number
  releaseCommits?: string
  sortCommits: CommitSort
  repoUrl?: string
  prBranch: string
}

export type PackageOverrides = Partial<PackageSettings> & { name: string }

export interface ReleaseConfig {
  workspace: WorkspaceSettings
  packages: PackageOverrides[]
}

export const DEFAULT_CONFIG: ReleaseConfig = {
  workspace: {
    allowDirty: false,
    changelogUpdate: true,
    changelogInclude: [],
    compatCheck: true,
    compatArgs: [],
    compatConcurrency: 4,
    featuresAlwaysIncrementMinor: false,
    breakingAlwaysIncrementMajor: false,
    gitOnly: false,
    inheritVersion: false,
    release: true,
    sortCommits: 'newest',
    prBranch: 'release'
  },
  packages: []
}

const packageSettingsShape = {
  changelog_update: z.boolean().optional(),
  changelog_path: z.string().optional(),
  changelog_include: z.array(z.string()).optional(),
  compat_check: z.boolean().optional(),
  features_always_increment_minor: z.boolean().optional(),
  breaking_always_increment_major: z.boolean().optional(),
  custom_minor_increment_regex: z.string().optional(),
  custom_major_increment_regex: z.string().optional(),
  git_only: z.boolean().optional(),
  inherit_version: z.boolean().optional(),
  release: z.boolean().optional(),
  tag_name_template: z.string().optional(),
  version_group: z.string().optional(),
  readme: z.string().optional()
}

const packageSettingsSchema = z.object(packageSettingsShape)

export const workspaceTableSchema = z
  .object({
    ...packageSettingsShape,
    allow_dirty: z.boolean().optional(),
    compat_command: z.string().optional(),
    compat_args: z.array(z.string()).optional(),
    compat_concurrency: z.number().int().positive().optional(),
    release_commits: z.string().optional(),
    sort_commits: z.enum(['newest', 'oldest']).optional(),
    repo_url: z.string().optional(),
    pr_branch: z.string().optional()
  })
  .strict()

export const packageTableSchema = z
  .object({ name: z.string().min(1), ...packageSettingsShape })
  .strict()

export const configFileSchema = z
  .object({
    workspace: workspaceTableSchema.default({}),
    package: z.array(packageTableSchema).default([])
  })
  .strict()
  .superRefine(({ package: packages }, ctx) => {
    const names = new Set<string>()
    packages.forEach(({ name }, index) => {
      if (names.has(name)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ['package', index, 'name'],
          message: `${name} is configured more than once`
        })
      }
      names.add(name)
    })
  })

type PackageTable = z.infer<typeof packageSettingsSchema>
type WorkspaceTable = z.infer<typeof workspaceTableSchema>

function packageSettings(table: PackageTable): Partial<PackageSettings> {
  return {
    changelogUpdate: table.changelog_update,
    changelogPath: table.changelog_path,
    changelogInclude: table.changelog_include,
    compatCheck: table.compat_check,
    featuresAlwaysIncrementMinor: table.features_always_increment_minor,
    breakingAlwaysIncrementMajor: table.breaking_always_increment_major,
    customMinorIncrementRegex: table.custom_minor_increment_regex,
    customMajorIncrementRegex: table.custom_major_increment_regex,
    gitOnly: table.git_only,
    inheritVersion: table.inherit_version,
    release: table.release,
    tagNameTemplate: table.tag_name_template,
    versionGroup: table.version_group,
    readme: table.readme
  }
}

/** Values set in `overrides` win over `base`. */
export function mergePackageSettings(
  base: PackageSettings,
  overrides: Partial<PackageSettings>
): PackageSettings {
  return {
    changelogUpdate: overrides.changelogUpdate ?? base.changelogUpdate,
    changelogPath: overrides.changelogPath ?? base.changelogPath,
    changelogInclude: overrides.changelogInclude ?? base.changelogInclude,
    compatCheck: overrides.compatCheck ?? base.compatCheck,
    featuresAlwaysIncrementMinor:
      overrides.featuresAlwaysIncrementMinor ??
      base.featuresAlwaysIncrementMinor,
    breakingAlwaysIncrementMajor:
      overrides.breakingAlwaysIncrementMajor ??
      base.breakingAlwaysIncrementMajor,
    customMinorIncrementRegex:
      overrides.customMinorIncrementRegex ?? base.customMinorIncrementRegex,
    customMajorIncrementRegex:
      overrides.customMajorIncrementRegex ?? base.customMajorIncrementRegex,
    gitOnly: overrides.gitOnly ?? base.gitOnly,
    inheritVersion: overrides.inheritVersion ?? base.inheritVersion,
    release: overrides.release ?? base.release,
    tagNameTemplate: overrides.tagNameTemplate ?? base.tagNameTemplate,
    versionGroup: overrides.versionGroup ?? base.versionGroup,
    readme: overrides.readme ?? base.readme
  }
}

function workspaceSettings(table: WorkspaceTable): WorkspaceSettings {
  const defaults = DEFAULT_CONFIG.workspace
  return {
    ...mergePackageSettings(defaults, packageSettings(table)),
    allowDirty: table.allow_dirty ?? defaults.allowDirty,
    compatCommand: table.compat_command,
    compatArgs: table.compat_args ?? defaults.compatArgs,
    compatConcurrency: table.compat_concurrency ?? defaults.compatConcurrency,
    releaseCommits: table.release_commits,
    sortCommits: table.sort_commits ?? defaults.sortCommits,
    repoUrl: table.repo_url,
    prBranch: table.pr_branch ?? defaults.prBranch
  }
}

export function parseConfig(content: string): ReleaseConfig {
  let parsed: toml.JsonMap
  try {
    parsed = toml.parse(content)
  } catch (error) {
    throw new ConfigError(`Invalid TOML: ${errorMessage(error)}`)
  }

  const result = configFileSchema.safeParse(parsed)
  if (!result.success) {
    throw new ConfigError(
      `Invalid configuration: ${formatIssues(result.error)}`
    )
  }
  const { workspace, package: packages } = result.data
  return {
    workspace: workspaceSettings(workspace),
    packages: packages.map(({ name, ...table }) => ({
      ...packageSettings(table),
      name
    }))
  }
}

/** Reads the configuration file; a missing file means the defaults. */
export async function loadConfig(file: string): Promise<ReleaseConfig> {
  let content: string
  try {
    content = await readFile(file, 'utf-8')
  } catch (error) {
    if (isNotFoundError(error)) {
      core.info(`No configuration found at ${file}, using the defaults`)
      return DEFAULT_CONFIG
    }
    throw error
  }
  core.debug(`Loading configuration from ${file}`)
  return parseConfig(content)
}

export function getPackageConfig(
  config: ReleaseConfig,
  packageName: string
): PackageSettings {
  const overrides = config.packages.find(({ name }) => name === packageName)
  return mergePackageSettings(config.workspace, overrides ?? {})
}

export function versionPolicyFor(settings: PackageSettings): VersionPolicy {
  return createVersionPolicy(settings)
}
