import * as core from '@actions/core'
import { readFile, writeFile } from 'node:fs/promises'
import * as path from 'node:path'
import { isDependencyLink, upgradeRequirement } from './dependencies.js'
import { ConfigError } from './errors.js'
import { MANIFEST_FILE, parseManifest } from './package-files.js'
import {
  DEPENDENCY_KINDS,
  type PackageJson,
  type UpdatePlan,
  type Workspace,
  type WorkspacePackage
} from './types.js'

/** Most spaces `JSON.stringify` indents with. */
const MAX_INDENTATION = 10

/** `tab` or a number of spaces, as given in the action input. */
export function parseIndentation(input: string | undefined): string {
  const value = input?.trim() ?? ''
  if (value === '') {
    return '  '
  }
  if (value === 'tab') {
    return '\t'
  }
  const spaces = /^\d+$/.test(value) ? parseInt(value, 10) : NaN
  if (!(spaces <= MAX_INDENTATION)) {
    throw new ConfigError(
      `Invalid indentation ${value}: expected tab or a number of spaces from 0 to ${MAX_INDENTATION}`
    )
  }
  return ' '.repeat(spaces)
}

export function formatManifest(manifest: PackageJson, indent: string): string {
  return JSON.stringify(manifest, null, indent) + '\n'
}

/** Raises `requirement` to `version`, keeping a `workspace:` prefix. */
function upgradeWrittenRequirement(
  requirement: string,
  range: string,
  version: string
): string | undefined {
  const upgraded = upgradeRequirement(range, version)
  if (upgraded === undefined) {
    return undefined
  }
  return requirement.startsWith('workspace:')
    ? `workspace:${upgraded}`
    : upgraded
}

/**
 * Applies the new version of the package and the new requirements of its
 * local dependencies to `manifest`. Returns whether anything changed.
 */
export function updateManifest(
  manifest: PackageJson,
  pkg: WorkspacePackage,
  version: string | undefined,
  versionsByPath: ReadonlyMap<string, string>
): boolean {
  let changed = false
  if (version !== undefined && manifest.version !== version) {
    manifest.version = version
    changed = true
  }

  for (const dependency of pkg.dependencies.filter(isDependencyLink)) {
    const dependencyVersion = versionsByPath.get(dependency.localPath)
    const requirements = manifest[dependency.kind]
    if (dependencyVersion === undefined || !requirements) {
      continue
    }
    const upgraded = upgradeWrittenRequirement(
      dependency.requirement,
      dependency.range,
      dependencyVersion
    )
    if (upgraded !== undefined) {
      requirements[dependency.name] = upgraded
      changed = true
    }
  }
  return changed
}

export interface WriteOptions {
  indentation: string
}

/**
 * Writes the plan into the working copy: package versions, requirements on
 * updated local packages, the workspace version and changelogs. Returns the
 * absolute paths of the written files.
 */
export async function writeUpdatePlan(
  workspace: Workspace,
  plan: UpdatePlan,
  { indentation }: WriteOptions
): Promise<string[]> {
  const written = new Set<string>()
  const write = async (file: string, content: string): Promise<void> => {
    await writeFile(file, content)
    written.add(file)
  }

  const versions = new Map(
    plan.updates.map(({ package: pkg, result }) => [pkg.name, result.version])
  )
  const versionsByPath = new Map(
    plan.updates.map(({ package: pkg, result }) => [pkg.path, result.version])
  )

  for (const pkg of workspace.packages) {
    const manifest = parseManifest(
      await readFile(pkg.manifestPath, 'utf-8'),
      pkg.manifestPath
    )
    if (updateManifest(manifest, pkg, versions.get(pkg.name), versionsByPath)) {
      core.debug(`Updating ${pkg.manifestPath}`)
      await write(pkg.manifestPath, formatManifest(manifest, indentation))
    }
  }

  if (workspace.isMultiPackage && plan.workspaceVersion !== undefined) {
    const rootManifestPath = path.join(workspace.root, MANIFEST_FILE)
    const manifest = parseManifest(
      await readFile(rootManifestPath, 'utf-8'),
      rootManifestPath
    )
    manifest.version = plan.workspaceVersion
    await write(rootManifestPath, formatManifest(manifest, indentation))
  }

  for (const { result } of plan.updates) {
    if (result.changelog !== undefined && result.changelogPath !== undefined) {
      await write(result.changelogPath, result.changelog)
    }
  }

  return [...written]
}
