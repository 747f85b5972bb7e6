import * as core from '@actions/core'
import * as path from 'node:path'
import semver from 'semver'
import { syntheticCommit } from './diff.js'
import type { Commit, PackageDependency, WorkspacePackage } from './types.js'
import { applyIncrement, isPrerelease } from './version.js'

const SIMPLE_REQUIREMENT =
  /^(?<operator>\^|~|>=|=)?v?(?<version>\d+(?:\.\d+){0,2}(?:-[0-9A-Za-z.-]+)?)$/

/**
 * Rewrites a requirement so that it asks for `version`, keeping its operator
 * and precision. Returns undefined when the requirement stays the same.
 * Ranges that aren't a single version are only replaced (by `^version`) when
 * they don't accept `version`.
 */
export function upgradeRequirement(
  requirement: string,
  version: string
): string | undefined {
  const trimmed = requirement.trim()
  if (trimmed === '' || trimmed === '*') {
    return undefined
  }

  const simple = trimmed.match(SIMPLE_REQUIREMENT)?.groups
  if (simple) {
    const operator = simple.operator ?? ''
    const current = simple.version
    const upgraded = `${operator}${withPrecisionOf(current, version)}`
    return upgraded === trimmed ? undefined : upgraded
  }

  if (!semver.validRange(trimmed)) {
    core.warning(`Cannot upgrade the invalid requirement ${trimmed}`)
    return undefined
  }
  return semver.satisfies(version, trimmed, { includePrerelease: true })
    ? undefined
    : `^${version}`
}

/** `1.2` with 1.3.0 gives `1.3`; full versions and pre-releases stay whole. */
function withPrecisionOf(current: string, version: string): string {
  const parts = current.split('.').length
  if (current.includes('-') || parts >= 3 || isPrerelease(version)) {
    return version
  }
  return version.split('.').slice(0, parts).join('.')
}

/** A dependency resolved from the workspace and pinned to a version. */
export function isDependencyLink(
  dependency: PackageDependency
): dependency is PackageDependency & { range: string; localPath: string } {
  return dependency.range !== undefined && dependency.localPath !== undefined
}

export interface ChangedPackage {
  pkg: WorkspacePackage
  version: string
}

export interface PropagatedUpdate {
  pkg: WorkspacePackage
  version: string
  commits: Commit[]
  /** Names of the local dependencies whose new version triggered the update. */
  updatedDependencies: string[]
}

export interface Propagation {
  updates: PropagatedUpdate[]
  waves: number
}

/** Changed dependencies whose requirement must be raised. */
export function dependenciesToUpdate(
  pkg: WorkspacePackage,
  changed: ReadonlyMap<string, ChangedPackage>
): string[] {
  const names: string[] = []
  for (const dependency of pkg.dependencies.filter(isDependencyLink)) {
    const target = changed.get(path.resolve(dependency.localPath))
    if (
      target &&
      !names.includes(target.pkg.name) &&
      upgradeRequirement(dependency.range, target.version) !== undefined
    ) {
      names.push(target.pkg.name)
    }
  }
  return names
}

export function propagatedVersion(version: string): string {
  return applyIncrement(version, isPrerelease(version) ? 'prerelease' : 'patch')
}

/**
 * Bumps the candidates that depend on a changed package, then the ones that
 * depend on those, until a wave schedules nothing. Each package is
 * scheduled at most once.
 */
export function propagateUpdates(
  changed: ChangedPackage[],
  candidates: WorkspacePackage[]
): Propagation {
  const changedByPath = new Map<string, ChangedPackage>(
    changed.map((entry) => [path.resolve(entry.pkg.path), entry])
  )
  const processed = new Set(changed.map(({ pkg }) => pkg.name))
  const updates: PropagatedUpdate[] = []
  let waves = 0

  for (;;) {
    const scheduled = candidates
      .filter(({ name }) => !processed.has(name))
      .map((pkg) => ({
        pkg,
        dependencies: dependenciesToUpdate(pkg, changedByPath)
      }))
      .filter(({ dependencies }) => dependencies.length > 0)
    if (scheduled.length === 0) {
      break
    }
    waves++

    for (const { pkg, dependencies } of scheduled) {
      const version = propagatedVersion(pkg.version)
      core.info(`${pkg.name}: dependencies changed. Next version is ${version}`)
      processed.add(pkg.name)
      changedByPath.set(path.resolve(pkg.path), { pkg, version })
      updates.push({
        pkg,
        version,
        commits: [
          syntheticCommit(
            `chore: updated the following local packages: ${dependencies.join(', ')}`
          )
        ],
        updatedDependencies: dependencies
      })
    }
  }

  return { updates, waves }
}
