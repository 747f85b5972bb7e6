import * as core from '@actions/core'
import semver from 'semver'
import { maxVersion } from './version.js'

export interface VersionCandidate {
  name: string
  /** Next version computed from the package's own commits. */
  candidate: string
  versionGroup?: string
  /** The package takes its version from the workspace root. */
  inheritsWorkspaceVersion: boolean
}

export interface CoordinatedVersions {
  /** Next version of every candidate, keyed by package name. */
  versions: Map<string, string>
  /** New workspace version, when an inheriting package moved it. */
  workspaceVersion?: string
}

/** Highest candidate of each version group. */
export function versionGroupMaxima(
  candidates: VersionCandidate[]
): Map<string, string> {
  const groups = new Map<string, string>()
  for (const { versionGroup, candidate } of candidates) {
    if (versionGroup === undefined) {
      continue
    }
    const max = groups.get(versionGroup)
    if (max === undefined || semver.gt(candidate, max)) {
      groups.set(versionGroup, candidate)
    }
  }
  return groups
}

/**
 * Highest candidate among the packages inheriting the workspace version,
 * ignoring candidates lower than the current workspace version.
 */
export function newWorkspaceVersion(
  candidates: VersionCandidate[],
  currentWorkspaceVersion: string | undefined
): string | undefined {
  if (currentWorkspaceVersion === undefined) {
    return undefined
  }
  return maxVersion(
    candidates
      .filter(({ inheritsWorkspaceVersion }) => inheritsWorkspaceVersion)
      .map(({ candidate }) => candidate)
      .filter((candidate) => semver.gte(candidate, currentWorkspaceVersion))
  )
}

/**
 * Unifies versions that must move together. Packages inheriting the
 * workspace version follow it even when they belong to a version group.
 */
export function coordinateVersions(
  candidates: VersionCandidate[],
  currentWorkspaceVersion?: string
): CoordinatedVersions {
  const groups = versionGroupMaxima(candidates)
  const workspaceVersion = newWorkspaceVersion(
    candidates,
    currentWorkspaceVersion
  )
  core.debug(
    `version groups: ${JSON.stringify(Object.fromEntries(groups))}, workspace version: ${workspaceVersion ?? 'unchanged'}`
  )

  const versions = new Map<string, string>()
  for (const pkg of candidates) {
    if (pkg.inheritsWorkspaceVersion && workspaceVersion !== undefined) {
      versions.set(pkg.name, workspaceVersion)
    } else if (pkg.versionGroup !== undefined) {
      versions.set(pkg.name, groups.get(pkg.versionGroup) ?? pkg.candidate)
    } else {
      versions.set(pkg.name, pkg.candidate)
    }
  }
  return { versions, workspaceVersion }
}
