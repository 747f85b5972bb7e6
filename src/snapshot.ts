import * as core from '@actions/core'
import semver from 'semver'
import type { PackageJson, PackagedFiles, WorkspacePackage } from './types.js'

interface SnapshotContent {
  version: string
  manifest: PackageJson
  /** Files of the published package keyed by package-relative path. */
  files: PackagedFiles
  /** Directory holding the materialized package. */
  directory: string
  /** Commit the artifact was built from, when known. */
  publishedAt?: string
}

export interface RegistrySnapshot extends SnapshotContent {
  kind: 'registry'
}

export interface TagSnapshot extends SnapshotContent {
  kind: 'tag'
  tag: string
  commit: string
}

export type PublishedSnapshot = RegistrySnapshot | TagSnapshot

/** Locates the latest published artifact of a package. */
export interface ArtifactResolver<
  T extends PublishedSnapshot = PublishedSnapshot
> {
  resolve(pkg: WorkspacePackage): Promise<T | undefined>
}

export const SINGLE_PACKAGE_TAG_TEMPLATE = 'v{{ version }}'
export const MULTI_PACKAGE_TAG_TEMPLATE = '{{ package }}-v{{ version }}'

const PLACEHOLDER = /\{\{\s*(package|version)\s*\}\}/g
const SEMVER_PATTERN =
  '(\\d+\\.\\d+\\.\\d+(?:-[0-9A-Za-z.-]+)?(?:\\+[0-9A-Za-z.-]+)?)'

export function defaultTagTemplate(isMultiPackage: boolean): string {
  return isMultiPackage
    ? MULTI_PACKAGE_TAG_TEMPLATE
    : SINGLE_PACKAGE_TAG_TEMPLATE
}

export function renderTagName(
  template: string,
  packageName: string,
  version: string
): string {
  return template.replace(PLACEHOLDER, (_, key: string) =>
    key === 'package' ? packageName : version
  )
}

function escapeRegex(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\]/g, '\\$&')
}

/** Anchored regex matching the release tags of a package; group 1 is the version. */
export function tagRegex(template: string, packageName: string): RegExp {
  const parts = template.split(PLACEHOLDER)
  // split() interleaves the captured placeholder names with the literal text
  const source = parts
    .map((part, index) => {
      if (index % 2 === 0) {
        return escapeRegex(part)
      }
      return part === 'package' ? escapeRegex(packageName) : SEMVER_PATTERN
    })
    .join('')
  return new RegExp(`^${source}$`)
}

export interface ReleaseTag {
  tag: string
  version: string
}

/** The tag of the highest released version of a package. */
export function latestReleaseTag(
  tags: string[],
  template: string,
  packageName: string
): ReleaseTag | undefined {
  const regex = tagRegex(template, packageName)
  let latest: ReleaseTag | undefined
  for (const tag of tags) {
    const version = tag.match(regex)?.[1]
    if (!version || !semver.valid(version)) {
      continue
    }
    if (!latest || semver.gt(version, latest.version)) {
      latest = { tag, version }
    }
  }
  return latest
}

function sameFiles(a: PackagedFiles, b: PackagedFiles): boolean {
  if (a.size !== b.size) {
    return false
  }
  for (const [file, hash] of a) {
    if (!b.has(file) || b.get(file) !== hash) {
      return false
    }
  }
  return true
}

/**
 * Picks the snapshot with the higher version. On equal versions the
 * registry artifact wins.
 */
export function pickLatestSnapshot(
  registry: RegistrySnapshot | undefined,
  tag: TagSnapshot | undefined
): PublishedSnapshot | undefined {
  if (!registry || !tag) {
    return registry ?? tag
  }
  if (semver.gt(tag.version, registry.version)) {
    return tag
  }
  if (
    semver.eq(tag.version, registry.version) &&
    !sameFiles(tag.files, registry.files)
  ) {
    core.warning(
      `${registry.manifest.name ?? tag.tag}: the registry artifact of ${registry.version} differs from the content of tag ${tag.tag}, using the registry artifact`
    )
  }
  return registry
}

export interface SnapshotLocatorOptions {
  registry?: ArtifactResolver<RegistrySnapshot>
  tags: ArtifactResolver<TagSnapshot>
}

/** Looks up both the registry and the release tags of a package. */
export class SnapshotLocator {
  constructor(private readonly options: SnapshotLocatorOptions) {}

  async locate(
    pkg: WorkspacePackage,
    gitOnly: boolean
  ): Promise<PublishedSnapshot | undefined> {
    const tag = await this.options.tags.resolve(pkg)
    if (gitOnly || pkg.isPrivate || !this.options.registry) {
      return tag
    }
    const registry = await this.options.registry.resolve(pkg)
    return pickLatestSnapshot(registry, tag)
  }
}
