import * as core from '@actions/core'
import * as path from 'node:path'
import { globby } from 'globby'
import semver from 'semver'
import { getPackageConfig, type ReleaseConfig } from './config.js'
import { ReleaseError } from './errors.js'
import { MANIFEST_FILE, type PackageReader } from './package-files.js'
import {
  DEPENDENCY_KINDS,
  type PackageDependency,
  type PackageJson,
  type Workspace,
  type WorkspacePackage
} from './types.js'

const WORKSPACE_PROTOCOL = 'workspace:'
const PATH_PROTOCOLS = ['file:', 'link:']
/** `workspace:` shorthands that pin no version. */
const UNPINNED = ['', '*', '^', '~']

export function workspacePatterns(manifest: PackageJson): string[] {
  const { workspaces } = manifest
  if (Array.isArray(workspaces)) {
    return workspaces
  }
  return workspaces?.packages ?? []
}

async function findPackageDirs(
  root: string,
  patterns: string[]
): Promise<string[]> {
  const manifests = await globby(
    patterns.map((pattern) =>
      pattern.startsWith('!')
        ? `!${path.posix.join(pattern.slice(1), MANIFEST_FILE)}`
        : path.posix.join(pattern, MANIFEST_FILE)
    ),
    { cwd: root, ignore: ['**/node_modules/**'] }
  )
  return manifests
    .map((manifest) => path.resolve(root, path.dirname(manifest)))
    .sort()
}

/**
 * Classifies a requirement: `range` when it pins a version, `localPath`
 * when it resolves to a directory of the workspace.
 */
export function resolveDependency(
  name: string,
  kind: PackageDependency['kind'],
  requirement: string,
  packageDir: string,
  members: ReadonlyMap<string, string>
): PackageDependency {
  const dependency: PackageDependency = { name, kind, requirement }

  const pathProtocol = PATH_PROTOCOLS.find((protocol) =>
    requirement.startsWith(protocol)
  )
  if (pathProtocol) {
    dependency.localPath = path.resolve(
      packageDir,
      requirement.slice(pathProtocol.length)
    )
    return dependency
  }

  const isWorkspaceProtocol = requirement.startsWith(WORKSPACE_PROTOCOL)
  const range = isWorkspaceProtocol
    ? requirement.slice(WORKSPACE_PROTOCOL.length)
    : requirement
  if (!UNPINNED.includes(range) && semver.validRange(range)) {
    dependency.range = range
  }
  const memberPath = members.get(name)
  if (memberPath !== undefined) {
    dependency.localPath = memberPath
  }
  return dependency
}

function declaresLibrary(manifest: PackageJson): boolean {
  return ['main', 'module', 'types', 'typings', 'exports'].some(
    (field) => manifest[field] !== undefined
  )
}

interface PackageSource {
  dir: string
  manifest: PackageJson
  name: string
}

function toPackage(
  { dir, manifest, name }: PackageSource,
  members: ReadonlyMap<string, string>,
  config: ReleaseConfig,
  workspaceVersion: string | undefined
): WorkspacePackage {
  const manifestPath = path.join(dir, MANIFEST_FILE)
  const versionInherited = getPackageConfig(config, name).inheritVersion
  const version =
    manifest.version ?? (versionInherited ? workspaceVersion : undefined)
  if (version === undefined || !semver.valid(version)) {
    throw new ReleaseError(
      `${manifestPath}: missing or invalid version`,
      'MANIFEST_READ',
      { file: manifestPath, field: 'version' }
    )
  }

  const dependencies = DEPENDENCY_KINDS.flatMap((kind) =>
    Object.entries(manifest[kind] ?? {}).map(([dependency, requirement]) =>
      resolveDependency(dependency, kind, requirement, dir, members)
    )
  )

  return {
    name,
    version,
    path: dir,
    manifestPath,
    dependencies,
    versionInherited,
    isPrivate: manifest.private === true,
    isLibrary: declaresLibrary(manifest),
    hasExecutable: manifest.bin !== undefined
  }
}

function packageName(manifest: PackageJson, dir: string): string {
  if (typeof manifest.name !== 'string' || manifest.name.length === 0) {
    const file = path.join(dir, MANIFEST_FILE)
    throw new ReleaseError(`${file}: missing package name`, 'MANIFEST_READ', {
      file,
      field: 'name'
    })
  }
  return manifest.name
}

/**
 * Reads the packages of the repository at `root`: the members listed in the
 * root `workspaces`, or the root package itself when there are none.
 */
export async function loadWorkspace(
  root: string,
  config: ReleaseConfig,
  reader: PackageReader
): Promise<Workspace> {
  const rootManifest = await reader.readManifest(root)
  const patterns = workspacePatterns(rootManifest)

  if (patterns.length === 0) {
    const source = {
      dir: root,
      manifest: rootManifest,
      name: packageName(rootManifest, root)
    }
    return {
      root,
      packages: [toPackage(source, new Map(), config, undefined)],
      isMultiPackage: false
    }
  }

  const sources: PackageSource[] = []
  for (const dir of await findPackageDirs(root, patterns)) {
    const manifest = await reader.readManifest(dir)
    sources.push({ dir, manifest, name: packageName(manifest, dir) })
  }
  const members = new Map(sources.map(({ name, dir }) => [name, dir]))
  const version =
    typeof rootManifest.version === 'string' ? rootManifest.version : undefined

  const packages = sources.map((source) =>
    toPackage(source, members, config, version)
  )
  core.debug(
    `Workspace packages: ${packages.map(({ name }) => name).join(', ')}`
  )
  return { root, version, packages, isMultiPackage: true }
}
