import { LOCKFILES, MANIFEST_FILE } from './package-files.js'
import { DEPENDENCY_KINDS, type PackageJson, type PackagedFiles } from './types.js'

/** JSON with object keys sorted, so key order doesn't affect equality. */
export function normalizeJson(value: unknown): string {
  return JSON.stringify(value, (_, nested: unknown) => {
    if (
      typeof nested !== 'object' ||
      nested === null ||
      Array.isArray(nested)
    ) {
      return nested
    }
    return Object.fromEntries(
      Object.entries(nested).sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))
    )
  })
}

export function areManifestsEqual(a: PackageJson, b: PackageJson): boolean {
  return normalizeJson(a) === normalizeJson(b)
}

const IGNORED_FILES = new Set([MANIFEST_FILE, ...LOCKFILES])

function comparableFiles(files: PackagedFiles): string[] {
  return [...files.keys()].filter((file) => !IGNORED_FILES.has(file)).sort()
}

/**
 * Same file list (manifest and lockfiles aside), and the same content for
 * every local file that could be hashed.
 */
export function arePackagedFilesEqual(
  local: PackagedFiles,
  published: PackagedFiles
): boolean {
  const localFiles = comparableFiles(local)
  const publishedFiles = comparableFiles(published)
  if (
    localFiles.length !== publishedFiles.length ||
    localFiles.some((file, index) => file !== publishedFiles[index])
  ) {
    return false
  }

  return localFiles.every((file) => {
    const hash = local.get(file)
    return hash === undefined || hash === published.get(file)
  })
}

/** Whether any dependency requirement was added, removed or changed. */
export function areManifestDependenciesUpdated(
  published: PackageJson,
  local: PackageJson
): boolean {
  return DEPENDENCY_KINDS.some(
    (kind) =>
      normalizeJson(published[kind] ?? {}) !==
      normalizeJson(local[kind] ?? {})
  )
}

/** Whether a dependency resolves to another version than when published. */
export function areLockedVersionsUpdated(
  published: Map<string, string>,
  local: Map<string, string>
): boolean {
  for (const [name, version] of local) {
    if (published.get(name) !== version) {
      return true
    }
  }
  return false
}
