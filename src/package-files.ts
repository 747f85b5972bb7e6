import { createHash } from 'node:crypto'
import { lstat, readFile } from 'node:fs/promises'
import * as path from 'node:path'
import { globby } from 'globby'
import { z } from 'zod'
import {
  ReleaseError,
  errorMessage,
  formatIssues,
  isNotFoundError
} from './errors.js'
import { runCommand } from './exec.js'
import type { PackageJson, PackagedFiles } from './types.js'

/** Reads packages from disk, either a working copy or an extracted artifact. */
export interface PackageReader {
  readManifest(dir: string): Promise<PackageJson>
  /** Files `npm pack` would ship from a package directory. */
  packedFiles(dir: string): Promise<PackagedFiles>
  /** Every file below an already packed (extracted) package. */
  listFiles(dir: string): Promise<PackagedFiles>
  /** Content of a file, undefined when it doesn't exist. */
  readText(file: string): Promise<string | undefined>
}

export const MANIFEST_FILE = 'package.json'
export const LOCKFILES = [
  'package-lock.json',
  'npm-shrinkwrap.json',
  'yarn.lock',
  'pnpm-lock.yaml'
]

const stringMapSchema = z.record(z.string())

/** The fields of `package.json` read here; other fields pass through. */
export const packageJsonSchema = z
  .object({
    name: z.string().optional(),
    version: z.string().optional(),
    private: z.boolean().optional(),
    main: z.string().optional(),
    module: z.string().optional(),
    types: z.string().optional(),
    typings: z.string().optional(),
    exports: z.unknown().optional(),
    bin: z.union([z.string(), stringMapSchema]).optional(),
    workspaces: z
      .union([
        z.array(z.string()),
        z.object({ packages: z.array(z.string()).optional() }).passthrough()
      ])
      .optional(),
    dependencies: stringMapSchema.optional(),
    devDependencies: stringMapSchema.optional(),
    peerDependencies: stringMapSchema.optional(),
    optionalDependencies: stringMapSchema.optional()
  })
  .passthrough()

const packDryRunSchema = z.array(
  z.object({ files: z.array(z.object({ path: z.string() })) })
)

const lockedPackagesSchema = z.record(
  z.object({ version: z.string().optional() }).passthrough()
)

/** `packages` in lockfile v2 and v3, `dependencies` in v1. */
const lockfileSchema = z.object({
  packages: lockedPackagesSchema.optional(),
  dependencies: lockedPackagesSchema.optional()
})

export function parseManifest(content: string, file: string): PackageJson {
  let parsed: unknown
  try {
    parsed = JSON.parse(content)
  } catch (error) {
    throw new ReleaseError(
      `Invalid JSON in ${file}: ${errorMessage(error)}`,
      'MANIFEST_READ',
      { file },
      { cause: error }
    )
  }
  const result = packageJsonSchema.safeParse(parsed)
  if (!result.success) {
    throw new ReleaseError(
      `${file} is not a valid package.json: ${formatIssues(result.error)}`,
      'MANIFEST_READ',
      { file }
    )
  }
  return result.data
}

export function hashContent(content: string | Buffer): string {
  return createHash('sha256').update(content).digest('hex')
}

/** Parses the output of `npm pack --dry-run --json` into relative paths. */
export function parsePackDryRun(output: string): string[] {
  const result = packDryRunSchema.safeParse(JSON.parse(output))
  if (!result.success) {
    throw new Error(
      `Unexpected output of npm pack --dry-run: ${formatIssues(result.error)}`
    )
  }
  return result.data.flatMap((entry) => entry.files.map((file) => file.path))
}

/**
 * Resolved dependency versions recorded in a lockfile, keyed by package
 * name. Reads both the `packages` (v2, v3) and `dependencies` (v1) layouts.
 * `packageDir` is the workspace-relative directory whose nested
 * `node_modules` take precedence over the hoisted ones.
 */
export function lockedVersions(
  lockfile: string,
  names: string[],
  packageDir: string = ''
): Map<string, string> {
  const versions = new Map<string, string>()
  const result = lockfileSchema.safeParse(JSON.parse(lockfile))
  if (!result.success) {
    return versions
  }

  const { packages = {}, dependencies: legacy = {} } = result.data
  for (const name of names) {
    const nested =
      packageDir && packageDir !== '.'
        ? packages[`${packageDir}/node_modules/${name}`]
        : undefined
    const entry = nested ?? packages[`node_modules/${name}`] ?? legacy[name]
    if (entry?.version !== undefined) {
      versions.set(name, entry.version)
    }
  }
  return versions
}

export class NpmPackageReader implements PackageReader {
  async readManifest(dir: string): Promise<PackageJson> {
    const file = path.join(dir, MANIFEST_FILE)
    const content = await this.readText(file)
    if (content === undefined) {
      throw new ReleaseError(`${file} not found`, 'MANIFEST_READ', { file })
    }
    return parseManifest(content, file)
  }

  async packedFiles(dir: string): Promise<PackagedFiles> {
    const { stdout } = await runCommand(
      'npm',
      ['pack', '--dry-run', '--json', '--ignore-scripts'],
      { cwd: dir }
    )
    return this.hashFiles(dir, parsePackDryRun(stdout))
  }

  async listFiles(dir: string): Promise<PackagedFiles> {
    const files = await globby('**/*', {
      cwd: dir,
      dot: true,
      onlyFiles: true,
      followSymbolicLinks: false
    })
    return this.hashFiles(dir, files)
  }

  async readText(file: string): Promise<string | undefined> {
    try {
      return await readFile(file, 'utf-8')
    } catch (error) {
      if (isNotFoundError(error)) {
        return undefined
      }
      throw error
    }
  }

  private async hashFiles(
    dir: string,
    files: string[]
  ): Promise<PackagedFiles> {
    const hashed: PackagedFiles = new Map()
    for (const file of files.sort()) {
      hashed.set(file, await this.hashFile(path.join(dir, file)))
    }
    return hashed
  }

  /** Symlinks and files that vanished are listed without a hash. */
  private async hashFile(file: string): Promise<string | undefined> {
    try {
      const stats = await lstat(file)
      if (stats.isSymbolicLink()) {
        return undefined
      }
      return hashContent(await readFile(file))
    } catch (error) {
      if (isNotFoundError(error)) {
        return undefined
      }
      throw error
    }
  }
}
