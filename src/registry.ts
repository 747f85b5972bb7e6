import * as core from '@actions/core'
import { mkdtemp, rm } from 'node:fs/promises'
import { tmpdir } from 'node:os'
import * as path from 'node:path'
import semver from 'semver'
import { z } from 'zod'
import { formatIssues, ReleaseError } from './errors.js'
import { runCommand } from './exec.js'
import type { SourceControlGateway } from './git.js'
import type { PackageReader } from './package-files.js'
import {
  latestReleaseTag,
  type ArtifactResolver,
  type RegistrySnapshot,
  type TagSnapshot
} from './snapshot.js'
import type { WorkspacePackage } from './types.js'

function parseJsonOutput(stdout: string): unknown {
  const trimmed = stdout.trim()
  return trimmed.length === 0 ? undefined : JSON.parse(trimmed)
}

/** `npm view <pkg> versions --json` prints a bare string for one version. */
const versionsSchema = z.union([
  z.string().transform((version) => [version]),
  z.array(z.string())
])

const packOutputSchema = z
  .array(z.object({ filename: z.string() }))
  .nonempty()

export function parseVersions(stdout: string): string[] {
  const parsed = parseJsonOutput(stdout)
  if (parsed === undefined) {
    return []
  }
  const result = versionsSchema.safeParse(parsed)
  if (!result.success) {
    throw new Error(
      `Unexpected output of npm view: ${formatIssues(result.error)}`
    )
  }
  return result.data
}

export function parsePackFilename(stdout: string): string {
  const result = packOutputSchema.safeParse(parseJsonOutput(stdout))
  if (!result.success) {
    throw new Error(
      `Unexpected output of npm pack: ${formatIssues(result.error)}`
    )
  }
  return result.data[0].filename
}

/** Downloads the latest version of a package published to npm. */
export class NpmRegistryResolver
  implements ArtifactResolver<RegistrySnapshot>
{
  private readonly directories: string[] = []

  constructor(private readonly reader: PackageReader) {}

  async resolve(pkg: WorkspacePackage): Promise<RegistrySnapshot | undefined> {
    const versions = await this.publishedVersions(pkg.name)
    const version = semver.rsort(versions.filter((v) => semver.valid(v)))[0]
    if (!version) {
      core.debug(`${pkg.name}: not published to the registry`)
      return undefined
    }

    const spec = `${pkg.name}@${version}`
    const gitHead = z
      .string()
      .safeParse(
        parseJsonOutput(
          (await runCommand('npm', ['view', spec, 'gitHead', '--json'])).stdout
        )
      )

    const destination = await mkdtemp(
      path.join(tmpdir(), 'release-registry-')
    )
    this.directories.push(destination)
    const { stdout } = await runCommand('npm', [
      'pack',
      spec,
      '--pack-destination',
      destination,
      '--json',
      '--ignore-scripts'
    ])
    const tarball = path.join(destination, parsePackFilename(stdout))
    await runCommand('tar', ['-xzf', tarball, '-C', destination])

    // npm tarballs keep their content under `package/`
    const directory = path.join(destination, 'package')
    core.debug(`${pkg.name}: downloaded ${spec} to ${directory}`)
    return {
      kind: 'registry',
      version,
      manifest: await this.reader.readManifest(directory),
      files: await this.reader.listFiles(directory),
      directory,
      publishedAt: gitHead.success ? gitHead.data : undefined
    }
  }

  async dispose(): Promise<void> {
    for (const dir of this.directories.splice(0)) {
      await rm(dir, { recursive: true, force: true })
    }
  }

  private async publishedVersions(name: string): Promise<string[]> {
    const output = await runCommand(
      'npm',
      ['view', name, 'versions', '--json'],
      { allowFail: true }
    )
    if (output.code === 0) {
      return parseVersions(output.stdout)
    }
    if (output.stderr.includes('E404') || output.stdout.includes('E404')) {
      return []
    }
    throw new ReleaseError(
      `Cannot query the registry for ${name}: ${output.stderr.trim()}`,
      'REGISTRY',
      { package: name }
    )
  }
}

/** Reads the last release of a package from the commit of its release tag. */
export class TagSnapshotResolver implements ArtifactResolver<TagSnapshot> {
  constructor(
    private readonly gateway: SourceControlGateway,
    private readonly reader: PackageReader,
    private readonly tagTemplate: (pkg: WorkspacePackage) => string
  ) {}

  async resolve(pkg: WorkspacePackage): Promise<TagSnapshot | undefined> {
    const latest = latestReleaseTag(
      await this.gateway.tags(),
      this.tagTemplate(pkg),
      pkg.name
    )
    if (!latest) {
      core.debug(`${pkg.name}: no release tag found`)
      return undefined
    }

    const commit = await this.gateway.tagCommit(latest.tag)
    if (!commit) {
      return undefined
    }
    const worktree = await this.gateway.materialize(commit)
    const directory = path.join(
      worktree,
      path.relative(this.gateway.root, pkg.path)
    )
    return {
      kind: 'tag',
      tag: latest.tag,
      commit,
      version: latest.version,
      manifest: await this.reader.readManifest(directory),
      files: await this.reader.packedFiles(directory),
      directory,
      publishedAt: commit
    }
  }
}
