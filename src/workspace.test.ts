import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest'
import { mkdir, mkdtemp, rm, writeFile } from 'node:fs/promises'
import { tmpdir } from 'node:os'
import * as path from 'node:path'
import { DEFAULT_CONFIG, parseConfig } from './config.js'
import { NpmPackageReader } from './package-files.js'
import type { PackageJson } from './types.js'
import {
  loadWorkspace,
  resolveDependency,
  workspacePatterns
} from './workspace.js'

vi.mock('@actions/core', async () => await import('../__fixtures__/core.js'))

async function writeManifests(
  root: string,
  manifests: Record<string, PackageJson>
): Promise<void> {
  for (const [dir, manifest] of Object.entries(manifests)) {
    await mkdir(path.join(root, dir), { recursive: true })
    await writeFile(
      path.join(root, dir, 'package.json'),
      JSON.stringify(manifest, null, 2)
    )
  }
}

describe('workspace.ts', () => {
  describe('workspacePatterns', () => {
    it('reads both forms of workspaces', () => {
      expect(workspacePatterns({ workspaces: ['packages/*'] })).toEqual([
        'packages/*'
      ])
      expect(
        workspacePatterns({ workspaces: { packages: ['libs/*'] } })
      ).toEqual(['libs/*'])
      expect(workspacePatterns({})).toEqual([])
    })
  })

  describe('resolveDependency', () => {
    const members = new Map([['a', '/repo/packages/a']])
    const resolve = (name: string, requirement: string) =>
      resolveDependency(name, 'dependencies', requirement, '/repo/b', members)

    it('pins ranges and resolves workspace members', () => {
      expect(resolve('a', 'workspace:^1.0.0')).toEqual({
        name: 'a',
        kind: 'dependencies',
        requirement: 'workspace:^1.0.0',
        range: '^1.0.0',
        localPath: '/repo/packages/a'
      })
    })

    it('leaves shorthands without a range', () => {
      expect(resolve('a', 'workspace:*')).toEqual({
        name: 'a',
        kind: 'dependencies',
        requirement: 'workspace:*',
        localPath: '/repo/packages/a'
      })
    })

    it('resolves path dependencies', () => {
      expect(resolve('c', 'file:../c')).toEqual({
        name: 'c',
        kind: 'dependencies',
        requirement: 'file:../c',
        localPath: '/repo/c'
      })
    })

    it('keeps registry dependencies outside of the workspace', () => {
      expect(resolve('left-pad', '^1.0.0')).toEqual({
        name: 'left-pad',
        kind: 'dependencies',
        requirement: '^1.0.0',
        range: '^1.0.0'
      })
      expect(resolve('x', 'npm:other@1').range).toBeUndefined()
    })
  })

  describe('loadWorkspace', () => {
    const reader = new NpmPackageReader()
    let root: string

    beforeEach(async () => {
      root = await mkdtemp(path.join(tmpdir(), 'workspace-'))
    })

    afterEach(async () => {
      await rm(root, { recursive: true, force: true })
    })

    it('reads the members of the workspace', async () => {
      await writeManifests(root, {
        '.': {
          name: 'root',
          version: '1.0.0',
          workspaces: ['packages/*', '!packages/ignored']
        },
        'packages/a': {
          name: 'a',
          version: '0.1.0',
          main: 'index.js',
          dependencies: { b: 'workspace:^0.2.0', 'left-pad': '^1.0.0' }
        },
        'packages/b': {
          name: 'b',
          version: '0.2.0',
          bin: 'cli.js',
          devDependencies: { a: 'file:../a' }
        },
        'packages/c': { name: 'c', private: true },
        'packages/ignored': { name: 'ignored', version: '0.0.1' },
        'packages/a/node_modules/x': { name: 'x', version: '1.0.0' }
      })
      const config = parseConfig(
        '[[package]]\nname = "c"\ninherit_version = true'
      )

      const workspace = await loadWorkspace(root, config, reader)

      expect(workspace.isMultiPackage).toBe(true)
      expect(workspace.version).toBe('1.0.0')
      expect(workspace.packages.map(({ name }) => name)).toEqual([
        'a',
        'b',
        'c'
      ])

      const [a, b, c] = workspace.packages
      expect(a).toEqual({
        name: 'a',
        version: '0.1.0',
        path: path.join(root, 'packages/a'),
        manifestPath: path.join(root, 'packages/a/package.json'),
        dependencies: [
          {
            name: 'b',
            kind: 'dependencies',
            requirement: 'workspace:^0.2.0',
            range: '^0.2.0',
            localPath: path.join(root, 'packages/b')
          },
          {
            name: 'left-pad',
            kind: 'dependencies',
            requirement: '^1.0.0',
            range: '^1.0.0'
          }
        ],
        versionInherited: false,
        isPrivate: false,
        isLibrary: true,
        hasExecutable: false
      })
      expect(b.hasExecutable).toBe(true)
      expect(b.dependencies).toEqual([
        {
          name: 'a',
          kind: 'devDependencies',
          requirement: 'file:../a',
          localPath: path.join(root, 'packages/a')
        }
      ])
      expect(c).toMatchObject({
        version: '1.0.0',
        versionInherited: true,
        isPrivate: true
      })
    })

    it('treats a repository without workspaces as a single package', async () => {
      await writeManifests(root, { '.': { name: 'solo', version: '2.0.0' } })

      const workspace = await loadWorkspace(root, DEFAULT_CONFIG, reader)

      expect(workspace.isMultiPackage).toBe(false)
      expect(workspace.version).toBeUndefined()
      expect(workspace.packages).toHaveLength(1)
      expect(workspace.packages[0]).toMatchObject({
        name: 'solo',
        version: '2.0.0',
        path: root
      })
    })

    it('requires a package name', async () => {
      await writeManifests(root, {
        '.': { name: 'root', workspaces: ['packages/*'] },
        'packages/a': { version: '0.1.0' }
      })

      await expect(loadWorkspace(root, DEFAULT_CONFIG, reader)).rejects.toThrow(
        `${path.join(root, 'packages/a/package.json')}: missing package name`
      )
    })

    it('requires a version unless it is inherited', async () => {
      await writeManifests(root, {
        '.': { name: 'root', version: '1.0.0', workspaces: ['packages/*'] },
        'packages/a': { name: 'a' }
      })

      await expect(
        loadWorkspace(root, DEFAULT_CONFIG, reader)
      ).rejects.toMatchObject({ code: 'MANIFEST_READ' })
    })
  })
})
