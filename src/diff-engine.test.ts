import { describe, it, expect, vi, beforeEach } from 'vitest'
import * as core from '@actions/core'
import {
  FakeRegistry,
  FakeRepository,
  manifest,
  workspacePackage
} from '../__fixtures__/repo.js'
import { DiffEngine } from './diff-engine.js'
import { nextVersionFromDiff } from './diff.js'
import { DEFAULT_VERSION_POLICY } from './version.js'

vi.mock('@actions/core', async () => await import('../__fixtures__/core.js'))

const A = 'packages/a'

describe('diff-engine.ts', () => {
  let repo: FakeRepository
  let registry: FakeRegistry
  let engine: DiffEngine
  let initial: string

  beforeEach(() => {
    repo = new FakeRepository()
    registry = new FakeRegistry(repo)
    engine = new DiffEngine(repo, repo)
    initial = repo.commit('feat: initial', {
      'package.json': manifest({ name: 'root', workspaces: ['packages/*'] }),
      'packages/a/package.json': manifest({ name: 'a', version: '0.1.0' }),
      'packages/a/index.js': 'export const a = 1\n'
    })
  })

  it('records the commits made after the release', async () => {
    const snapshot = await registry.publish('a', A, initial)
    const fix = repo.commit('fix: bug', {
      'packages/a/index.js': 'export const a = 2\n'
    })

    const diff = await engine.diff({
      pkg: workspacePackage('a', A),
      snapshot,
      tagName: 'a-v0.1.0'
    })

    expect(diff.commits).toEqual([
      {
        id: fix,
        message: 'fix: bug',
        author: {
          name: 'Test Author',
          email: 'author@example.com',
          timestamp: 1700000001
        },
        committer: {
          name: 'Test Author',
          email: 'author@example.com',
          timestamp: 1700000001
        },
        remote: {}
      }
    ])
    expect(nextVersionFromDiff('0.1.0', diff, DEFAULT_VERSION_POLICY)).toBe(
      '0.1.1'
    )
    expect(repo.checkedOut).toBe(fix)
    expect(engine.state).toEqual({ kind: 'at-head' })
  })

  it('finds nothing when the package is unchanged, every time', async () => {
    const snapshot = await registry.publish('a', A, initial)
    const request = {
      pkg: workspacePackage('a', A),
      snapshot,
      tagName: 'a-v0.1.0'
    }

    const first = await engine.diff(request)
    const second = await engine.diff(request)

    expect(first.commits).toEqual([])
    expect(second.commits).toEqual([])
    expect(first.shouldUpdateVersion()).toBe(false)
    expect(core.info).toHaveBeenCalledWith('a: already up to date')
  })

  it('skips commits that only touch files left out of the package', async () => {
    const snapshot = await registry.publish('a', A, initial)
    const fix = repo.commit('fix: bug', {
      'packages/a/index.js': 'export const a = 2\n'
    })
    repo.commit('chore: vendor', {
      'packages/a/node_modules/x/index.js': 'module.exports = 1\n'
    })

    const diff = await engine.diff({
      pkg: workspacePackage('a', A),
      snapshot,
      tagName: 'a-v0.1.0'
    })

    expect(diff.commits.map(({ id }) => id)).toEqual([fix])
  })

  it('stops when the version was bumped by hand', async () => {
    const snapshot = await registry.publish('a', A, initial)
    repo.commit('feat: new api', {
      'packages/a/index.js': 'export const b = 1\n'
    })
    repo.commit('chore: release', {
      'packages/a/package.json': manifest({ name: 'a', version: '0.2.0' })
    })

    const diff = await engine.diff({
      pkg: workspacePackage('a', A, { version: '0.2.0' }),
      snapshot,
      tagName: 'a-v0.2.0'
    })

    expect(diff.commits).toEqual([])
    expect(diff.isVersionPublished).toBe(false)
    expect(diff.registryVersion).toBe('0.1.0')
  })

  it('stops at the released commit even when the content differs', async () => {
    const snapshot = await registry.publish('a', A, initial, {
      'dist/index.js': 'built\n'
    })
    repo.tag('a-v0.1.0', initial)
    const fix = repo.commit('fix: bug', {
      'packages/a/index.js': 'export const a = 2\n'
    })

    const diff = await engine.diff({
      pkg: workspacePackage('a', A),
      snapshot,
      tagName: 'a-v0.1.0'
    })

    expect(diff.commits.map(({ id }) => id)).toEqual([fix])
  })

  it('records every commit of a package that was never published', async () => {
    const fix = repo.commit('fix: bug', {
      'packages/a/index.js': 'export const a = 2\n'
    })

    const diff = await engine.diff({
      pkg: workspacePackage('a', A),
      tagName: 'a-v0.1.0'
    })

    expect(diff.commits.map(({ id }) => id)).toEqual([fix, initial])
    expect(diff.registryPackageExists).toBe(false)
  })

  it('assumes a commit is relevant when the package can not be packed', async () => {
    const repository = new FakeRepository()
    const sources = repository.commit('chore: sources', {
      'packages/a/index.js': 'export const a = 1\n'
    })
    const setup = repository.commit('chore: manifest', {
      'packages/a/package.json': manifest({ name: 'a', version: '0.1.0' })
    })

    const diff = await new DiffEngine(repository, repository).diff({
      pkg: workspacePackage('a', A),
      tagName: 'a-v0.1.0'
    })

    expect(diff.commits.map(({ id }) => id)).toEqual([setup, sources])
  })

  it('assumes a commit is relevant when its changes can not be listed', async () => {
    const fix = repo.commit('fix: bug', {
      'packages/a/index.js': 'export const a = 2\n'
    })
    repo.failingChangedFiles.add(fix)
    const snapshot = await registry.publish('a', A, initial)

    const diff = await engine.diff({
      pkg: workspacePackage('a', A),
      snapshot,
      tagName: 'a-v0.1.0'
    })

    expect(diff.commits.map(({ id }) => id)).toEqual([fix])
    expect(core.warning).toHaveBeenCalledWith(
      `a: cannot list the files changed in ${fix}, assuming it changes the package: bad object ${fix}`
    )
  })

  it('adds a commit for updated dependency requirements', async () => {
    const snapshot = await registry.publish('a', A, initial)

    const diff = await engine.diff({
      pkg: workspacePackage('a', A, {
        dependencies: [
          { name: 'b', kind: 'dependencies', requirement: '^0.2.0' }
        ]
      }),
      snapshot,
      tagName: 'a-v0.1.0'
    })

    expect(diff.commits.map(({ message }) => message)).toEqual([
      'chore: update package.json dependencies'
    ])
  })

  it('adds a commit for updated locked versions of executables', async () => {
    const dependencies = { 'left-pad': '^1.0.0' }
    const cli = repo.commit('feat: cli', {
      'package-lock.json': JSON.stringify({
        packages: { 'node_modules/left-pad': { version: '1.1.0' } }
      }),
      'packages/a/package.json': manifest({
        name: 'a',
        version: '0.1.0',
        bin: 'cli.js',
        dependencies
      }),
      'packages/a/cli.js': '#!/usr/bin/env node\n'
    })
    const snapshot = await registry.publish('a', A, cli, {
      'npm-shrinkwrap.json': JSON.stringify({
        packages: { 'node_modules/left-pad': { version: '1.0.0' } }
      })
    })

    const diff = await engine.diff({
      pkg: workspacePackage('a', A, {
        hasExecutable: true,
        dependencies: [
          { name: 'left-pad', kind: 'dependencies', requirement: '^1.0.0' }
        ]
      }),
      snapshot,
      tagName: 'a-v0.1.0',
      lockfile: '/repo/package-lock.json'
    })

    expect(diff.commits.map(({ message }) => message)).toEqual([
      'chore: update lockfile dependencies'
    ])
  })

  it('follows a README kept outside of the package', async () => {
    const withReadme = repo.commit('docs: readme', { 'README.md': 'Hello\n' })
    const snapshot = await registry.publish('a', A, withReadme, {
      'README.md': 'Hello\n'
    })
    const docs = repo.commit('docs: more readme', {
      'README.md': 'Hello world\n'
    })

    const diff = await engine.diff({
      pkg: workspacePackage('a', A),
      snapshot,
      tagName: 'a-v0.1.0',
      readme: '/repo/README.md'
    })

    expect(diff.commits.map(({ id }) => id)).toEqual([docs])
  })

  it('refuses a release tag without a published artifact', async () => {
    repo.tag('a-v0.1.0')
    repo.commit('fix: bug', { 'packages/a/index.js': 'export const a = 2\n' })

    await expect(
      engine.diff({ pkg: workspacePackage('a', A), tagName: 'a-v0.1.0' })
    ).rejects.toMatchObject({ code: 'TAG_WITHOUT_ARTIFACT' })
    expect(engine.state).toEqual({ kind: 'at-head' })
    expect(repo.checkedOut).toBe(repo.head.id)
  })

  it('refuses a release tag whose artifact has another version', async () => {
    const snapshot = await registry.publish('a', A, initial)
    repo.commit('chore: release', {
      'packages/a/package.json': manifest({ name: 'a', version: '0.2.0' })
    })
    repo.tag('a-v0.2.0')

    await expect(
      engine.diff({
        pkg: workspacePackage('a', A, { version: '0.2.0' }),
        snapshot,
        tagName: 'a-v0.2.0'
      })
    ).rejects.toMatchObject({ code: 'VERSION_MISMATCH' })
  })

  it('walks one package at a time', async () => {
    repo.commit('feat: b', {
      'packages/b/package.json': manifest({ name: 'b', version: '1.0.0' }),
      'packages/b/index.js': 'export const b = 1\n'
    })
    const snapshotA = await registry.publish('a', A, initial)
    const fix = repo.commit('fix: a', {
      'packages/a/index.js': 'export const a = 2\n'
    })

    const [a, b] = await Promise.all([
      engine.diff({
        pkg: workspacePackage('a', A),
        snapshot: snapshotA,
        tagName: 'a-v0.1.0'
      }),
      engine.diff({
        pkg: workspacePackage('b', 'packages/b', { version: '1.0.0' }),
        tagName: 'b-v1.0.0'
      })
    ])

    expect(a.commits.map(({ id }) => id)).toEqual([fix])
    expect(b.commits.map(({ message }) => message)).toEqual(['feat: b'])
  })
})
