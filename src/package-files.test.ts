import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest'
import { mkdir, mkdtemp, rm, writeFile } from 'node:fs/promises'
import { tmpdir } from 'node:os'
import * as path from 'node:path'
import { runCommand } from './exec.js'
import {
  hashContent,
  lockedVersions,
  NpmPackageReader,
  parseManifest,
  parsePackDryRun
} from './package-files.js'

vi.mock('@actions/core', async () => await import('../__fixtures__/core.js'))
vi.mock('./exec.js', () => ({ runCommand: vi.fn() }))

describe('package-files.ts', () => {
  describe('parseManifest', () => {
    it('parses JSON objects', () => {
      expect(parseManifest('{"name": "a"}', 'package.json')).toEqual({
        name: 'a'
      })
    })

    it('rejects invalid manifests', () => {
      expect(() => parseManifest('{', 'a/package.json')).toThrow(
        /^Invalid JSON in a\/package.json/
      )
      expect(() => parseManifest('[]', 'a/package.json')).toThrow(
        'a/package.json is not a valid package.json: (root): Expected object, received array'
      )
    })

    it('rejects fields of the wrong type', () => {
      expect(() =>
        parseManifest('{"dependencies": {"x": 1}}', 'a/package.json')
      ).toThrow(
        'a/package.json is not a valid package.json: dependencies.x: Expected string, received number'
      )
    })

    it('keeps the fields it does not know', () => {
      expect(
        parseManifest('{"name": "a", "scripts": {"test": "vitest"}}', 'p')
      ).toEqual({ name: 'a', scripts: { test: 'vitest' } })
    })
  })

  describe('parsePackDryRun', () => {
    it('lists the packed files', () => {
      expect(
        parsePackDryRun(
          '[{"name": "a", "files": [{"path": "index.js", "size": 10}, {"path": "package.json"}]}]'
        )
      ).toEqual(['index.js', 'package.json'])
    })

    it('rejects unexpected output', () => {
      expect(() => parsePackDryRun('[{"files": "index.js"}]')).toThrow(
        'Unexpected output of npm pack --dry-run: 0.files: Expected array, received string'
      )
    })
  })

  describe('lockedVersions', () => {
    const lockfile = JSON.stringify({
      packages: {
        '': { name: 'root' },
        'node_modules/x': { version: '1.0.0' },
        'packages/a/node_modules/x': { version: '2.0.0' },
        'node_modules/y': { version: '3.0.0' }
      }
    })

    it('prefers the versions nested in the package', () => {
      expect(
        Object.fromEntries(lockedVersions(lockfile, ['x', 'y'], 'packages/a'))
      ).toEqual({ x: '2.0.0', y: '3.0.0' })
    })

    it('reads the hoisted versions', () => {
      expect(
        Object.fromEntries(lockedVersions(lockfile, ['x', 'missing']))
      ).toEqual({ x: '1.0.0' })
    })

    it('reads the legacy layout', () => {
      const legacy = JSON.stringify({
        dependencies: { x: { version: '0.5.0' } }
      })
      expect(Object.fromEntries(lockedVersions(legacy, ['x']))).toEqual({
        x: '0.5.0'
      })
    })
  })

  describe('NpmPackageReader', () => {
    const reader = new NpmPackageReader()
    let dir: string

    beforeEach(async () => {
      dir = await mkdtemp(path.join(tmpdir(), 'package-files-'))
      await mkdir(path.join(dir, 'lib'))
      await writeFile(path.join(dir, 'package.json'), '{"name": "a"}')
      await writeFile(path.join(dir, 'lib', 'index.js'), 'export {}\n')
      await writeFile(path.join(dir, '.npmignore'), 'test\n')
    })

    afterEach(async () => {
      await rm(dir, { recursive: true, force: true })
    })

    it('reads the manifest', async () => {
      expect(await reader.readManifest(dir)).toEqual({ name: 'a' })
    })

    it('fails without a manifest', async () => {
      await expect(
        reader.readManifest(path.join(dir, 'lib'))
      ).rejects.toMatchObject({ code: 'MANIFEST_READ' })
    })

    it('reads missing files as undefined', async () => {
      expect(await reader.readText(path.join(dir, 'README.md'))).toBeUndefined()
    })

    it('hashes every file of an extracted package', async () => {
      const files = await reader.listFiles(dir)

      expect(Object.fromEntries(files)).toEqual({
        '.npmignore': hashContent('test\n'),
        'lib/index.js': hashContent('export {}\n'),
        'package.json': hashContent('{"name": "a"}')
      })
    })

    it('hashes the files npm would pack', async () => {
      vi.mocked(runCommand).mockResolvedValue({
        code: 0,
        stdout: JSON.stringify([
          { files: [{ path: 'package.json' }, { path: 'lib/index.js' }] }
        ]),
        stderr: ''
      })

      const files = await reader.packedFiles(dir)

      expect([...files.entries()]).toEqual([
        ['lib/index.js', hashContent('export {}\n')],
        ['package.json', hashContent('{"name": "a"}')]
      ])
      expect(runCommand).toHaveBeenCalledWith(
        'npm',
        ['pack', '--dry-run', '--json', '--ignore-scripts'],
        { cwd: dir }
      )
    })
  })
})
