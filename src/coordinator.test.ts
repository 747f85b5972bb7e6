import { describe, it, expect, vi } from 'vitest'
import {
  coordinateVersions,
  newWorkspaceVersion,
  versionGroupMaxima,
  type VersionCandidate
} from './coordinator.js'

vi.mock('@actions/core', async () => await import('../__fixtures__/core.js'))

function candidate(
  name: string,
  version: string,
  fields: Partial<VersionCandidate> = {}
): VersionCandidate {
  return {
    name,
    candidate: version,
    inheritsWorkspaceVersion: false,
    ...fields
  }
}

describe('coordinator.ts', () => {
  describe('versionGroupMaxima', () => {
    it('keeps the highest candidate of each group', () => {
      const groups = versionGroupMaxima([
        candidate('a', '1.1.0', { versionGroup: 'core' }),
        candidate('b', '1.0.1', { versionGroup: 'core' }),
        candidate('c', '0.4.0', { versionGroup: 'tools' }),
        candidate('d', '9.0.0')
      ])
      expect(Object.fromEntries(groups)).toEqual({
        core: '1.1.0',
        tools: '0.4.0'
      })
    })
  })

  describe('newWorkspaceVersion', () => {
    it('ignores candidates below the current workspace version', () => {
      expect(
        newWorkspaceVersion(
          [
            candidate('a', '0.2.5', { inheritsWorkspaceVersion: true }),
            candidate('b', '0.3.1', { inheritsWorkspaceVersion: true }),
            candidate('c', '5.0.0')
          ],
          '0.3.0'
        )
      ).toBe('0.3.1')
    })

    it('is undefined without a workspace version', () => {
      expect(
        newWorkspaceVersion(
          [candidate('a', '1.0.0', { inheritsWorkspaceVersion: true })],
          undefined
        )
      ).toBeUndefined()
    })
  })

  describe('coordinateVersions', () => {
    it('gives every package of a group the highest version', () => {
      const { versions, workspaceVersion } = coordinateVersions([
        candidate('a', '1.1.0', { versionGroup: 'core' }),
        candidate('b', '1.0.1', { versionGroup: 'core' }),
        candidate('c', '2.0.1')
      ])
      expect(Object.fromEntries(versions)).toEqual({
        a: '1.1.0',
        b: '1.1.0',
        c: '2.0.1'
      })
      expect(workspaceVersion).toBeUndefined()
    })

    it('moves inheriting packages to the new workspace version', () => {
      const { versions, workspaceVersion } = coordinateVersions(
        [
          candidate('a', '0.3.1', { inheritsWorkspaceVersion: true }),
          candidate('b', '0.4.0', { inheritsWorkspaceVersion: true }),
          candidate('c', '1.0.1')
        ],
        '0.3.0'
      )
      expect(workspaceVersion).toBe('0.4.0')
      expect(Object.fromEntries(versions)).toEqual({
        a: '0.4.0',
        b: '0.4.0',
        c: '1.0.1'
      })
    })

    it('lets the workspace version win over a version group', () => {
      const { versions } = coordinateVersions(
        [
          candidate('a', '0.3.1', {
            inheritsWorkspaceVersion: true,
            versionGroup: 'core'
          }),
          candidate('b', '0.9.0', { versionGroup: 'core' })
        ],
        '0.3.0'
      )
      expect(versions.get('a')).toBe('0.3.1')
      expect(versions.get('b')).toBe('0.9.0')
    })
  })
})
