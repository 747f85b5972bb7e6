import { describe, it, expect } from 'vitest'
import { Diff, nextVersionFromDiff, syntheticCommit } from './diff.js'
import type { Commit } from './types.js'
import { DEFAULT_VERSION_POLICY } from './version.js'

function commit(id: string, message: string): Commit {
  return { id, message, author: {}, committer: {}, remote: {} }
}

describe('diff.ts', () => {
  describe('Diff', () => {
    it('skips commits already recorded', () => {
      const diff = new Diff(true)
      diff.addCommits([commit('a1', 'fix: one'), commit('b2', 'feat: two')])
      diff.addCommits([commit('a1', 'fix: one'), commit('c3', 'fix: three')])

      expect(diff.commits.map(({ id }) => id)).toEqual(['a1', 'b2', 'c3'])
    })

    it('keeps synthetic commits with different messages', () => {
      const diff = new Diff(true)
      diff.addCommits([
        syntheticCommit('chore: update package.json dependencies'),
        syntheticCommit('chore: updated the following local packages: a')
      ])
      expect(diff.commits).toHaveLength(2)
    })

    it('updates the version of published packages with commits', () => {
      const diff = new Diff(true)
      expect(diff.shouldUpdateVersion()).toBe(false)

      diff.addCommits([commit('a1', 'fix: one')])
      expect(diff.shouldUpdateVersion()).toBe(true)

      diff.setVersionUnpublished('0.1.0')
      expect(diff.shouldUpdateVersion()).toBe(false)
      expect(diff.registryVersion).toBe('0.1.0')
    })

    it('never updates the version of unpublished packages', () => {
      const diff = new Diff(false)
      diff.addCommits([commit('a1', 'feat: one')])
      expect(diff.shouldUpdateVersion()).toBe(false)
    })

    it('matches commit messages', () => {
      const diff = new Diff(true)
      diff.addCommits([commit('a1', 'docs: readme')])
      expect(diff.anyCommitMatches(/^docs/)).toBe(true)
      expect(diff.anyCommitMatches(/^feat/)).toBe(false)
    })
  })

  describe('nextVersionFromDiff', () => {
    it('computes the next version from the commits', () => {
      const diff = new Diff(true)
      diff.addCommits([commit('a1', 'fix: bug')])
      expect(nextVersionFromDiff('0.1.0', diff, DEFAULT_VERSION_POLICY)).toBe(
        '0.1.1'
      )
    })

    it('keeps the version when it was bumped by hand', () => {
      const diff = new Diff(true)
      diff.addCommits([commit('a1', 'feat: one')])
      diff.setVersionUnpublished('1.0.0')
      expect(nextVersionFromDiff('2.0.0', diff, DEFAULT_VERSION_POLICY)).toBe(
        '2.0.0'
      )
    })
  })

  describe('syntheticCommit', () => {
    it('has no commit id', () => {
      expect(syntheticCommit('chore: x')).toEqual({
        id: '0000000',
        message: 'chore: x',
        author: {},
        committer: {},
        remote: {}
      })
    })
  })
})
