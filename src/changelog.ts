import semver from 'semver'
import type { Commit } from './types.js'
import { firstLine, parseConventionalCommit } from './version.js'

const SECTIONS: Record<string, string> = {
  feat: '🚀 Features',
  fix: '🐛 Fixes',
  docs: '📝 Documentation',
  refactor: '♻️ Refactors',
  perf: '⚡️ Performance',
  test: '🧪 Tests',
  chore: '🔧 Chores',
  revert: '⏪ Reverts',
  build: '🔨 Build',
  ci: '👷 CI'
}

const DEFAULT_SECTION = SECTIONS.chore

/**
 * Groups commits into one markdown section per commit type. Commits that
 * don't follow the conventional format are listed under chores by the
 * first line of their message.
 */
export function generateChangelog(commits: Commit[]): string {
  const sections = new Map<string, string[]>(
    Object.values(SECTIONS).map((title) => [title, []])
  )

  for (const commit of commits) {
    const parsed = parseConventionalCommit(commit.message, commit.id)
    const section = (parsed && SECTIONS[parsed.type]) || DEFAULT_SECTION
    const message = parsed
      ? parsed.breaking
        ? `**BREAKING CHANGE:** ${parsed.message}`
        : parsed.message
      : firstLine(commit.message)
    sections.get(section)?.push(`- ${message}${attribution(commit)}`)
  }

  return [...sections.entries()]
    .filter(([, items]) => items.length > 0)
    .map(([title, items]) => `### ${title}\n\n${items.join('\n')}`)
    .join('\n\n')
}

function attribution({ remote }: Commit): string {
  const by = remote.username ? ` by @${remote.username}` : ''
  const pr = remote.prNumber ? ` in #${remote.prNumber}` : ''
  return `${by}${pr}`
}

export interface ChangelogEntry {
  version: string
  commits: Commit[]
  /** Link to the changes between the previous and this release. */
  compareLink?: string
  date?: Date
}

export function renderChangelogEntry({
  version,
  commits,
  compareLink,
  date = new Date()
}: ChangelogEntry): string {
  const heading = compareLink ? `[${version}](${compareLink})` : version
  const body = generateChangelog(commits)
  return `## ${heading} (${date.toISOString().split('T')[0]})\n\n${body}\n`
}

/** Adds `entry` right below the title of the changelog, creating it if needed. */
export function prependChangelog(
  changelog: string | undefined,
  entry: string,
  title: string
): string {
  const content = changelog?.startsWith('# ')
    ? changelog
    : `# ${title}\n\n${changelog ?? ''}`
  const [heading = '', ...rest] = content.split('\n')
  return (
    [heading, entry.trim(), rest.join('\n').trim()]
      .filter((part) => part.length > 0)
      .join('\n\n') + '\n'
  )
}

const VERSION_HEADING =
  /^## \[?v?(\d+\.\d+\.\d+(?:-[0-9A-Za-z.-]+)?(?:\+[0-9A-Za-z.-]+)?)\]?/gm

/** Version of the most recent release listed in the changelog. */
export function lastVersionFromChangelog(changelog: string): string | undefined {
  for (const [, version] of changelog.matchAll(VERSION_HEADING)) {
    if (semver.valid(version)) {
      return version
    }
  }
  return undefined
}

export function changelogTitle(packageName: string, isRoot: boolean): string {
  return isRoot
    ? 'Changelog'
    : `${packageName.charAt(0).toUpperCase() + packageName.slice(1)} Changelog`
}

export interface ChangelogRequest {
  title: string
  currentVersion: string
  nextVersion: string
  commits: Commit[]
  oldChangelog?: string
  /** Builds the compare link between two released versions. */
  compareLink?: (previous: string, next: string) => string | undefined
  date?: Date
}

export interface BuiltChangelog {
  changelog: string
  /** Undefined when the old changelog already describes the release. */
  entry?: string
}

/**
 * Renders the section of `nextVersion` on top of the old changelog. When
 * the version isn't bumped and the changelog already ends at it (e.g. a
 * release PR was merged but never published), the old changelog is kept.
 */
export function buildChangelog(request: ChangelogRequest): BuiltChangelog {
  const { oldChangelog, currentVersion, nextVersion } = request
  const lastVersion = oldChangelog
    ? lastVersionFromChangelog(oldChangelog)
    : undefined
  const isBumped = nextVersion !== currentVersion

  if (oldChangelog && !isBumped && lastVersion === nextVersion) {
    return { changelog: oldChangelog }
  }

  const previousVersion = isBumped
    ? (lastVersion ?? currentVersion)
    : undefined
  const entry = renderChangelogEntry({
    version: nextVersion,
    commits: request.commits,
    compareLink: previousVersion
      ? request.compareLink?.(previousVersion, nextVersion)
      : undefined,
    date: request.date
  })
  return {
    changelog: prependChangelog(oldChangelog, entry, request.title),
    entry
  }
}
