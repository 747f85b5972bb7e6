import type { ConventionalCommit, VersionIncrement } from './types.js'
import { ReleaseError } from './errors.js'
import semver, { type SemVer } from 'semver'

export interface VersionPolicy {
  /** Bump the minor version for features even before 1.0.0. */
  featuresAlwaysIncrementMinor: boolean
  /** Bump the major version for breaking changes even before 1.0.0. */
  breakingAlwaysIncrementMajor: boolean
  customMajorIncrementRegex?: RegExp
  customMinorIncrementRegex?: RegExp
}

export const DEFAULT_VERSION_POLICY: VersionPolicy = {
  featuresAlwaysIncrementMinor: false,
  breakingAlwaysIncrementMajor: false
}

export interface VersionPolicyOptions {
  featuresAlwaysIncrementMinor?: boolean
  breakingAlwaysIncrementMajor?: boolean
  customMajorIncrementRegex?: string
  customMinorIncrementRegex?: string
}

export function createVersionPolicy(
  options: VersionPolicyOptions
): VersionPolicy {
  return {
    featuresAlwaysIncrementMinor: options.featuresAlwaysIncrementMinor ?? false,
    breakingAlwaysIncrementMajor: options.breakingAlwaysIncrementMajor ?? false,
    customMajorIncrementRegex: compileRegex(options.customMajorIncrementRegex),
    customMinorIncrementRegex: compileRegex(options.customMinorIncrementRegex)
  }
}

export function compileRegex(pattern?: string): RegExp | undefined {
  if (pattern === undefined) {
    return undefined
  }
  try {
    return new RegExp(pattern)
  } catch (error) {
    throw new ReleaseError(
      `Invalid regular expression: ${pattern}`,
      'INVALID_REGEX',
      { pattern },
      { cause: error }
    )
  }
}

const CONVENTIONAL_HEADER =
  /^(?<type>\w+)(?:\((?<scope>[^)]*)\))?(?<breaking>!)?: (?<message>.+)$/
const BREAKING_FOOTER = /^BREAKING[ -]CHANGE: /m

/**
 * Parses the header of a `type(scope)!: subject` commit message. A
 * `BREAKING CHANGE:` footer in the body also marks the commit as breaking.
 * Returns undefined for messages that don't follow the convention.
 */
export function parseConventionalCommit(
  message: string,
  hash: string = ''
): ConventionalCommit | undefined {
  const [header = '', ...body] = message.trim().split('\n')
  const match = header.trim().match(CONVENTIONAL_HEADER)

  if (!match?.groups) {
    return undefined
  }

  const { type, scope, breaking, message: subject } = match.groups
  return {
    type,
    scope: scope || undefined,
    breaking: Boolean(breaking) || BREAKING_FOOTER.test(body.join('\n')),
    message: subject,
    hash
  }
}

export function isConventional(message: string): boolean {
  return parseConventionalCommit(message) !== undefined
}

export function firstLine(message: string): string {
  return message.trim().split('\n')[0] ?? ''
}

export function parseVersion(version: string): SemVer {
  const parsed = semver.parse(version)
  if (!parsed) {
    throw new ReleaseError(`Invalid version: ${version}`, 'INVALID_VERSION', {
      version
    })
  }
  return parsed
}

/**
 * Decides which part of `currentVersion` the commits increment.
 * No commits means no release.
 */
export function determineVersionIncrement(
  currentVersion: string,
  messages: string[],
  policy: VersionPolicy = DEFAULT_VERSION_POLICY
): VersionIncrement | undefined {
  if (messages.length === 0) {
    return undefined
  }

  const version = parseVersion(currentVersion)
  if (version.prerelease.length > 0) {
    return 'prerelease'
  }

  const commits = messages.map((message) => ({
    message,
    parsed: parseConventionalCommit(message)
  }))

  // Custom patterns see the commit type, or the header of other commits.
  const anyMatches = (regex?: RegExp): boolean =>
    regex !== undefined &&
    commits.some(({ message, parsed }) =>
      regex.test(parsed ? parsed.type : firstLine(message))
    )

  const breaking =
    commits.some(({ parsed }) => parsed?.breaking === true) ||
    anyMatches(policy.customMajorIncrementRegex)
  const hasFeature = commits.some(({ parsed }) => parsed?.type === 'feat')
  const isInitialDevelopment = version.major === 0

  if (
    breaking &&
    (!isInitialDevelopment || policy.breakingAlwaysIncrementMajor)
  ) {
    return 'major'
  }

  if (
    (hasFeature &&
      (!isInitialDevelopment || policy.featuresAlwaysIncrementMinor)) ||
    (isInitialDevelopment && version.minor !== 0 && breaking) ||
    anyMatches(policy.customMinorIncrementRegex)
  ) {
    return 'minor'
  }

  return 'patch'
}

export function applyIncrement(
  currentVersion: string,
  increment: VersionIncrement
): string {
  const version = parseVersion(currentVersion)

  switch (increment) {
    case 'major':
      return `${version.major + 1}.0.0`
    case 'minor':
      return `${version.major}.${version.minor + 1}.0`
    case 'patch':
      return `${version.major}.${version.minor}.${version.patch + 1}`
    case 'prerelease': {
      if (version.prerelease.length === 0) {
        return `${version.major}.${version.minor}.${version.patch + 1}-1`
      }
      const prerelease = incrementPrerelease(version.prerelease)
      return `${version.major}.${version.minor}.${version.patch}-${prerelease.join('.')}`
    }
  }
}

/** `alpha.1` -> `alpha.2`, `alpha` -> `alpha.1`. */
function incrementPrerelease(
  identifiers: ReadonlyArray<string | number>
): Array<string | number> {
  const next = [...identifiers]
  for (let i = next.length - 1; i >= 0; i--) {
    const identifier = next[i]
    if (typeof identifier === 'number') {
      next[i] = identifier + 1
      return next
    }
  }
  next.push(1)
  return next
}

export function nextVersion(
  currentVersion: string,
  messages: string[],
  policy: VersionPolicy = DEFAULT_VERSION_POLICY
): string {
  const increment = determineVersionIncrement(currentVersion, messages, policy)
  return increment ? applyIncrement(currentVersion, increment) : currentVersion
}

export function isPrerelease(version: string): boolean {
  return parseVersion(version).prerelease.length > 0
}

export function maxVersion(versions: string[]): string | undefined {
  return versions.reduce<string | undefined>(
    (max, version) =>
      max === undefined || semver.gt(version, max) ? version : max,
    undefined
  )
}
