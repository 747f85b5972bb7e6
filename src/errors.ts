import type { ZodError } from 'zod'
import type { UpdateStage } from './types.js'

export type ReleaseErrorCode =
  | 'DIRTY_WORKING_TREE'
  | 'TAG_WITHOUT_ARTIFACT'
  | 'VERSION_MISMATCH'
  | 'MANIFEST_READ'
  | 'CHECKOUT_FAILED'
  | 'INVALID_VERSION'
  | 'INVALID_REGEX'
  | 'REGISTRY'

/**
 * Error the user has to act on. `details` carries what triggered it
 * (package, tag, commit, manifest field).
 */
export class ReleaseError extends Error {
  constructor(
    message: string,
    public code: ReleaseErrorCode,
    public details?: Record<string, unknown>,
    options?: ErrorOptions
  ) {
    super(message, options)
    this.name = 'ReleaseError'
  }
}

export class ConfigError extends Error {
  constructor(message: string) {
    super(message)
    this.name = 'ConfigError'
  }
}

/** Failure while computing the update of a single package. */
export class PackageError extends Error {
  constructor(
    public packageName: string,
    public stage: UpdateStage,
    cause: unknown,
    public commit?: string
  ) {
    const at = commit ? ` at commit ${commit}` : ''
    super(
      `${packageName}: ${stage} failed${at}: ${errorMessage(cause)}`,
      { cause }
    )
    this.name = 'PackageError'
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error)
}

/** `path: message` of every issue, `(root)` for the value itself. */
export function formatIssues(error: ZodError): string {
  return error.issues
    .map((issue) => {
      const where = issue.path.length > 0 ? issue.path.join('.') : '(root)'
      return `${where}: ${issue.message}`
    })
    .join('; ')
}

export function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error))
}

/** Whether a file system or spawn error reports a missing file. */
export function isNotFoundError(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT'
}
