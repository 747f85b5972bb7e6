import * as core from '@actions/core'
import PQueue from 'p-queue'
import { isNotFoundError, toError } from './errors.js'
import { runCommand } from './exec.js'
import type { CompatibilityCheck } from './types.js'

export type CompatibilityOutcome =
  | Exclude<CompatibilityCheck, { status: 'skipped' }>
  | { status: 'unavailable' }

/** Compares the API of a local package with its published version. */
export interface CompatibilityChecker {
  readonly name: string
  check(localDir: string, publishedDir: string): Promise<CompatibilityOutcome>
}

/**
 * Runs `<command> <args...> <localDir> <publishedDir>`. A zero exit code
 * means compatible, any other code incompatible with the output as details.
 */
export class CommandCompatibilityChecker implements CompatibilityChecker {
  constructor(
    readonly name: string,
    private readonly args: string[] = []
  ) {}

  async check(
    localDir: string,
    publishedDir: string
  ): Promise<CompatibilityOutcome> {
    try {
      const { code, stdout, stderr } = await runCommand(
        this.name,
        [...this.args, localDir, publishedDir],
        { allowFail: true }
      )
      if (code === 0) {
        return { status: 'compatible' }
      }
      return {
        status: 'incompatible',
        details: [stdout.trim(), stderr.trim()].filter(Boolean).join('\n')
      }
    } catch (error) {
      if (isNotFoundError(error)) {
        return { status: 'unavailable' }
      }
      throw error
    }
  }
}

export interface CompatibilityJob {
  packageName: string
  localDir: string
  publishedDir: string
}

export interface CompatibilityResults {
  checks: Map<string, CompatibilityCheck>
  failures: Map<string, Error>
}

/**
 * Compatibility checks of one update run. Once the checker turns out to be
 * missing, the remaining checks are skipped and the warning is not repeated.
 */
export class CompatibilityRun {
  private announced = false
  private unavailable = false

  constructor(
    private readonly checker: CompatibilityChecker,
    private readonly concurrency: number
  ) {}

  async checkAll(jobs: CompatibilityJob[]): Promise<CompatibilityResults> {
    const results: CompatibilityResults = {
      checks: new Map(),
      failures: new Map()
    }
    if (jobs.length === 0) {
      return results
    }
    if (!this.announced) {
      core.info(`Checking API compatibility with ${this.checker.name}`)
      this.announced = true
    }

    const queue = new PQueue({ concurrency: this.concurrency })
    await Promise.all(
      jobs.map((job) =>
        queue.add(
          async () => {
            try {
              results.checks.set(job.packageName, await this.check(job))
            } catch (error) {
              results.failures.set(job.packageName, toError(error))
            }
          },
          { throwOnTimeout: true }
        )
      )
    )
    return results
  }

  private async check(job: CompatibilityJob): Promise<CompatibilityCheck> {
    if (this.unavailable) {
      return { status: 'skipped' }
    }
    const outcome = await this.checker.check(job.localDir, job.publishedDir)
    if (outcome.status !== 'unavailable') {
      core.debug(`${job.packageName}: API ${outcome.status}`)
      return outcome
    }
    if (!this.unavailable) {
      core.warning(
        `${this.checker.name} is not installed, skipping the compatibility checks`
      )
      this.unavailable = true
    }
    return { status: 'skipped' }
  }
}

export function compatibilitySummary(check: CompatibilityCheck): string {
  switch (check.status) {
    case 'compatible':
      return ' (✓ API compatible changes)'
    case 'incompatible':
      return ' (⚠ API breaking changes)'
    case 'skipped':
      return ''
  }
}
