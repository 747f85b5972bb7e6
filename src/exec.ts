import * as core from '@actions/core'
import { spawn } from 'node:child_process'

export interface CommandOptions {
  cwd?: string
  /** Resolve instead of rejecting on a non-zero exit code. */
  allowFail?: boolean
}

export interface CommandOutput {
  code: number
  stdout: string
  stderr: string
}

export interface CommandFailure extends Omit<CommandOutput, 'code'> {
  /** `null` when the program was killed by a signal. */
  code: number | null
  signal: NodeJS.Signals | null
}

export class CommandError extends Error {
  constructor(
    message: string,
    public output: CommandFailure
  ) {
    super(message)
    this.name = 'CommandError'
  }
}

/**
 * Runs a program without a shell and collects its output. Rejects with the
 * spawn error (e.g. `ENOENT`) when the program can't be started, and with a
 * `CommandError` when it is killed by a signal, even with `allowFail`.
 */
export function runCommand(
  command: string,
  args: string[],
  options: CommandOptions = {}
): Promise<CommandOutput> {
  const { cwd, allowFail = false } = options
  core.debug(`Running ${command} ${args.join(' ')}${cwd ? ` in ${cwd}` : ''}`)

  return new Promise((resolve, reject) => {
    const child = spawn(command, args, { cwd, stdio: 'pipe' })

    let stdout = ''
    let stderr = ''
    child.stdout.on('data', (chunk: Buffer) => (stdout += chunk.toString()))
    child.stderr.on('data', (chunk: Buffer) => (stderr += chunk.toString()))

    child.on('error', reject)
    child.on('close', (code, signal) => {
      if (code === null) {
        reject(
          new CommandError(
            `Command killed by ${signal ?? 'a signal'}: ${command} ${args.join(' ')}\n${stderr}`,
            { code, signal, stdout, stderr }
          )
        )
      } else if (code === 0 || allowFail) {
        resolve({ code, stdout, stderr })
      } else {
        reject(
          new CommandError(
            `Command failed (${code}): ${command} ${args.join(' ')}\n${stderr}`,
            { code, signal, stdout, stderr }
          )
        )
      }
    })
  })
}
