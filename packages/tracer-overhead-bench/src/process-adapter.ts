import { execa } from 'execa'
import { TimeoutExceededError, TrialFailedError } from './errors.js'
import { consoleLogger } from './logger.js'
import type { CommandResult, Logger } from './types.js'

const DEFAULT_TIMEOUT_MS = 300_000
const CONTROL_TIMEOUT_MS = 30_000

export interface ExecuteOptions {
  /** Merged onto the ambient environment, never replacing it */
  env?: Record<string, string>
  timeoutMs?: number
}

export interface ProcessExit {
  exitCode: number | undefined
  signal: string | undefined
  stdout: string
  stderr: string
}

export interface BackgroundProcess {
  readonly pid: number | undefined
  readonly exited: Promise<ProcessExit>
  kill(signal: NodeJS.Signals): boolean
}

export interface ProcessAdapter {
  execute(command: string, args: readonly string[], options?: ExecuteOptions): Promise<CommandResult>
  /**
   * Fire-and-forget control command. Failures are logged, never thrown, so
   * that "destroy if exists" style bookkeeping stays idempotent.
   */
  runControl(command: string, args: readonly string[]): Promise<void>
  launch(command: string, args: readonly string[]): BackgroundProcess
}

export function formatCommand(command: string, args: readonly string[]): string {
  return [command, ...args].map((part) => (/\s/.test(part) ? JSON.stringify(part) : part)).join(' ')
}

function text(output: unknown): string {
  return typeof output === 'string' ? output : ''
}

export class ExecaProcessAdapter implements ProcessAdapter {
  constructor(private readonly logger: Logger = consoleLogger) {}

  async execute(
    command: string,
    args: readonly string[],
    options: ExecuteOptions = {}
  ): Promise<CommandResult> {
    const timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS
    const rendered = formatCommand(command, args)
    this.logger.debug(`    Running: ${rendered}`)

    const result = await execa(command, args, {
      env: options.env,
      extendEnv: true,
      reject: false,
      timeout: timeoutMs
    })

    if (result.timedOut) {
      throw new TimeoutExceededError(rendered, timeoutMs)
    }

    // No exit code without a timeout means the process never started
    if (result.exitCode === undefined) {
      const cause = result instanceof Error ? result : undefined
      throw new TrialFailedError(`Failed to run ${rendered}`, { cause })
    }

    return {
      stdout: text(result.stdout),
      stderr: text(result.stderr),
      exitCode: result.exitCode
    }
  }

  async runControl(command: string, args: readonly string[]): Promise<void> {
    try {
      const result = await this.execute(command, args, { timeoutMs: CONTROL_TIMEOUT_MS })
      if (result.exitCode !== 0) {
        this.logger.debug(
          `    Control command exited with ${result.exitCode}: ${formatCommand(command, args)}`,
          result.stderr.trim()
        )
      }
    } catch (error) {
      this.logger.warn(`    Control command failed: ${formatCommand(command, args)}`, error)
    }
  }

  launch(command: string, args: readonly string[]): BackgroundProcess {
    this.logger.debug(`    Launching: ${formatCommand(command, args)}`)

    const subprocess = execa(command, args, {
      reject: false,
      cleanup: true
    })

    const exited = subprocess.then((result) => ({
      exitCode: result.exitCode,
      signal: result.signal,
      stdout: text(result.stdout),
      stderr: text(result.stderr)
    }))

    return {
      pid: subprocess.pid,
      exited,
      kill: (signal) => subprocess.kill(signal)
    }
  }
}
