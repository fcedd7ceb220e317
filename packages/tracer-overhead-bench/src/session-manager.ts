import { bytesToMb, directorySize, removeArtifact } from './artifacts.js'
import { TrialFailedError, errorMessage } from './errors.js'
import { consoleLogger } from './logger.js'
import type { ProcessAdapter } from './process-adapter.js'
import type { Logger } from './types.js'

const SESSION_COMMAND = 'lttng'

export type SessionState = 'created' | 'started' | 'stopped' | 'destroyed'

/**
 * Creates named tracing sessions through the session-management CLI.
 */
export class SessionLifecycleManager {
  constructor(
    private readonly processes: ProcessAdapter,
    private readonly logger: Logger = consoleLogger,
    private readonly command: string = SESSION_COMMAND
  ) {}

  /**
   * Destroys any leftover session with the same name, then creates a fresh one
   * writing below `outputDir`.
   */
  async create(name: string, outputDir: string): Promise<TracingSession> {
    await this.processes.runControl(this.command, ['destroy', name])

    const result = await this.processes.execute(this.command, [
      'create',
      name,
      `--output=${outputDir}`
    ])
    if (result.exitCode !== 0) {
      throw new TrialFailedError(
        `Could not create tracing session ${name}: ${result.stderr.trim() || `exit ${result.exitCode}`}`
      )
    }

    return new TracingSession(name, outputDir, this.processes, this.logger, this.command)
  }
}

export class TracingSession {
  private _state: SessionState = 'created'
  private started = false

  constructor(
    readonly name: string,
    readonly outputDir: string,
    private readonly processes: ProcessAdapter,
    private readonly logger: Logger,
    private readonly command: string
  ) {}

  get state(): SessionState {
    return this._state
  }

  async enableEvents(pattern: string): Promise<void> {
    const result = await this.processes.execute(this.command, [
      'enable-event',
      '-u',
      pattern,
      '-s',
      this.name
    ])
    if (result.exitCode !== 0) {
      throw new TrialFailedError(
        `Could not enable events ${pattern} on session ${this.name}: ${result.stderr.trim() || `exit ${result.exitCode}`}`
      )
    }
  }

  async start(): Promise<void> {
    await this.processes.runControl(this.command, ['start', this.name])
    this._state = 'started'
    this.started = true
  }

  async stop(): Promise<void> {
    if (this._state !== 'started') {
      return
    }
    await this.processes.runControl(this.command, ['stop', this.name])
    this._state = 'stopped'
  }

  async destroy(): Promise<void> {
    if (this._state === 'destroyed') {
      return
    }
    await this.processes.runControl(this.command, ['destroy', this.name])
    this._state = 'destroyed'
  }

  /**
   * Measures everything the session wrote, then deletes it. Returns the size
   * in MB; a session that traced but wrote nothing measures 0, one that was
   * never started measures undefined.
   */
  async collectArtifact(): Promise<number | undefined> {
    const bytes = await directorySize(this.outputDir)
    if (bytes === undefined) {
      return this.started ? 0 : undefined
    }

    try {
      await removeArtifact(this.outputDir)
    } catch (error) {
      this.logger.warn(`Could not remove trace directory ${this.outputDir}: ${errorMessage(error)}`)
    }
    return bytesToMb(bytes)
  }
}
