import { TrialFailedError, errorMessage } from './errors.js'
import { consoleLogger } from './logger.js'
import { sleep, waitFor } from './timing.js'
import type { BackgroundProcess, ProcessAdapter, ProcessExit } from './process-adapter.js'
import type { ResourceMonitor } from './resource-monitor.js'
import type { Logger } from './types.js'

export type DaemonState = 'launched' | 'ready' | 'stopped'

export interface DaemonLaunchOptions {
  binary: string
  outputFile: string
  /** e.g. ['sudo']; empty to launch and signal the daemon directly */
  privilegePrefix: readonly string[]
  /** Command-line pattern used to find the daemon's own pid */
  processPattern: string
}

/**
 * Owned handle on a privileged, detached tracer daemon.
 *
 * Nothing cleans the daemon up implicitly: whoever launches it must call
 * {@link DaemonTracer.terminate}, which never throws.
 */
export class DaemonTracer {
  private _state: DaemonState = 'launched'
  private _pid: number | undefined
  private exit: ProcessExit | undefined

  private constructor(
    private readonly child: BackgroundProcess,
    private readonly options: DaemonLaunchOptions,
    private readonly processes: ProcessAdapter,
    private readonly logger: Logger
  ) {}

  static launch(
    processes: ProcessAdapter,
    options: DaemonLaunchOptions,
    logger: Logger = consoleLogger
  ): DaemonTracer {
    const [command, ...args] = [...options.privilegePrefix, options.binary, options.outputFile]
    const child = processes.launch(command ?? options.binary, args)
    return new DaemonTracer(child, options, processes, logger)
  }

  get state(): DaemonState {
    return this._state
  }

  /** The daemon's own pid, once resolved by {@link waitUntilReady}. */
  get pid(): number | undefined {
    return this._pid
  }

  /**
   * Gives the daemon `warmupMs` to attach its probes, then resolves its pid.
   * A failed lookup is logged and leaves `pid` undefined; the daemon is still
   * considered ready. A daemon that has already exited fails the trial, since
   * the workload would otherwise run untraced.
   */
  async waitUntilReady(warmupMs: number, monitor: ResourceMonitor): Promise<number | undefined> {
    await sleep(warmupMs)

    const early = await waitFor(this.child.exited, 0)
    if (early) {
      this._state = 'stopped'
      this.exit = early
      const status = early.exitCode ?? early.signal ?? 'unknown'
      const detail = early.stderr.trim().split('\n').pop() ?? ''
      throw new TrialFailedError(
        `Tracer exited during warm-up with status ${status}${detail ? `: ${detail}` : ''}`
      )
    }

    try {
      this._pid = await monitor.findProcessId(this.options.processPattern)
    } catch (error) {
      this.logger.warn(`Tracer process lookup failed, skipping resource sampling: ${errorMessage(error)}`)
      this._pid = undefined
    }

    if (this._state === 'launched') {
      this._state = 'ready'
    }
    return this._pid
  }

  /**
   * Interrupts the daemon so it can flush its output, escalating to a kill if
   * it is still running after `gracePeriodMs`. Returns the daemon's exit, or
   * undefined if it could not be confirmed.
   */
  async terminate(gracePeriodMs: number): Promise<ProcessExit | undefined> {
    if (this._state === 'stopped') {
      return this.exit
    }

    await this.signal('SIGINT')
    let exit = await waitFor(this.child.exited, gracePeriodMs)

    if (!exit) {
      this.logger.warn(`Tracer did not exit within ${gracePeriodMs}ms, killing it`)
      await this.signal('SIGKILL')
      exit = await waitFor(this.child.exited, gracePeriodMs)
      if (!exit) {
        this.logger.warn('Tracer still running after SIGKILL; continuing without it')
      }
    }

    this._state = 'stopped'
    this.exit = exit
    return exit
  }

  private async signal(signal: 'SIGINT' | 'SIGKILL'): Promise<void> {
    const [command, ...prefixArgs] = this.options.privilegePrefix
    const target = this._pid ?? this.child.pid

    if (command !== undefined && target !== undefined) {
      const name = signal.replace(/^SIG/, '')
      await this.processes.runControl(command, [...prefixArgs, 'kill', `-${name}`, String(target)])
      return
    }

    try {
      this.child.kill(signal)
    } catch (error) {
      this.logger.debug(`    Could not send ${signal} to tracer: ${errorMessage(error)}`)
    }
  }
}
