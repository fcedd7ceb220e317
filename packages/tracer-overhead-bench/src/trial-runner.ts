import { join } from 'path'
import { bytesToMb, countLines, fileSize, removeArtifact } from './artifacts.js'
import { DaemonTracer } from './daemon-tracer.js'
import { TrialFailedError, errorMessage } from './errors.js'
import { consoleLogger } from './logger.js'
import {
  TIME_FORMAT,
  parseDroppedEvents,
  parseTimingOutput,
  parseWorkloadOutput
} from './output-parsers.js'
import { ResourceMonitor, computeCpuPercent } from './resource-monitor.js'
import { SessionLifecycleManager } from './session-manager.js'
import { sleep, systemClock } from './timing.js'
import type { TimingOutput, WorkloadOutput } from './output-parsers.js'
import type { ProcessAdapter } from './process-adapter.js'
import type { Clock } from './timing.js'
import type { BenchConfig, Logger, Method, RawTrialRecord, ResourceSample, Scenario } from './types.js'

export const WORKLOAD_BINARY = 'bin/sample_app'
export const TRACER_BINARY = 'bin/mylib_tracer'
export const LIBRARY = 'lib/libmylib.so'
export const SESSION_SHIM = 'lib/libmylib_lttng.so'
export const SIMULATED_WORK_ENV = 'SIMULATED_WORK_US'
export const SESSION_EVENT_PATTERN = 'mylib:*'
export const TRACER_PROCESS_PATTERN = 'mylib_tracer'

/**
 * Produces exactly one raw record per call, or throws. Failures are
 * `TrialFailedError` or `TimeoutExceededError`; parse misses are not failures.
 */
export interface TrialRunner {
  readonly method: Method
  run(scenario: Scenario, runIndex: number): Promise<RawTrialRecord>
}

export interface TrialRunnerDeps {
  config: BenchConfig
  processes: ProcessAdapter
  logger?: Logger
  clock?: Clock
  monitor?: ResourceMonitor
  sessions?: SessionLifecycleManager
}

interface WorkloadRun {
  timing: TimingOutput
  workload: WorkloadOutput
}

type TracerFields = Pick<
  RawTrialRecord,
  'traceSizeMb' | 'tracerCpuPercent' | 'tracerMemoryKb' | 'eventsCaptured' | 'eventsDropped'
>

/**
 * Unique per scenario and run so repeated or sharded runs never share a
 * session name or output path.
 */
export function artifactName(
  prefix: string,
  scenario: Scenario,
  runIndex: number,
  shardId?: string
): string {
  const base = `${prefix}_${scenario.simulatedWorkUs}us_r${runIndex}`
  return shardId ? `${shardId}_${base}` : base
}

abstract class WorkloadTrialRunner implements TrialRunner {
  abstract readonly method: Method
  protected readonly logger: Logger

  constructor(protected readonly deps: TrialRunnerDeps) {
    this.logger = deps.logger ?? consoleLogger
  }

  abstract run(scenario: Scenario, runIndex: number): Promise<RawTrialRecord>

  protected get config(): BenchConfig {
    return this.deps.config
  }

  protected async runWorkload(
    scenario: Scenario,
    env: Record<string, string> = {}
  ): Promise<WorkloadRun> {
    const workloadEnv = { ...env }
    if (scenario.simulatedWorkUs > 0) {
      workloadEnv[SIMULATED_WORK_ENV] = String(scenario.simulatedWorkUs)
    }

    const result = await this.deps.processes.execute(
      this.config.timeBinary,
      ['-f', TIME_FORMAT, join(this.config.buildDir, WORKLOAD_BINARY), String(scenario.iterations)],
      { env: workloadEnv, timeoutMs: this.config.trialTimeoutMs }
    )

    if (result.exitCode !== 0) {
      const detail = result.stderr.trim().split('\n').pop() ?? ''
      throw new TrialFailedError(
        `Workload exited with status ${result.exitCode}${detail ? `: ${detail}` : ''}`
      )
    }

    const run = {
      timing: parseTimingOutput(result.stderr),
      workload: parseWorkloadOutput(result.stdout)
    }
    if (run.workload.avgTimePerCallNs === undefined) {
      this.logger.debug('    Workload output had no average time per call, recording 0')
    }
    return run
  }

  protected buildRecord(
    scenario: Scenario,
    run: WorkloadRun,
    tracer: TracerFields = {}
  ): RawTrialRecord {
    const record: RawTrialRecord = {
      scenario: scenario.name,
      method: this.method,
      iterations: scenario.iterations,
      simulatedWorkUs: scenario.simulatedWorkUs,
      wallTimeS: run.timing.wallTimeS ?? 0,
      userCpuS: run.timing.userCpuS ?? 0,
      systemCpuS: run.timing.systemCpuS ?? 0,
      maxRssKb: run.timing.maxRssKb ?? 0,
      avgTimePerCallNs: run.workload.avgTimePerCallNs ?? 0,
      ...tracer
    }
    return Object.freeze(record)
  }
}

export class BaselineTrialRunner extends WorkloadTrialRunner {
  readonly method = 'baseline'

  async run(scenario: Scenario, _runIndex: number): Promise<RawTrialRecord> {
    return this.buildRecord(scenario, await this.runWorkload(scenario))
  }
}

export class SessionTrialRunner extends WorkloadTrialRunner {
  readonly method = 'session'
  private readonly sessions: SessionLifecycleManager

  constructor(deps: TrialRunnerDeps) {
    super(deps)
    this.sessions = deps.sessions ?? new SessionLifecycleManager(deps.processes, this.logger)
  }

  async run(scenario: Scenario, runIndex: number): Promise<RawTrialRecord> {
    const { outputDir, shardId, buildDir } = this.config
    const name = artifactName('mylib_bench', scenario, runIndex, shardId)
    const traceDir = join(outputDir, artifactName('lttng', scenario, runIndex, shardId))

    const session = await this.sessions.create(name, traceDir)
    let run: WorkloadRun
    let traceSizeMb: number | undefined
    try {
      await session.enableEvents(SESSION_EVENT_PATTERN)
      await session.start()
      run = await this.runWorkload(scenario, { LD_PRELOAD: join(buildDir, SESSION_SHIM) })
    } finally {
      await session.stop()
      await session.destroy()
      traceSizeMb = await session.collectArtifact()
    }

    return this.buildRecord(scenario, run, { traceSizeMb })
  }
}

export class DaemonTrialRunner extends WorkloadTrialRunner {
  readonly method = 'daemon'
  private readonly monitor: ResourceMonitor
  private readonly clock: Clock

  constructor(deps: TrialRunnerDeps) {
    super(deps)
    this.monitor = deps.monitor ?? new ResourceMonitor(deps.processes, undefined, this.logger)
    this.clock = deps.clock ?? systemClock
  }

  async run(scenario: Scenario, runIndex: number): Promise<RawTrialRecord> {
    const { outputDir, shardId, buildDir, privilegePrefix } = this.config
    const traceFile = join(outputDir, `${artifactName('ebpf', scenario, runIndex, shardId)}.txt`)

    const daemon = DaemonTracer.launch(
      this.deps.processes,
      {
        binary: join(buildDir, TRACER_BINARY),
        outputFile: traceFile,
        privilegePrefix,
        processPattern: TRACER_PROCESS_PATTERN
      },
      this.logger
    )

    let run: WorkloadRun
    let usage: Pick<TracerFields, 'tracerCpuPercent' | 'tracerMemoryKb'> = {}
    let trace: Pick<TracerFields, 'traceSizeMb' | 'eventsCaptured'> = {}
    let eventsDropped: number | undefined
    try {
      const pid = await daemon.waitUntilReady(this.config.warmupMs, this.monitor)

      const before = pid === undefined ? undefined : await this.monitor.sample(pid)
      const start = this.clock.now()
      run = await this.runWorkload(scenario)
      const elapsedSeconds = (this.clock.now() - start) / 1000
      const after = pid === undefined ? undefined : await this.monitor.sample(pid)

      usage = await this.tracerUsage(before, after, elapsedSeconds)
      await sleep(this.config.settleMs)
    } finally {
      const exit = await daemon.terminate(this.config.gracePeriodMs)
      eventsDropped = exit ? parseDroppedEvents(exit.stdout) : undefined
      trace = await this.collectTrace(traceFile)
    }

    return this.buildRecord(scenario, run, { ...trace, ...usage, eventsDropped })
  }

  private async tracerUsage(
    before: ResourceSample | undefined,
    after: ResourceSample | undefined,
    elapsedSeconds: number
  ): Promise<Pick<TracerFields, 'tracerCpuPercent' | 'tracerMemoryKb'>> {
    if (!before || !after) {
      return {}
    }

    const ticksPerSecond = await this.monitor.getTicksPerSecond()
    return {
      tracerCpuPercent: computeCpuPercent(before, after, ticksPerSecond, elapsedSeconds),
      tracerMemoryKb: after.residentMemoryKb
    }
  }

  private async collectTrace(
    traceFile: string
  ): Promise<Pick<TracerFields, 'traceSizeMb' | 'eventsCaptured'>> {
    const bytes = await fileSize(traceFile)
    if (bytes === undefined) {
      this.logger.debug(`    Tracer wrote no trace file at ${traceFile}`)
      return {}
    }

    let eventsCaptured: number | undefined
    try {
      eventsCaptured = await countLines(traceFile)
    } catch (error) {
      this.logger.warn(`Could not count events in ${traceFile}: ${errorMessage(error)}`)
    }

    try {
      await removeArtifact(traceFile)
    } catch (error) {
      this.logger.warn(`Could not remove trace file ${traceFile}: ${errorMessage(error)}`)
    }

    return { traceSizeMb: bytesToMb(bytes), eventsCaptured }
  }
}

export function createTrialRunner(method: Method, deps: TrialRunnerDeps): TrialRunner {
  switch (method) {
    case 'baseline':
      return new BaselineTrialRunner(deps)
    case 'session':
      return new SessionTrialRunner(deps)
    case 'daemon':
      return new DaemonTrialRunner(deps)
  }
}
