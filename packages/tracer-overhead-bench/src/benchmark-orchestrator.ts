import { access, mkdir } from 'fs/promises'
import { join } from 'path'
import mitt from 'mitt'
import type { Emitter } from 'mitt'
import { aggregate } from './aggregator.js'
import { SuiteAbortedError, TrialFailedError, errorMessage } from './errors.js'
import { consoleLogger } from './logger.js'
import { ExecaProcessAdapter } from './process-adapter.js'
import { RESULTS_FILE_NAME, writeResultSet } from './results-store.js'
import { selectScenarios } from './scenarios.js'
import {
  LIBRARY,
  SESSION_SHIM,
  TRACER_BINARY,
  WORKLOAD_BINARY,
  createTrialRunner
} from './trial-runner.js'
import type { ProcessAdapter } from './process-adapter.js'
import type { TrialRunner, TrialRunnerDeps } from './trial-runner.js'
import type {
  AggregateRecord,
  BenchConfig,
  Logger,
  Method,
  RawTrialRecord,
  ResultSet,
  Scenario,
  SuiteState
} from './types.js'

const PROGRESS_EVERY = 10

export type SuiteEvents = {
  'suite:start': { scenarios: readonly Scenario[], methods: readonly Method[], runs: number }
  state: { state: SuiteState, scenario?: Scenario, method?: Method }
  'scenario:start': { scenario: Scenario, index: number, total: number }
  'pair:start': { scenario: Scenario, method: Method, runs: number }
  'trial:complete': { scenario: Scenario, method: Method, runIndex: number, record: RawTrialRecord }
  'trial:failed': { scenario: Scenario, method: Method, runIndex: number, error: unknown }
  'pair:complete': { scenario: Scenario, method: Method, record: AggregateRecord, failedTrials: number }
  'pair:skipped': { scenario: Scenario, method: Method, error: unknown }
  'suite:persisted': { path: string, results: ResultSet }
}

export type TrialRunnerFactory = (method: Method, deps: TrialRunnerDeps) => TrialRunner

export interface OrchestratorOptions {
  config: BenchConfig
  processes?: ProcessAdapter
  logger?: Logger
  /** Defaults to the catalog filtered by `config.scenarios` */
  scenarios?: readonly Scenario[]
  createRunner?: TrialRunnerFactory
  /** Checked between trials; aborting persists what has been measured so far */
  signal?: AbortSignal
}

const METHOD_LABELS: Record<Method, string> = {
  baseline: 'BASELINE',
  session: 'SESSION',
  daemon: 'DAEMON'
}

const REQUIRED_ARTIFACTS: Record<Method, readonly string[]> = {
  baseline: [WORKLOAD_BINARY, LIBRARY],
  session: [WORKLOAD_BINARY, LIBRARY, SESSION_SHIM],
  daemon: [WORKLOAD_BINARY, LIBRARY, TRACER_BINARY]
}

/**
 * Confirms every build artifact the selected methods need exists before any
 * trial starts.
 */
export async function verifyBuildArtifacts(config: Pick<BenchConfig, 'buildDir' | 'methods'>): Promise<void> {
  const required = [...new Set(config.methods.flatMap((method) => REQUIRED_ARTIFACTS[method]))]
  const missing: string[] = []

  for (const artifact of required) {
    const path = join(config.buildDir, artifact)
    try {
      await access(path)
    } catch {
      missing.push(path)
    }
  }

  if (missing.length > 0) {
    throw new SuiteAbortedError(
      'setup',
      `Required file(s) not found: ${missing.join(', ')}. Build the project first.`
    )
  }
}

/**
 * Runs every (scenario, method) pair the configured number of times and
 * reduces each pair's trials to one aggregate record.
 *
 * Pairs run strictly one after another: the daemon tracer needs exclusive
 * attachment to the workload.
 */
export class BenchmarkOrchestrator {
  readonly events: Emitter<SuiteEvents> = mitt<SuiteEvents>()
  readonly resultsPath: string

  private _state: SuiteState = 'idle'
  private readonly results: AggregateRecord[] = []
  private readonly config: BenchConfig
  private readonly processes: ProcessAdapter
  private readonly logger: Logger
  private readonly scenarios: readonly Scenario[]
  private readonly createRunner: TrialRunnerFactory
  private readonly signal: AbortSignal | undefined

  constructor(options: OrchestratorOptions) {
    this.config = options.config
    this.logger = options.logger ?? consoleLogger
    this.processes = options.processes ?? new ExecaProcessAdapter(this.logger)
    this.scenarios = options.scenarios ?? selectScenarios(options.config.scenarios)
    this.createRunner = options.createRunner ?? createTrialRunner
    this.signal = options.signal
    this.resultsPath = join(options.config.outputDir, RESULTS_FILE_NAME)
  }

  get state(): SuiteState {
    return this._state
  }

  async run(): Promise<ResultSet> {
    if (this._state !== 'idle') {
      throw new Error(`Suite has already been run (state: ${this._state})`)
    }

    try {
      await mkdir(this.config.outputDir, { recursive: true })
    } catch (error) {
      throw new SuiteAbortedError(
        'setup',
        `Could not create output directory ${this.config.outputDir}: ${errorMessage(error)}`,
        [],
        { cause: error }
      )
    }

    const { runs, methods } = this.config
    this.logger.info('🔥 Starting tracer overhead benchmark suite')
    this.logger.info(
      `📊 Config: ${this.scenarios.length} scenarios × ${methods.length} methods × ${runs} runs = ${this.scenarios.length * methods.length * runs} trials`
    )

    this.events.emit('suite:start', { scenarios: this.scenarios, methods, runs })

    try {
      for (const [index, scenario] of this.scenarios.entries()) {
        this.throwIfAborted()
        this.logScenario(scenario)
        this.events.emit('scenario:start', { scenario, index, total: this.scenarios.length })

        for (const method of methods) {
          await this.runPair(scenario, method)
        }
      }
    } catch (error) {
      if (error instanceof SuiteAbortedError) {
        this.setState('aborted')
        await this.persistPartial()
        throw new SuiteAbortedError(error.reason, error.message, this.snapshot(), { cause: error.cause })
      }
      this.setState('aborted')
      await this.persistPartial()
      throw error
    }

    await this.persist()
    this.setState('persisted')
    return this.snapshot()
  }

  private async runPair(scenario: Scenario, method: Method): Promise<void> {
    const { runs } = this.config
    this.setState('running', scenario, method)
    this.events.emit('pair:start', { scenario, method, runs })
    this.logger.info(`\n  📈 [${METHOD_LABELS[method]}] ${scenario.name} - Running ${runs} times`)

    const records: RawTrialRecord[] = []
    let failedTrials = 0

    try {
      const runner = this.createRunner(method, {
        config: this.config,
        processes: this.processes,
        logger: this.logger
      })

      for (let runIndex = 0; runIndex < runs; runIndex++) {
        if (this.signal?.aborted) {
          // Keep the trials this pair already paid for
          this.aggregateInto(scenario, method, records, failedTrials)
          this.throwIfAborted()
        }

        if (runIndex % PROGRESS_EVERY === 0) {
          this.logger.info(`    Run ${runIndex + 1}/${runs}...`)
        }

        try {
          const record = await runner.run(scenario, runIndex)
          records.push(record)
          this.events.emit('trial:complete', { scenario, method, runIndex, record })
        } catch (error) {
          failedTrials++
          this.logger.warn(`Run ${runIndex + 1} failed, excluding it: ${errorMessage(error)}`)
          this.events.emit('trial:failed', { scenario, method, runIndex, error })
        }
      }

      if (records.length === 0) {
        throw new TrialFailedError(`All ${runs} runs failed`)
      }
    } catch (error) {
      if (error instanceof SuiteAbortedError) {
        throw error
      }
      this.logger.error(`Skipping ${METHOD_LABELS[method]} for ${scenario.name}: ${errorMessage(error)}`)
      this.events.emit('pair:skipped', { scenario, method, error })
      return
    }

    this.aggregateInto(scenario, method, records, failedTrials)
    const failedNote = failedTrials > 0 ? ` (${failedTrials} failed)` : ''
    this.logger.info(`    Completed ${records.length}/${runs} runs${failedNote}`)
  }

  private aggregateInto(
    scenario: Scenario,
    method: Method,
    records: RawTrialRecord[],
    failedTrials: number
  ): void {
    if (records.length === 0) {
      return
    }
    this.setState('aggregating', scenario, method)
    const record = aggregate(records)
    this.results.push(record)
    this.events.emit('pair:complete', { scenario, method, record, failedTrials })
  }

  private throwIfAborted(): void {
    if (this.signal?.aborted) {
      throw new SuiteAbortedError('interrupted', 'Benchmark interrupted', this.snapshot())
    }
  }

  private async persist(): Promise<void> {
    const results = this.snapshot()
    await writeResultSet(this.resultsPath, results)
    this.logger.info(`\n📝 Results saved to: ${this.resultsPath}`)
    this.events.emit('suite:persisted', { path: this.resultsPath, results })
  }

  private async persistPartial(): Promise<void> {
    try {
      await this.persist()
    } catch (error) {
      this.logger.error(`Could not save partial results: ${errorMessage(error)}`)
    }
  }

  private snapshot(): ResultSet {
    return [...this.results]
  }

  private setState(state: SuiteState, scenario?: Scenario, method?: Method): void {
    this._state = state
    this.events.emit('state', { state, scenario, method })
  }

  private logScenario(scenario: Scenario): void {
    this.logger.info(`\n🧪 Scenario: ${scenario.name}`)
    this.logger.info(`   Work Duration: ${scenario.simulatedWorkUs} μs`)
    this.logger.info(`   Iterations: ${scenario.iterations.toLocaleString()}`)
    this.logger.info(`   Description: ${scenario.description}`)
  }
}
