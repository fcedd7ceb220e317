export interface Scenario {
  readonly name: string
  readonly simulatedWorkUs: number // microseconds of simulated work per call
  readonly iterations: number
  readonly description: string
}

export type Method = 'baseline' | 'session' | 'daemon'

export const METHOD_ORDER: readonly Method[] = ['baseline', 'session', 'daemon']

export interface RawTrialRecord {
  readonly scenario: string
  readonly method: Method
  readonly iterations: number
  readonly simulatedWorkUs: number
  readonly wallTimeS: number
  readonly userCpuS: number
  readonly systemCpuS: number
  readonly maxRssKb: number
  readonly avgTimePerCallNs: number
  readonly traceSizeMb?: number
  readonly tracerCpuPercent?: number
  readonly tracerMemoryKb?: number
  readonly eventsCaptured?: number
  readonly eventsDropped?: number
}

export interface AggregateRecord extends RawTrialRecord {
  readonly numRuns: number
  readonly avgTimeStddev: number
  readonly avgTimeMin: number
  readonly avgTimeMax: number
  readonly wallTimeStddev: number
  readonly confidence95Margin: number
}

export type ResultSet = AggregateRecord[]

export type OutputFormat = 'table' | 'json' | 'csv'

export type SuiteState = 'idle' | 'running' | 'aggregating' | 'persisted' | 'aborted'

export interface BenchConfig {
  buildDir: string
  outputDir: string
  runs: number
  methods: Method[]
  scenarios?: number[]
  shardId?: string
  timeBinary: string
  privilegePrefix: string[]
  warmupMs: number
  settleMs: number
  gracePeriodMs: number
  trialTimeoutMs: number
  verbose: boolean
}

export interface ResourceSample {
  residentMemoryKb: number
  cpuTicksUser: number
  cpuTicksSystem: number
}

export interface CommandResult {
  stdout: string
  stderr: string
  exitCode: number
}

export interface Logger {
  info(message: string, ...details: unknown[]): void
  warn(message: string, ...details: unknown[]): void
  error(message: string, ...details: unknown[]): void
  debug(message: string, ...details: unknown[]): void
}
