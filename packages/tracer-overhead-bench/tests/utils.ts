import { mkdtemp, rm } from "fs/promises"
import { tmpdir } from "os"
import { join } from "path"
import { resolveConfig } from "../src/config.js"
import type {
  BackgroundProcess,
  ExecuteOptions,
  ProcessAdapter,
  ProcessExit,
} from "../src/process-adapter.js"
import type { ProcfsReader } from "../src/resource-monitor.js"
import type { Clock } from "../src/timing.js"
import type {
  AggregateRecord,
  BenchConfig,
  CommandResult,
  Logger,
} from "../src/types.js"

export interface RecordedCall {
  kind: `execute` | `control` | `launch`
  command: string
  args: Array<string>
  options?: ExecuteOptions
}

type Responder = (
  call: RecordedCall
) => CommandResult | undefined | Promise<CommandResult | undefined>

export function ok(stdout = ``, stderr = ``): CommandResult {
  return { stdout, stderr, exitCode: 0 }
}

export function failed(exitCode = 1, stderr = ``): CommandResult {
  return { stdout: ``, stderr, exitCode }
}

/**
 * A launched process that exits once it receives one of `exitsOn`.
 */
export class FakeBackgroundProcess implements BackgroundProcess {
  readonly signals: Array<NodeJS.Signals> = []
  readonly exited: Promise<ProcessExit>
  private resolveExit: (exit: ProcessExit) => void = () => {}

  constructor(
    readonly pid: number | undefined,
    private readonly exitsOn: ReadonlyArray<NodeJS.Signals> = [`SIGINT`],
    private readonly exitStdout = ``,
    private readonly exitStderr = ``
  ) {
    this.exited = new Promise((resolve) => {
      this.resolveExit = resolve
    })
  }

  kill(signal: NodeJS.Signals): boolean {
    this.signals.push(signal)
    if (this.exitsOn.includes(signal)) {
      this.exitWith(signal)
    }
    return true
  }

  exitWith(signal?: string, exitCode = 0): void {
    this.resolveExit({
      exitCode: signal === `SIGKILL` ? undefined : exitCode,
      signal,
      stdout: this.exitStdout,
      stderr: this.exitStderr,
    })
  }
}

/**
 * Records every command and answers `execute` calls through `respond`.
 * Unanswered calls succeed with empty output.
 */
export class FakeProcessAdapter implements ProcessAdapter {
  readonly calls: Array<RecordedCall> = []
  readonly launched: Array<FakeBackgroundProcess> = []

  constructor(
    private readonly respond: Responder = () => undefined,
    private readonly spawn: () => FakeBackgroundProcess = () =>
      new FakeBackgroundProcess(9000)
  ) {}

  async execute(
    command: string,
    args: ReadonlyArray<string>,
    options?: ExecuteOptions
  ): Promise<CommandResult> {
    const call: RecordedCall = { kind: `execute`, command, args: [...args], options }
    this.calls.push(call)
    return (await this.respond(call)) ?? ok()
  }

  async runControl(command: string, args: ReadonlyArray<string>): Promise<void> {
    this.calls.push({ kind: `control`, command, args: [...args] })
  }

  launch(command: string, args: ReadonlyArray<string>): BackgroundProcess {
    this.calls.push({ kind: `launch`, command, args: [...args] })
    const child = this.spawn()
    this.launched.push(child)
    return child
  }

  commandLines(): Array<string> {
    return this.calls.map((call) => `${call.kind}: ${[call.command, ...call.args].join(` `)}`)
  }
}

export class FakeProcfs implements ProcfsReader {
  readonly reads: Array<string> = []

  constructor(private readonly answer: (path: string, readIndex: number) => string | undefined) {}

  async read(path: string): Promise<string> {
    const readIndex = this.reads.filter((read) => read === path).length
    this.reads.push(path)
    const content = this.answer(path, readIndex)
    if (content === undefined) {
      throw new Error(`ENOENT: no such file or directory, open '${path}'`)
    }
    return content
  }
}

export function procStat(pid: number, utime: number, stime: number): string {
  return `${pid} (mylib_tracer) S 1 ${pid} ${pid} 0 -1 4194560 100 0 0 0 ${utime} ${stime} 0 0 20 0 1 0 12345 1000000 500`
}

export function procStatus(rssKb: number): string {
  return `Name:\tmylib_tracer\nState:\tS (sleeping)\nVmPeak:\t   90000 kB\nVmRSS:\t   ${rssKb} kB\nThreads:\t2\n`
}

/** Advances by `stepMs` on every read. */
export function steppingClock(stepMs: number): Clock {
  let now = 0
  return {
    now: () => {
      const value = now
      now += stepMs
      return value
    },
  }
}

export interface LogEntry {
  level: keyof Logger
  message: string
}

export function createRecordingLogger(): Logger & {
  entries: Array<LogEntry>
  messages: (level: keyof Logger) => Array<string>
} {
  const entries: Array<LogEntry> = []
  const record = (level: keyof Logger) => (message: string) => {
    entries.push({ level, message })
  }
  return {
    entries,
    messages: (level) =>
      entries.filter((entry) => entry.level === level).map((entry) => entry.message),
    info: record(`info`),
    warn: record(`warn`),
    error: record(`error`),
    debug: record(`debug`),
  }
}

export function workloadStdout(avgNs: number): string {
  return `Running 1000 iterations\nTotal time: 1.00 s\nAverage time per call: ${avgNs} ns\n`
}

export function timingStderr(
  wall: string,
  user: string,
  sys: string,
  maxRss: string
): string {
  return `wall_time=${wall} user_time=${user} sys_time=${sys} max_rss=${maxRss}\n`
}

export function testConfig(overrides: Partial<BenchConfig> = {}): BenchConfig {
  return {
    ...resolveConfig(
      {
        buildDir: `/opt/build`,
        outputDir: `/tmp/bench-out`,
        runs: 3,
        privilegePrefix: [],
        warmupMs: 0,
        settleMs: 0,
        gracePeriodMs: 20,
      },
      {}
    ),
    ...overrides,
  }
}

export function makeRecord(overrides: Partial<AggregateRecord> = {}): AggregateRecord {
  return {
    scenario: `Empty Function`,
    method: `baseline`,
    iterations: 1_000_000,
    simulatedWorkUs: 0,
    wallTimeS: 1.5,
    userCpuS: 1.2,
    systemCpuS: 0.1,
    maxRssKb: 3456,
    avgTimePerCallNs: 6.5,
    numRuns: 10,
    avgTimeStddev: 0.5,
    avgTimeMin: 6,
    avgTimeMax: 7,
    wallTimeStddev: 0.05,
    confidence95Margin: 0.31,
    ...overrides,
  }
}

export async function withTempDir<T>(fn: (dir: string) => Promise<T>): Promise<T> {
  const dir = await mkdtemp(join(tmpdir(), `tracer-bench-`))
  try {
    return await fn(dir)
  } finally {
    await rm(dir, { recursive: true, force: true })
  }
}
