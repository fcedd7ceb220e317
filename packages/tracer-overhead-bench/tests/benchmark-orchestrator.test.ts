import { mkdir, readFile, writeFile } from "fs/promises"
import { join } from "path"
import { describe, expect, it, vi } from "vitest"
import {
  BenchmarkOrchestrator,
  verifyBuildArtifacts,
} from "../src/benchmark-orchestrator.js"
import { SuiteAbortedError, TrialFailedError } from "../src/errors.js"
import { silentLogger } from "../src/logger.js"
import { ResourceMonitor } from "../src/resource-monitor.js"
import { createTrialRunner } from "../src/trial-runner.js"
import {
  FakeBackgroundProcess,
  FakeProcessAdapter,
  FakeProcfs,
  createRecordingLogger,
  failed,
  ok,
  procStat,
  procStatus,
  steppingClock,
  testConfig,
  timingStderr,
  withTempDir,
  workloadStdout,
} from "./utils.js"
import type { TrialRunnerFactory } from "../src/benchmark-orchestrator.js"
import type { Method, RawTrialRecord, Scenario, SuiteState } from "../src/types.js"

const emptyFunction: Scenario = {
  name: `Empty Function`,
  simulatedWorkUs: 0,
  iterations: 1000,
  description: `Empty workload`,
}
const fiftyMicros: Scenario = {
  name: `50 μs Function`,
  simulatedWorkUs: 50,
  iterations: 500,
  description: `Medium workload`,
}

function rawRecord(scenario: Scenario, method: Method, avgTimePerCallNs: number): RawTrialRecord {
  return {
    scenario: scenario.name,
    method,
    iterations: scenario.iterations,
    simulatedWorkUs: scenario.simulatedWorkUs,
    wallTimeS: 1,
    userCpuS: 0.9,
    systemCpuS: 0.05,
    maxRssKb: 2000,
    avgTimePerCallNs,
  }
}

/** Runners whose trials are answered by `trial`, without any processes. */
function stubRunners(
  trial: (scenario: Scenario, method: Method, runIndex: number) => RawTrialRecord
): TrialRunnerFactory {
  return (method) => ({
    method,
    run: async (scenario, runIndex) => trial(scenario, method, runIndex),
  })
}

describe(`verifyBuildArtifacts`, () => {
  it(`accepts a build with every artifact the methods need`, async () => {
    await withTempDir(async (dir) => {
      await mkdir(join(dir, `bin`))
      await mkdir(join(dir, `lib`))
      await writeFile(join(dir, `bin`, `sample_app`), ``)
      await writeFile(join(dir, `lib`, `libmylib.so`), ``)

      await expect(verifyBuildArtifacts({ buildDir: dir, methods: [`baseline`] })).resolves.toBeUndefined()
    })
  })

  it(`requires the instrumented library for every method`, async () => {
    await withTempDir(async (dir) => {
      await mkdir(join(dir, `bin`))
      await writeFile(join(dir, `bin`, `sample_app`), ``)

      await expect(verifyBuildArtifacts({ buildDir: dir, methods: [`baseline`] })).rejects.toThrow(
        `Required file(s) not found: ${join(dir, `lib/libmylib.so`)}. Build the project first.`
      )
    })
  })

  it(`lists every missing artifact`, async () => {
    await withTempDir(async (dir) => {
      await mkdir(join(dir, `bin`))
      await writeFile(join(dir, `bin`, `sample_app`), ``)

      const check = verifyBuildArtifacts({ buildDir: dir, methods: [`baseline`, `daemon`] })

      await expect(check).rejects.toThrow(SuiteAbortedError)
      await expect(check).rejects.toThrow(
        `Required file(s) not found: ${join(dir, `lib/libmylib.so`)}, ${join(dir, `bin/mylib_tracer`)}. Build the project first.`
      )
    })
  })
})

describe(`BenchmarkOrchestrator`, () => {
  it(`runs every pair in scenario then method order`, async () => {
    await withTempDir(async (dir) => {
      const orchestrator = new BenchmarkOrchestrator({
        config: testConfig({ outputDir: dir, runs: 2, methods: [`baseline`, `daemon`] }),
        logger: silentLogger,
        scenarios: [emptyFunction, fiftyMicros],
        createRunner: stubRunners((scenario, method, runIndex) =>
          rawRecord(scenario, method, 10 + runIndex)
        ),
      })

      const results = await orchestrator.run()

      expect(results.map((record) => `${record.simulatedWorkUs}/${record.method}`)).toEqual([
        `0/baseline`,
        `0/daemon`,
        `50/baseline`,
        `50/daemon`,
      ])
      expect(results[0]?.numRuns).toBe(2)
      expect(results[0]?.avgTimePerCallNs).toBe(10.5)
      expect(orchestrator.state).toBe(`persisted`)
    })
  })

  it(`persists the results as snake_case JSON`, async () => {
    await withTempDir(async (dir) => {
      const orchestrator = new BenchmarkOrchestrator({
        config: testConfig({ outputDir: dir, runs: 1, methods: [`baseline`] }),
        logger: silentLogger,
        scenarios: [emptyFunction],
        createRunner: stubRunners((scenario, method) => rawRecord(scenario, method, 6.5)),
      })

      await orchestrator.run()

      expect(orchestrator.resultsPath).toBe(join(dir, `results.json`))
      const persisted: unknown = JSON.parse(await readFile(orchestrator.resultsPath, `utf8`))
      expect(persisted).toEqual([
        {
          scenario: `Empty Function`,
          method: `baseline`,
          iterations: 1000,
          simulated_work_us: 0,
          wall_time_s: 1,
          user_cpu_s: 0.9,
          system_cpu_s: 0.05,
          max_rss_kb: 2000,
          avg_time_per_call_ns: 6.5,
          num_runs: 1,
          avg_time_stddev: 0,
          avg_time_min: 6.5,
          avg_time_max: 6.5,
          wall_time_stddev: 0,
          confidence_95_margin: 0,
        },
      ])
    })
  })

  it(`moves through its states and announces each pair`, async () => {
    await withTempDir(async (dir) => {
      const orchestrator = new BenchmarkOrchestrator({
        config: testConfig({ outputDir: dir, runs: 1, methods: [`baseline`] }),
        logger: silentLogger,
        scenarios: [emptyFunction],
        createRunner: stubRunners((scenario, method) => rawRecord(scenario, method, 1)),
      })
      const states: Array<SuiteState> = []
      const completed = vi.fn()
      const persisted = vi.fn()
      orchestrator.events.on(`state`, ({ state }) => states.push(state))
      orchestrator.events.on(`pair:complete`, completed)
      orchestrator.events.on(`suite:persisted`, persisted)

      await orchestrator.run()

      expect(states).toEqual([`running`, `aggregating`, `persisted`])
      expect(completed).toHaveBeenCalledTimes(1)
      expect(persisted).toHaveBeenCalledWith(
        expect.objectContaining({ path: join(dir, `results.json`) })
      )
    })
  })

  it(`excludes failed trials from the aggregate`, async () => {
    await withTempDir(async (dir) => {
      const logger = createRecordingLogger()
      const orchestrator = new BenchmarkOrchestrator({
        config: testConfig({ outputDir: dir, runs: 3, methods: [`baseline`] }),
        logger,
        scenarios: [emptyFunction],
        createRunner: stubRunners((scenario, method, runIndex) => {
          if (runIndex === 1) throw new TrialFailedError(`Workload exited with status 1`)
          return rawRecord(scenario, method, runIndex === 0 ? 10 : 30)
        }),
      })

      const [record] = await orchestrator.run()

      expect(record?.numRuns).toBe(2)
      expect(record?.avgTimePerCallNs).toBe(20)
      expect(logger.messages(`warn`)).toEqual([
        `Run 2 failed, excluding it: Workload exited with status 1`,
      ])
      expect(logger.messages(`info`)).toContain(`    Completed 2/3 runs (1 failed)`)
    })
  })

  it(`skips a pair whose trials all fail and carries on`, async () => {
    await withTempDir(async (dir) => {
      const logger = createRecordingLogger()
      const skipped = vi.fn()
      const orchestrator = new BenchmarkOrchestrator({
        config: testConfig({ outputDir: dir, runs: 2, methods: [`baseline`, `daemon`] }),
        logger,
        scenarios: [emptyFunction],
        createRunner: stubRunners((scenario, method) => {
          if (method === `baseline`) throw new TrialFailedError(`boom`)
          return rawRecord(scenario, method, 8)
        }),
      })
      orchestrator.events.on(`pair:skipped`, skipped)

      const results = await orchestrator.run()

      expect(results.map((record) => record.method)).toEqual([`daemon`])
      expect(skipped).toHaveBeenCalledTimes(1)
      expect(logger.messages(`error`)).toEqual([
        `Skipping BASELINE for Empty Function: All 2 runs failed`,
      ])
    })
  })

  it(`persists what it has when interrupted`, async () => {
    await withTempDir(async (dir) => {
      const controller = new AbortController()
      const orchestrator = new BenchmarkOrchestrator({
        config: testConfig({ outputDir: dir, runs: 5, methods: [`baseline`, `daemon`] }),
        logger: silentLogger,
        scenarios: [emptyFunction, fiftyMicros],
        signal: controller.signal,
        createRunner: stubRunners((scenario, method, runIndex) => {
          if (runIndex === 1) controller.abort()
          return rawRecord(scenario, method, 12)
        }),
      })

      const error = await orchestrator.run().then(
        () => undefined,
        (reason: unknown) => reason
      )

      expect(error).toBeInstanceOf(SuiteAbortedError)
      if (!(error instanceof SuiteAbortedError)) return
      expect(error.reason).toBe(`interrupted`)
      expect(error.results).toHaveLength(1)
      expect(error.results[0]?.numRuns).toBe(2)
      expect(orchestrator.state).toBe(`aborted`)

      const persisted: unknown = JSON.parse(await readFile(join(dir, `results.json`), `utf8`))
      expect(persisted).toHaveLength(1)
    })
  })

  it(`persists what it has when a listener fails`, async () => {
    await withTempDir(async (dir) => {
      const orchestrator = new BenchmarkOrchestrator({
        config: testConfig({ outputDir: dir, runs: 1, methods: [`baseline`, `daemon`] }),
        logger: silentLogger,
        scenarios: [emptyFunction],
        createRunner: stubRunners((scenario, method) => rawRecord(scenario, method, 4)),
      })
      orchestrator.events.on(`pair:complete`, () => {
        throw new Error(`listener broke`)
      })

      await expect(orchestrator.run()).rejects.toThrow(`listener broke`)

      expect(orchestrator.state).toBe(`aborted`)
      const persisted: unknown = JSON.parse(await readFile(join(dir, `results.json`), `utf8`))
      expect(persisted).toEqual([expect.objectContaining({ method: `baseline`, avg_time_per_call_ns: 4 })])
    })
  })

  it(`cannot be run twice`, async () => {
    await withTempDir(async (dir) => {
      const orchestrator = new BenchmarkOrchestrator({
        config: testConfig({ outputDir: dir, runs: 1, methods: [`baseline`] }),
        logger: silentLogger,
        scenarios: [emptyFunction],
        createRunner: stubRunners((scenario, method) => rawRecord(scenario, method, 1)),
      })

      await orchestrator.run()

      await expect(orchestrator.run()).rejects.toThrow(`Suite has already been run (state: persisted)`)
    })
  })

  it(`aborts setup when the output directory cannot be created`, async () => {
    await withTempDir(async (dir) => {
      await writeFile(join(dir, `occupied`), ``)
      const orchestrator = new BenchmarkOrchestrator({
        config: testConfig({ outputDir: join(dir, `occupied`, `results`), runs: 1 }),
        logger: silentLogger,
        scenarios: [emptyFunction],
        createRunner: stubRunners((scenario, method) => rawRecord(scenario, method, 1)),
      })

      const run = orchestrator.run()

      await expect(run).rejects.toThrow(SuiteAbortedError)
      await expect(run).rejects.toThrow(`Could not create output directory`)
    })
  })

  it(`averages tracer figures over the trials that could sample the tracer`, async () => {
    await withTempDir(async (dir) => {
      const logger = createRecordingLogger()
      let lookups = 0
      let workloads = 0
      const processes = new FakeProcessAdapter(
        async (call) => {
          if (call.command === `pgrep`) {
            lookups++
            return lookups === 2 ? failed(1) : ok(`4242\n`)
          }
          if (call.command === `getconf`) return ok(`100\n`)
          if (call.command !== `/usr/bin/time`) return undefined

          const runIndex = workloads++
          await writeFile(join(dir, `ebpf_0us_r${runIndex}.txt`), `a\nb\nc\n`)
          return ok(
            workloadStdout([100, 110, 120][runIndex] ?? 0),
            timingStderr(`1.00`, `0.50`, `0.25`, `3000`)
          )
        },
        () => new FakeBackgroundProcess(9000, [`SIGINT`], `Wrote 3 events (1 dropped)\n`)
      )
      const procfs = new FakeProcfs((path, readIndex) => {
        if (path === `/proc/4242/status`) return procStatus(20000 + 1000 * readIndex)
        if (path === `/proc/4242/stat`) {
          return readIndex % 2 === 0 ? procStat(4242, 100, 50) : procStat(4242, 150, 100)
        }
        return undefined
      })
      const monitor = new ResourceMonitor(processes, procfs, logger)
      const clock = steppingClock(2000)

      const orchestrator = new BenchmarkOrchestrator({
        config: testConfig({ outputDir: dir, runs: 3, methods: [`daemon`] }),
        processes,
        logger,
        scenarios: [emptyFunction],
        createRunner: (method, deps) => createTrialRunner(method, { ...deps, monitor, clock }),
      })

      const [record] = await orchestrator.run()

      expect(record).toEqual({
        scenario: `Empty Function`,
        method: `daemon`,
        iterations: 1000,
        simulatedWorkUs: 0,
        wallTimeS: 1,
        userCpuS: 0.5,
        systemCpuS: 0.25,
        maxRssKb: 3000,
        avgTimePerCallNs: 110,
        traceSizeMb: 6 / (1024 * 1024),
        tracerCpuPercent: 50,
        tracerMemoryKb: 22000,
        eventsCaptured: 3,
        eventsDropped: 1,
        numRuns: 3,
        avgTimeStddev: 10,
        avgTimeMin: 100,
        avgTimeMax: 120,
        wallTimeStddev: 0,
        confidence95Margin: (1.96 * 10) / Math.sqrt(3),
      })
      expect(logger.messages(`warn`)).toEqual([
        `Tracer process lookup failed, skipping resource sampling: No running process matches "mylib_tracer"`,
      ])
    })
  })
})
