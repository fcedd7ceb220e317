import { describe, expect, it } from "vitest"
import {
  formatDuration,
  formatMemory,
  outputFormatter,
  overheadPercent,
} from "../src/output-formatters.js"
import { makeRecord } from "./utils.js"

describe(`formatDuration`, () => {
  it(`picks a unit for the magnitude`, () => {
    expect(formatDuration(6.5)).toBe(`6.50 ns`)
    expect(formatDuration(1500)).toBe(`1.50 μs`)
    expect(formatDuration(2_500_000)).toBe(`2.50 ms`)
    expect(formatDuration(3_000_000_000)).toBe(`3.00 s`)
  })
})

describe(`formatMemory`, () => {
  it(`scales kilobytes`, () => {
    expect(formatMemory(512)).toBe(`512.00 KB`)
    expect(formatMemory(2048)).toBe(`2.00 MB`)
    expect(formatMemory(3 * 1024 * 1024)).toBe(`3.00 GB`)
  })
})

describe(`overheadPercent`, () => {
  it(`is relative to the baseline per-call time`, () => {
    expect(overheadPercent(makeRecord({ avgTimePerCallNs: 150 }), makeRecord({ avgTimePerCallNs: 100 }))).toBe(50)
  })

  it(`is undefined against a zero baseline`, () => {
    expect(overheadPercent(makeRecord(), makeRecord({ avgTimePerCallNs: 0 }))).toBeUndefined()
  })
})

describe(`OutputFormatter`, () => {
  const baseline = makeRecord({ avgTimePerCallNs: 100 })
  const session = makeRecord({ method: `session`, avgTimePerCallNs: 150, traceSizeMb: 12.5 })
  const daemon = makeRecord({
    method: `daemon`,
    avgTimePerCallNs: 90,
    tracerCpuPercent: 3.25,
    eventsCaptured: 1200,
  })

  it(`writes CSV with empty cells for unmeasured figures`, () => {
    const lines = outputFormatter.formatCSV([baseline, session]).split(`\n`)

    expect(lines[0]).toBe(
      `scenario,method,iterations,simulated_work_us,wall_time_s,user_cpu_s,system_cpu_s,max_rss_kb,avg_time_per_call_ns,trace_size_mb,tracer_cpu_percent,tracer_memory_kb,events_captured,events_dropped,num_runs,avg_time_stddev,avg_time_min,avg_time_max,wall_time_stddev,confidence_95_margin`
    )
    expect(lines[1]).toBe(`Empty Function,baseline,1000000,0,1.5,1.2,0.1,3456,100,,,,,,10,0.5,6,7,0.05,0.31`)
    expect(lines[2]).toBe(`Empty Function,lttng,1000000,0,1.5,1.2,0.1,3456,150,12.5,,,,,10,0.5,6,7,0.05,0.31`)
  })

  it(`quotes CSV cells that contain commas`, () => {
    const [, row] = outputFormatter.formatCSV([makeRecord({ scenario: `Heavy, slow` })]).split(`\n`)

    expect(row?.startsWith(`"Heavy, slow",baseline,`)).toBe(true)
  })

  it(`writes JSON in the persisted format`, () => {
    const parsed: unknown = JSON.parse(outputFormatter.formatJSON([daemon]))

    expect(parsed).toEqual([
      expect.objectContaining({
        method: `ebpf`,
        avg_time_per_call_ns: 90,
        tracer_cpu_percent: 3.25,
        events_captured: 1200,
      }),
    ])
  })

  it(`summarizes each tracer against the baseline`, () => {
    const lines = outputFormatter.formatSummary([daemon, session, baseline]).split(`\n`)

    expect(lines).toContain(`   Session tracer adds 50.00 ns per call (+50.0%)`)
    expect(lines).toContain(`   Daemon tracer saves 10.00 ns per call (-10.0%)`)
  })

  it(`says so when there is no baseline`, () => {
    expect(outputFormatter.formatSummary([session])).toContain(
      `No baseline results to compare against`
    )
  })

  it(`tabulates every method of a scenario`, () => {
    const table = outputFormatter.formatTable([baseline, session, daemon])

    expect(table).toContain(`Empty Function`)
    expect(table).toContain(`Session tracer`)
    expect(table).toContain(`Daemon tracer`)
    expect(table).toContain(`+50.0%`)
    expect(table).toContain(`12.50 MB`)
    expect(table).toContain(`3.3%`)
  })
})
