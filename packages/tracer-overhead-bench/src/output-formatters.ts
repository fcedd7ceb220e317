import Table from 'cli-table3'
import chalk from 'chalk'
import { sortResults } from './combine.js'
import { encodeRecord, serializeResultSet } from './results-store.js'
import type { AggregateRecord, Method, ResultSet } from './types.js'

const CSV_COLUMNS = [
  'scenario',
  'method',
  'iterations',
  'simulated_work_us',
  'wall_time_s',
  'user_cpu_s',
  'system_cpu_s',
  'max_rss_kb',
  'avg_time_per_call_ns',
  'trace_size_mb',
  'tracer_cpu_percent',
  'tracer_memory_kb',
  'events_captured',
  'events_dropped',
  'num_runs',
  'avg_time_stddev',
  'avg_time_min',
  'avg_time_max',
  'wall_time_stddev',
  'confidence_95_margin'
] as const

const METHOD_NAMES: Record<Method, string> = {
  baseline: 'Baseline',
  session: 'Session tracer',
  daemon: 'Daemon tracer'
}

export function formatDuration(ns: number): string {
  if (ns < 1_000) {
    return `${ns.toFixed(2)} ns`
  } else if (ns < 1_000_000) {
    return `${(ns / 1_000).toFixed(2)} μs`
  } else if (ns < 1_000_000_000) {
    return `${(ns / 1_000_000).toFixed(2)} ms`
  }
  return `${(ns / 1_000_000_000).toFixed(2)} s`
}

export function formatMemory(kb: number): string {
  const units = ['KB', 'MB', 'GB']
  let value = kb
  let unitIndex = 0

  while (value >= 1024 && unitIndex < units.length - 1) {
    value /= 1024
    unitIndex++
  }

  return `${value.toFixed(2)} ${units[unitIndex]}`
}

/**
 * Per-call overhead of `record` relative to the baseline, as a percentage.
 * Undefined when the baseline has no per-call time to compare against.
 */
export function overheadPercent(record: AggregateRecord, baseline: AggregateRecord): number | undefined {
  if (baseline.avgTimePerCallNs <= 0) {
    return undefined
  }
  return ((record.avgTimePerCallNs - baseline.avgTimePerCallNs) / baseline.avgTimePerCallNs) * 100
}

function groupBySimulatedWork(results: ResultSet): Map<number, AggregateRecord[]> {
  const grouped = new Map<number, AggregateRecord[]>()
  for (const record of sortResults(results)) {
    const group = grouped.get(record.simulatedWorkUs) ?? []
    group.push(record)
    grouped.set(record.simulatedWorkUs, group)
  }
  return grouped
}

export class OutputFormatter {
  formatTable(results: ResultSet): string {
    const output: string[] = []

    output.push(chalk.bold.blue('🔥 Tracer Overhead Benchmark Results'))
    output.push('')

    for (const [, records] of groupBySimulatedWork(results)) {
      const [first] = records
      if (!first) continue

      output.push(chalk.bold.yellow(`📊 ${first.scenario}`))
      output.push(chalk.gray(`Iterations: ${first.iterations.toLocaleString()}, Simulated work: ${first.simulatedWorkUs} μs`))

      const table = new Table({
        head: [
          chalk.bold('Method'),
          chalk.bold('Time/Call'),
          chalk.bold('±95% CI'),
          chalk.bold('Overhead'),
          chalk.bold('Wall Time'),
          chalk.bold('Max RSS'),
          chalk.bold('Trace Size'),
          chalk.bold('Tracer CPU'),
          chalk.bold('Tracer Mem'),
          chalk.bold('Events'),
          chalk.bold('Runs')
        ]
      })

      const baseline = records.find((record) => record.method === 'baseline')
      for (const record of records) {
        table.push([
          this.formatMethodName(record.method),
          formatDuration(record.avgTimePerCallNs),
          formatDuration(record.confidence95Margin),
          this.formatOverhead(record, baseline),
          `${record.wallTimeS.toFixed(2)} s`,
          formatMemory(record.maxRssKb),
          record.traceSizeMb === undefined ? '-' : `${record.traceSizeMb.toFixed(2)} MB`,
          record.tracerCpuPercent === undefined ? '-' : `${record.tracerCpuPercent.toFixed(1)}%`,
          record.tracerMemoryKb === undefined ? '-' : formatMemory(record.tracerMemoryKb),
          record.eventsCaptured === undefined ? '-' : record.eventsCaptured.toLocaleString(),
          record.numRuns.toString()
        ])
      }

      output.push(table.toString())
      output.push('')
    }

    return output.join('\n')
  }

  formatJSON(results: ResultSet): string {
    return serializeResultSet(results)
  }

  formatCSV(results: ResultSet): string {
    const rows = results.map((record) => {
      const encoded: Record<string, unknown> = encodeRecord(record)
      return CSV_COLUMNS.map((column) => {
        const value = encoded[column]
        if (value === undefined || value === null) {
          return ''
        }
        const text = String(value)
        return /[",\n]/.test(text) ? `"${text.replace(/"/g, '""')}"` : text
      })
    })

    return [CSV_COLUMNS.join(','), ...rows.map((row) => row.join(','))].join('\n')
  }

  formatSummary(results: ResultSet): string {
    const output: string[] = []

    output.push(chalk.bold.blue('📈 Overhead Summary'))
    output.push('')

    for (const [, records] of groupBySimulatedWork(results)) {
      const baseline = records.find((record) => record.method === 'baseline')
      const [first] = records
      if (!baseline || !first) continue

      const comparisons: string[] = []
      for (const record of records) {
        if (record.method === 'baseline') continue

        const added = record.avgTimePerCallNs - baseline.avgTimePerCallNs
        const percent = overheadPercent(record, baseline)
        const percentText = percent === undefined ? '' : ` (${percent >= 0 ? '+' : ''}${percent.toFixed(1)}%)`
        comparisons.push(
          `   ${METHOD_NAMES[record.method]} ${added >= 0 ? 'adds' : 'saves'} ${formatDuration(Math.abs(added))} per call${percentText}`
        )
      }

      if (comparisons.length > 0) {
        output.push(chalk.yellow(`${first.scenario}:`))
        output.push(...comparisons)
        output.push('')
      }
    }

    if (output.length === 2) {
      output.push(chalk.gray('No baseline results to compare against'))
    }

    return output.join('\n')
  }

  private formatMethodName(method: Method): string {
    const colorMap: Record<Method, string> = {
      baseline: chalk.bold.green(METHOD_NAMES.baseline),
      session: chalk.bold.cyan(METHOD_NAMES.session),
      daemon: chalk.bold.magenta(METHOD_NAMES.daemon)
    }
    return colorMap[method]
  }

  private formatOverhead(record: AggregateRecord, baseline: AggregateRecord | undefined): string {
    if (!baseline || record.method === 'baseline') {
      return '-'
    }

    const percent = overheadPercent(record, baseline)
    if (percent === undefined) {
      return chalk.gray('n/a')
    }

    const formatted = `${percent >= 0 ? '+' : ''}${percent.toFixed(1)}%`
    if (percent < 10) {
      return chalk.green(formatted)
    } else if (percent < 50) {
      return chalk.yellow(formatted)
    }
    return chalk.red(formatted)
  }
}

export const outputFormatter = new OutputFormatter()
