import { AggregationMismatchError, EmptyInputError } from './errors.js'
import type { AggregateRecord, RawTrialRecord } from './types.js'

const Z_95 = 1.96

type OptionalField = 'traceSizeMb' | 'tracerCpuPercent' | 'tracerMemoryKb' | 'eventsCaptured' | 'eventsDropped'

// Counts and kB figures stay whole numbers after averaging
const INTEGER_FIELDS: ReadonlySet<OptionalField> = new Set<OptionalField>([
  'tracerMemoryKb',
  'eventsCaptured',
  'eventsDropped'
])

const OPTIONAL_FIELDS: readonly OptionalField[] = [
  'traceSizeMb',
  'tracerCpuPercent',
  'tracerMemoryKb',
  'eventsCaptured',
  'eventsDropped'
]

export interface SampleStats {
  mean: number
  stddev: number
  min: number
  max: number
}

// Summing in sorted order makes every reduction independent of input order
function sortedSum(values: readonly number[]): number {
  return [...values].sort((a, b) => a - b).reduce((total, value) => total + value, 0)
}

export function mean(values: readonly number[]): number {
  if (values.length === 0) {
    return 0
  }
  return sortedSum(values) / values.length
}

/**
 * Mean, sample standard deviation (N - 1 denominator), min and max.
 * A single sample, or any set of identical samples, has zero spread.
 */
export function sampleStats(values: readonly number[]): SampleStats {
  if (values.length === 0) {
    throw new EmptyInputError()
  }

  const min = Math.min(...values)
  const max = Math.max(...values)
  if (min === max) {
    return { mean: min, stddev: 0, min, max }
  }

  const avg = mean(values)
  const squaredDeviations = values.map((value) => (value - avg) ** 2)
  const stddev = Math.sqrt(sortedSum(squaredDeviations) / (values.length - 1))

  return { mean: avg, stddev, min, max }
}

/** Half-width of the 95% confidence interval around a sample mean. */
export function confidenceMargin95(stddev: number, count: number): number {
  if (count <= 1) {
    return 0
  }
  return (Z_95 * stddev) / Math.sqrt(count)
}

function averagePresent(records: readonly RawTrialRecord[], field: OptionalField): number | undefined {
  const values: number[] = []
  for (const record of records) {
    const value = record[field]
    if (value !== undefined) {
      values.push(value)
    }
  }

  if (values.length === 0) {
    return undefined
  }
  const avg = mean(values)
  return INTEGER_FIELDS.has(field) ? Math.trunc(avg) : avg
}

/**
 * Reduces the trials of one (scenario, method) pair into a single summary.
 *
 * Optional tracer figures are averaged over the trials that measured them;
 * a figure no trial measured stays absent rather than becoming 0.
 */
export function aggregate(records: readonly RawTrialRecord[]): AggregateRecord {
  const [first] = records
  if (!first) {
    throw new EmptyInputError()
  }

  for (const record of records) {
    if (record.scenario !== first.scenario || record.method !== first.method) {
      throw new AggregationMismatchError(
        { scenario: first.scenario, method: first.method },
        { scenario: record.scenario, method: record.method }
      )
    }
  }

  const perCall = sampleStats(records.map((record) => record.avgTimePerCallNs))
  const wall = sampleStats(records.map((record) => record.wallTimeS))

  const optional: { -readonly [K in OptionalField]?: number } = {}
  for (const field of OPTIONAL_FIELDS) {
    const value = averagePresent(records, field)
    if (value !== undefined) {
      optional[field] = value
    }
  }

  return Object.freeze({
    scenario: first.scenario,
    method: first.method,
    iterations: first.iterations,
    simulatedWorkUs: first.simulatedWorkUs,
    wallTimeS: wall.mean,
    userCpuS: mean(records.map((record) => record.userCpuS)),
    systemCpuS: mean(records.map((record) => record.systemCpuS)),
    maxRssKb: Math.trunc(mean(records.map((record) => record.maxRssKb))),
    avgTimePerCallNs: perCall.mean,
    ...optional,
    numRuns: records.length,
    avgTimeStddev: perCall.stddev,
    avgTimeMin: perCall.min,
    avgTimeMax: perCall.max,
    wallTimeStddev: wall.stddev,
    confidence95Margin: confidenceMargin95(perCall.stddev, records.length)
  })
}
