import { mkdir, readFile, writeFile } from 'fs/promises'
import { dirname } from 'path'
import { z } from 'zod'
import { ResultsFormatError } from './errors.js'
import type { AggregateRecord, Method, ResultSet } from './types.js'

export const RESULTS_FILE_NAME = 'results.json'

// The document names tracers after their tools, which is what report
// renderers and combiners key rows on
export const PERSISTED_METHOD_NAMES = {
  baseline: 'baseline',
  session: 'lttng',
  daemon: 'ebpf'
} as const satisfies Record<Method, string>

const METHOD_ALIASES = {
  baseline: 'baseline',
  session: 'session',
  daemon: 'daemon',
  lttng: 'session',
  ebpf: 'daemon'
} as const satisfies Record<string, Method>

const methodSchema = z
  .enum(['baseline', 'session', 'daemon', 'lttng', 'ebpf'])
  .transform((value): Method => METHOD_ALIASES[value])

const optionalNumber = z.number().nullish()

export const persistedRecordSchema = z.object({
  scenario: z.string(),
  method: methodSchema,
  iterations: z.number().int().positive(),
  simulated_work_us: z.number().nonnegative(),
  wall_time_s: z.number(),
  user_cpu_s: z.number(),
  system_cpu_s: z.number(),
  max_rss_kb: z.number(),
  avg_time_per_call_ns: z.number(),
  trace_size_mb: optionalNumber,
  tracer_cpu_percent: optionalNumber,
  tracer_memory_kb: optionalNumber,
  events_captured: optionalNumber,
  events_dropped: optionalNumber,
  num_runs: z.number().int().positive().default(1),
  avg_time_stddev: optionalNumber,
  avg_time_min: optionalNumber,
  avg_time_max: optionalNumber,
  wall_time_stddev: optionalNumber,
  confidence_95_margin: optionalNumber
})

export const persistedResultSetSchema = z.array(persistedRecordSchema)

export type PersistedRecord = z.input<typeof persistedRecordSchema>

function present(value: number | null | undefined): number | undefined {
  return value ?? undefined
}

function optionalField<K extends string>(
  key: K,
  value: number | undefined
): Partial<Record<K, number>> {
  const entry: Partial<Record<K, number>> = {}
  if (value !== undefined) {
    entry[key] = value
  }
  return entry
}

/** Unmeasured fields are left out of the document entirely. */
export function encodeRecord(record: AggregateRecord): PersistedRecord {
  return {
    scenario: record.scenario,
    method: PERSISTED_METHOD_NAMES[record.method],
    iterations: record.iterations,
    simulated_work_us: record.simulatedWorkUs,
    wall_time_s: record.wallTimeS,
    user_cpu_s: record.userCpuS,
    system_cpu_s: record.systemCpuS,
    max_rss_kb: record.maxRssKb,
    avg_time_per_call_ns: record.avgTimePerCallNs,
    ...optionalField('trace_size_mb', record.traceSizeMb),
    ...optionalField('tracer_cpu_percent', record.tracerCpuPercent),
    ...optionalField('tracer_memory_kb', record.tracerMemoryKb),
    ...optionalField('events_captured', record.eventsCaptured),
    ...optionalField('events_dropped', record.eventsDropped),
    num_runs: record.numRuns,
    avg_time_stddev: record.avgTimeStddev,
    avg_time_min: record.avgTimeMin,
    avg_time_max: record.avgTimeMax,
    wall_time_stddev: record.wallTimeStddev,
    confidence_95_margin: record.confidence95Margin
  }
}

export function decodeResultSet(data: unknown, source: string): ResultSet {
  const parsed = persistedResultSetSchema.safeParse(data)
  if (!parsed.success) {
    const issue = parsed.error.issues[0]
    const detail = issue ? `${issue.path.join('.') || '(root)'}: ${issue.message}` : 'invalid document'
    throw new ResultsFormatError(source, detail)
  }

  return parsed.data.map((record) => {
    const decoded: AggregateRecord = {
      scenario: record.scenario,
      method: record.method,
      iterations: record.iterations,
      simulatedWorkUs: record.simulated_work_us,
      wallTimeS: record.wall_time_s,
      userCpuS: record.user_cpu_s,
      systemCpuS: record.system_cpu_s,
      maxRssKb: record.max_rss_kb,
      avgTimePerCallNs: record.avg_time_per_call_ns,
      traceSizeMb: present(record.trace_size_mb),
      tracerCpuPercent: present(record.tracer_cpu_percent),
      tracerMemoryKb: present(record.tracer_memory_kb),
      eventsCaptured: present(record.events_captured),
      eventsDropped: present(record.events_dropped),
      numRuns: record.num_runs,
      // Single-run documents may carry no spread statistics at all
      avgTimeStddev: record.avg_time_stddev ?? 0,
      avgTimeMin: record.avg_time_min ?? record.avg_time_per_call_ns,
      avgTimeMax: record.avg_time_max ?? record.avg_time_per_call_ns,
      wallTimeStddev: record.wall_time_stddev ?? 0,
      confidence95Margin: record.confidence_95_margin ?? 0
    }
    return Object.freeze(decoded)
  })
}

export function serializeResultSet(results: ResultSet): string {
  return JSON.stringify(results.map(encodeRecord), null, 2)
}

export async function writeResultSet(path: string, results: ResultSet): Promise<void> {
  await mkdir(dirname(path), { recursive: true })
  await writeFile(path, serializeResultSet(results) + '\n', 'utf8')
}

export async function readResultSet(path: string): Promise<ResultSet> {
  const content = await readFile(path, 'utf8')
  let data: unknown
  try {
    data = JSON.parse(content)
  } catch (error) {
    throw new ResultsFormatError(path, error instanceof Error ? error.message : String(error))
  }
  return decodeResultSet(data, path)
}
