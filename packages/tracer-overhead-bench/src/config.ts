import { z } from 'zod'
import { ConfigError } from './errors.js'
import { METHOD_ORDER } from './types.js'
import type { BenchConfig } from './types.js'

export const DEFAULT_RUNS = 10
export const RUNS_WARNING_THRESHOLD = 200

const methodSchema = z.enum(['baseline', 'session', 'daemon'])

export const benchConfigSchema = z.object({
  buildDir: z.string().min(1, 'Build directory is required'),
  outputDir: z.string().min(1, 'Output directory is required'),
  runs: z.coerce.number().int().min(1, 'Number of runs must be at least 1'),
  methods: z
    .array(methodSchema)
    .min(1, 'At least one method must be selected')
    // Methods always run in the fixed order, whatever order they were given in
    .transform((methods) => METHOD_ORDER.filter((method) => methods.includes(method)))
    .default([...METHOD_ORDER]),
  scenarios: z.array(z.coerce.number().int().nonnegative()).optional(),
  shardId: z
    .string()
    .regex(/^[A-Za-z0-9_-]+$/, 'Shard id may only contain letters, digits, "_" and "-"')
    .optional(),
  timeBinary: z.string().min(1).default('/usr/bin/time'),
  privilegePrefix: z.array(z.string().min(1)).default(['sudo']),
  warmupMs: z.coerce.number().int().nonnegative().default(2000),
  settleMs: z.coerce.number().int().nonnegative().default(1000),
  gracePeriodMs: z.coerce.number().int().positive().default(5000),
  trialTimeoutMs: z.coerce.number().int().positive().default(300_000),
  verbose: z.boolean().default(false)
})

export type BenchConfigInput = Omit<z.input<typeof benchConfigSchema>, 'runs' | 'outputDir'> & {
  runs?: number | string
  outputDir?: string
}

/** Timestamped directory name for a run, e.g. benchmark_results_20250101_120000 */
export function defaultOutputDir(date: Date): string {
  const pad = (value: number) => String(value).padStart(2, '0')
  const day = `${date.getFullYear()}${pad(date.getMonth() + 1)}${pad(date.getDate())}`
  const time = `${pad(date.getHours())}${pad(date.getMinutes())}${pad(date.getSeconds())}`
  return `benchmark_results_${day}_${time}`
}

/**
 * Validates suite configuration. `runs` and `outputDir` fall back to
 * TRACER_BENCH_RUNS and TRACER_BENCH_OUTPUT_DIR.
 */
export function resolveConfig(
  input: BenchConfigInput,
  env: NodeJS.ProcessEnv = process.env
): BenchConfig {
  const parsed = benchConfigSchema.safeParse({
    ...input,
    runs: input.runs ?? env.TRACER_BENCH_RUNS ?? DEFAULT_RUNS,
    outputDir: input.outputDir ?? env.TRACER_BENCH_OUTPUT_DIR ?? ''
  })

  if (!parsed.success) {
    throw new ConfigError(
      parsed.error.issues.map((issue) =>
        issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message
      )
    )
  }
  return parsed.data
}

/** Splits a comma-separated CLI value, dropping empty items. */
export function parseList(value: string): string[] {
  return value
    .split(',')
    .map((item) => item.trim())
    .filter((item) => item.length > 0)
}
