import type { Method, ResultSet } from './types.js'

export type TracerBenchErrorCode =
  | 'TIMEOUT_EXCEEDED'
  | 'PROCESS_LOOKUP_FAILED'
  | 'TRIAL_FAILED'
  | 'EMPTY_INPUT'
  | 'AGGREGATION_MISMATCH'
  | 'SUITE_ABORTED'
  | 'RESULTS_FORMAT'
  | 'INVALID_CONFIG'

export abstract class TracerBenchError extends Error {
  abstract readonly code: TracerBenchErrorCode

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options)
    this.name = new.target.name
  }
}

/**
 * An external command ran past its allotted time. The trial it belonged to is
 * abandoned; whoever called the adapter decides how far that reaches.
 */
export class TimeoutExceededError extends TracerBenchError {
  readonly code = 'TIMEOUT_EXCEEDED'

  constructor(
    readonly command: string,
    readonly timeoutMs: number,
    options?: { cause?: unknown }
  ) {
    super(`Command timed out after ${timeoutMs}ms: ${command}`, options)
  }
}

export class ProcessLookupFailedError extends TracerBenchError {
  readonly code = 'PROCESS_LOOKUP_FAILED'

  constructor(readonly pattern: string, options?: { cause?: unknown }) {
    super(`No running process matches "${pattern}"`, options)
  }
}

export class TrialFailedError extends TracerBenchError {
  readonly code = 'TRIAL_FAILED'

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options)
  }
}

export class EmptyInputError extends TracerBenchError {
  readonly code = 'EMPTY_INPUT'

  constructor() {
    super('No trial records to aggregate')
  }
}

export class AggregationMismatchError extends TracerBenchError {
  readonly code = 'AGGREGATION_MISMATCH'

  constructor(
    readonly expected: { scenario: string, method: Method },
    readonly found: { scenario: string, method: Method }
  ) {
    super(
      `Cannot aggregate ${found.scenario}/${found.method} together with ${expected.scenario}/${expected.method}`
    )
  }
}

export type SuiteAbortReason = 'interrupted' | 'setup'

/**
 * The suite stopped before finishing every pair. `results` holds whatever was
 * aggregated (and persisted) up to that point.
 */
export class SuiteAbortedError extends TracerBenchError {
  readonly code = 'SUITE_ABORTED'

  constructor(
    readonly reason: SuiteAbortReason,
    message: string,
    readonly results: ResultSet = [],
    options?: { cause?: unknown }
  ) {
    super(message, options)
  }
}

export class ResultsFormatError extends TracerBenchError {
  readonly code = 'RESULTS_FORMAT'

  constructor(readonly source: string, detail: string) {
    super(`Invalid results document ${source}: ${detail}`)
  }
}

export class ConfigError extends TracerBenchError {
  readonly code = 'INVALID_CONFIG'

  constructor(readonly issues: string[]) {
    super(`Invalid configuration:\n${issues.map((issue) => `  - ${issue}`).join('\n')}`)
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error)
}
