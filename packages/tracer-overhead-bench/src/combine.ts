import { readFile, readdir } from 'fs/promises'
import { join, resolve } from 'path'
import { errorMessage } from './errors.js'
import { consoleLogger } from './logger.js'
import { RESULTS_FILE_NAME, decodeResultSet } from './results-store.js'
import { expectedSimulatedWork } from './scenarios.js'
import { METHOD_ORDER } from './types.js'
import type { Logger, Method, ResultSet } from './types.js'

export const METHOD_RANK: Readonly<Record<Method, number>> = {
  baseline: 0,
  session: 1,
  daemon: 2
}

export interface ExpectedCoverage {
  simulatedWork: readonly number[]
  methods: readonly Method[]
}

export interface ValidationReport {
  scenarios: number[]
  methods: Method[]
  total: number
  warnings: string[]
}

const defaultCoverage: ExpectedCoverage = {
  simulatedWork: expectedSimulatedWork,
  methods: METHOD_ORDER
}

/** Records are additive: nothing is keyed or de-duplicated. */
export function combineResults(documents: readonly ResultSet[]): ResultSet {
  return documents.flat()
}

export function sortResults(results: ResultSet): ResultSet {
  return [...results].sort(
    (a, b) =>
      a.simulatedWorkUs - b.simulatedWorkUs ||
      METHOD_RANK[a.method] - METHOD_RANK[b.method]
  )
}

function sameMembers<T>(actual: readonly T[], expected: readonly T[]): boolean {
  const expectedSet = new Set(expected)
  return actual.length === expectedSet.size && actual.every((value) => expectedSet.has(value))
}

/**
 * Reports, without failing, whether the combined records cover exactly the
 * expected scenarios and methods.
 */
export function validateResults(
  results: ResultSet,
  expected: ExpectedCoverage = defaultCoverage
): ValidationReport {
  const scenarios = [...new Set(results.map((record) => record.simulatedWorkUs))].sort((a, b) => a - b)
  const methods = [...new Set(results.map((record) => record.method))].sort(
    (a, b) => METHOD_RANK[a] - METHOD_RANK[b]
  )
  const warnings: string[] = []

  if (results.length === 0) {
    warnings.push('No results to validate')
    return { scenarios, methods, total: 0, warnings }
  }

  if (!sameMembers(scenarios, expected.simulatedWork)) {
    warnings.push(
      `Expected scenarios {${[...expected.simulatedWork].join(', ')}}, got {${scenarios.join(', ')}}`
    )
  }
  if (!sameMembers(methods, expected.methods)) {
    warnings.push(`Expected methods {${expected.methods.join(', ')}}, got {${methods.join(', ')}}`)
  }

  return { scenarios, methods, total: results.length, warnings }
}

/**
 * Loads one results document. Unreadable or malformed documents are logged
 * and contribute no records.
 */
export async function loadResultsFile(path: string, logger: Logger = consoleLogger): Promise<ResultSet> {
  let data: unknown
  try {
    data = JSON.parse(await readFile(path, 'utf8'))
  } catch (error) {
    logger.error(`Failed to read ${path}: ${errorMessage(error)}`)
    return []
  }

  if (!Array.isArray(data)) {
    logger.warn(`${path} does not contain a list, skipping`)
    return []
  }

  try {
    return decodeResultSet(data, path)
  } catch (error) {
    logger.error(errorMessage(error))
    return []
  }
}

export async function findResultsFiles(dir: string): Promise<string[]> {
  const found: string[] = []
  const entries = await readdir(dir, { withFileTypes: true })
  for (const entry of entries) {
    const path = join(dir, entry.name)
    if (entry.isDirectory()) {
      found.push(...(await findResultsFiles(path)))
    } else if (entry.isFile() && entry.name === RESULTS_FILE_NAME) {
      found.push(path)
    }
  }
  return found
}

export async function combineResultFiles(
  paths: readonly string[],
  logger: Logger = consoleLogger
): Promise<ResultSet> {
  const unique = [...new Set(paths.map((path) => resolve(path)))].sort()
  const documents: ResultSet[] = []

  for (const path of unique) {
    logger.info(`📂 Loading: ${path}`)
    const results = await loadResultsFile(path, logger)
    if (results.length > 0) {
      logger.info(`   Added ${results.length} results`)
      documents.push(results)
    }
  }

  return combineResults(documents)
}
