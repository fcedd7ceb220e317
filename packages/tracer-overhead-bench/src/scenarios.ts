import type { Scenario } from './types.js'

// From an empty function up to typical GPU runtime API call durations
export const defaultScenarios: readonly Scenario[] = Object.freeze([
  {
    name: 'Empty Function',
    simulatedWorkUs: 0,
    iterations: 1_000_000,
    description: 'Worst case: ~6ns function (just arithmetic)'
  },
  {
    name: '5 μs Function',
    simulatedWorkUs: 5,
    iterations: 100_000,
    description: 'Ultra-fast API: ~5μs (comparable to uprobe overhead)'
  },
  {
    name: '50 μs Function',
    simulatedWorkUs: 50,
    iterations: 50_000,
    description: 'Fast API: ~50μs (e.g., device queries)'
  },
  {
    name: '100 μs Function',
    simulatedWorkUs: 100,
    iterations: 10_000,
    description: 'Typical API: ~100μs (e.g., small allocations and copies)'
  },
  {
    name: '500 μs Function',
    simulatedWorkUs: 500,
    iterations: 5_000,
    description: 'Medium API: ~500μs (e.g., medium copies, kernel launches)'
  },
  {
    name: '1000 μs (1ms) Function',
    simulatedWorkUs: 1000,
    iterations: 2_000,
    description: 'Slow API: ~1ms (e.g., large allocations)'
  }
].map((scenario) => Object.freeze(scenario)))

export const expectedSimulatedWork: readonly number[] = defaultScenarios.map(
  (scenario) => scenario.simulatedWorkUs
)

/**
 * Restrict the catalog to the given simulated-work values, keeping catalog
 * order. Used to shard a suite across parallel jobs.
 */
export function selectScenarios(
  simulatedWork: readonly number[] | undefined,
  catalog: readonly Scenario[] = defaultScenarios
): Scenario[] {
  if (!simulatedWork || simulatedWork.length === 0) {
    return [...catalog]
  }

  const unknown = simulatedWork.filter(
    (us) => !catalog.some((scenario) => scenario.simulatedWorkUs === us)
  )
  if (unknown.length > 0) {
    const available = catalog.map((scenario) => scenario.simulatedWorkUs).join(', ')
    throw new Error(`Unknown scenario(s): ${unknown.join(', ')}. Available: ${available}`)
  }

  return catalog.filter((scenario) => simulatedWork.includes(scenario.simulatedWorkUs))
}
