export interface Clock {
  /** Monotonic milliseconds */
  now(): number
}

export const systemClock: Clock = {
  now: () => performance.now()
}

export function sleep(ms: number): Promise<void> {
  if (ms <= 0) {
    return Promise.resolve()
  }
  return new Promise((resolve) => setTimeout(resolve, ms))
}

/**
 * Resolves with the promise's value, or with undefined once `ms` have passed
 * without it settling. The timer never outlives the race.
 */
export async function waitFor<T>(promise: Promise<T>, ms: number): Promise<T | undefined> {
  let timer: NodeJS.Timeout | undefined
  const timeout = new Promise<undefined>((resolve) => {
    timer = setTimeout(() => resolve(undefined), ms)
  })

  try {
    return await Promise.race([promise, timeout])
  } finally {
    clearTimeout(timer)
  }
}
