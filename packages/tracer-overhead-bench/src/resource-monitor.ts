import { readFile } from 'fs/promises'
import { ProcessLookupFailedError, errorMessage } from './errors.js'
import { consoleLogger } from './logger.js'
import { parsePidList, parseProcStat, parseProcStatus } from './output-parsers.js'
import type { ProcessAdapter } from './process-adapter.js'
import type { Logger, ResourceSample } from './types.js'

const FALLBACK_TICKS_PER_SECOND = 100
const LOOKUP_TIMEOUT_MS = 10_000

export interface ProcfsReader {
  read(path: string): Promise<string>
}

export const nodeProcfsReader: ProcfsReader = {
  read: (path) => readFile(path, 'utf8')
}

/**
 * Samples OS process accounting for a process the suite does not own (the
 * tracer daemon). Figures are telemetry: any failure to read them yields
 * `undefined` rather than an error.
 */
export class ResourceMonitor {
  private ticksPerSecond: number | null = null

  constructor(
    private readonly processes: ProcessAdapter,
    private readonly procfs: ProcfsReader = nodeProcfsReader,
    private readonly logger: Logger = consoleLogger
  ) {}

  async sample(pid: number): Promise<ResourceSample | undefined> {
    let status: string
    let stat: string
    try {
      status = await this.procfs.read(`/proc/${pid}/status`)
      stat = await this.procfs.read(`/proc/${pid}/stat`)
    } catch (error) {
      this.logger.debug(`    Process accounting unavailable for pid ${pid}: ${errorMessage(error)}`)
      return undefined
    }

    const residentMemoryKb = parseProcStatus(status)
    const ticks = parseProcStat(stat)
    if (residentMemoryKb === undefined || !ticks) {
      this.logger.debug(`    Could not parse process accounting for pid ${pid}`)
      return undefined
    }

    return {
      residentMemoryKb,
      cpuTicksUser: ticks.utime,
      cpuTicksSystem: ticks.stime
    }
  }

  async getTicksPerSecond(): Promise<number> {
    if (this.ticksPerSecond !== null) {
      return this.ticksPerSecond
    }

    let resolved = FALLBACK_TICKS_PER_SECOND
    try {
      const result = await this.processes.execute('getconf', ['CLK_TCK'], {
        timeoutMs: LOOKUP_TIMEOUT_MS
      })
      const value = Number.parseInt(result.stdout.trim(), 10)
      if (result.exitCode === 0 && Number.isFinite(value) && value > 0) {
        resolved = value
      }
    } catch (error) {
      this.logger.debug(`    getconf CLK_TCK failed, assuming ${FALLBACK_TICKS_PER_SECOND}: ${errorMessage(error)}`)
    }

    this.ticksPerSecond = resolved
    return resolved
  }

  /** Resolves the newest process whose command line matches `pattern`. */
  async findProcessId(pattern: string): Promise<number> {
    let stdout: string
    try {
      const result = await this.processes.execute('pgrep', ['-f', pattern], {
        timeoutMs: LOOKUP_TIMEOUT_MS
      })
      stdout = result.stdout
    } catch (error) {
      throw new ProcessLookupFailedError(pattern, { cause: error })
    }

    const pid = parsePidList(stdout)
    if (pid === undefined) {
      throw new ProcessLookupFailedError(pattern)
    }
    return pid
  }
}

/**
 * CPU utilization of a process between two samples, as a percentage of the
 * elapsed wall time. Zero when no wall time elapsed.
 */
export function computeCpuPercent(
  before: ResourceSample,
  after: ResourceSample,
  ticksPerSecond: number,
  elapsedSeconds: number
): number {
  if (elapsedSeconds <= 0 || ticksPerSecond <= 0) {
    return 0
  }

  const ticks =
    (after.cpuTicksUser - before.cpuTicksUser) +
    (after.cpuTicksSystem - before.cpuTicksSystem)

  return (100 * ticks) / ticksPerSecond / elapsedSeconds
}
