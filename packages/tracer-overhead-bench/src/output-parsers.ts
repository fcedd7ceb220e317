/**
 * Best-effort extraction of values from the text printed by external tools.
 *
 * Every parser returns a record of optional fields. A field that cannot be
 * found is left undefined; callers decide what a missing value means.
 */

export const TIME_FORMAT = 'wall_time=%e user_time=%U sys_time=%S max_rss=%M'

export interface TimingOutput {
  wallTimeS?: number
  userCpuS?: number
  systemCpuS?: number
  maxRssKb?: number
}

export interface WorkloadOutput {
  avgTimePerCallNs?: number
}

export interface ProcStat {
  utime: number
  stime: number
}

function matchNumber(text: string, pattern: RegExp): number | undefined {
  const match = pattern.exec(text)
  if (!match?.[1]) {
    return undefined
  }
  const value = Number.parseFloat(match[1])
  return Number.isFinite(value) ? value : undefined
}

/** Parses the line written by the timing wrapper with {@link TIME_FORMAT}. */
export function parseTimingOutput(stderr: string): TimingOutput {
  const maxRss = matchNumber(stderr, /max_rss=(\d+)/)
  return {
    wallTimeS: matchNumber(stderr, /wall_time=([\d.]+)/),
    userCpuS: matchNumber(stderr, /user_time=([\d.]+)/),
    systemCpuS: matchNumber(stderr, /sys_time=([\d.]+)/),
    maxRssKb: maxRss === undefined ? undefined : Math.trunc(maxRss)
  }
}

export function parseWorkloadOutput(stdout: string): WorkloadOutput {
  return {
    avgTimePerCallNs: matchNumber(stdout, /Average time per call:\s+([\d.]+)/)
  }
}

/** Resident set size in kB from the contents of /proc/<pid>/status. */
export function parseProcStatus(status: string): number | undefined {
  return matchNumber(status, /^VmRSS:\s+(\d+)/m)
}

/**
 * User and system CPU ticks (fields 14 and 15) from /proc/<pid>/stat.
 * The command name in field 2 may itself contain spaces and parentheses, so
 * counting starts after its closing parenthesis.
 */
export function parseProcStat(stat: string): ProcStat | undefined {
  const commEnd = stat.lastIndexOf(')')
  if (commEnd === -1) {
    return undefined
  }

  // First field after the command name is field 3 (state)
  const fields = stat.slice(commEnd + 1).trim().split(/\s+/)
  const utime = Number.parseInt(fields[11] ?? '', 10)
  const stime = Number.parseInt(fields[12] ?? '', 10)

  if (!Number.isFinite(utime) || !Number.isFinite(stime)) {
    return undefined
  }
  return { utime, stime }
}

/** Last process id printed by pgrep, which is the most recently started match. */
export function parsePidList(stdout: string): number | undefined {
  const pids = stdout
    .split('\n')
    .map((line) => line.trim())
    .filter((line) => /^\d+$/.test(line))
    .map((line) => Number.parseInt(line, 10))

  return pids.length > 0 ? pids[pids.length - 1] : undefined
}

/** Dropped event count from the daemon's shutdown summary, "Wrote N events (M dropped)". */
export function parseDroppedEvents(stdout: string): number | undefined {
  return matchNumber(stdout, /\((\d+) dropped\)/)
}
