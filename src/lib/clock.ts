import { parseSimulatedDateTime, projectedNow, truncateToMinute } from './timeUtils'

export type Clock = () => Date

export interface ClockOptions {
  /** "YYYY-MM-DD HH:MM"; null for the real clock */
  simulate: string | null
  realNow?: () => Date
}

/**
 * Create the "now" source for the dashboard, truncated to the minute.
 * A simulated clock starts at the given time and advances at wall-clock rate.
 */
export function createClock({ simulate, realNow = () => new Date() }: ClockOptions): Clock {
  if (simulate === null) {
    return () => truncateToMinute(realNow())
  }

  const anchor = realNow()
  let simulatedStart = parseSimulatedDateTime(simulate)
  if (!simulatedStart) {
    console.warn(`[Clock] Invalid simulated time "${simulate}", starting from the current time`)
    simulatedStart = truncateToMinute(anchor)
  }
  const start = simulatedStart

  return () => truncateToMinute(projectedNow(anchor, start, realNow()))
}
