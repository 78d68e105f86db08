import type { PlanEvent } from '@/types'
import { formatClockTime } from './timeUtils'

const MAIN_NAME_WIDTH = 20
const DETAIL_SPLIT_REGEX = /\s*[[(]/

export function formatTimeRange(event: PlanEvent): string {
  return `${formatClockTime(event.startTime)} - ${formatClockTime(event.endTime)}`
}

/**
 * Full schedule line: "09:00 AM - 10:15 AM: Write report"
 */
export function formatEvent(event: PlanEvent): string {
  return `${formatTimeRange(event)}: ${event.description}`
}

/**
 * Description without trailing details in [...] or (...)
 */
export function shortDescription(description: string): string {
  return description.split(DETAIL_SPLIT_REGEX)[0].trim()
}

/**
 * Main view line: short name padded to a fixed column, then the time range
 */
export function formatEventMain(event: PlanEvent): string {
  return `${shortDescription(event.description).padEnd(MAIN_NAME_WIDTH)}${formatTimeRange(event)}`
}
