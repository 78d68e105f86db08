/**
 * ScheduleEvaluator - decides which event is in progress and which comes next
 *
 * Pure functions over an immutable ParseResult; called once per refresh tick
 * with a fresh "now".
 */

import type { CalendarDate, DaySchedule, EvaluateOptions, Evaluation, ParseResult, PlanEvent } from '@/types'
import { isSameCalendarDate, minutesBetween } from './timeUtils'

/**
 * Default break policy for `next`: the nearest future event, breaks included.
 * Callers that hide breaks pass `excludeBreaks: true`.
 */
export const DEFAULT_EXCLUDE_BREAKS = false

const BREAK_KEYWORD = 'break'

export type DatedEvent = PlanEvent & { readonly start: Date; readonly end: Date }

function isDated(event: PlanEvent): event is DatedEvent {
  return event.start !== null && event.end !== null
}

/**
 * First schedule in file order whose date equals targetDate.
 * Duplicate date headers resolve to the earliest block; dateless blocks never match.
 */
export function findDay(result: ParseResult, targetDate: CalendarDate): DaySchedule | null {
  for (const day of result) {
    if (day.date && isSameCalendarDate(day.date, targetDate)) {
      return day
    }
  }
  return null
}

/**
 * Stable sort by start time. Returns a new array; events without a start are skipped.
 */
export function sortEvents(events: readonly PlanEvent[]): DatedEvent[] {
  return events
    .filter(isDated)
    .map((event, index) => ({ event, index }))
    .sort((a, b) => a.event.start.getTime() - b.event.start.getTime() || a.index - b.index)
    .map(({ event }) => event)
}

export function isBreakEvent(event: PlanEvent): boolean {
  return event.description.toLowerCase().includes(BREAK_KEYWORD)
}

/**
 * Whole minutes left until the event ends (floored)
 */
export function remainingMinutes(event: DatedEvent, now: Date): number {
  return minutesBetween(now, event.end)
}

export function evaluate(
  day: DaySchedule | null,
  now: Date,
  options: EvaluateOptions = {}
): Evaluation {
  if (!day) {
    return { current: null, next: null, upcoming: [], remainingMinutes: null }
  }

  const excludeBreaks = options.excludeBreaks ?? DEFAULT_EXCLUDE_BREAKS
  const nowMs = now.getTime()
  const sorted = sortEvents(day.events)

  // Half-open: an event ending exactly at now is over
  const current = sorted.find(
    (event) => event.start.getTime() <= nowMs && nowMs < event.end.getTime()
  ) ?? null

  const upcoming = sorted.filter(
    (event) => event.start.getTime() > nowMs && !(excludeBreaks && isBreakEvent(event))
  )

  return {
    current,
    next: upcoming[0] ?? null,
    upcoming,
    remainingMinutes: current ? remainingMinutes(current, now) : null,
  }
}
