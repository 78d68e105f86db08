/**
 * Plan file parser
 *
 * Turns plan text into day schedules. Malformed pieces never raise: a header
 * with an impossible date yields a dateless day, an event line with a bad
 * time token is dropped, and anything else is ignored.
 */

import type { CalendarDate, DaySchedule, ParseResult, PlanEvent } from '@/types'
import { MONTH_NAMES, combineDateAndTime, createCalendarDate, parseClockTime } from './timeUtils'

// "Monday, April 7th, 2025 - No Gym"
const DAY_HEADER_REGEX = /^([A-Za-z]+),\s+([A-Za-z]+)\s+(\d{1,2}(?:st|nd|rd|th)?),\s+(\d{4}).*/
// "9:00 AM → 10:15 AM: Write report"
const EVENT_REGEX = /^(\d{1,2}:\d{2}\s*(?:AM|PM))\s*→\s*(\d{1,2}:\d{2}\s*(?:AM|PM)):\s*(.+)$/
const ORDINAL_SUFFIX_REGEX = /st|nd|rd|th/g

export interface ParsedDayHeader {
  date: CalendarDate | null
  headerText: string
}

export function stripOrdinalSuffix(token: string): string {
  return token.replace(ORDINAL_SUFFIX_REGEX, '')
}

function monthFromName(name: string): number | null {
  const lower = name.toLowerCase()
  const index = MONTH_NAMES.findIndex((month) => month.toLowerCase() === lower)
  return index === -1 ? null : index + 1
}

/**
 * Match a day-header line. Returns null when the line is not a header;
 * returns a header with `date: null` when it is one but the date does not exist.
 * The weekday token is not checked against the date.
 */
export function parseDayHeader(line: string): ParsedDayHeader | null {
  const match = DAY_HEADER_REGEX.exec(line)
  if (!match) return null

  const [, , monthName, dayToken, yearToken] = match
  const month = monthFromName(monthName)
  const day = parseInt(stripOrdinalSuffix(dayToken), 10)
  const year = parseInt(yearToken, 10)

  return {
    date: month === null ? null : createCalendarDate(year, month, day),
    headerText: line,
  }
}

/**
 * Match an event line and build the event against the enclosing day's date.
 * Returns null when the line is not an event or either time fails to parse.
 */
export function parseEventLine(line: string, date: CalendarDate | null): PlanEvent | null {
  const match = EVENT_REGEX.exec(line)
  if (!match) return null

  const startTime = parseClockTime(match[1])
  const endTime = parseClockTime(match[2])
  if (!startTime || !endTime) return null

  return {
    start: date ? combineDateAndTime(date, startTime) : null,
    end: date ? combineDateAndTime(date, endTime) : null,
    startTime,
    endTime,
    description: match[3],
  }
}

export function parsePlan(text: string): ParseResult {
  const days: DaySchedule[] = []
  let currentHeader: ParsedDayHeader | null = null
  let currentEvents: PlanEvent[] = []

  const closeCurrentDay = (): void => {
    if (!currentHeader) return
    days.push({
      date: currentHeader.date,
      headerText: currentHeader.headerText,
      events: currentEvents,
    })
    currentEvents = []
  }

  for (const rawLine of text.split(/\r\n|\r|\n/)) {
    const line = rawLine.trim()
    if (line === '') continue

    const header = parseDayHeader(line)
    if (header) {
      closeCurrentDay()
      currentHeader = header
      continue
    }

    // Events before the first header have no date to attach to
    if (!currentHeader) continue

    const event = parseEventLine(line, currentHeader.date)
    if (event) {
      currentEvents.push(event)
    }
  }

  closeCurrentDay()
  return days
}
