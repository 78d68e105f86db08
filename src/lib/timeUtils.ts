/**
 * Time and date helpers
 * All Date values are interpreted in the host's local time.
 */

import type { CalendarDate, ClockTime } from '@/types'

export const MONTH_NAMES = [
  'January', 'February', 'March', 'April', 'May', 'June',
  'July', 'August', 'September', 'October', 'November', 'December',
] as const

export const WEEKDAY_NAMES = [
  'Sunday', 'Monday', 'Tuesday', 'Wednesday', 'Thursday', 'Friday', 'Saturday',
] as const

const MS_PER_MINUTE = 60 * 1000

const CLOCK_TIME_REGEX = /^(\d{1,2}):(\d{1,2})\s+(AM|PM)$/i
const SIMULATED_DATETIME_REGEX = /^(\d{4})-(\d{1,2})-(\d{1,2})\s+(\d{1,2}):(\d{1,2})$/

function pad(value: number): string {
  return String(value).padStart(2, '0')
}

/**
 * Parse a 12-hour "H:MM AM" token into a 24-hour ClockTime.
 * Returns null when the hour is outside 1-12 or the minute outside 0-59.
 */
export function parseClockTime(token: string): ClockTime | null {
  const match = CLOCK_TIME_REGEX.exec(token.trim())
  if (!match) return null

  const hour12 = parseInt(match[1], 10)
  const minute = parseInt(match[2], 10)
  if (hour12 < 1 || hour12 > 12) return null
  if (minute < 0 || minute > 59) return null

  const isPm = match[3].toUpperCase() === 'PM'
  const hour = (hour12 % 12) + (isPm ? 12 : 0)
  return { hour, minute }
}

/**
 * Format a ClockTime as "hh:MM AM"
 */
export function formatClockTime(time: ClockTime): string {
  const meridiem = time.hour < 12 ? 'AM' : 'PM'
  const hour12 = time.hour % 12 === 0 ? 12 : time.hour % 12
  return `${pad(hour12)}:${pad(time.minute)} ${meridiem}`
}

/**
 * Build a CalendarDate, or null when the combination does not exist (e.g. February 30)
 */
export function createCalendarDate(year: number, month: number, day: number): CalendarDate | null {
  if (!Number.isInteger(year) || !Number.isInteger(month) || !Number.isInteger(day)) return null
  if (year < 1 || year > 9999) return null
  if (month < 1 || month > 12) return null
  if (day < 1 || day > 31) return null

  const check = new Date(Date.UTC(2000, month - 1, day))
  check.setUTCFullYear(year)
  if (check.getUTCMonth() + 1 !== month || check.getUTCDate() !== day) {
    return null
  }
  return { year, month, day }
}

export function toCalendarDate(date: Date): CalendarDate {
  return {
    year: date.getFullYear(),
    month: date.getMonth() + 1,
    day: date.getDate(),
  }
}

export function isSameCalendarDate(a: CalendarDate, b: CalendarDate): boolean {
  return a.year === b.year && a.month === b.month && a.day === b.day
}

/**
 * Combine a calendar date with a time of day (local time)
 */
export function combineDateAndTime(date: CalendarDate, time: ClockTime): Date {
  const result = new Date(2000, date.month - 1, date.day, time.hour, time.minute, 0, 0)
  result.setFullYear(date.year)
  return result
}

export function truncateToMinute(date: Date): Date {
  const result = new Date(date.getTime())
  result.setSeconds(0, 0)
  return result
}

/**
 * Simulated "now": the simulated start advanced by the wall-clock time elapsed since anchor
 */
export function projectedNow(anchor: Date, simulatedStart: Date, realNow: Date): Date {
  return new Date(simulatedStart.getTime() + (realNow.getTime() - anchor.getTime()))
}

/**
 * Milliseconds until the next wall-clock minute boundary (1..60000)
 */
export function msUntilNextMinute(now: Date): number {
  const next = truncateToMinute(now)
  next.setMinutes(next.getMinutes() + 1)
  return next.getTime() - now.getTime()
}

/**
 * Whole minutes from `from` to `to`, floored
 */
export function minutesBetween(from: Date, to: Date): number {
  return Math.floor((to.getTime() - from.getTime()) / MS_PER_MINUTE)
}

/**
 * Parse "YYYY-MM-DD HH:MM" (24-hour, local time).
 * Returns null for anything malformed or out of range.
 */
export function parseSimulatedDateTime(value: string): Date | null {
  const match = SIMULATED_DATETIME_REGEX.exec(value.trim())
  if (!match) return null

  const [, yearStr, monthStr, dayStr, hourStr, minuteStr] = match
  const date = createCalendarDate(parseInt(yearStr, 10), parseInt(monthStr, 10), parseInt(dayStr, 10))
  if (!date) return null

  const hour = parseInt(hourStr, 10)
  const minute = parseInt(minuteStr, 10)
  if (hour > 23 || minute > 59) return null

  return combineDateAndTime(date, { hour, minute })
}

/**
 * e.g. "Monday, April 07, 2025 09:30 AM"
 */
export function formatLongDateTime(date: Date): string {
  const weekday = WEEKDAY_NAMES[date.getDay()]
  const month = MONTH_NAMES[date.getMonth()]
  const time = formatClockTime({ hour: date.getHours(), minute: date.getMinutes() })
  return `${weekday}, ${month} ${pad(date.getDate())}, ${date.getFullYear()} ${time}`
}
