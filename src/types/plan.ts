export interface ClockTime {
  hour: number           // 0-23
  minute: number         // 0-59
}

export interface CalendarDate {
  year: number
  month: number          // 1-12
  day: number            // 1-31
}

/**
 * One timed entry of a day. `start` and `end` are shared by every caller
 * that reads the parse result; treat them as read-only and copy before
 * doing Date arithmetic in place.
 */
export interface PlanEvent {
  readonly start: Date | null   // null when the enclosing day has no date
  readonly end: Date | null
  readonly startTime: ClockTime
  readonly endTime: ClockTime
  readonly description: string
}

export interface DaySchedule {
  readonly date: CalendarDate | null
  readonly headerText: string   // raw header line, kept verbatim
  readonly events: readonly PlanEvent[]
}

/** Day schedules in file order, one per header line */
export type ParseResult = readonly DaySchedule[]

export interface EvaluateOptions {
  excludeBreaks?: boolean
}

export interface Evaluation {
  current: PlanEvent | null
  next: PlanEvent | null
  upcoming: PlanEvent[]
  remainingMinutes: number | null
}
