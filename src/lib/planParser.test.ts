import { describe, it, expect } from 'vitest'
import { parsePlan, parseDayHeader, parseEventLine, stripOrdinalSuffix } from './planParser'

const SAMPLE_PLAN = [
  'Monday, April 7th, 2025 - No Gym',
  '9:00 AM → 10:15 AM: Write report',
  '11:00 AM → 12:00 PM: Review',
].join('\n')

describe('planParser', () => {
  describe('stripOrdinalSuffix', () => {
    it('should strip st/nd/rd/th', () => {
      expect(stripOrdinalSuffix('1st')).toBe('1')
      expect(stripOrdinalSuffix('2nd')).toBe('2')
      expect(stripOrdinalSuffix('3rd')).toBe('3')
      expect(stripOrdinalSuffix('4th')).toBe('4')
    })

    it('should leave bare numbers unchanged', () => {
      expect(stripOrdinalSuffix('21')).toBe('21')
    })
  })

  describe('parseDayHeader', () => {
    it('should parse days 1st to 4th', () => {
      expect(parseDayHeader('Tuesday, April 1st, 2025')?.date).toEqual({ year: 2025, month: 4, day: 1 })
      expect(parseDayHeader('Wednesday, April 2nd, 2025')?.date).toEqual({ year: 2025, month: 4, day: 2 })
      expect(parseDayHeader('Thursday, April 3rd, 2025')?.date).toEqual({ year: 2025, month: 4, day: 3 })
      expect(parseDayHeader('Friday, April 4th, 2025')?.date).toEqual({ year: 2025, month: 4, day: 4 })
    })

    it('should keep the header text verbatim', () => {
      const header = parseDayHeader('Monday, April 7th, 2025 - No Gym')
      expect(header).toEqual({
        date: { year: 2025, month: 4, day: 7 },
        headerText: 'Monday, April 7th, 2025 - No Gym',
      })
    })

    it('should accept a day without suffix', () => {
      expect(parseDayHeader('Monday, April 7, 2025')?.date).toEqual({ year: 2025, month: 4, day: 7 })
    })

    it('should match month names case-insensitively', () => {
      expect(parseDayHeader('Monday, april 7th, 2025')?.date).toEqual({ year: 2025, month: 4, day: 7 })
    })

    it('should ignore a weekday that does not match the date', () => {
      expect(parseDayHeader('Friday, April 7th, 2025')?.date).toEqual({ year: 2025, month: 4, day: 7 })
    })

    it('should yield a null date for an impossible date', () => {
      const header = parseDayHeader('Sunday, February 30th, 2025')
      expect(header).not.toBeNull()
      expect(header?.date).toBeNull()
    })

    it('should yield a null date for an unknown month', () => {
      expect(parseDayHeader('Monday, Smarch 7th, 2025')?.date).toBeNull()
    })

    it('should return null for non-header lines', () => {
      expect(parseDayHeader('9:00 AM → 10:15 AM: Write report')).toBeNull()
      expect(parseDayHeader('April 7th, 2025')).toBeNull()
      expect(parseDayHeader('Notes for the week')).toBeNull()
    })
  })

  describe('parseEventLine', () => {
    const date = { year: 2025, month: 4, day: 7 }

    it('should combine times with the day date', () => {
      const event = parseEventLine('9:00 AM → 10:15 AM: Write report', date)
      expect(event?.start?.getTime()).toBe(new Date(2025, 3, 7, 9, 0).getTime())
      expect(event?.end?.getTime()).toBe(new Date(2025, 3, 7, 10, 15).getTime())
      expect(event?.startTime).toEqual({ hour: 9, minute: 0 })
      expect(event?.endTime).toEqual({ hour: 10, minute: 15 })
      expect(event?.description).toBe('Write report')
    })

    it('should keep brackets and parentheses in the description', () => {
      const event = parseEventLine('1:00 PM → 2:30 PM: Deep work [project X] (focus)', date)
      expect(event?.description).toBe('Deep work [project X] (focus)')
    })

    it('should allow missing spaces around the arrow', () => {
      const event = parseEventLine('3:00 PM→4:00 PM: Walk', date)
      expect(event?.description).toBe('Walk')
    })

    it('should drop lines with a malformed time', () => {
      expect(parseEventLine('25:99 AM → 10:00 AM: X', date)).toBeNull()
      expect(parseEventLine('9:00 AM → 13:00 PM: X', date)).toBeNull()
    })

    it('should reject other separators', () => {
      expect(parseEventLine('9:00 AM - 10:00 AM: X', date)).toBeNull()
      expect(parseEventLine('9:00 AM -> 10:00 AM: X', date)).toBeNull()
    })

    it('should keep times but null datetimes when the day has no date', () => {
      const event = parseEventLine('9:00 AM → 10:00 AM: Orphan', null)
      expect(event).toEqual({
        start: null,
        end: null,
        startTime: { hour: 9, minute: 0 },
        endTime: { hour: 10, minute: 0 },
        description: 'Orphan',
      })
    })
  })

  describe('parsePlan', () => {
    it('should parse the sample plan', () => {
      const result = parsePlan(SAMPLE_PLAN)
      expect(result).toHaveLength(1)
      expect(result[0].date).toEqual({ year: 2025, month: 4, day: 7 })
      expect(result[0].headerText).toBe('Monday, April 7th, 2025 - No Gym')
      expect(result[0].events.map((e) => e.description)).toEqual(['Write report', 'Review'])
    })

    it('should keep day blocks in file order regardless of blank lines', () => {
      const text = [
        '',
        'Wednesday, April 9th, 2025',
        '',
        '9:00 AM → 10:00 AM: C',
        '   ',
        'Monday, April 7th, 2025',
        '9:00 AM → 10:00 AM: A',
        '',
        '',
        'Tuesday, April 8th, 2025',
        '',
      ].join('\n')
      const result = parsePlan(text)
      expect(result.map((d) => d.date?.day)).toEqual([9, 7, 8])
      expect(result.map((d) => d.events.length)).toEqual([1, 1, 0])
    })

    it('should keep events in file order, not time order', () => {
      const text = [
        'Monday, April 7th, 2025',
        '2:00 PM → 3:00 PM: Later',
        '9:00 AM → 10:00 AM: Earlier',
      ].join('\n')
      expect(parsePlan(text)[0].events.map((e) => e.description)).toEqual(['Later', 'Earlier'])
    })

    it('should be idempotent', () => {
      expect(parsePlan(SAMPLE_PLAN)).toEqual(parsePlan(SAMPLE_PLAN))
    })

    it('should handle CRLF line endings', () => {
      const result = parsePlan(SAMPLE_PLAN.replace(/\n/g, '\r\n'))
      expect(result[0].events.map((e) => e.description)).toEqual(['Write report', 'Review'])
    })

    it('should handle bare CR line endings', () => {
      const text = 'Monday, April 7th, 2025\r9:00 AM → 10:15 AM: Write report\r11:00 AM → 12:00 PM: Review'
      const result = parsePlan(text)
      expect(result).toHaveLength(1)
      expect(result[0].events.map((e) => e.description)).toEqual(['Write report', 'Review'])
    })

    it('should handle mixed line endings', () => {
      const text = 'Monday, April 7th, 2025\r\n9:00 AM → 10:15 AM: Write report\r11:00 AM → 12:00 PM: Review\n'
      expect(parsePlan(text)[0].events).toHaveLength(2)
    })

    it('should drop events before the first header', () => {
      const text = ['8:00 AM → 9:00 AM: Too early', SAMPLE_PLAN].join('\n')
      const result = parsePlan(text)
      expect(result).toHaveLength(1)
      expect(result[0].events).toHaveLength(2)
    })

    it('should ignore unrecognized lines', () => {
      const text = ['Monday, April 7th, 2025', 'Remember to hydrate', '9:00 AM → 10:00 AM: Task'].join('\n')
      expect(parsePlan(text)[0].events).toHaveLength(1)
    })

    it('should produce an empty day when its only event is malformed', () => {
      const text = ['Monday, April 7th, 2025', '25:99 AM → 10:00 AM: X'].join('\n')
      const result = parsePlan(text)
      expect(result).toHaveLength(1)
      expect(result[0].events).toEqual([])
    })

    it('should keep repeated date headers as separate days', () => {
      const text = [
        'Monday, April 7th, 2025',
        '9:00 AM → 10:00 AM: First',
        'Monday, April 7th, 2025 - again',
        '9:00 AM → 10:00 AM: Second',
      ].join('\n')
      const result = parsePlan(text)
      expect(result).toHaveLength(2)
      expect(result[1].headerText).toBe('Monday, April 7th, 2025 - again')
    })

    it('should still collect events under a dateless header', () => {
      const text = ['Sunday, February 30th, 2025', '9:00 AM → 10:00 AM: Ghost'].join('\n')
      const result = parsePlan(text)
      expect(result[0].date).toBeNull()
      expect(result[0].events[0].description).toBe('Ghost')
      expect(result[0].events[0].start).toBeNull()
    })

    it('should return an empty result for empty input', () => {
      expect(parsePlan('')).toEqual([])
      expect(parsePlan('\n\n  \n')).toEqual([])
    })
  })
})
