import { describe, it, expect } from 'vitest'
import { DateQueryTranslator, translateDateQuery, dayTerms } from '../../src/vault/date-query-translator.js'
import { calendarDate, isoWeekLabel } from '../../src/vault/calendar.js'

/** Noon local time on the given day. */
function on(year: number, month: number, day: number): Date {
  return new Date(year, month - 1, day, 12)
}

function rangeOf(query: string, ref: Date): [string | undefined, string | undefined] {
  const result = translateDateQuery(query, ref)
  return [result.startDate, result.endDate]
}

// 2026-01-19 is a Monday
const MONDAY = on(2026, 1, 19)
const WEDNESDAY = on(2026, 1, 21)
const SATURDAY = on(2026, 1, 17)
const SUNDAY = on(2026, 1, 18)

describe('translateDateQuery', () => {
  it('resolves yesterday to one day in four formats', () => {
    const result = translateDateQuery('notes yesterday', MONDAY)

    expect(result).toEqual({
      originalQuery: 'notes yesterday',
      dateTerms: ['2026-01-18', '20260118', 'January 18, 2026', '18 January 2026'],
      startDate: '2026-01-18',
      endDate: '2026-01-18',
      combinedQuery: 'notes yesterday 2026-01-18 20260118 January 18, 2026 18 January 2026',
    })
  })

  it('sets a one-day range for "January 1st" and still adds the month terms', () => {
    const result = translateDateQuery('January 1st', on(2026, 6, 1))

    expect(result.startDate).toBe('2026-01-01')
    expect(result.endDate).toBe('2026-01-01')
    expect(result.dateTerms.slice(0, 7)).toEqual([
      '2026-01-01', '20260101', 'January 1, 2026', '1 January 2026',
      '2026-01', 'January 2026', 'January',
    ])
    expect(result.dateTerms).toHaveLength(4 + 3 + 30 * 4)
  })

  it('resolves every occurrence of a phrase', () => {
    const result = translateDateQuery('January 1st and in March', on(2026, 6, 1))

    expect([result.startDate, result.endDate]).toEqual(['2026-01-01', '2026-01-01'])
    expect(result.dateTerms).toContain('2026-01')
    expect(result.dateTerms).toContain('2026-03')
    expect(result.dateTerms).toContain('March 2026')
    expect(result.dateTerms).toContain('March')
    expect(result.dateTerms).toContain('2026-03-31')
    expect(result.dateTerms).toHaveLength(4 + (3 + 30 * 4) + (3 + 31 * 4))
  })

  it('leaves queries without dates untouched', () => {
    const result = translateDateQuery('dog walks', MONDAY)

    expect(result.dateTerms).toEqual([])
    expect(result.startDate).toBeUndefined()
    expect(result.endDate).toBeUndefined()
    expect(result.combinedQuery).toBe('dog walks')
  })

  it('matches case-insensitively', () => {
    expect(rangeOf('YESTERDAY', MONDAY)).toEqual(['2026-01-18', '2026-01-18'])
    expect(rangeOf('what did I do Today', MONDAY)).toEqual(['2026-01-19', '2026-01-19'])
  })

  describe('weeks', () => {
    it('resolves last week to the previous Monday-Sunday with its ISO week', () => {
      const result = translateDateQuery('last week', MONDAY)

      expect([result.startDate, result.endDate]).toEqual(['2026-01-12', '2026-01-18'])
      expect(result.dateTerms[0]).toBe('2026-W03')
      expect(result.dateTerms).toHaveLength(1 + 7 * 4)
    })

    it('treats Sunday as the end of the current week', () => {
      expect(rangeOf('last week', SUNDAY)).toEqual(['2026-01-05', '2026-01-11'])
      expect(rangeOf('this week', SUNDAY)).toEqual(['2026-01-12', '2026-01-18'])
    })

    it('caps this week at today', () => {
      const result = translateDateQuery('this week', WEDNESDAY)

      expect([result.startDate, result.endDate]).toEqual(['2026-01-19', '2026-01-21'])
      expect(result.dateTerms[0]).toBe('2026-W04')
    })

    it('resolves N weeks ago to a Monday-aligned week', () => {
      const result = translateDateQuery('2 weeks ago', MONDAY)

      expect([result.startDate, result.endDate]).toEqual(['2026-01-05', '2026-01-11'])
      expect(result.dateTerms[0]).toBe('2026-W02')
    })
  })

  describe('weekends', () => {
    it('resolves last, this and next weekend midweek', () => {
      expect(rangeOf('last weekend', WEDNESDAY)).toEqual(['2026-01-17', '2026-01-18'])
      expect(rangeOf('this weekend', WEDNESDAY)).toEqual(['2026-01-24', '2026-01-25'])
      expect(rangeOf('next weekend', WEDNESDAY)).toEqual(['2026-01-24', '2026-01-25'])
    })

    it('resolves weekends from a Saturday', () => {
      expect(rangeOf('last weekend', SATURDAY)).toEqual(['2026-01-10', '2026-01-11'])
      expect(rangeOf('this weekend', SATURDAY)).toEqual(['2026-01-17', '2026-01-18'])
      expect(rangeOf('next weekend', SATURDAY)).toEqual(['2026-01-24', '2026-01-25'])
    })

    it('treats this weekend on a Sunday as yesterday and today', () => {
      expect(rangeOf('this weekend', SUNDAY)).toEqual(['2026-01-17', '2026-01-18'])
      expect(rangeOf('last weekend', SUNDAY)).toEqual(['2026-01-10', '2026-01-11'])
    })
  })

  describe('months', () => {
    it('resolves last month across a year boundary', () => {
      const result = translateDateQuery('last month', MONDAY)

      expect([result.startDate, result.endDate]).toEqual(['2025-12-01', '2025-12-31'])
      expect(result.dateTerms.slice(0, 3)).toEqual(['2025-12', 'December 2025', '2025-12-01'])
      expect(result.dateTerms).toHaveLength(2 + 31 * 4)
    })

    it('caps this month at today', () => {
      const result = translateDateQuery('this month', MONDAY)

      expect([result.startDate, result.endDate]).toEqual(['2026-01-01', '2026-01-19'])
      expect(result.dateTerms.slice(0, 2)).toEqual(['2026-01', 'January 2026'])
    })

    it('resolves N months ago to the whole month', () => {
      expect(rangeOf('2 months ago', MONDAY)).toEqual(['2025-11-01', '2025-11-30'])
    })

    it('places a bare month in the past year when it is still ahead', () => {
      const result = translateDateQuery('notes in December', MONDAY)

      expect([result.startDate, result.endDate]).toEqual(['2025-12-01', '2025-12-31'])
      expect(result.dateTerms.slice(0, 3)).toEqual(['2025-12', 'December 2025', 'December'])
    })

    it('caps the current month at today', () => {
      expect(rangeOf('January', MONDAY)).toEqual(['2026-01-01', '2026-01-19'])
    })

    it('reads lower-case "may" as a month only after "in"', () => {
      expect(rangeOf('what may I have written', MONDAY)).toEqual([undefined, undefined])
      expect(rangeOf('trips in may', MONDAY)).toEqual(['2025-05-01', '2025-05-31'])
      expect(rangeOf('May', MONDAY)).toEqual(['2025-05-01', '2025-05-31'])
    })
  })

  describe('single days', () => {
    it('counts days back', () => {
      expect(rangeOf('3 days ago', MONDAY)).toEqual(['2026-01-16', '2026-01-16'])
      expect(rangeOf('1 day ago', MONDAY)).toEqual(['2026-01-18', '2026-01-18'])
    })

    it('finds the last occurrence of a weekday', () => {
      expect(rangeOf('last friday', MONDAY)).toEqual(['2026-01-16', '2026-01-16'])
      expect(rangeOf('last Monday', MONDAY)).toEqual(['2026-01-12', '2026-01-12'])
    })

    it('accepts valid ISO dates only', () => {
      expect(rangeOf('on 2026-01-18', MONDAY)).toEqual(['2026-01-18', '2026-01-18'])
      expect(rangeOf('on 2026-02-30', MONDAY)).toEqual([undefined, undefined])
    })

    it('accepts European dates validated against the month length', () => {
      expect(rangeOf('on 18.01.2026', MONDAY)).toEqual(['2026-01-18', '2026-01-18'])
      expect(rangeOf('on 18/01/2026', MONDAY)).toEqual(['2026-01-18', '2026-01-18'])
      expect(rangeOf('on 29.02.2024', MONDAY)).toEqual(['2024-02-29', '2024-02-29'])
      expect(rangeOf('on 31.02.2026', MONDAY)).toEqual([undefined, undefined])
    })

    it('resolves natural dates into the past', () => {
      expect(rangeOf('18 January', MONDAY)).toEqual(['2026-01-18', '2026-01-18'])
      expect(rangeOf('December 25th', MONDAY)).toEqual(['2025-12-25', '2025-12-25'])
      expect(rangeOf('February 31', on(2026, 6, 1))).toEqual(['2026-02-28', '2026-02-28'])
    })
  })

  describe('week of year and month', () => {
    it('resolves the first and last week of a year', () => {
      const result = translateDateQuery('last week of 2025', MONDAY)

      expect([result.startDate, result.endDate]).toEqual(['2025-12-25', '2025-12-31'])
      // "last week" inside the phrase adds its own week terms, but not the range
      expect(result.dateTerms[0]).toBe('2025-12-25')
      expect(result.dateTerms).toContain('2026-W03')
      expect(result.dateTerms).toContain('2026-01-12')
      expect(result.dateTerms).toHaveLength(7 * 4 + 1 + 7 * 4)
      expect(rangeOf('first week of 2026', MONDAY)).toEqual(['2026-01-01', '2026-01-07'])
    })

    it('picks the year of a month phrase', () => {
      expect(rangeOf('first week of December', MONDAY)).toEqual(['2025-12-01', '2025-12-07'])
      expect(rangeOf('last week of last January', MONDAY)).toEqual(['2025-01-25', '2025-01-31'])
      expect(rangeOf('first week of this March', MONDAY)).toEqual(['2026-03-01', '2026-03-07'])
      expect(rangeOf('last week of February 2024', MONDAY)).toEqual(['2024-02-23', '2024-02-29'])
    })
  })

  describe('combining phrases', () => {
    it('takes the range from the highest-priority rule and accumulates terms', () => {
      const result = translateDateQuery('3 days ago or yesterday', MONDAY)

      expect([result.startDate, result.endDate]).toEqual(['2026-01-18', '2026-01-18'])
      expect(result.dateTerms).toEqual([
        '2026-01-18', '20260118', 'January 18, 2026', '18 January 2026',
        '2026-01-16', '20260116', 'January 16, 2026', '16 January 2026',
      ])
    })

    it('de-duplicates terms', () => {
      const result = translateDateQuery('today, 2026-01-19', MONDAY)

      expect(result.dateTerms).toEqual(dayTerms(calendarDate(2026, 1, 19)))
    })
  })

  it('accepts a custom rule list', () => {
    const translator = new DateQueryTranslator([])

    expect(translator.translate('yesterday', MONDAY).dateTerms).toEqual([])
  })
})

describe('isoWeekLabel', () => {
  it('uses the week-numbering year', () => {
    expect(isoWeekLabel(calendarDate(2025, 12, 29))).toBe('2026-W01')
    expect(isoWeekLabel(calendarDate(2027, 1, 1))).toBe('2026-W53')
    expect(isoWeekLabel(calendarDate(2026, 1, 12))).toBe('2026-W03')
  })
})
