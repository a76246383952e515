/**
 * Date phrase rules, most specific first. Each rule recognises one kind of
 * phrase and resolves every occurrence of it to a calendar range plus any
 * rule-specific terms (ISO week labels, month labels). Per-day terms are added
 * by the translator.
 */

import type { CalendarDate } from './calendar.js'
import {
  WEEKDAY_NAMES,
  addDays,
  addMonths,
  calendarDate,
  compareDates,
  daysInMonth,
  dayOfWeek,
  formatMonthYear,
  formatYearMonth,
  isValidDate,
  isoWeekLabel,
  lastOfMonth,
  parseMonthName,
  MONTH_NAMES,
} from './calendar.js'

export interface DateRange {
  start: CalendarDate
  end: CalendarDate
}

export interface DateRuleMatch {
  range: DateRange
  terms: string[]
}

export interface DateRule {
  name: string
  /** Every occurrence of the rule's phrase, in query order. */
  match(query: string, today: CalendarDate): DateRuleMatch[]
}

const MONTH_PATTERN = 'january|february|march|april|may|june|july|august|september|october|november|december'
const WEEKDAY_PATTERN = WEEKDAY_NAMES.join('|')

const WEEK_OF_YEAR_RE = /\b(first|last)\s+week\s+of\s+(\d{4})\b/gi
const WEEK_OF_MONTH_RE = new RegExp(`\\b(first|last)\\s+week\\s+of\\s+(?:(last|this)\\s+)?(${MONTH_PATTERN})(?:\\s+(\\d{4}))?\\b`, 'gi')
const WEEKEND_RE = /\b(last|this|next)\s+weekend\b/gi
const YESTERDAY_RE = /\byesterday\b/gi
const TODAY_RE = /\btoday\b/gi
const LAST_WEEK_RE = /\blast\s+week\b/gi
const THIS_WEEK_RE = /\bthis\s+week\b/gi
const LAST_MONTH_RE = /\blast\s+month\b/gi
const THIS_MONTH_RE = /\bthis\s+month\b/gi
const DAYS_AGO_RE = /\b(\d+)\s+days?\s+ago\b/gi
const WEEKS_AGO_RE = /\b(\d+)\s+weeks?\s+ago\b/gi
const MONTHS_AGO_RE = /\b(\d+)\s+months?\s+ago\b/gi
const LAST_WEEKDAY_RE = new RegExp(`\\blast\\s+(${WEEKDAY_PATTERN})\\b`, 'gi')
const ISO_DATE_RE = /\b(\d{4})-(\d{2})-(\d{2})\b/g
const EUROPEAN_DATE_RE = /\b(\d{1,2})[./](\d{1,2})[./](\d{4})\b/g
const NATURAL_DATE_RE = new RegExp(
  `\\b(?:(\\d{1,2})(?:st|nd|rd|th)?\\s+(${MONTH_PATTERN})|(${MONTH_PATTERN})\\s+(\\d{1,2})(?:st|nd|rd|th)?)\\b`,
  'gi',
)
const MONTH_NAME_RE = new RegExp(`\\b(?:in\\s+)?(${MONTH_PATTERN})\\b`, 'gi')

function matchesOf(re: RegExp, query: string): RegExpMatchArray[] {
  return [...query.matchAll(re)]
}

function singleDay(day: CalendarDate): DateRuleMatch {
  return { range: { start: day, end: day }, terms: [] }
}

function isMatch(match: DateRuleMatch | null): match is DateRuleMatch {
  return match !== null
}

/** Whole month, with its `YYYY-MM` and `Month YYYY` labels. */
function monthMatch(first: CalendarDate, end: CalendarDate, extraTerms: string[] = []): DateRuleMatch {
  return {
    range: { start: first, end },
    terms: [formatYearMonth(first), formatMonthYear(first), ...extraTerms],
  }
}

/** Monday-aligned week, with its ISO week label. */
function weekMatch(monday: CalendarDate, end: CalendarDate): DateRuleMatch {
  return { range: { start: monday, end }, terms: [isoWeekLabel(monday)] }
}

function firstOrLastSeven(position: string, first: CalendarDate, last: CalendarDate): DateRange {
  return position.toLowerCase() === 'last'
    ? { start: addDays(last, -6), end: last }
    : { start: first, end: addDays(first, 6) }
}

/** A rule that resolves each occurrence of `re` on its own. */
function phraseRule(
  name: string,
  re: RegExp,
  resolve: (m: RegExpMatchArray, today: CalendarDate) => DateRuleMatch | null,
): DateRule {
  return {
    name,
    match: (query, today) => matchesOf(re, query).map((m) => resolve(m, today)).filter(isMatch),
  }
}

const weekOfYear = phraseRule('week-of-year', WEEK_OF_YEAR_RE, (m) => {
  const year = Number(m[2])
  return { range: firstOrLastSeven(m[1], calendarDate(year, 1, 1), calendarDate(year, 12, 31)), terms: [] }
})

const weekOfMonth = phraseRule('week-of-month', WEEK_OF_MONTH_RE, (m, today) => {
  const month = parseMonthName(m[3])
  if (month === null) return null

  const modifier = m[2]?.toLowerCase()
  let year: number
  if (m[4] !== undefined) {
    year = Number(m[4])
  } else if (modifier === 'this') {
    year = today.year
  } else if (modifier === 'last') {
    year = month >= today.month ? today.year - 1 : today.year
  } else {
    year = month > today.month ? today.year - 1 : today.year
  }

  return { range: firstOrLastSeven(m[1], calendarDate(year, month, 1), lastOfMonth(year, month)), terms: [] }
})

const weekend = phraseRule('weekend', WEEKEND_RE, (m, today) => {
  const dow = dayOfWeek(today)
  const modifier = m[1].toLowerCase()

  let saturday: CalendarDate
  if (modifier === 'last') {
    const back = dow === 0 ? 8 : dow === 6 ? 7 : dow + 1
    saturday = addDays(today, -back)
  } else if (modifier === 'next') {
    const ahead = (6 - dow + 7) % 7
    saturday = addDays(today, ahead === 0 ? 7 : ahead)
  } else {
    // On a Sunday the current weekend started yesterday
    saturday = dow === 0 ? addDays(today, -1) : addDays(today, (6 - dow + 7) % 7)
  }

  return { range: { start: saturday, end: addDays(saturday, 1) }, terms: [] }
})

const yesterday = phraseRule('yesterday', YESTERDAY_RE, (_m, today) => singleDay(addDays(today, -1)))

const todayRule = phraseRule('today', TODAY_RE, (_m, today) => singleDay(today))

const lastWeek = phraseRule('last-week', LAST_WEEK_RE, (_m, today) => {
  const dow = dayOfWeek(today)
  const monday = addDays(today, dow === 0 ? -13 : -dow - 6)
  return weekMatch(monday, addDays(monday, 6))
})

const thisWeek = phraseRule('this-week', THIS_WEEK_RE, (_m, today) => {
  const dow = dayOfWeek(today)
  return weekMatch(addDays(today, dow === 0 ? -6 : 1 - dow), today)
})

const lastMonth = phraseRule('last-month', LAST_MONTH_RE, (_m, today) => {
  const first = addMonths(today, -1)
  return monthMatch(first, lastOfMonth(first.year, first.month))
})

const thisMonth = phraseRule('this-month', THIS_MONTH_RE, (_m, today) =>
  monthMatch(calendarDate(today.year, today.month, 1), today))

const daysAgo = phraseRule('days-ago', DAYS_AGO_RE, (m, today) => singleDay(addDays(today, -Number(m[1]))))

const weeksAgo = phraseRule('weeks-ago', WEEKS_AGO_RE, (m, today) => {
  const weeks = Number(m[1])
  const dow = dayOfWeek(today)
  const monday = addDays(today, dow === 0 ? -weeks * 7 - 6 : -dow - weeks * 7 + 1)
  return weekMatch(monday, addDays(monday, 6))
})

const monthsAgo = phraseRule('months-ago', MONTHS_AGO_RE, (m, today) => {
  const first = addMonths(today, -Number(m[1]))
  return monthMatch(first, lastOfMonth(first.year, first.month))
})

const lastWeekday = phraseRule('last-weekday', LAST_WEEKDAY_RE, (m, today) => {
  const target = WEEKDAY_NAMES.findIndex((name) => name === m[1].toLowerCase())
  if (target === -1) return null
  const back = (7 + dayOfWeek(today) - target) % 7
  return singleDay(addDays(today, -(back === 0 ? 7 : back)))
})

function isoDate(m: RegExpMatchArray): DateRuleMatch | null {
  const [year, month, day] = [Number(m[1]), Number(m[2]), Number(m[3])]
  return isValidDate(year, month, day) ? singleDay(calendarDate(year, month, day)) : null
}

function europeanDate(m: RegExpMatchArray): DateRuleMatch | null {
  const [day, month, year] = [Number(m[1]), Number(m[2]), Number(m[3])]
  return isValidDate(year, month, day) ? singleDay(calendarDate(year, month, day)) : null
}

/** "18 January", "January 18th": this year, or last year when that day is still ahead. */
function naturalDate(m: RegExpMatchArray, today: CalendarDate): DateRuleMatch | null {
  const month = parseMonthName(m[2] ?? m[3])
  const day = Number(m[1] ?? m[4])
  if (month === null || day < 1) return null

  const clamped = (year: number): CalendarDate => calendarDate(year, month, Math.min(day, daysInMonth(year, month)))
  const candidate = clamped(today.year)
  return singleDay(compareDates(candidate, today) > 0 ? clamped(today.year - 1) : candidate)
}

const isoDates = phraseRule('iso-date', ISO_DATE_RE, isoDate)
const europeanDates = phraseRule('european-date', EUROPEAN_DATE_RE, europeanDate)
const naturalDates = phraseRule('natural-date', NATURAL_DATE_RE, naturalDate)

/** ISO, then European, then natural-language dates; the first format with a valid date wins. */
const specificDate: DateRule = {
  name: 'specific-date',
  match(query, today) {
    for (const format of [isoDates, europeanDates, naturalDates]) {
      const found = format.match(query, today)
      if (found.length > 0) return found
    }
    return []
  },
}

const monthName = phraseRule('month-name', MONTH_NAME_RE, (m, today) => {
  const month = parseMonthName(m[1])
  if (month === null) return null
  // Lower-case "may" is usually the verb
  if (m[1] === 'may' && !/^in\s/i.test(m[0])) return null

  const year = month > today.month ? today.year - 1 : today.year
  const first = calendarDate(year, month, 1)
  const isCurrentMonth = year === today.year && month === today.month
  return monthMatch(first, isCurrentMonth ? today : lastOfMonth(year, month), [MONTH_NAMES[month - 1]])
})

/** Evaluation order. Specific dates come before bare month names so "January 1st" sets a one-day range. */
export const DEFAULT_DATE_RULES: readonly DateRule[] = [
  weekOfYear,
  weekOfMonth,
  weekend,
  yesterday,
  todayRule,
  lastWeek,
  thisWeek,
  lastMonth,
  thisMonth,
  daysAgo,
  weeksAgo,
  monthsAgo,
  lastWeekday,
  specificDate,
  monthName,
]
