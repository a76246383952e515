/**
 * Rewrites relative date phrases in a search query into concrete date terms
 * and an optional date range.
 *
 * Rules run in priority order. The first rule that matches sets the range;
 * every occurrence matched by any rule contributes terms, so "January 1st"
 * is a one-day range that still carries the January month labels.
 */

import type { TranslatedQuery } from './schemas.js'
import type { CalendarDate } from './calendar.js'
import {
  eachDay,
  formatCompact,
  formatDayMonthYear,
  formatIso,
  formatMonthDayYear,
  localCalendarDate,
} from './calendar.js'
import type { DateRange, DateRule } from './date-rules.js'
import { DEFAULT_DATE_RULES } from './date-rules.js'

/** The four literal forms a day may take in note names and text. */
export function dayTerms(day: CalendarDate): string[] {
  return [formatIso(day), formatCompact(day), formatMonthDayYear(day), formatDayMonthYear(day)]
}

export class DateQueryTranslator {
  private readonly rules: readonly DateRule[]

  constructor(rules: readonly DateRule[] = DEFAULT_DATE_RULES) {
    this.rules = rules
  }

  /** `referenceDate` is read in local time; only its calendar day matters. */
  translate(query: string, referenceDate: Date): TranslatedQuery {
    const today = localCalendarDate(referenceDate)
    const terms = new Set<string>()
    let range: DateRange | null = null

    for (const rule of this.rules) {
      for (const match of rule.match(query, today)) {
        range ??= match.range

        for (const term of match.terms) terms.add(term)
        for (const day of eachDay(match.range.start, match.range.end)) {
          for (const term of dayTerms(day)) terms.add(term)
        }
      }
    }

    const dateTerms = [...terms]
    return {
      originalQuery: query,
      dateTerms,
      ...(range ? { startDate: formatIso(range.start), endDate: formatIso(range.end) } : {}),
      combinedQuery: dateTerms.length > 0 ? `${query} ${dateTerms.join(' ')}` : query,
    }
  }
}

const defaultTranslator = new DateQueryTranslator()

export function translateDateQuery(query: string, referenceDate: Date): TranslatedQuery {
  return defaultTranslator.translate(query, referenceDate)
}
