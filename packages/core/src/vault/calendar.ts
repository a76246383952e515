/**
 * Calendar-date arithmetic for query translation. Dates carry no time or zone;
 * arithmetic goes through UTC so DST shifts never move a day.
 */

export interface CalendarDate {
  year: number
  /** 1-12 */
  month: number
  day: number
}

export const MONTH_NAMES = [
  'January', 'February', 'March', 'April', 'May', 'June',
  'July', 'August', 'September', 'October', 'November', 'December',
] as const

export const WEEKDAY_NAMES = [
  'sunday', 'monday', 'tuesday', 'wednesday', 'thursday', 'friday', 'saturday',
] as const

const MS_PER_DAY = 86_400_000

function toUtc(date: CalendarDate): number {
  return Date.UTC(date.year, date.month - 1, date.day)
}

function fromUtc(ms: number): CalendarDate {
  const d = new Date(ms)
  return { year: d.getUTCFullYear(), month: d.getUTCMonth() + 1, day: d.getUTCDate() }
}

/** The calendar day of `date` in the process's local time zone. */
export function localCalendarDate(date: Date): CalendarDate {
  return { year: date.getFullYear(), month: date.getMonth() + 1, day: date.getDate() }
}

export function calendarDate(year: number, month: number, day: number): CalendarDate {
  return { year, month, day }
}

export function addDays(date: CalendarDate, days: number): CalendarDate {
  return fromUtc(toUtc(date) + days * MS_PER_DAY)
}

/** First day of the month `months` away from the month of `date`. */
export function addMonths(date: CalendarDate, months: number): CalendarDate {
  const index = date.year * 12 + (date.month - 1) + months
  return { year: Math.floor(index / 12), month: (index % 12 + 12) % 12 + 1, day: 1 }
}

export function daysInMonth(year: number, month: number): number {
  return new Date(Date.UTC(year, month, 0)).getUTCDate()
}

export function lastOfMonth(year: number, month: number): CalendarDate {
  return { year, month, day: daysInMonth(year, month) }
}

/** 0 = Sunday ... 6 = Saturday */
export function dayOfWeek(date: CalendarDate): number {
  return new Date(toUtc(date)).getUTCDay()
}

export function compareDates(a: CalendarDate, b: CalendarDate): number {
  return toUtc(a) - toUtc(b)
}

export function isValidDate(year: number, month: number, day: number): boolean {
  return month >= 1 && month <= 12 && day >= 1 && day <= daysInMonth(year, month)
}

/** Every day from start to end inclusive. */
export function eachDay(start: CalendarDate, end: CalendarDate): CalendarDate[] {
  const days: CalendarDate[] = []
  for (let d = start; compareDates(d, end) <= 0; d = addDays(d, 1)) {
    days.push(d)
  }
  return days
}

function pad(value: number, width: number): string {
  return String(value).padStart(width, '0')
}

/** 2026-01-18 */
export function formatIso(date: CalendarDate): string {
  return `${pad(date.year, 4)}-${pad(date.month, 2)}-${pad(date.day, 2)}`
}

/** 20260118 */
export function formatCompact(date: CalendarDate): string {
  return `${pad(date.year, 4)}${pad(date.month, 2)}${pad(date.day, 2)}`
}

/** January 18, 2026 */
export function formatMonthDayYear(date: CalendarDate): string {
  return `${MONTH_NAMES[date.month - 1]} ${date.day}, ${date.year}`
}

/** 18 January 2026 */
export function formatDayMonthYear(date: CalendarDate): string {
  return `${date.day} ${MONTH_NAMES[date.month - 1]} ${date.year}`
}

/** 2026-01 */
export function formatYearMonth(date: CalendarDate): string {
  return `${pad(date.year, 4)}-${pad(date.month, 2)}`
}

/** January 2026 */
export function formatMonthYear(date: CalendarDate): string {
  return `${MONTH_NAMES[date.month - 1]} ${date.year}`
}

/** ISO-8601 week label, e.g. 2026-W03. The year is the week-numbering year. */
export function isoWeekLabel(date: CalendarDate): string {
  // Thursday of the same week decides the week-numbering year
  const weekday = dayOfWeek(date) || 7
  const thursday = addDays(date, 4 - weekday)
  const jan1 = calendarDate(thursday.year, 1, 1)
  const week = Math.floor((toUtc(thursday) - toUtc(jan1)) / MS_PER_DAY / 7) + 1
  return `${thursday.year}-W${pad(week, 2)}`
}

/** Month number (1-12) from a full English month name, case-insensitive. */
export function parseMonthName(name: string): number | null {
  const lower = name.trim().toLowerCase()
  const index = MONTH_NAMES.findIndex((m) => m.toLowerCase() === lower)
  return index === -1 ? null : index + 1
}
