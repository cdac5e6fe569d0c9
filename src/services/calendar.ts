/**
 * Local-calendar date helpers. All functions work in the process's local timezone.
 */

/**
 * Same wall-clock time, `days` calendar days later
 */
export function addDays(date: Date, days: number): Date {
  const result = new Date(date)
  result.setDate(result.getDate() + days)
  return result
}

/**
 * The calendar day after `from`
 */
export function tomorrow(from: Date = new Date()): Date {
  return addDays(from, 1)
}

/**
 * Format as YYYY-MM-DD in the local calendar
 */
export function formatLocalDate(date: Date): string {
  const year = date.getFullYear().toString().padStart(4, '0')
  const month = (date.getMonth() + 1).toString().padStart(2, '0')
  const day = date.getDate().toString().padStart(2, '0')
  return `${year}-${month}-${day}`
}

/**
 * Move the local time of day of `instant` onto the local calendar day of `day`.
 * Milliseconds are dropped.
 */
export function anchorToDay(instant: Date, day: Date): Date {
  return new Date(
    day.getFullYear(),
    day.getMonth(),
    day.getDate(),
    instant.getHours(),
    instant.getMinutes(),
    instant.getSeconds()
  )
}

export function isSameLocalDay(a: Date, b: Date): boolean {
  return formatLocalDate(a) === formatLocalDate(b)
}
