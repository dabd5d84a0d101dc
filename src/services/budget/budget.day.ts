/**
 * Budget day arithmetic
 *
 * A budget day is the calendar date (YYYY-MM-DD) of an instant in the
 * configured time zone. Usage filters on this value, so there is no reset
 * step: the first call after midnight simply reads a new day.
 */

const formatters = new Map<string, Intl.DateTimeFormat>();

const formatterFor = (timeZone: string): Intl.DateTimeFormat => {
  let formatter = formatters.get(timeZone);
  if (!formatter) {
    formatter = new Intl.DateTimeFormat('en-CA', {
      timeZone,
      year: 'numeric',
      month: '2-digit',
      day: '2-digit',
    });
    formatters.set(timeZone, formatter);
  }
  return formatter;
};

export function budgetDayOf(instant: number | Date, timeZone: string): string {
  const parts = formatterFor(timeZone).formatToParts(instant);
  const part = (type: Intl.DateTimeFormatPartTypes): string =>
    parts.find((item) => item.type === type)?.value ?? '';
  return `${part('year')}-${part('month')}-${part('day')}`;
}

/**
 * The budget days covering the last `days` days up to and including today,
 * oldest first
 */
export function recentBudgetDays(now: number, days: number, timeZone: string): string[] {
  const result: string[] = [];
  const seen = new Set<string>();
  // Step in hours so DST transitions cannot skip a calendar date
  for (let offsetHours = (days - 1) * 24; offsetHours >= 0; offsetHours -= 6) {
    const day = budgetDayOf(now - offsetHours * 3600000, timeZone);
    if (!seen.has(day)) {
      seen.add(day);
      result.push(day);
    }
  }
  return result.slice(-days);
}
