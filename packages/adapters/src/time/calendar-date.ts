/**
 * True when year/month/day name a day that exists. `Date` rolls
 * `2024-02-31` over into March, so round-trip the fields to catch it.
 */
export function isCalendarDate(year: number, month: number, day: number): boolean {
  const probe = new Date(Date.UTC(year, month - 1, day));
  return (
    probe.getUTCFullYear() === year && probe.getUTCMonth() === month - 1 && probe.getUTCDate() === day
  );
}
