/**
 * Date Utilities
 *
 * Calendar dates are handled in local time and exchanged as `YYYY-MM-DD`.
 */

const ISO_DATE = /^(\d{4})-(\d{2})-(\d{2})$/;

/**
 * Return a new date `days` calendar days after `date` (local midnight)
 */
export function addDays(date: Date, days: number): Date {
  return new Date(date.getFullYear(), date.getMonth(), date.getDate() + days);
}

/**
 * Format a date as `YYYY-MM-DD` using its local calendar fields
 */
export function toIsoDate(date: Date): string {
  const year = date.getFullYear().toString().padStart(4, '0');
  return `${year}-${monthDayKey(date)}`;
}

/**
 * Parse a `YYYY-MM-DD` string into a local date.
 * Returns null for malformed strings and impossible dates such as 2023-02-30.
 */
export function parseIsoDate(value: string): Date | null {
  const match = ISO_DATE.exec(value);
  if (!match) {
    return null;
  }

  const year = Number(match[1]);
  const month = Number(match[2]);
  const day = Number(match[3]);
  const date = new Date(year, month - 1, day);
  date.setFullYear(year);

  if (date.getFullYear() !== year || date.getMonth() !== month - 1 || date.getDate() !== day) {
    return null;
  }
  return date;
}

export function isLeapYear(year: number): boolean {
  return (year % 4 === 0 && year % 100 !== 0) || year % 400 === 0;
}

/**
 * `MM-DD` of a date, the part of a birthday that recurs every year
 */
export function monthDayKey(date: Date): string {
  const month = (date.getMonth() + 1).toString().padStart(2, '0');
  const day = date.getDate().toString().padStart(2, '0');
  return `${month}-${day}`;
}

/**
 * Month-day keys of every day in `[start, end)`, in calendar order.
 *
 * In a non-leap year `02-29` is listed right after `02-28`, so people born on
 * Feb 29 are greeted on Feb 28.
 */
export function birthdayKeysBetween(start: Date, end: Date): string[] {
  const keys: string[] = [];
  const stop = addDays(end, 0).getTime();

  for (let day = addDays(start, 0); day.getTime() < stop; day = addDays(day, 1)) {
    const key = monthDayKey(day);
    keys.push(key);
    if (key === '02-28' && !isLeapYear(day.getFullYear())) {
      keys.push('02-29');
    }
  }

  return keys;
}
