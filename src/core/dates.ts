/**
 * Calendar date helpers for YYYY-MM-DD strings.
 *
 * Dates are local calendar days: a parsed date is the local midnight that
 * starts the day.
 */

const DATE_PATTERN = /^(\d{4})-(\d{1,2})-(\d{1,2})$/;

/**
 * Parse a `YYYY-MM-DD` string to local midnight of that day.
 *
 * Accepts a four-digit year and one- or two-digit month and day.
 * Returns null for anything else, including days that do not exist
 * (2023-02-29, 2024-04-31) and year 0000.
 */
export function parseCalendarDate(value: string): Date | null {
  const match = DATE_PATTERN.exec(value);
  if (!match) return null;

  const [, y = '', m = '', d = ''] = match;
  const year = Number(y);
  const month = Number(m);
  const day = Number(d);
  if (year < 1 || month < 1 || month > 12 || day < 1) return null;

  // setFullYear keeps two-digit years literal (new Date(99, ...) would mean 1999)
  const date = new Date(0);
  date.setFullYear(year, month - 1, day);
  date.setHours(0, 0, 0, 0);

  if (date.getFullYear() !== year || date.getMonth() !== month - 1 || date.getDate() !== day) {
    return null;
  }
  return date;
}

/** Whether a string is a valid `YYYY-MM-DD` calendar date. */
export function isCalendarDate(value: string): boolean {
  return parseCalendarDate(value) !== null;
}

/** Format a moment as its local `YYYY-MM-DD` day. */
export function formatCalendarDate(date: Date): string {
  const year = String(date.getFullYear()).padStart(4, '0');
  const month = String(date.getMonth() + 1).padStart(2, '0');
  const day = String(date.getDate()).padStart(2, '0');
  return `${year}-${month}-${day}`;
}
