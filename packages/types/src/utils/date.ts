const DOTTED_DATE = /^(\d{1,2})\.(\d{1,2})\.(\d{4})$/;
const ISO_DATE = /^(\d{4})-(\d{2})-(\d{2})$/;

function daysInMonth(year: number, month: number): number {
  return new Date(Date.UTC(year, month, 0)).getUTCDate();
}

/**
 * Parse a day.month.year statement date into YYYY-MM-DD.
 * Returns null for anything else, including impossible calendar dates.
 */
export function parseDottedDate(dateStr: string): string | null {
  const match = dateStr.trim().match(DOTTED_DATE);
  if (!match) {
    return null;
  }
  const [, dayStr, monthStr, yearStr] = match;
  if (dayStr === undefined || monthStr === undefined || yearStr === undefined) {
    return null;
  }
  const day = parseInt(dayStr, 10);
  const month = parseInt(monthStr, 10);
  const year = parseInt(yearStr, 10);
  if (month < 1 || month > 12 || day < 1 || day > daysInMonth(year, month)) {
    return null;
  }
  return `${yearStr}-${monthStr.padStart(2, '0')}-${dayStr.padStart(2, '0')}`;
}

export interface DateParts {
  year: number;
  month: number;
  day: number;
}

export function splitISODate(dateStr: string): DateParts {
  const match = dateStr.match(ISO_DATE);
  if (!match) {
    throw new Error(`Invalid ISO date: ${dateStr}`);
  }
  const [, year, month, day] = match;
  if (year === undefined || month === undefined || day === undefined) {
    throw new Error(`Invalid ISO date: ${dateStr}`);
  }
  return { year: parseInt(year, 10), month: parseInt(month, 10), day: parseInt(day, 10) };
}

/** YYYY-MM-DD naming a real calendar day. */
export function isValidISODate(dateStr: string): boolean {
  const match = dateStr.match(ISO_DATE);
  if (!match) {
    return false;
  }
  const [, year, month, day] = match;
  if (year === undefined || month === undefined || day === undefined) {
    return false;
  }
  const monthNum = parseInt(month, 10);
  const dayNum = parseInt(day, 10);
  return monthNum >= 1 && monthNum <= 12 && dayNum >= 1 && dayNum <= daysInMonth(parseInt(year, 10), monthNum);
}
