import dayjs from 'dayjs';
import customParseFormat from 'dayjs/plugin/customParseFormat.js';
import { DATE_FORMATS } from './constants.js';

dayjs.extend(customParseFormat);

const SWISS_DATE_PATTERN = /^(\d{1,2})\.(\d{1,2})\.(\d{4}|\d{2})$/;

/**
 * Parse a Swiss `d.m.yyyy` or `d.m.yy` date into `YYYY-MM-DD`.
 *
 * The long form is tried before the short one. Parsing is strict, so
 * out-of-range values such as `31.02.2026` yield `null` rather than rolling
 * over into the next month. Two-digit years 00-68 map to 20xx, 69-99 to 19xx.
 */
export function parseSwissDate(dateStr: string): string | null {
  const match = SWISS_DATE_PATTERN.exec(dateStr.trim());
  if (match === null) return null;

  const [, day, month, year] = match;
  if (day === undefined || month === undefined || year === undefined) return null;

  const padded = `${day.padStart(2, '0')}.${month.padStart(2, '0')}.${year}`;

  for (const format of [DATE_FORMATS.SWISS_LONG, DATE_FORMATS.SWISS_SHORT]) {
    const parsed = dayjs(padded, format, true);
    if (parsed.isValid()) {
      return parsed.format(DATE_FORMATS.ISO);
    }
  }

  return null;
}

export function formatSwissDate(isoDate: string): string {
  const parsed = dayjs(isoDate, DATE_FORMATS.ISO, true);
  if (!parsed.isValid()) {
    throw new Error(`Invalid ISO date: ${isoDate}`);
  }
  return parsed.format(DATE_FORMATS.SWISS_LONG);
}

export function isValidISODate(dateStr: string): boolean {
  return /^\d{4}-\d{2}-\d{2}$/.test(dateStr) && dayjs(dateStr, DATE_FORMATS.ISO, true).isValid();
}

export function compareDates(a: string, b: string): number {
  return a.localeCompare(b);
}
