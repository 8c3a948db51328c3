import dayjs from 'dayjs';
import utc from 'dayjs/plugin/utc';
import timezone from 'dayjs/plugin/timezone';
import customParseFormat from 'dayjs/plugin/customParseFormat';

dayjs.extend(utc);
dayjs.extend(timezone);
dayjs.extend(customParseFormat);

export const DATE_FORMAT = 'YYYY-MM-DD';
export const MINUTE_FORMAT = 'YYYY-MM-DD HH:mm';
export const DATE_PATTERN = /^\d{4}-\d{2}-\d{2}$/;

// Layouts found in existing workbooks. Older sheets kept the timestamp in the date column.
const DATE_LAYOUTS = ['YYYY-MM-DD', 'DD.MM.YYYY', 'DD/MM/YYYY'];
const TIMESTAMP_LAYOUTS = ['YYYY-MM-DD HH:mm', 'YYYY-MM-DD HH:mm:ss', 'YYYY-MM-DD[T]HH:mm:ss', 'DD.MM.YYYY HH:mm'];

// Spreadsheet serial day 0 is 1899-12-30; 25569 is 1970-01-01.
const SERIAL_UNIX_EPOCH = 25569;
const MS_PER_DAY = 86_400_000;

export interface ParsedDate {
  date: string;
  /** Minute-precision timestamp when the source carried a time of day. */
  timestamp: string | null;
}

export function isValidTimeZone(zone: string): boolean {
  try {
    dayjs().tz(zone);
    return true;
  } catch {
    return false;
  }
}

export function formatMinute(now: Date, zone: string): string {
  return dayjs(now).tz(zone).format(MINUTE_FORMAT);
}

export function todayIn(now: Date, zone: string): string {
  return dayjs(now).tz(zone).format(DATE_FORMAT);
}

/** Strict `YYYY-MM-DD` check that also rejects impossible dates such as 2024-02-30. */
export function isCalendarDate(value: string): boolean {
  return DATE_PATTERN.test(value) && dayjs(value, DATE_FORMAT, true).isValid();
}

export function parseCellDate(value: unknown): ParsedDate | null {
  if (value instanceof Date) {
    if (Number.isNaN(value.getTime())) return null;
    const d = dayjs(value);
    const hasTime = d.hour() !== 0 || d.minute() !== 0;
    return { date: d.format(DATE_FORMAT), timestamp: hasTime ? d.format(MINUTE_FORMAT) : null };
  }

  if (typeof value === 'number') {
    if (!Number.isFinite(value) || value <= 0) return null;
    const d = dayjs.utc(Math.round((value - SERIAL_UNIX_EPOCH) * MS_PER_DAY));
    const hasTime = d.hour() !== 0 || d.minute() !== 0;
    return { date: d.format(DATE_FORMAT), timestamp: hasTime ? d.format(MINUTE_FORMAT) : null };
  }

  if (typeof value !== 'string') return null;
  const raw = value.trim();
  if (!raw) return null;

  const withTime = dayjs(raw, TIMESTAMP_LAYOUTS, true);
  if (withTime.isValid()) {
    return { date: withTime.format(DATE_FORMAT), timestamp: withTime.format(MINUTE_FORMAT) };
  }

  const dateOnly = dayjs(raw, DATE_LAYOUTS, true);
  if (dateOnly.isValid()) {
    return { date: dateOnly.format(DATE_FORMAT), timestamp: null };
  }

  return null;
}

export function parseCellTimestamp(value: unknown): string | null {
  const parsed = parseCellDate(value);
  if (!parsed) return null;
  return parsed.timestamp ?? `${parsed.date} 00:00`;
}
