import { DateRange } from '../types/briefing.types';

const DAY_MS = 24 * 60 * 60 * 1000;
const DATE_RE = /^(\d{4})-(\d{2})-(\d{2})$/;

export function parseDateToIso(value: string): string {
  if (!value) {
    return '';
  }
  const date = new Date(value);
  if (Number.isNaN(date.getTime())) {
    return '';
  }
  return date.toISOString();
}

/** Wall-clock "now" shifted to the configured offset; read with UTC getters. */
export function getZonedNow(offsetHours: number, now = new Date()): Date {
  return new Date(now.getTime() + offsetHours * 60 * 60 * 1000);
}

export function formatDateYYYYMMDD(date: Date): string {
  const y = date.getUTCFullYear();
  const m = String(date.getUTCMonth() + 1).padStart(2, '0');
  const d = String(date.getUTCDate()).padStart(2, '0');
  return `${y}-${m}-${d}`;
}

export function todayString(offsetHours: number, now = new Date()): string {
  return formatDateYYYYMMDD(getZonedNow(offsetHours, now));
}

export function isValidDateString(value: string): boolean {
  const match = DATE_RE.exec(value);
  if (!match) {
    return false;
  }
  const [, y, m, d] = match;
  const parsed = new Date(Date.UTC(Number(y), Number(m) - 1, Number(d)));
  return formatDateYYYYMMDD(parsed) === value;
}

/** The calendar day `date` at the configured offset, as a UTC interval. */
export function dayRange(date: string, offsetHours: number): DateRange {
  const start = Date.parse(`${date}T00:00:00.000Z`) - offsetHours * 60 * 60 * 1000;
  return {
    from: new Date(start).toISOString(),
    to: new Date(start + DAY_MS).toISOString(),
  };
}

export function isWithinRange(iso: string, range: DateRange): boolean {
  const time = Date.parse(iso);
  if (Number.isNaN(time)) {
    return false;
  }
  return time >= Date.parse(range.from) && time < Date.parse(range.to);
}
