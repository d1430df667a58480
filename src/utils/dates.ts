/**
 * Date parsing for article metadata. Everything returns null instead of
 * guessing: a record without a date is still a valid record.
 */

const ISO_DATE = /^(\d{4})-(\d{2})-(\d{2})(?:[T ](\d{2}:\d{2}(?::\d{2}(?:\.\d+)?)?)(Z|[+-]\d{2}:?\d{2})?)?$/;

// NewsML "basic" format, e.g. 20240314T093000+0100
const COMPACT_DATE = /^(\d{4})(\d{2})(\d{2})T(\d{2})(\d{2})(\d{2})(Z|[+-]\d{2}:?\d{2})?$/;

function normalizeOffset(offset: string | undefined): string {
  if (!offset) return 'Z';
  if (offset === 'Z') return offset;
  return offset.includes(':') ? offset : `${offset.slice(0, 3)}:${offset.slice(3)}`;
}

/**
 * `new Date` rolls impossible days over (Feb 30 -> Mar 1)
 */
function isCalendarDay(year: string | undefined, month: string | undefined, day: string | undefined): boolean {
  const y = Number(year);
  const m = Number(month);
  const d = Number(day);
  const date = new Date(Date.UTC(y, m - 1, d));
  return date.getUTCFullYear() === y && date.getUTCMonth() === m - 1 && date.getUTCDate() === d;
}

function toValidDate(iso: string): Date | null {
  const date = new Date(iso);
  return isNaN(date.getTime()) ? null : date;
}

/**
 * Parse an ISO 8601 timestamp (`2024-03-14T09:30:00+01:00`, date-only, or
 * with a space separator). Times without offset are taken as UTC.
 */
export function parseIsoDate(value: string | null | undefined): Date | null {
  if (!value) return null;

  const match = value.trim().match(ISO_DATE);
  if (!match) return null;

  const [, year, month, day, time, offset] = match;
  if (!isCalendarDay(year, month, day)) return null;

  const date = `${year}-${month}-${day}`;
  if (!time) {
    return toValidDate(`${date}T00:00:00Z`);
  }

  return toValidDate(`${date}T${time}${normalizeOffset(offset)}`);
}

/**
 * Parse a NewsML timestamp in compact (`20240314T093000+0100`) or ISO form
 */
export function parseNewsMLDate(value: string | null | undefined): Date | null {
  if (!value) return null;

  const match = value.trim().match(COMPACT_DATE);
  if (!match) {
    return parseIsoDate(value);
  }

  const [, year, month, day, hour, minute, second, offset] = match;
  if (!isCalendarDay(year, month, day)) return null;

  return toValidDate(`${year}-${month}-${day}T${hour}:${minute}:${second}${normalizeOffset(offset)}`);
}
