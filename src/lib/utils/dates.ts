/**
 * @fileoverview ISO-8601 parsing for announcement windows.
 * @module lib/utils/dates
 */

// Date, or date-time (T or space) with optional seconds, fraction and offset.
const ISO_8601 =
  /^(\d{4}-\d{2}-\d{2})(?:[T ](\d{2}):(\d{2})(?::(\d{2})(?:\.(\d{1,6}))?)?(Z|[+-]\d{2}:?\d{2})?)?$/;

function normalizeOffset(offset: string | undefined): string {
  if (!offset) return '';
  if (offset === 'Z' || offset.includes(':')) return offset;
  return `${offset.slice(0, 3)}:${offset.slice(3)}`;
}

/**
 * Epoch milliseconds for an ISO-8601 timestamp, or null when the value is
 * missing or not ISO-8601.
 *
 * Values without an offset, date-only ones included, are read as local time:
 * `2026-06-01` is local midnight, not UTC midnight.
 */
export function parseIsoTimestamp(value: string | null | undefined): number | null {
  if (!value) return null;
  const match = ISO_8601.exec(value.trim());
  if (!match) return null;

  const [, date, hh = '00', mm = '00', ss = '00', fraction, offset] = match;
  const ms = fraction ? `.${fraction.padEnd(3, '0').slice(0, 3)}` : '';
  const t = Date.parse(`${date}T${hh}:${mm}:${ss}${ms}${normalizeOffset(offset)}`);
  return Number.isNaN(t) ? null : t;
}
