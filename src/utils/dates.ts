/**
 * Timestamp formatting for report display.
 *
 * Accepts epoch seconds or ISO-8601 strings and renders them as
 * `YYYY-MM-DD HH:MM:SS`. Anything that does not parse is returned in its
 * string form; these helpers never throw.
 */

const ISO_PATTERN =
  /^(\d{4})-(\d{2})-(\d{2})(?:[T ](\d{2}):(\d{2})(?::(\d{2})(?:\.\d+)?)?)?(?:[+-]\d{2}:?\d{2})?$/;

function pad(n: number): string {
  return String(n).padStart(2, '0');
}

function formatParts(
  year: number,
  month: number,
  day: number,
  hour: number,
  minute: number,
  second: number,
): string {
  return `${year}-${pad(month)}-${pad(day)} ${pad(hour)}:${pad(minute)}:${pad(second)}`;
}

/**
 * Parse an ISO-8601 string. A trailing `Z` is read as `+00:00`. The wall
 * clock time is kept as written; no offset conversion happens.
 */
export function parseIsoTimestamp(value: string): string | null {
  const normalized = value.trim().replace(/Z$/, '+00:00');
  const m = ISO_PATTERN.exec(normalized);
  if (!m) return null;

  const [year, month, day] = [Number(m[1]), Number(m[2]), Number(m[3])];
  const hour = m[4] ? Number(m[4]) : 0;
  const minute = m[5] ? Number(m[5]) : 0;
  const second = m[6] ? Number(m[6]) : 0;

  // Reject impossible calendar values such as 2024-02-30
  const check = new Date(Date.UTC(year, month - 1, day, hour, minute, second));
  if (
    check.getUTCFullYear() !== year ||
    check.getUTCMonth() !== month - 1 ||
    check.getUTCDate() !== day ||
    check.getUTCHours() !== hour ||
    check.getUTCMinutes() !== minute ||
    check.getUTCSeconds() !== second
  ) {
    return null;
  }

  return formatParts(year, month, day, hour, minute, second);
}

/**
 * Format epoch seconds in UTC. Values outside years 1..9999 (millisecond
 * epochs, for one) are rejected.
 */
export function formatEpochSeconds(seconds: number): string | null {
  if (!Number.isFinite(seconds)) return null;
  const date = new Date(seconds * 1000);
  if (Number.isNaN(date.getTime())) return null;
  const year = date.getUTCFullYear();
  if (year < 1 || year > 9999) return null;
  return formatParts(
    date.getUTCFullYear(),
    date.getUTCMonth() + 1,
    date.getUTCDate(),
    date.getUTCHours(),
    date.getUTCMinutes(),
    date.getUTCSeconds(),
  );
}

/**
 * Format a timestamp-like value for display, falling back to the value's
 * string form.
 */
export function formatTimestamp(value: unknown): string {
  if (typeof value === 'number') {
    return formatEpochSeconds(value) ?? String(value);
  }
  if (typeof value === 'string') {
    return parseIsoTimestamp(value) ?? value;
  }
  if (value === null || value === undefined) {
    return '';
  }
  if (typeof value === 'object') {
    try {
      return JSON.stringify(value);
    } catch {
      return String(value);
    }
  }
  return String(value);
}

/**
 * Run-directory timestamp, e.g. `20240501_134502`.
 */
export function runTimestamp(date: Date = new Date()): string {
  return (
    `${date.getFullYear()}${pad(date.getMonth() + 1)}${pad(date.getDate())}_` +
    `${pad(date.getHours())}${pad(date.getMinutes())}${pad(date.getSeconds())}`
  );
}

/**
 * Report display timestamp in local time, e.g. `2024-05-01 13:45:02`.
 */
export function displayTimestamp(date: Date = new Date()): string {
  return formatParts(
    date.getFullYear(),
    date.getMonth() + 1,
    date.getDate(),
    date.getHours(),
    date.getMinutes(),
    date.getSeconds(),
  );
}
