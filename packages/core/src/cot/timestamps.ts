// YYYY-MM-DDTHH:MM:SS[.fraction](Z|+HH:MM|-HH:MM)
const ISO_8601 = /^(\d{4})-(\d{2})-(\d{2})T(\d{2}):(\d{2}):(\d{2})(?:\.(\d+))?(Z|[+-]\d{2}:\d{2})$/;

/**
 * Parse a CoT wire timestamp into epoch milliseconds.
 * Only ISO-8601 date-times with an explicit zone are accepted; anything else
 * (including impossible calendar dates) yields `null`.
 * Fractions finer than a millisecond are truncated.
 */
export function parseCotTimestamp(text: string): number | null {
  const match = ISO_8601.exec(text.trim());
  if (!match) {
    return null;
  }

  const [, y, mo, d, h, mi, s, fraction, zone] = match;
  const year = Number(y);
  const month = Number(mo);
  const day = Number(d);
  const hour = Number(h);
  const minute = Number(mi);
  const second = Number(s);
  const millis = fraction ? Number(fraction.slice(0, 3).padEnd(3, '0')) : 0;

  if (month < 1 || month > 12 || hour > 23 || minute > 59 || second > 59) {
    return null;
  }

  const utc = Date.UTC(year, month - 1, day, hour, minute, second, millis);
  const check = new Date(utc);
  // Date.UTC rolls Feb 30 over into March; reject instead
  if (check.getUTCFullYear() !== year || check.getUTCMonth() !== month - 1 || check.getUTCDate() !== day) {
    return null;
  }

  if (zone === 'Z') {
    return utc;
  }

  const sign = zone.startsWith('-') ? -1 : 1;
  const offsetHours = Number(zone.slice(1, 3));
  const offsetMinutes = Number(zone.slice(4, 6));
  if (offsetHours > 23 || offsetMinutes > 59) {
    return null;
  }
  return utc - sign * (offsetHours * 60 + offsetMinutes) * 60_000;
}

/**
 * Format epoch milliseconds as a CoT wire timestamp (always UTC, millisecond precision).
 */
export function formatCotTimestamp(ms: number): string {
  return new Date(ms).toISOString();
}
