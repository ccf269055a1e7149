import { DateTime } from 'luxon';

export interface ClockPort {
  nowMs(): number;
}

/**
 * Create a system clock adapter that uses Date.now()
 *
 * Only composition roots create it; everything else receives a ClockPort.
 */
export function createSystemClock(): ClockPort {
  return { nowMs: () => Date.now() };
}

/**
 * ISO-8601 UTC timestamp for a clock reading, as stored on registry rows
 */
export function toIsoTimestamp(ms: number): string {
  const iso = DateTime.fromMillis(ms, { zone: 'utc' }).toISO();
  if (iso === null) {
    throw new RangeError(`Invalid timestamp: ${ms}`);
  }
  return iso;
}
