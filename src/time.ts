/**
 * Time zone helpers built on Intl.
 *
 * Timestamps are rendered as `YYYY-MM-DD HH:MM:SS <zone>`, where the zone is
 * the short en-US name of the zone at that instant (for example `UTC` or
 * `GMT+8`).
 */

import { UsageError, ConfigError } from './errors.js';

export const DEFAULT_TIME_ZONE = 'UTC';

const LOCAL_DATE_TIME = /^(\d{4})-(\d{2})-(\d{2}) (\d{2}):(\d{2}):(\d{2})$/;

interface Formatters {
  fields: Intl.DateTimeFormat;
  zone: Intl.DateTimeFormat;
}

const formatterCache = new Map<string, Formatters>();

function formattersFor(timeZone: string): Formatters {
  let formatters = formatterCache.get(timeZone);
  if (!formatters) {
    formatters = {
      fields: new Intl.DateTimeFormat('en-US', {
        timeZone,
        year: 'numeric',
        month: '2-digit',
        day: '2-digit',
        hour: '2-digit',
        minute: '2-digit',
        second: '2-digit',
        hourCycle: 'h23',
      }),
      zone: new Intl.DateTimeFormat('en-US', { timeZone, timeZoneName: 'short' }),
    };
    formatterCache.set(timeZone, formatters);
  }
  return formatters;
}

interface WallClock {
  year: number;
  month: number;
  day: number;
  hour: number;
  minute: number;
  second: number;
}

function wallClock(instant: number, timeZone: string): WallClock {
  const parts = formattersFor(timeZone).fields.formatToParts(instant);
  const get = (type: Intl.DateTimeFormatPartTypes): number => {
    const part = parts.find((p) => p.type === type);
    return part ? Number(part.value) : 0;
  };
  return {
    year: get('year'),
    month: get('month'),
    day: get('day'),
    hour: get('hour'),
    minute: get('minute'),
    second: get('second'),
  };
}

function pad(value: number, width = 2): string {
  return String(value).padStart(width, '0');
}

/**
 * Validate an IANA time zone name, returning it unchanged.
 */
export function resolveTimeZone(name: string | undefined): string {
  if (name === undefined) {
    return DEFAULT_TIME_ZONE;
  }
  try {
    formattersFor(name);
  } catch (e) {
    throw new ConfigError(`Unknown time zone: ${name}`, e);
  }
  return name;
}

/**
 * Offset of `timeZone` from UTC at `instant`, in milliseconds.
 */
export function timeZoneOffset(instant: number, timeZone: string): number {
  const seconds = Math.floor(instant / 1000) * 1000;
  const wall = wallClock(seconds, timeZone);
  const asUtc = Date.UTC(wall.year, wall.month - 1, wall.day, wall.hour, wall.minute, wall.second);
  return asUtc - seconds;
}

/**
 * Render an instant in the display time zone.
 */
export function formatTimestamp(instant: Date | number, timeZone: string): string {
  const ms = typeof instant === 'number' ? instant : instant.getTime();
  const wall = wallClock(ms, timeZone);
  const zonePart = formattersFor(timeZone)
    .zone.formatToParts(ms)
    .find((p) => p.type === 'timeZoneName');

  const date = `${pad(wall.year, 4)}-${pad(wall.month)}-${pad(wall.day)}`;
  const time = `${pad(wall.hour)}:${pad(wall.minute)}:${pad(wall.second)}`;
  return zonePart ? `${date} ${time} ${zonePart.value}` : `${date} ${time}`;
}

/**
 * Parse `YYYY-MM-DD HH:MM:SS` as a wall-clock time in `timeZone`.
 *
 * @returns Epoch milliseconds.
 */
export function parseLocalDateTime(value: string, timeZone: string): number {
  const match = LOCAL_DATE_TIME.exec(value.trim());
  if (!match) {
    throw new UsageError(`Invalid date time: ${value} (expected format: YYYY-MM-DD HH:MM:SS)`);
  }

  const [year, month, day, hour, minute, second] = match.slice(1).map(Number);
  const guess = Date.UTC(year, month - 1, day, hour, minute, second);

  // Round-trip check rejects impossible dates such as 2024-02-30.
  const check = new Date(guess);
  if (
    check.getUTCFullYear() !== year ||
    check.getUTCMonth() !== month - 1 ||
    check.getUTCDate() !== day ||
    hour > 23 ||
    minute > 59 ||
    second > 59
  ) {
    throw new UsageError(`Invalid date time: ${value}`);
  }

  const offset = timeZoneOffset(guess, timeZone);
  const candidate = guess - offset;
  // Re-evaluate at the candidate instant when a DST transition lies in between.
  const corrected = timeZoneOffset(candidate, timeZone);
  return corrected === offset ? candidate : guess - corrected;
}
