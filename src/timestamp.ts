
import { TimezoneError } from './errors';
import { JsonValue, TsFormat } from './types';

/**
 * A point in time as read from a log record.
 *
 * `seconds` may be negative; `nanos` is always within [0, 1e9) so that
 * pre-1970 instants still print a positive sub-second part.
 */
export interface Instant {
  seconds: number;
  nanos: number;
  offsetSeconds: number; // offset the source text carried, 0 when it had none
}

export type ResolvedZone =
  | { kind: 'utc' }
  | { kind: 'local' }
  | { kind: 'named'; name: string; formatter: Intl.DateTimeFormat };

const NANOS_PER_SECOND = 1_000_000_000;
const SECONDS_PER_DAY = 86_400;
// Range of a JS Date, in seconds
const MAX_EPOCH_SECONDS = 8.64e12;
const EPOCH_MILLIS_THRESHOLD = 1e12;

const WITH_OFFSET = /^(\d{4})-(\d{2})-(\d{2})[Tt ](\d{2}):(\d{2}):(\d{2})(?:\.(\d+))?([Zz]|[+-]\d{2}:\d{2})$/;
const WITHOUT_OFFSET = /^(\d{4})-(\d{2})-(\d{2})[T ](\d{2}):(\d{2}):(\d{2})(?:\.(\d+))?$/;

// Howard Hinnant's days_from_civil / civil_from_days; Date.UTC maps years 0-99 onto 1900-1999.
export function daysFromCivil(year: number, month: number, day: number): number {
  const y = month <= 2 ? year - 1 : year;
  const era = Math.floor(y / 400);
  const yoe = y - era * 400;
  const mp = (month + 9) % 12;
  const doy = Math.floor((153 * mp + 2) / 5) + day - 1;
  const doe = yoe * 365 + Math.floor(yoe / 4) - Math.floor(yoe / 100) + doy;
  return era * 146097 + doe - 719468;
}

export function civilFromDays(days: number): { year: number; month: number; day: number } {
  const z = days + 719468;
  const era = Math.floor(z / 146097);
  const doe = z - era * 146097;
  const yoe = Math.floor((doe - Math.floor(doe / 1460) + Math.floor(doe / 36524) - Math.floor(doe / 146096)) / 365);
  const doy = doe - (365 * yoe + Math.floor(yoe / 4) - Math.floor(yoe / 100));
  const mp = Math.floor((5 * doy + 2) / 153);
  const day = doy - Math.floor((153 * mp + 2) / 5) + 1;
  const month = mp < 10 ? mp + 3 : mp - 9;
  const year = yoe + era * 400 + (month <= 2 ? 1 : 0);
  return { year, month, day };
}

function daysInMonth(year: number, month: number): number {
  if (month === 2) {
    const leap = year % 4 === 0 && (year % 100 !== 0 || year % 400 === 0);
    return leap ? 29 : 28;
  }
  return [4, 6, 9, 11].includes(month) ? 30 : 31;
}

function fractionToNanos(fraction: string | undefined): number {
  if (!fraction) return 0;
  return Number(fraction.slice(0, 9).padEnd(9, '0'));
}

function parseOffset(text: string): number | undefined {
  if (text === 'Z' || text === 'z') return 0;
  const hours = Number(text.slice(1, 3));
  const minutes = Number(text.slice(4, 6));
  if (hours > 23 || minutes > 59) return undefined;
  const sign = text[0] === '-' ? -1 : 1;
  return sign * (hours * 3600 + minutes * 60);
}

function fromMatch(match: RegExpExecArray, offsetSeconds: number): Instant | undefined {
  const [year, month, day, hour, minute, second] = match.slice(1, 7).map(Number);
  if (month < 1 || month > 12) return undefined;
  if (day < 1 || day > daysInMonth(year, month)) return undefined;
  if (hour > 23 || minute > 59 || second > 59) return undefined;
  const wall = daysFromCivil(year, month, day) * SECONDS_PER_DAY + hour * 3600 + minute * 60 + second;
  return {
    seconds: wall - offsetSeconds,
    nanos: fractionToNanos(match[7]),
    offsetSeconds,
  };
}

function parseIsoString(text: string): Instant | undefined {
  const withOffset = WITH_OFFSET.exec(text);
  if (withOffset) {
    const offset = parseOffset(withOffset[8]);
    return offset === undefined ? undefined : fromMatch(withOffset, offset);
  }
  const naive = WITHOUT_OFFSET.exec(text);
  if (naive) return fromMatch(naive, 0);
  return undefined;
}

/**
 * Numbers with a magnitude of at least 1e12 are epoch milliseconds, smaller
 * ones epoch seconds (fraction kept). Both use floor division so the
 * remainder never goes negative.
 */
export function parseEpoch(value: number): Instant | undefined {
  if (!Number.isFinite(value)) return undefined;
  let seconds: number;
  let nanos: number;
  if (Math.abs(value) >= EPOCH_MILLIS_THRESHOLD) {
    const millis = Math.trunc(value);
    if (!Number.isSafeInteger(millis)) return undefined;
    seconds = Math.floor(millis / 1000);
    nanos = (millis - seconds * 1000) * 1_000_000;
  } else {
    seconds = Math.floor(value);
    nanos = Math.min(Math.trunc((value - seconds) * NANOS_PER_SECOND), NANOS_PER_SECOND - 1);
  }
  if (Math.abs(seconds) > MAX_EPOCH_SECONDS) return undefined;
  return { seconds, nanos, offsetSeconds: 0 };
}

/** Returns undefined for anything that is not a recognizable timestamp; callers keep the raw value. */
export function parseTimestamp(value: JsonValue): Instant | undefined {
  if (typeof value === 'string') return parseIsoString(value);
  if (typeof value === 'number') return parseEpoch(value);
  return undefined;
}

const zoneCache = new Map<string, ResolvedZone>();

/**
 * Resolves `local`, `utc` (any case) or an IANA zone name.
 * An unknown name is a configuration error.
 */
export function resolveTimeZone(name: string): ResolvedZone {
  const cached = zoneCache.get(name);
  if (cached) return cached;

  const lower = name.replace(/[A-Z]/g, (c) => c.toLowerCase());
  let zone: ResolvedZone;
  if (lower === 'local') {
    zone = { kind: 'local' };
  } else if (lower === 'utc') {
    zone = { kind: 'utc' };
  } else {
    try {
      const formatter = new Intl.DateTimeFormat('en-US', {
        timeZone: name,
        hourCycle: 'h23',
        era: 'short',
        year: 'numeric',
        month: '2-digit',
        day: '2-digit',
        hour: '2-digit',
        minute: '2-digit',
        second: '2-digit',
      });
      zone = { kind: 'named', name, formatter };
    } catch (e: unknown) {
      if (e instanceof RangeError) throw new TimezoneError(`unknown timezone: ${name}`);
      throw e;
    }
  }
  zoneCache.set(name, zone);
  return zone;
}

function offsetSecondsAt(zone: ResolvedZone, seconds: number, millis: number): number {
  switch (zone.kind) {
    case 'utc':
      return 0;
    case 'local':
      return Math.round(-new Date(millis).getTimezoneOffset() * 60);
    case 'named': {
      const fields: Record<string, number> = {};
      let beforeCommonEra = false;
      for (const part of zone.formatter.formatToParts(new Date(millis))) {
        if (part.type === 'era') beforeCommonEra = part.value === 'BC';
        else if (part.type !== 'literal') fields[part.type] = Number(part.value);
      }
      // Intl counts 1 BC, 2 BC, ... with no year 0
      const year = beforeCommonEra ? 1 - fields.year : fields.year;
      const hour = fields.hour === 24 ? 0 : fields.hour;
      const wall =
        daysFromCivil(year, fields.month, fields.day) * SECONDS_PER_DAY +
        hour * 3600 +
        fields.minute * 60 +
        fields.second;
      return wall - seconds;
    }
  }
}

const pad = (n: number, width: number) => String(n).padStart(width, '0');

function formatYear(year: number): string {
  if (year >= 0 && year <= 9999) return pad(year, 4);
  return (year < 0 ? '-' : '+') + pad(Math.abs(year), 4);
}

function formatOffset(offsetSeconds: number): string {
  const sign = offsetSeconds < 0 ? '-' : '+';
  const abs = Math.abs(offsetSeconds);
  return `${sign}${pad(Math.floor(abs / 3600), 2)}:${pad(Math.floor((abs % 3600) / 60), 2)}`;
}

/**
 * Formats an instant in the target zone.
 *
 * - `time`: `HH:MM:SS.mmm`
 * - `full`: `YYYY-MM-DDTHH:MM:SS.mmm` followed by `Z` for utc or `±HH:MM` otherwise
 */
export function formatTimestamp(instant: Instant, timezone: string | ResolvedZone, style: TsFormat): string {
  const zone = typeof timezone === 'string' ? resolveTimeZone(timezone) : timezone;
  const millisOfSecond = Math.floor(instant.nanos / 1_000_000);
  const offset = offsetSecondsAt(zone, instant.seconds, instant.seconds * 1000 + millisOfSecond);

  const wall = instant.seconds + offset;
  const days = Math.floor(wall / SECONDS_PER_DAY);
  const secondOfDay = wall - days * SECONDS_PER_DAY;
  const time =
    `${pad(Math.floor(secondOfDay / 3600), 2)}:${pad(Math.floor((secondOfDay % 3600) / 60), 2)}:` +
    `${pad(secondOfDay % 60, 2)}.${pad(millisOfSecond, 3)}`;
  if (style === 'time') return time;

  const { year, month, day } = civilFromDays(days);
  const suffix = zone.kind === 'utc' ? 'Z' : formatOffset(offset);
  return `${formatYear(year)}-${pad(month, 2)}-${pad(day, 2)}T${time}${suffix}`;
}
