
import { levelFromValue } from './level';
import { FieldMapping, findKey } from './schema';
import { ResolvedZone, formatTimestamp, parseTimestamp } from './timestamp';
import { CanonicalRole, JsonObject, JsonValue, LogRecord, TsFormat, isJsonObject } from './types';

const ROLES: readonly CanonicalRole[] = ['level', 'timestamp', 'logger', 'message', 'stack_trace'];

/** Strings as they are, everything else as compact JSON. */
export function valueToString(value: JsonValue): string {
  return typeof value === 'string' ? value : JSON.stringify(value);
}

function formatTimestampValue(value: JsonValue, timezone: string | ResolvedZone, style: TsFormat): string {
  const instant = parseTimestamp(value);
  // Unparseable timestamps are shown as found rather than dropped
  return instant ? formatTimestamp(instant, timezone, style) : valueToString(value);
}

function collectExtras(obj: JsonObject, consumed: ReadonlySet<string>): Map<string, JsonValue> {
  const keys = Object.keys(obj)
    .filter((key) => !consumed.has(key))
    .sort();
  return new Map(keys.map((key): [string, JsonValue] => [key, obj[key]]));
}

/**
 * Projects one parsed JSON line onto a {@link LogRecord}.
 *
 * Throws `TimezoneError` when `timezone` cannot be resolved; a missing or
 * unrecognized field is never an error.
 */
export function extractRecord(
  value: JsonValue,
  mapping: FieldMapping,
  timezone: string | ResolvedZone,
  style: TsFormat,
): LogRecord {
  if (!isJsonObject(value)) {
    return { message: JSON.stringify(value), extras: new Map(), raw: value };
  }

  const keys: Partial<Record<CanonicalRole, string>> = {};
  for (const role of ROLES) {
    keys[role] = findKey(mapping[role], value);
  }
  const read = (role: CanonicalRole): JsonValue | undefined => {
    const key = keys[role];
    return key === undefined ? undefined : value[key];
  };

  const level = read('level');
  const timestamp = read('timestamp');
  const logger = read('logger');
  const message = read('message');
  const stackTrace = read('stack_trace');

  const consumed = new Set<string>();
  for (const key of Object.values(keys)) {
    if (key !== undefined) consumed.add(key);
  }

  return {
    level: level === undefined ? undefined : levelFromValue(level),
    timestamp: timestamp === undefined ? undefined : formatTimestampValue(timestamp, timezone, style),
    logger: logger === undefined ? undefined : valueToString(logger),
    message: message === undefined ? undefined : valueToString(message),
    stackTrace: stackTrace === undefined ? undefined : valueToString(stackTrace),
    extras: collectExtras(value, consumed),
    raw: value,
  };
}
