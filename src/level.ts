
import { JsonValue, Level } from './types';

export const LEVELS: readonly Level[] = ['TRACE', 'DEBUG', 'INFO', 'WARN', 'ERROR', 'FATAL'];

const LEVEL_NAMES: Record<string, Level> = {
  TRACE: 'TRACE',
  DEBUG: 'DEBUG',
  INFO: 'INFO',
  WARN: 'WARN',
  WARNING: 'WARN',
  ERROR: 'ERROR',
  FATAL: 'FATAL',
  CRITICAL: 'FATAL',
  PANIC: 'FATAL',
};

// Bunyan / pino numeric levels
const BUNYAN_LEVELS: Record<number, Level> = {
  10: 'TRACE',
  20: 'DEBUG',
  30: 'INFO',
  40: 'WARN',
  50: 'ERROR',
  60: 'FATAL',
};

export function levelRank(level: Level): number {
  return LEVELS.indexOf(level);
}

export function compareLevels(a: Level, b: Level): number {
  return levelRank(a) - levelRank(b);
}

export function parseLevelName(name: string): Level | undefined {
  // ASCII only: toUpperCase() would map e.g. a dotless 'ı' onto 'I'
  const key = name.replace(/[a-z]/g, (c) => c.toUpperCase());
  return Object.prototype.hasOwnProperty.call(LEVEL_NAMES, key) ? LEVEL_NAMES[key] : undefined;
}

export function levelFromBunyan(n: number): Level | undefined {
  if (!Number.isInteger(n)) return undefined;
  return Object.prototype.hasOwnProperty.call(BUNYAN_LEVELS, n) ? BUNYAN_LEVELS[n] : undefined;
}

/** Strings go through the name table, integers through the Bunyan scale; anything else has no level. */
export function levelFromValue(value: JsonValue): Level | undefined {
  if (typeof value === 'string') return parseLevelName(value);
  if (typeof value === 'number') return levelFromBunyan(value);
  return undefined;
}

/** Records without a level always pass. */
export function passesMinLevel(level: Level | undefined, minLevel: Level | undefined): boolean {
  if (!minLevel || !level) return true;
  return compareLevels(level, minLevel) >= 0;
}
