
import { ParseError } from './errors';
import { sanitize } from './sanitize';
import { JsonValue, NonJsonMode } from './types';

export type ParsedLine =
  | { kind: 'json'; value: JsonValue }
  | { kind: 'text'; text: string }
  | { kind: 'skip' };

function tryParseJson(line: string): JsonValue | undefined {
  try {
    // JSON.parse only ever produces JSON values
    const value: JsonValue = JSON.parse(line);
    return value;
  } catch {
    return undefined;
  }
}

/**
 * Parses one input line. Non-JSON lines are handled per `mode`: passed on
 * as text (the caller sanitizes before writing), skipped silently, or
 * reported as a `ParseError` that ends the run.
 */
export function parseLine(line: string, mode: NonJsonMode): ParsedLine {
  const value = tryParseJson(line);
  if (value !== undefined) return { kind: 'json', value };
  switch (mode) {
    case 'print-as-is':
      return { kind: 'text', text: line };
    case 'skip':
      return { kind: 'skip' };
    case 'fail':
      throw new ParseError(`not valid JSON: ${sanitize(line)}`);
  }
}
