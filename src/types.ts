
export type JsonPrimitive = string | number | boolean | null;
export type JsonValue = JsonPrimitive | JsonValue[] | JsonObject;
export interface JsonObject {
  [key: string]: JsonValue;
}

export type Level = 'TRACE' | 'DEBUG' | 'INFO' | 'WARN' | 'ERROR' | 'FATAL';

export type SchemaName = 'logstash' | 'logrus' | 'bunyan' | 'generic';
export type SchemaChoice = 'auto' | SchemaName;

export type ColorMode = 'auto' | 'always' | 'never';
export type NonJsonMode = 'print-as-is' | 'skip' | 'fail';
export type LoggerFormat = 'short-dots' | 'as-is';
export type TsFormat = 'time' | 'full';
export type ColorName = 'black' | 'red' | 'green' | 'yellow' | 'blue' | 'magenta' | 'cyan' | 'white';

export type CanonicalRole = 'level' | 'timestamp' | 'logger' | 'message' | 'stack_trace';
export type TemplateField = Exclude<CanonicalRole, 'stack_trace'>;

export interface LogRecord {
  level?: Level;
  timestamp?: string; // already formatted for display
  logger?: string;
  message?: string;
  stackTrace?: string;
  extras: Map<string, JsonValue>; // keys in lexicographic order
  raw: JsonValue;
  rawText?: string; // the input line, as read
}

export type FormatToken =
  | { kind: 'literal'; text: string }
  | { kind: 'field'; field: TemplateField }
  | { kind: 'custom'; name: string };

export interface RenderOptions {
  rawJson: boolean;
  expanded: boolean;
  loggerFormat: LoggerFormat;
  loggerLength: number; // 0 = unlimited
  addFields: readonly string[];
  omitFields: readonly string[];
}

export interface RenderContext {
  omitFields: ReadonlySet<string>;
  addFields: ReadonlySet<string>;
  templateCustomFields: ReadonlySet<string>;
}

export function isJsonObject(value: JsonValue): value is JsonObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}
