
import { CanonicalRole, JsonObject, JsonValue, SchemaChoice, SchemaName, isJsonObject } from './types';

/** Candidate keys per canonical role, tried in order; the first key present wins. */
export type FieldMapping = Readonly<Record<CanonicalRole, readonly string[]>>;

const FIELD_MAPPINGS: Record<SchemaName, FieldMapping> = {
  logstash: {
    level: ['level'],
    timestamp: ['@timestamp'],
    logger: ['logger_name'],
    message: ['message'],
    stack_trace: ['stack_trace'],
  },
  logrus: {
    level: ['level'],
    timestamp: ['time'],
    logger: ['component'],
    message: ['msg'],
    stack_trace: ['stack_trace', 'stacktrace'],
  },
  bunyan: {
    level: ['level'],
    timestamp: ['time'],
    logger: ['name'],
    message: ['msg'],
    stack_trace: ['stack'],
  },
  generic: {
    level: ['level', 'severity', 'loglevel', 'log_level', 'lvl'],
    timestamp: ['timestamp', '@timestamp', 'time', 'ts', 'datetime', 'date'],
    logger: ['logger', 'logger_name', 'name', 'component', 'source', 'caller'],
    message: ['message', 'msg', 'text', 'body', 'log'],
    stack_trace: ['stack_trace', 'stacktrace', 'stack', 'exception', 'traceback'],
  },
};

export function fieldMapping(schema: SchemaName): FieldMapping {
  return FIELD_MAPPINGS[schema];
}

export function hasKey(obj: JsonObject, key: string): boolean {
  return Object.prototype.hasOwnProperty.call(obj, key);
}

export function findKey(candidates: readonly string[], obj: JsonObject): string | undefined {
  return candidates.find((key) => hasKey(obj, key));
}

export type DetectableSchema = Exclude<SchemaName, 'generic'>;
export type SchemaScores = Record<DetectableSchema, number>;

export interface DetectionRule {
  schema: DetectableSchema;
  signature: readonly string[];
  bonus: (obj: JsonObject) => number;
}

export const DETECTION_RULES: readonly DetectionRule[] = [
  {
    schema: 'logstash',
    signature: ['@timestamp', 'level', 'logger_name', 'message', 'stack_trace', 'thread_name', '@version'],
    bonus: (obj) => (hasKey(obj, '@timestamp') ? 2 : 0),
  },
  {
    schema: 'logrus',
    signature: ['level', 'msg', 'time', 'component'],
    bonus: () => 0,
  },
  {
    schema: 'bunyan',
    signature: ['v', 'level', 'name', 'hostname', 'pid', 'time', 'msg'],
    bonus: (obj) => (hasKey(obj, 'v') && typeof obj.level === 'number' ? 3 : 0),
  },
];

export function scoreSchemas(obj: JsonObject): SchemaScores {
  const scores: SchemaScores = { logstash: 0, logrus: 0, bunyan: 0 };
  for (const rule of DETECTION_RULES) {
    const hits = rule.signature.filter((key) => hasKey(obj, key)).length;
    scores[rule.schema] = hits + rule.bonus(obj);
  }
  return scores;
}

/**
 * Picks a winner from the scores. The order below is a fixed policy rather
 * than a measure of which schema is "right": logstash needs a strict lead,
 * bunyan only has to beat logstash, so `{"level":..,"msg":..}` is bunyan.
 */
export function resolveTie(scores: SchemaScores): SchemaName {
  const { logstash, logrus, bunyan } = scores;
  const max = Math.max(logstash, logrus, bunyan);
  if (max === 0) return 'generic';
  if (logstash === max && logstash > logrus && logstash > bunyan) return 'logstash';
  if (bunyan === max && bunyan > logstash) return 'bunyan';
  if (logrus === max && logrus > logstash && logrus > bunyan) return 'logrus';
  if (logstash === max) return 'logstash';
  if (bunyan === max) return 'bunyan';
  return 'generic';
}

export function detectSchema(value: JsonValue): SchemaName {
  if (!isJsonObject(value)) return 'generic';
  return resolveTie(scoreSchemas(value));
}

export function schemaFromChoice(choice: SchemaChoice, value: JsonValue): SchemaName {
  return choice === 'auto' ? detectSchema(value) : choice;
}
