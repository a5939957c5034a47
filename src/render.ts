
import { ColorConfig } from './color';
import { valueToString } from './extractor';
import { shortenLoggerName, truncateLoggerName } from './loggerName';
import { sanitize } from './sanitize';
import { FormatToken, JsonValue, LogRecord, RenderContext, RenderOptions, TemplateField } from './types';

const STACK_INDENT = '    ';
const EXPANDED_INDENT = '  ';

function renderField(field: TemplateField, record: LogRecord, colors: ColorConfig, options: RenderOptions): string {
  switch (field) {
    case 'level':
      return record.level ? colors.level(record.level) : '';
    case 'timestamp':
      return sanitize(record.timestamp ?? '');
    case 'logger': {
      const raw = record.logger ?? '';
      const formatted = options.loggerFormat === 'short-dots' ? shortenLoggerName(raw) : raw;
      return sanitize(truncateLoggerName(formatted, options.loggerLength));
    }
    case 'message':
      return sanitize(record.message ?? '');
  }
}

function renderToken(token: FormatToken, record: LogRecord, colors: ColorConfig, options: RenderOptions): string {
  switch (token.kind) {
    case 'literal':
      return token.text;
    case 'field':
      return renderField(token.field, record, colors, options);
    case 'custom': {
      // extras only: a key taken by a canonical role is not reachable here
      const value = record.extras.get(token.name);
      return value === undefined ? '' : sanitize(valueToString(value));
    }
  }
}

/**
 * Extras that get appended after the template. Fields the template already
 * shows are skipped; then `addFields` acts as an allow list or `omitFields`
 * as a deny list. With neither set nothing is appended.
 */
export function selectExtras(record: LogRecord, context: RenderContext): Array<[string, JsonValue]> {
  const selected: Array<[string, JsonValue]> = [];
  for (const [key, value] of record.extras) {
    if (context.templateCustomFields.has(key)) continue;
    let include: boolean;
    if (context.addFields.size > 0) {
      include = context.addFields.has(key);
    } else if (context.omitFields.size > 0) {
      include = !context.omitFields.has(key);
    } else {
      include = false;
    }
    if (include) selected.push([key, value]);
  }
  return selected;
}

function renderExtras(extras: Array<[string, JsonValue]>, colors: ColorConfig, expanded: boolean): string {
  if (extras.length === 0) return '';
  const pairs = extras.map(([key, value]) => ({
    key: colors.key(sanitize(key)),
    value: colors.value(sanitize(valueToString(value))),
  }));
  if (expanded) {
    return pairs.map(({ key, value }) => `\n${EXPANDED_INDENT}${key}: ${value}`).join('');
  }
  return ' ' + pairs.map(({ key, value }) => `${key}=${value}`).join(' ');
}

/** One indented line per stack frame, each dimmed on its own. */
export function renderStackTrace(stackTrace: string, colors: ColorConfig): string {
  const lines = sanitize(stackTrace).split('\n');
  if (lines[lines.length - 1] === '') lines.pop();
  return lines.map((line) => '\n' + colors.dim(STACK_INDENT + line)).join('');
}

/**
 * Renders one record to a single output string, which may span several
 * lines in expanded mode or with a stack trace. Pure apart from local
 * timezone lookups done earlier during extraction.
 */
export function renderRecord(
  record: LogRecord,
  tokens: readonly FormatToken[],
  colors: ColorConfig,
  options: RenderOptions,
  context: RenderContext,
): string {
  // The source text, so integers beyond 2^53 come out as they went in
  if (options.rawJson) return record.rawText ?? JSON.stringify(record.raw);

  let line = tokens.map((token) => renderToken(token, record, colors, options)).join('');
  line += renderExtras(selectExtras(record, context), colors, options.expanded);

  if (record.stackTrace !== undefined && !context.omitFields.has('stack_trace')) {
    line += renderStackTrace(record.stackTrace, colors);
  }
  return line;
}
