
import { FormatToken, RenderContext, RenderOptions, TemplateField } from './types';

export const DEFAULT_TEMPLATE = '{timestamp} {level} [{logger}] {message}';

const TEMPLATE_FIELDS: readonly TemplateField[] = ['level', 'timestamp', 'logger', 'message'];

function placeholder(name: string): FormatToken {
  const field = TEMPLATE_FIELDS.find((f) => f === name);
  return field ? { kind: 'field', field } : { kind: 'custom', name };
}

/**
 * Splits a format template into tokens in one left-to-right pass.
 *
 * `{name}` is a placeholder, `{{` and `}}` are literal braces, a lone `}` is
 * literal too, and an unclosed `{` takes the rest of the template as its name.
 * Malformed templates never fail.
 */
export function parseTemplate(template: string): FormatToken[] {
  const tokens: FormatToken[] = [];
  const chars = Array.from(template);
  let literal = '';
  let i = 0;

  while (i < chars.length) {
    const ch = chars[i++];
    if (ch === '{') {
      if (chars[i] === '{') {
        i++;
        literal += '{';
        continue;
      }
      if (literal) {
        tokens.push({ kind: 'literal', text: literal });
        literal = '';
      }
      let name = '';
      while (i < chars.length) {
        const inner = chars[i++];
        if (inner === '}') break;
        name += inner;
      }
      tokens.push(placeholder(name));
    } else if (ch === '}') {
      if (chars[i] === '}') i++;
      literal += '}';
    } else {
      literal += ch;
    }
  }

  if (literal) tokens.push({ kind: 'literal', text: literal });
  return tokens;
}

/** Splits a comma-separated field list, trimming names and dropping empty ones. */
export function parseFieldList(list: string | undefined): string[] {
  if (!list) return [];
  return list
    .split(',')
    .map((f) => f.trim())
    .filter((f) => f.length > 0);
}

export function createRenderContext(options: Pick<RenderOptions, 'addFields' | 'omitFields'>, tokens: readonly FormatToken[]): RenderContext {
  const templateCustomFields = new Set<string>();
  for (const token of tokens) {
    if (token.kind === 'custom') templateCustomFields.add(token.name);
  }
  return {
    addFields: new Set(options.addFields),
    omitFields: new Set(options.omitFields),
    templateCustomFields,
  };
}
