import { describe, test, expect } from '@jest/globals';
import { DEFAULT_TEMPLATE, createRenderContext, parseFieldList, parseTemplate } from './template';

describe('parseTemplate', () => {
  test('default template', () => {
    expect(parseTemplate(DEFAULT_TEMPLATE)).toEqual([
      { kind: 'field', field: 'timestamp' },
      { kind: 'literal', text: ' ' },
      { kind: 'field', field: 'level' },
      { kind: 'literal', text: ' [' },
      { kind: 'field', field: 'logger' },
      { kind: 'literal', text: '] ' },
      { kind: 'field', field: 'message' },
    ]);
  });

  test('unknown names are custom fields', () => {
    expect(parseTemplate('{host}:{pid}')).toEqual([
      { kind: 'custom', name: 'host' },
      { kind: 'literal', text: ':' },
      { kind: 'custom', name: 'pid' },
    ]);
  });

  test('doubled braces are literal', () => {
    expect(parseTemplate('{{literal}}')).toEqual([{ kind: 'literal', text: '{literal}' }]);
  });

  test('a lone closing brace is literal', () => {
    expect(parseTemplate('a}b')).toEqual([{ kind: 'literal', text: 'a}b' }]);
  });

  test('an unclosed placeholder takes the rest', () => {
    expect(parseTemplate('abc {unterminated')).toEqual([
      { kind: 'literal', text: 'abc ' },
      { kind: 'custom', name: 'unterminated' },
    ]);
  });

  test('edge cases never fail', () => {
    expect(parseTemplate('')).toEqual([]);
    expect(parseTemplate('{}')).toEqual([{ kind: 'custom', name: '' }]);
    expect(parseTemplate('stack_trace {stack_trace}')).toEqual([
      { kind: 'literal', text: 'stack_trace ' },
      { kind: 'custom', name: 'stack_trace' },
    ]);
  });
});

describe('parseFieldList', () => {
  test('trims and drops empties', () => {
    expect(parseFieldList(' host, ,pid ')).toEqual(['host', 'pid']);
    expect(parseFieldList('')).toEqual([]);
    expect(parseFieldList(undefined)).toEqual([]);
  });
});

describe('createRenderContext', () => {
  test('collects custom template fields', () => {
    const context = createRenderContext({ addFields: ['a'], omitFields: [] }, parseTemplate('{level} {host} {pid}'));
    expect([...context.templateCustomFields]).toEqual(['host', 'pid']);
    expect(context.addFields.has('a')).toBe(true);
    expect(context.omitFields.size).toBe(0);
  });
});
