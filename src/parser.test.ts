import { describe, test, expect } from '@jest/globals';
import { ParseError } from './errors';
import { parseLine } from './parser';

describe('parseLine', () => {
  test('any JSON value is accepted', () => {
    expect(parseLine('{"a":1}', 'fail')).toEqual({ kind: 'json', value: { a: 1 } });
    expect(parseLine('"str"', 'fail')).toEqual({ kind: 'json', value: 'str' });
    expect(parseLine('null', 'fail')).toEqual({ kind: 'json', value: null });
  });

  test('print-as-is passes the line through', () => {
    expect(parseLine('plain text', 'print-as-is')).toEqual({ kind: 'text', text: 'plain text' });
    expect(parseLine('', 'print-as-is')).toEqual({ kind: 'text', text: '' });
  });

  test('skip drops the line', () => {
    expect(parseLine('{"truncated":', 'skip')).toEqual({ kind: 'skip' });
  });

  test('fail reports the sanitized line', () => {
    expect(() => parseLine('oops \x1b[31m', 'fail')).toThrow(ParseError);
    expect(() => parseLine('oops \x1b[31m', 'fail')).toThrow('Parse error: not valid JSON: oops [31m');
  });
});
