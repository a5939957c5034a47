import { describe, test, expect } from '@jest/globals';
import { ConfigError, InputError, LogprismError, ParseError, TimezoneError, isBrokenPipe, toInputError } from './errors';

describe('errors', () => {
  test('each error carries its code and a prefixed message', () => {
    expect(new ParseError('bad input').message).toBe('Parse error: bad input');
    expect(new ParseError('bad input').code).toBe('PARSE_ERROR');
    expect(new TimezoneError('unknown timezone: Mars/Base').message).toBe('Timezone error: unknown timezone: Mars/Base');
    expect(new ConfigError('nope').code).toBe('CONFIG_ERROR');
    expect(new InputError('gone').code).toBe('IO_ERROR');
  });

  test('subclasses are LogprismErrors with their own name', () => {
    const err = new TimezoneError('x');
    expect(err).toBeInstanceOf(LogprismError);
    expect(err).toBeInstanceOf(Error);
    expect(err.name).toBe('TimezoneError');
    expect(err.toLogObject()).toEqual({ name: 'TimezoneError', code: 'TIMEZONE_ERROR', message: 'Timezone error: x' });
  });

  test('toInputError keeps the path and the original error as cause', () => {
    const cause = Object.assign(new Error('ENOENT: no such file'), { code: 'ENOENT' });
    const err = toInputError(cause, '/var/log/app.log');
    expect(err.message).toBe('I/O error: /var/log/app.log: ENOENT: no such file');
    expect(err.cause).toBe(cause);
  });

  test('isBrokenPipe recognizes EPIPE directly or as a cause', () => {
    const epipe = Object.assign(new Error('write EPIPE'), { code: 'EPIPE' });
    expect(isBrokenPipe(epipe)).toBe(true);
    expect(isBrokenPipe(new InputError('writing to stdout failed', { cause: epipe }))).toBe(true);
    expect(isBrokenPipe(new InputError('other'))).toBe(false);
    expect(isBrokenPipe(new Error('plain'))).toBe(false);
    expect(isBrokenPipe(undefined)).toBe(false);
  });
});
