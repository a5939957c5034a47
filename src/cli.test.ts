import { describe, test, expect } from '@jest/globals';
import { parseCommandLine } from './cli';
import { loadConfig } from './config';
import { ConfigError } from './errors';

describe('parseCommandLine', () => {
  test('only given options are set', () => {
    expect(parseCommandLine(['-f', '{message}', '--min-level', 'warn', '--raw-json', 'a.log', 'b.log'])).toEqual({
      help: false,
      settings: { format: '{message}', minLevel: 'warn', rawJson: true, files: ['a.log', 'b.log'] },
    });
  });

  test('no arguments', () => {
    expect(parseCommandLine([])).toEqual({ help: false, settings: {} });
  });

  test('help', () => {
    expect(parseCommandLine(['-h']).help).toBe(true);
    expect(parseCommandLine(['--help']).help).toBe(true);
  });

  test('long options map onto settings', () => {
    const { settings } = parseCommandLine([
      '--logger-length', '12', '--ts-format', 'full', '--tz', 'utc', '--follow', '-o', 'out.txt', 'app.log',
    ]);
    const config = loadConfig(settings, {});
    expect(config.loggerLength).toBe(12);
    expect(config.tsFormat).toBe('full');
    expect(config.tz).toBe('utc');
    expect(config.follow).toBe(true);
    expect(config.output).toBe('out.txt');
    expect(config.files).toEqual(['app.log']);
  });

  test('unknown options and missing values are config errors', () => {
    expect(() => parseCommandLine(['--bogus'])).toThrow(ConfigError);
    expect(() => parseCommandLine(['--logger-length'])).toThrow(ConfigError);
  });
});
