import { describe, test, expect } from '@jest/globals';
import { LEVELS, compareLevels, levelFromBunyan, levelFromValue, parseLevelName, passesMinLevel } from './level';

describe('level', () => {
  test('names parse case-insensitively', () => {
    expect(parseLevelName('info')).toBe('INFO');
    expect(parseLevelName('Info')).toBe('INFO');
    expect(parseLevelName('WaRn')).toBe('WARN');
    expect(parseLevelName('trace')).toBe('TRACE');
  });

  test('synonyms map onto WARN and FATAL', () => {
    expect(parseLevelName('warning')).toBe('WARN');
    expect(parseLevelName('CRITICAL')).toBe('FATAL');
    expect(parseLevelName('panic')).toBe('FATAL');
  });

  test('unknown names have no level', () => {
    expect(parseLevelName('verbose')).toBeUndefined();
    expect(parseLevelName('')).toBeUndefined();
    expect(parseLevelName('toString')).toBeUndefined();
    // non-ASCII letters are not folded
    expect(parseLevelName('ınfo')).toBeUndefined();
  });

  test('bunyan scale', () => {
    expect([10, 20, 30, 40, 50, 60].map(levelFromBunyan)).toEqual(['TRACE', 'DEBUG', 'INFO', 'WARN', 'ERROR', 'FATAL']);
    expect(levelFromBunyan(0)).toBeUndefined();
    expect(levelFromBunyan(35)).toBeUndefined();
    expect(levelFromBunyan(30.5)).toBeUndefined();
    expect(levelFromBunyan(-10)).toBeUndefined();
  });

  test('only strings and numbers carry a level', () => {
    expect(levelFromValue('error')).toBe('ERROR');
    expect(levelFromValue(50)).toBe('ERROR');
    expect(levelFromValue(true)).toBeUndefined();
    expect(levelFromValue(null)).toBeUndefined();
    expect(levelFromValue(['info'])).toBeUndefined();
    expect(levelFromValue({ level: 'info' })).toBeUndefined();
  });

  test('ordering is total', () => {
    for (let i = 1; i < LEVELS.length; i++) {
      expect(compareLevels(LEVELS[i - 1], LEVELS[i])).toBeLessThan(0);
    }
    expect(compareLevels('INFO', 'INFO')).toBe(0);
  });

  test('min-level filter lets level-less records through', () => {
    expect(passesMinLevel('DEBUG', 'WARN')).toBe(false);
    expect(passesMinLevel('WARN', 'WARN')).toBe(true);
    expect(passesMinLevel('FATAL', 'WARN')).toBe(true);
    expect(passesMinLevel(undefined, 'WARN')).toBe(true);
    expect(passesMinLevel('TRACE', undefined)).toBe(true);
  });
});
