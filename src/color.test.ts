import { describe, test, expect } from '@jest/globals';
import { ColorConfig } from './color';

const settings = { keyColor: 'magenta', valueColor: 'cyan' } as const;

describe('ColorConfig', () => {
  test('auto colors a terminal only', () => {
    expect(ColorConfig.fromSettings({ ...settings, mode: 'auto' }, true, false).enabled).toBe(true);
    expect(ColorConfig.fromSettings({ ...settings, mode: 'auto' }, false, false).enabled).toBe(false);
    expect(ColorConfig.fromSettings({ ...settings, mode: 'auto' }, true, true).enabled).toBe(false);
  });

  test('always and never ignore the terminal', () => {
    expect(ColorConfig.fromSettings({ ...settings, mode: 'always' }, false, true).enabled).toBe(true);
    expect(ColorConfig.fromSettings({ ...settings, mode: 'never' }, true, false).enabled).toBe(false);
  });

  test('levels get their colors', () => {
    const colors = ColorConfig.withEnabled(true);
    expect(colors.level('INFO')).toBe('\x1b[32mINFO\x1b[39m');
    expect(colors.level('TRACE')).toBe('\x1b[2mTRACE\x1b[22m');
    expect(colors.level('FATAL')).toBe('\x1b[1m\x1b[31mFATAL\x1b[39m\x1b[22m');
  });

  test('key and value colors are configurable', () => {
    const colors = ColorConfig.withEnabled(true, 'yellow', 'white');
    expect(colors.key('host')).toBe('\x1b[33mhost\x1b[39m');
    expect(colors.value('web-1')).toBe('\x1b[37mweb-1\x1b[39m');
  });

  test('disabled colors return text untouched', () => {
    const colors = ColorConfig.withEnabled(false);
    expect(colors.level('ERROR')).toBe('ERROR');
    expect(colors.key('k')).toBe('k');
    expect(colors.dim('d')).toBe('d');
  });

  test('is frozen', () => {
    expect(Object.isFrozen(ColorConfig.withEnabled(true))).toBe(true);
  });
});
