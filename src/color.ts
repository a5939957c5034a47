
import { ColorMode, ColorName, Level } from './types';

interface Style {
  open: string;
  close: string;
}

const ESC = '\x1b[';
const sgr = (open: number, close: number): Style => ({ open: `${ESC}${open}m`, close: `${ESC}${close}m` });

export const STYLES = {
  bold: sgr(1, 22),
  dim: sgr(2, 22),
  black: sgr(30, 39),
  red: sgr(31, 39),
  green: sgr(32, 39),
  yellow: sgr(33, 39),
  blue: sgr(34, 39),
  magenta: sgr(35, 39),
  cyan: sgr(36, 39),
  white: sgr(37, 39),
} as const;

const LEVEL_STYLES: Record<Level, readonly Style[]> = {
  TRACE: [STYLES.dim],
  DEBUG: [STYLES.blue],
  INFO: [STYLES.green],
  WARN: [STYLES.yellow],
  ERROR: [STYLES.red],
  FATAL: [STYLES.bold, STYLES.red],
};

function paint(text: string, styles: readonly Style[]): string {
  const open = styles.map((s) => s.open).join('');
  const close = styles
    .map((s) => s.close)
    .reverse()
    .join('');
  return `${open}${text}${close}`;
}

export interface ColorSettings {
  mode: ColorMode;
  keyColor: ColorName;
  valueColor: ColorName;
}

/**
 * Built once at startup and shared by every render call. With `enabled`
 * false every method returns its input untouched.
 */
export class ColorConfig {
  private constructor(
    readonly enabled: boolean,
    readonly keyColor: ColorName,
    readonly valueColor: ColorName,
  ) {
    Object.freeze(this);
  }

  /** `auto` colors only a TTY stdout, and never output redirected with `--output`. */
  static fromSettings(settings: ColorSettings, stdoutIsTTY: boolean, writingToFile: boolean): ColorConfig {
    const enabled =
      settings.mode === 'always' ? true : settings.mode === 'never' ? false : stdoutIsTTY && !writingToFile;
    return new ColorConfig(enabled, settings.keyColor, settings.valueColor);
  }

  static withEnabled(enabled: boolean, keyColor: ColorName = 'magenta', valueColor: ColorName = 'cyan'): ColorConfig {
    return new ColorConfig(enabled, keyColor, valueColor);
  }

  level(level: Level): string {
    return this.enabled ? paint(level, LEVEL_STYLES[level]) : level;
  }

  key(text: string): string {
    return this.enabled ? paint(text, [STYLES[this.keyColor]]) : text;
  }

  value(text: string): string {
    return this.enabled ? paint(text, [STYLES[this.valueColor]]) : text;
  }

  dim(text: string): string {
    return this.enabled ? paint(text, [STYLES.dim]) : text;
  }
}
