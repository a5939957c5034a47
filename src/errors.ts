
export type ErrorCode = 'IO_ERROR' | 'PARSE_ERROR' | 'TIMEZONE_ERROR' | 'CONFIG_ERROR';

/**
 * Base error for everything logprism reports to the user.
 * The message is shown as-is on the diagnostic line.
 */
export class LogprismError extends Error {
  constructor(message: string, public readonly code: ErrorCode, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'LogprismError';
  }

  toLogObject(): Record<string, unknown> {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
    };
  }
}

/**
 * Reading an input or writing the output failed.
 */
export class InputError extends LogprismError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(`I/O error: ${message}`, 'IO_ERROR', options);
    this.name = 'InputError';
  }
}

/**
 * A non-JSON line was met while the non-JSON policy is `fail`.
 */
export class ParseError extends LogprismError {
  constructor(message: string) {
    super(`Parse error: ${message}`, 'PARSE_ERROR');
    this.name = 'ParseError';
  }
}

export class TimezoneError extends LogprismError {
  constructor(message: string) {
    super(`Timezone error: ${message}`, 'TIMEZONE_ERROR');
    this.name = 'TimezoneError';
  }
}

export class ConfigError extends LogprismError {
  constructor(message: string) {
    super(`Config error: ${message}`, 'CONFIG_ERROR');
    this.name = 'ConfigError';
  }
}

export function errorCode(err: unknown): string | undefined {
  if (typeof err !== 'object' || err === null || !('code' in err)) return undefined;
  const code = err.code;
  return typeof code === 'string' ? code : undefined;
}

/** True when the downstream reader went away (e.g. `logprism app.log | head`). */
export function isBrokenPipe(err: unknown): boolean {
  if (errorCode(err) === 'EPIPE') return true;
  return err instanceof LogprismError && errorCode(err.cause) === 'EPIPE';
}

/** Wraps a Node system error (ENOENT, EACCES, ...) with the path it concerned. */
export function toInputError(err: unknown, path: string): InputError {
  const detail = err instanceof Error ? err.message : String(err);
  return new InputError(`${path}: ${detail}`, { cause: err });
}
