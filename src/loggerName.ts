
/**
 * `com.example.service.MyHandler` -> `c.e.s.MyHandler`.
 * Names without a dot (and the empty name) come back unchanged.
 */
export function shortenLoggerName(name: string): string {
  const segments = name.split('.');
  if (segments.length <= 1) return name;
  const last = segments.pop() ?? '';
  // code points, so an astral first character is kept whole
  const initials = segments.map((segment) => Array.from(segment)[0] ?? '');
  return [...initials, last].join('.');
}

/**
 * Crops a logger name from the left so it fits in `maxLength` characters
 * (0 = unlimited). Whole leading segments go first; if that is not enough the
 * rightmost `maxLength` characters are kept.
 */
export function truncateLoggerName(name: string, maxLength: number): string {
  const length = (s: string) => Array.from(s).length;
  if (maxLength === 0 || length(name) <= maxLength) return name;

  let remaining = name;
  while (length(remaining) > maxLength) {
    const dot = remaining.indexOf('.');
    if (dot < 0) break;
    const rest = remaining.slice(dot + 1);
    if (rest === '') break;
    remaining = rest;
  }

  const chars = Array.from(remaining);
  return chars.length > maxLength ? chars.slice(chars.length - maxLength).join('') : remaining;
}
