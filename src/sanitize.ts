
// Unicode Cc (C0, DEL, C1) minus TAB and LF. ESC/CSI/OSC from hostile log
// content must never reach the terminal.
const CONTROL_CHARS = /[\u0000-\u0008\u000B-\u001F\u007F-\u009F]/g;

export function sanitize(text: string): string {
  return text.replace(CONTROL_CHARS, '');
}
