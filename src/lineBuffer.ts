
import { StringDecoder } from 'string_decoder';

/**
 * Turns arbitrary byte chunks into complete lines.
 *
 * Multi-byte UTF-8 sequences split across chunks are reassembled, LF and
 * CRLF terminators are removed, and text after the last LF is held back
 * until more data arrives.
 */
export class LineBuffer {
  private decoder = new StringDecoder('utf8');
  private partial = '';

  push(chunk: Buffer): string[] {
    this.partial += this.decoder.write(chunk);
    const lines: string[] = [];
    let idx: number;
    while ((idx = this.partial.indexOf('\n')) >= 0) {
      lines.push(stripCR(this.partial.slice(0, idx)));
      this.partial = this.partial.slice(idx + 1);
    }
    return lines;
  }

  /**
   * Final unterminated line, if any. Only for sources that really end; a
   * lone trailing CR is kept since it is not a CRLF terminator.
   */
  flush(): string | undefined {
    const rest = this.partial + this.decoder.end();
    this.partial = '';
    this.decoder = new StringDecoder('utf8');
    return rest.length > 0 ? rest : undefined;
  }

  /** Drops the buffered partial line, e.g. after the file it came from was replaced. */
  reset(): void {
    this.partial = '';
    this.decoder = new StringDecoder('utf8');
  }
}

function stripCR(line: string): string {
  return line.endsWith('\r') ? line.slice(0, -1) : line;
}
