
import fs from 'fs';
import type { FileHandle } from 'fs/promises';
import { Readable } from 'stream';
import { toInputError } from './errors';
import { LineBuffer } from './lineBuffer';

/**
 * Pull-based line input. `nextLine()` resolves to the next line without its
 * terminator, or `null` once the source is exhausted.
 */
export interface LineSource {
  readonly name: string;
  nextLine(): Promise<string | null>;
  close(): Promise<void>;
}

class StreamSource implements LineSource {
  private readonly iterator: AsyncIterator<unknown>;
  private readonly buffer = new LineBuffer();
  private queue: string[] = [];
  private ended = false;

  constructor(
    readonly name: string,
    private readonly stream: Readable,
  ) {
    this.iterator = stream[Symbol.asyncIterator]();
  }

  async nextLine(): Promise<string | null> {
    while (this.queue.length === 0) {
      if (this.ended) return null;
      let result: IteratorResult<unknown>;
      try {
        result = await this.iterator.next();
      } catch (e: unknown) {
        throw toInputError(e, this.name);
      }
      if (result.done) {
        this.ended = true;
        const rest = this.buffer.flush();
        if (rest !== undefined) this.queue.push(rest);
      } else {
        this.queue.push(...this.buffer.push(toBuffer(result.value)));
      }
    }
    return this.queue.shift() ?? null;
  }

  async close(): Promise<void> {
    this.ended = true;
    this.stream.destroy();
  }
}

function toBuffer(chunk: unknown): Buffer {
  if (Buffer.isBuffer(chunk)) return chunk;
  if (chunk instanceof Uint8Array) return Buffer.from(chunk);
  return Buffer.from(String(chunk), 'utf8');
}

export class StdinSource extends StreamSource {
  constructor(stream: Readable = process.stdin) {
    super('<stdin>', stream);
  }
}

export class FileSource extends StreamSource {
  /** Opens eagerly so a missing or unreadable file fails before any output. */
  static async open(path: string): Promise<FileSource> {
    let handle: FileHandle;
    try {
      handle = await fs.promises.open(path, 'r');
    } catch (e: unknown) {
      throw toInputError(e, path);
    }
    return new FileSource(path, handle.createReadStream());
  }
}
