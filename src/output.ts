
import fs from 'fs';
import { Writable } from 'stream';
import { InputError, toInputError } from './errors';

export interface OutputSink {
  writeLine(line: string): Promise<void>;
  close(): Promise<void>;
}

function write(stream: Writable, text: string): Promise<void> {
  return new Promise((resolve, reject) => {
    stream.write(text, (err) => (err ? reject(err) : resolve()));
  });
}

/**
 * Awaits every line so an interactive reader sees each record as soon as
 * it is rendered. A closed pipe surfaces as an error with code EPIPE.
 */
export class StdoutSink implements OutputSink {
  constructor(private readonly stream: Writable = process.stdout) {}

  async writeLine(line: string): Promise<void> {
    try {
      await write(this.stream, line + '\n');
    } catch (e: unknown) {
      throw new InputError('writing to stdout failed', { cause: e });
    }
  }

  async close(): Promise<void> {}
}

/** Buffered by the write stream; everything is flushed on `close()`. */
export class FileSink implements OutputSink {
  private failure?: Error;

  private constructor(
    private readonly path: string,
    private readonly stream: fs.WriteStream,
  ) {
    stream.on('error', (err) => {
      this.failure = err;
    });
  }

  static async create(path: string): Promise<FileSink> {
    const stream = fs.createWriteStream(path, { flags: 'w' });
    await new Promise<void>((resolve, reject) => {
      stream.once('open', () => resolve());
      stream.once('error', (err) => reject(toInputError(err, path)));
    });
    return new FileSink(path, stream);
  }

  async writeLine(line: string): Promise<void> {
    if (this.failure) throw toInputError(this.failure, this.path);
    if (this.stream.write(line + '\n')) return;
    await new Promise<void>((resolve, reject) => {
      const onDrain = () => {
        this.stream.off('error', onError);
        resolve();
      };
      const onError = (err: Error) => {
        this.stream.off('drain', onDrain);
        reject(toInputError(err, this.path));
      };
      this.stream.once('drain', onDrain);
      this.stream.once('error', onError);
    });
  }

  async close(): Promise<void> {
    await new Promise<void>((resolve, reject) => {
      this.stream.end((err?: Error | null) => (err ? reject(toInputError(err, this.path)) : resolve()));
    });
    if (this.failure) throw toInputError(this.failure, this.path);
  }
}
