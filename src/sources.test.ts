import { describe, test, expect, beforeEach, afterEach } from '@jest/globals';
import fs from 'fs';
import os from 'os';
import path from 'path';
import { Readable } from 'stream';
import { InputError } from './errors';
import { FileSource, LineSource, StdinSource } from './sources';

async function drain(source: LineSource): Promise<string[]> {
  const lines: string[] = [];
  for (let line = await source.nextLine(); line !== null; line = await source.nextLine()) {
    lines.push(line);
  }
  return lines;
}

describe('StdinSource', () => {
  test('splits chunks into lines and flushes the tail at end', async () => {
    const source = new StdinSource(Readable.from([Buffer.from('a\nb'), Buffer.from('c\nlast')]));
    expect(await drain(source)).toEqual(['a', 'bc', 'last']);
    expect(await source.nextLine()).toBeNull();
    await source.close();
  });

  test('accepts string chunks', async () => {
    const source = new StdinSource(Readable.from(['x\r\ny\n']));
    expect(await drain(source)).toEqual(['x', 'y']);
    expect(source.name).toBe('<stdin>');
  });
});

describe('FileSource', () => {
  let dir: string;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'logprism-src-'));
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  test('reads every line, including blank ones and an unterminated last line', async () => {
    const file = path.join(dir, 'app.log');
    fs.writeFileSync(file, '{"a":1}\n\nplain\r\nno newline');
    const source = await FileSource.open(file);
    expect(await drain(source)).toEqual(['{"a":1}', '', 'plain', 'no newline']);
    await source.close();
  });

  test('empty file has no lines', async () => {
    const file = path.join(dir, 'empty.log');
    fs.writeFileSync(file, '');
    const source = await FileSource.open(file);
    expect(await source.nextLine()).toBeNull();
    await source.close();
  });

  test('a missing file is an I/O error naming the path', async () => {
    const file = path.join(dir, 'missing.log');
    await expect(FileSource.open(file)).rejects.toThrow(InputError);
    await expect(FileSource.open(file)).rejects.toThrow(`I/O error: ${file}: `);
  });
});
