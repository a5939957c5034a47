import fs from 'fs';
import type { FileHandle } from 'fs/promises';
import { EventEmitter } from 'events';
import { setTimeout as sleep } from 'timers/promises';
import { errorCode, toInputError } from './errors';
import { LineBuffer } from './lineBuffer';
import { FileStats, IdentityRotationDetector, LengthProbeRotationDetector, RotationDetector, RotationVerdict } from './rotation';
import { LineSource } from './sources';

export type FollowState = 'reading' | 'eof-wait' | 'rotated';

export interface FollowOptions {
  backoffMs?: number;
  /** Consecutive checks without a file identity before switching to the length probe. */
  identityMissThreshold?: number;
  detector?: RotationDetector;
  signal?: AbortSignal;
  readSize?: number;
}

const DEFAULT_BACKOFF_MS = 200;
const DEFAULT_IDENTITY_MISS_THRESHOLD = 5;
const DEFAULT_READ_SIZE = 64 * 1024;

export interface FollowSource {
  on(event: 'notice', listener: (msg: string) => void): this;
  on(event: 'warning', listener: (msg: string) => void): this;
  emit(event: 'notice', msg: string): boolean;
  emit(event: 'warning', msg: string): boolean;
}

/**
 * `tail -f` over a path. Lines are only handed out once their newline has
 * been written. At EOF the follower sleeps, reopens the path and asks its
 * rotation detector whether the file was replaced or truncated; if so it
 * starts over at offset 0 and drops the partial line of the old file.
 *
 * `nextLine()` never resolves to `null` on its own, only after `signal` aborts.
 */
export class FollowSource extends (EventEmitter as { new(): EventEmitter }) implements LineSource {
  private readonly lines = new LineBuffer();
  private readonly readBuffer: Buffer;
  private readonly backoffMs: number;
  private readonly identityMissThreshold: number;
  private readonly signal?: AbortSignal;
  private detector: RotationDetector;
  private queue: string[] = [];
  private offset = 0;
  private identityMisses = 0;
  private current: FollowState = 'reading';

  private constructor(
    readonly name: string,
    private handle: FileHandle,
    stats: FileStats,
    options: FollowOptions,
  ) {
    super();
    this.backoffMs = options.backoffMs ?? DEFAULT_BACKOFF_MS;
    this.identityMissThreshold = options.identityMissThreshold ?? DEFAULT_IDENTITY_MISS_THRESHOLD;
    this.signal = options.signal;
    this.readBuffer = Buffer.alloc(options.readSize ?? DEFAULT_READ_SIZE);
    this.detector = options.detector ?? new IdentityRotationDetector();
    this.detector.track(stats);
  }

  static async open(path: string, options: FollowOptions = {}): Promise<FollowSource> {
    let handle: FileHandle;
    try {
      handle = await fs.promises.open(path, 'r');
    } catch (e: unknown) {
      throw toInputError(e, path);
    }
    try {
      const stats = await handle.stat();
      return new FollowSource(path, handle, stats, options);
    } catch (e: unknown) {
      await handle.close();
      throw toInputError(e, path);
    }
  }

  get state(): FollowState {
    return this.current;
  }

  get position(): number {
    return this.offset;
  }

  get rotationStrategy(): RotationDetector['strategy'] {
    return this.detector.strategy;
  }

  async nextLine(): Promise<string | null> {
    while (this.queue.length === 0) {
      if (this.signal?.aborted) return null;
      const bytesRead = await this.readMore();
      if (bytesRead > 0) continue;

      this.current = 'eof-wait';
      if (!(await this.backoff())) return null;
      await this.reopen();
    }
    return this.queue.shift() ?? null;
  }

  async close(): Promise<void> {
    await this.handle.close();
  }

  private async readMore(): Promise<number> {
    let bytesRead: number;
    try {
      ({ bytesRead } = await this.handle.read(this.readBuffer, 0, this.readBuffer.length, this.offset));
    } catch (e: unknown) {
      throw toInputError(e, this.name);
    }
    if (bytesRead > 0) {
      this.current = 'reading';
      this.offset += bytesRead;
      this.queue.push(...this.lines.push(this.readBuffer.subarray(0, bytesRead)));
    }
    return bytesRead;
  }

  /** false when the wait was cut short by the abort signal */
  private async backoff(): Promise<boolean> {
    try {
      await sleep(this.backoffMs, undefined, { signal: this.signal });
      return true;
    } catch (e: unknown) {
      if (this.signal?.aborted) return false;
      throw e;
    }
  }

  private async reopen(): Promise<void> {
    let next: FileHandle;
    try {
      next = await fs.promises.open(this.name, 'r');
    } catch (e: unknown) {
      // Between a rename and the new file being created; keep the old handle
      if (errorCode(e) === 'ENOENT') return;
      throw toInputError(e, this.name);
    }

    let stats: FileStats;
    try {
      stats = await next.stat();
    } catch (e: unknown) {
      await next.close();
      throw toInputError(e, this.name);
    }

    const verdict = this.judge(stats);
    await this.handle.close();
    this.handle = next;
    if (verdict !== 'rotated') return;

    this.current = 'rotated';
    this.emit('notice', `${this.name} was rotated or truncated (read offset ${this.offset}); reading from the start`);
    this.offset = 0;
    this.lines.reset();
    this.detector.track(stats);
  }

  private judge(stats: FileStats): RotationVerdict {
    const verdict = this.detector.check(stats, this.offset);
    if (verdict !== 'unknown') {
      this.identityMisses = 0;
      return verdict;
    }

    this.identityMisses++;
    if (this.identityMisses > this.identityMissThreshold && this.detector.strategy === 'identity') {
      this.detector = new LengthProbeRotationDetector();
      this.emit('warning', `cannot read file identity of ${this.name}; detecting rotation by file length only`);
    }
    return stats.size < this.offset ? 'rotated' : 'unchanged';
  }
}
