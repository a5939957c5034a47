
import fs from 'fs';

export type FileStats = Pick<fs.Stats, 'dev' | 'ino' | 'size'>;

/** `unknown` means the detector could not tell; the follower decides what to do then. */
export type RotationVerdict = 'rotated' | 'unchanged' | 'unknown';

/**
 * Decides whether the file now at a followed path is still the one being
 * read. `check` gets the stats of a fresh open of the path and the follower's
 * current read offset.
 */
export interface RotationDetector {
  readonly strategy: 'identity' | 'length-probe';
  track(stats: FileStats): void;
  check(stats: FileStats, offset: number): RotationVerdict;
}

/** Some filesystems (and Windows volumes without file ids) report an inode of 0. */
export function fileIdentity(stats: FileStats): string | undefined {
  if (!stats.ino) return undefined;
  return `${stats.dev}:${stats.ino}`;
}

export class IdentityRotationDetector implements RotationDetector {
  readonly strategy = 'identity';
  private tracked?: string;

  track(stats: FileStats): void {
    this.tracked = fileIdentity(stats);
  }

  check(stats: FileStats, offset: number): RotationVerdict {
    const identity = fileIdentity(stats);
    if (identity === undefined) return 'unknown';
    if (this.tracked !== undefined && identity !== this.tracked) return 'rotated';
    if (stats.size < offset) return 'rotated'; // truncated in place
    return 'unchanged';
  }
}

/** Only sees rotations that leave the file shorter than what was already read. */
export class LengthProbeRotationDetector implements RotationDetector {
  readonly strategy = 'length-probe';

  track(): void {}

  check(stats: FileStats, offset: number): RotationVerdict {
    return stats.size < offset ? 'rotated' : 'unchanged';
  }
}
