/**
 * Per-file capacity bookkeeping.
 *
 * A source file is a bounded 1-D resource: committed clip windows are
 * exclusion zones, and every pair of them must stay at least `minGap` seconds
 * apart. The file's own start and end need no buffer.
 */
import { DEFAULT_MIN_GAP_SECONDS } from '../config.js';
import { pickOne, uniform, type Random } from '../utils/random.js';

// ── Types ─────────────────────────────────────────────────────────────────────

export interface Interval {
  start: number;
  end: number;
}

export interface SourceFileInit {
  path: string;
  totalDuration: number;
  /** Orderable key (epoch ms); only used to order the final timeline. */
  timestamp: number;
  minGap?: number;
}

export class NoCapacityError extends Error {
  constructor(
    public readonly path: string,
    public readonly length: number,
  ) {
    super(`No room for a ${length}s clip in ${path}`);
    this.name = 'NoCapacityError';
  }
}

// ── SourceFile ────────────────────────────────────────────────────────────────

export class SourceFile {
  readonly path: string;
  readonly totalDuration: number;
  readonly timestamp: number;
  readonly minGap: number;
  private readonly intervals: Interval[] = [];

  constructor(init: SourceFileInit) {
    this.path = init.path;
    this.totalDuration = Number.isFinite(init.totalDuration) ? Math.max(0, init.totalDuration) : 0;
    this.timestamp = init.timestamp;
    const minGap = init.minGap ?? DEFAULT_MIN_GAP_SECONDS;
    if (!Number.isFinite(minGap) || minGap < 0) {
      throw new RangeError(`SourceFile: minGap must be a non-negative number, got ${minGap}`);
    }
    this.minGap = minGap;
  }

  /** Committed intervals, sorted by start. */
  get committed(): readonly Interval[] {
    return this.intervals.map((iv) => ({ ...iv }));
  }

  availableDuration(): number {
    const used = this.intervals.reduce((sum, iv) => sum + (iv.end - iv.start), 0);
    const buffers = this.intervals.length > 1 ? this.minGap * (this.intervals.length - 1) : 0;
    return Math.max(0, this.totalDuration - used - buffers);
  }

  /**
   * Maximal free sub-ranges, with `minGap` already trimmed from every edge
   * that touches a committed interval. Ranges may be empty or inverted when
   * two intervals sit closer than twice the gap; callers filter on length.
   */
  freeRanges(): Interval[] {
    if (this.intervals.length === 0) {
      return [{ start: 0, end: this.totalDuration }];
    }

    const ranges: Interval[] = [];
    const first = this.intervals[0];
    ranges.push({ start: 0, end: first.start - this.minGap });

    for (let i = 1; i < this.intervals.length; i++) {
      ranges.push({
        start: this.intervals[i - 1].end + this.minGap,
        end:   this.intervals[i].start - this.minGap,
      });
    }

    const last = this.intervals[this.intervals.length - 1];
    ranges.push({ start: last.end + this.minGap, end: this.totalDuration });
    return ranges;
  }

  canFit(length: number): boolean {
    return this.eligibleRanges(length).length > 0;
  }

  /**
   * Two-stage draw: choose one eligible gap uniformly (every gap weighs the
   * same regardless of its size), then a uniform start inside it.
   */
  proposeStart(length: number, random: Random): number {
    const eligible = this.eligibleRanges(length);
    if (eligible.length === 0) {
      throw new NoCapacityError(this.path, length);
    }
    const range = pickOne(random, eligible);
    const latest = range.end - length;
    return Math.min(latest, uniform(random, range.start, latest));
  }

  /** Reserve `[start, start + length)`. Placement must come from `proposeStart`. */
  commit(start: number, length: number): void {
    if (!Number.isFinite(start) || !Number.isFinite(length) || length <= 0) {
      throw new RangeError(`commit: invalid interval start=${start} length=${length}`);
    }
    const interval = { start, end: start + length };
    const at = this.intervals.findIndex((iv) => iv.start > start);
    if (at === -1) {
      this.intervals.push(interval);
    } else {
      this.intervals.splice(at, 0, interval);
    }
  }

  private eligibleRanges(length: number): Interval[] {
    if (!(length > 0) || this.totalDuration < length) return [];
    return this.freeRanges().filter((range) => range.end - range.start >= length);
  }
}
