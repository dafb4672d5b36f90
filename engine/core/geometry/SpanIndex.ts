/**
 * GridTiles Engine - Span Index
 *
 * Per-axis size storage with a prefix-sum array for O(log n) position lookups.
 *
 * Layout:
 * - sizes[i] is the size of span i (row height or column width)
 * - cumulative[i] is the offset where span i starts; cumulative[count] is the total
 * - cumulative is rebuilt in full (O(n)) on every resize
 *
 * Resizes come from user drags and are rare; lookups run for every hit-test and
 * every tile, so the rebuild cost is paid on the cold path.
 */

import { InvalidConfigError, checkIndex } from '../errors/index.js';

/** Returned by indexAtPosition when the position lies outside the content. */
export const NOT_FOUND = -1;

/** Far edges are probed this far inside the boundary so an exact edge is not counted twice. */
export const SPAN_EDGE_EPSILON = 0.001;

/**
 * Inclusive range of span indices.
 */
export interface SpanRange {
  startIndex: number;
  endIndex: number;
}

export function spanLength(range: SpanRange): number {
  return range.endIndex - range.startIndex + 1;
}

export interface SpanIndexOptions {
  /** Number of spans. Fixed for the lifetime of the index. */
  count: number;
  /** Size of every span without a custom size. */
  defaultSize: number;
  /** Initial custom sizes (index -> size). Indices outside [0, count) are ignored. */
  customSizes?: ReadonlyMap<number, number>;
}

export class SpanIndex {
  readonly count: number;
  readonly defaultSize: number;

  private sizes: Float64Array;
  private cumulative: Float64Array;

  constructor(options: SpanIndexOptions) {
    const { count, defaultSize } = options;

    if (!Number.isInteger(count) || count <= 0) {
      throw new InvalidConfigError('count', `Span count must be a positive integer, got ${count}`);
    }
    if (!(defaultSize > 0) || !Number.isFinite(defaultSize)) {
      throw new InvalidConfigError('defaultSize', `Default size must be positive, got ${defaultSize}`);
    }

    this.count = count;
    this.defaultSize = defaultSize;
    this.sizes = new Float64Array(count).fill(defaultSize);
    this.cumulative = new Float64Array(count + 1);

    if (options.customSizes) {
      for (const [index, size] of entriesOf(options.customSizes)) {
        if (index < 0 || index >= count || !Number.isInteger(index)) continue;
        assertPositiveSize(size);
        this.sizes[index] = size;
      }
    }

    this.rebuild();
  }

  // ===========================================================================
  // Queries
  // ===========================================================================

  /** Total size of all spans. */
  get totalSize(): number {
    return this.cumulative[this.count];
  }

  /**
   * Size of span at index.
   * Throws IndexOutOfRangeError outside [0, count).
   */
  sizeAt(index: number): number {
    checkIndex(index, 0, this.count - 1, 'span index');
    return this.sizes[index];
  }

  /**
   * Start offset of span at index.
   * index == count is accepted and returns totalSize (the end sentinel).
   */
  positionAt(index: number): number {
    checkIndex(index, 0, this.count, 'span position index');
    return this.cumulative[index];
  }

  /** End offset of span at index (start + size). */
  endPositionAt(index: number): number {
    checkIndex(index, 0, this.count - 1, 'span index');
    return this.cumulative[index + 1];
  }

  /**
   * Find the span containing a position using binary search.
   * Returns NOT_FOUND for position < 0 or position >= totalSize.
   * O(log n).
   */
  indexAtPosition(position: number): number {
    if (!(position >= 0) || position >= this.totalSize) {
      return NOT_FOUND;
    }

    // Largest index with cumulative[index] <= position
    let low = 0;
    let high = this.count - 1;

    while (low < high) {
      const mid = low + ((high - low + 1) >>> 1);
      if (this.cumulative[mid] <= position) {
        low = mid;
      } else {
        high = mid - 1;
      }
    }

    return low;
  }

  /**
   * Inclusive range of spans overlapping [startPosition, endPosition).
   * A start beyond the content clamps to 0 and an end beyond it clamps to count - 1.
   */
  getRange(startPosition: number, endPosition: number): SpanRange {
    const startIndex = this.indexAtPosition(startPosition);
    const endIndex = this.indexAtPosition(endPosition - SPAN_EDGE_EPSILON);

    return {
      startIndex: startIndex === NOT_FOUND ? 0 : startIndex,
      endIndex: endIndex === NOT_FOUND ? this.count - 1 : endIndex,
    };
  }

  hasCustomSize(index: number): boolean {
    return this.sizeAt(index) !== this.defaultSize;
  }

  // ===========================================================================
  // Mutations
  // ===========================================================================

  /**
   * Set the size of one span and rebuild offsets.
   */
  setSize(index: number, size: number): void {
    checkIndex(index, 0, this.count - 1, 'span index');
    assertPositiveSize(size);

    this.sizes[index] = size;
    this.rebuild();
  }

  /**
   * Set several sizes with a single rebuild (bulk auto-fit, paste of sizes).
   * All entries are validated before any is applied.
   */
  setSizes(sizes: ReadonlyMap<number, number>): void {
    const entries = entriesOf(sizes);
    for (const [index, size] of entries) {
      checkIndex(index, 0, this.count - 1, 'span index');
      assertPositiveSize(size);
    }
    for (const [index, size] of entries) {
      this.sizes[index] = size;
    }
    this.rebuild();
  }

  /** Restore the default size at index. */
  resetSize(index: number): void {
    this.setSize(index, this.defaultSize);
  }

  private rebuild(): void {
    let sum = 0;
    for (let i = 0; i < this.count; i++) {
      this.cumulative[i] = sum;
      sum += this.sizes[i];
    }
    this.cumulative[this.count] = sum;
  }
}

function assertPositiveSize(size: number): void {
  if (!(size > 0) || !Number.isFinite(size)) {
    throw new InvalidConfigError('size', `Span size must be positive, got ${size}`);
  }
}

function entriesOf(sizes: ReadonlyMap<number, number>): Array<[number, number]> {
  return Array.from(sizes.entries());
}
