/**
 * GridTiles Engine - Error Types
 *
 * Both errors signal programmer mistakes and are thrown synchronously.
 * "No cell at this pixel" is not an error: lookups return NOT_FOUND / null.
 */

/**
 * An index or coordinate fell outside its valid interval [min, max].
 */
export class IndexOutOfRangeError extends RangeError {
  readonly index: number;
  readonly min: number;
  readonly max: number;

  constructor(message: string, index: number, min: number, max: number) {
    super(message);
    this.name = 'IndexOutOfRangeError';
    this.index = index;
    this.min = min;
    this.max = max;
  }
}

/**
 * A construction argument or size violated its invariant
 * (non-positive count, size, tile size, cache capacity, scale bounds).
 */
export class InvalidConfigError extends Error {
  readonly option: string;

  constructor(option: string, message: string) {
    super(message);
    this.name = 'InvalidConfigError';
    this.option = option;
  }
}

/**
 * Throw IndexOutOfRangeError unless min <= index <= max and index is an integer.
 */
export function checkIndex(index: number, min: number, max: number, name: string): void {
  if (!Number.isInteger(index) || index < min || index > max) {
    throw new IndexOutOfRangeError(
      `Invalid ${name}: ${index} (valid range ${min}..${max})`,
      index,
      min,
      max
    );
  }
}
