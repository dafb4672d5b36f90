/**
 * GridTiles Engine - Tile
 *
 * A rendered block of the grid. The picture is opaque to the engine: it is
 * stored, handed back to the painter, and released exactly once.
 */

import type { CellRange } from '../types/index.js';
import { rangeContains, rangesOverlap } from '../types/index.js';
import type { ZoomBucket } from '../geometry/ZoomTransform.js';
import type { TileCoordinate } from './TileCoordinate.js';

/** Releases the resource behind a picture (GPU texture, canvas, recorded picture). */
export type PictureDisposer<TPicture> = (picture: TPicture) => void;

/**
 * Disposer used when none is supplied: calls picture.dispose() when the
 * picture has one, otherwise does nothing.
 */
export function disposeIfDisposable(picture: unknown): void {
  if (
    typeof picture === 'object' &&
    picture !== null &&
    'dispose' in picture &&
    typeof picture.dispose === 'function'
  ) {
    picture.dispose();
  }
}

// =============================================================================
// Tile Key
// =============================================================================

/**
 * Cache identity of a tile. The same pixels at two zoom buckets are two keys.
 */
export interface TileKey {
  coordinate: TileCoordinate;
  zoomBucket: ZoomBucket;
}

export function createTileKey(coordinate: TileCoordinate, zoomBucket: ZoomBucket): TileKey {
  return { coordinate, zoomBucket };
}

/** Map key form: "row:col@bucket" */
export function tileKeyString(key: TileKey): string {
  return `${key.coordinate.row}:${key.coordinate.column}@${key.zoomBucket}`;
}

export function tileKeysEqual(a: TileKey, b: TileKey): boolean {
  return a.zoomBucket === b.zoomBucket && a.coordinate.equals(b.coordinate);
}

// =============================================================================
// Tile
// =============================================================================

export interface TileInit<TPicture> {
  coordinate: TileCoordinate;
  zoomBucket: ZoomBucket;
  picture: TPicture;
  /** Cells under the tile's pixel bounds, computed when it was rendered */
  cellRange: CellRange;
  /** Defaults to disposeIfDisposable */
  disposePicture?: PictureDisposer<TPicture>;
}

export class Tile<TPicture = unknown> {
  readonly coordinate: TileCoordinate;
  readonly zoomBucket: ZoomBucket;
  readonly picture: TPicture;
  readonly cellRange: CellRange;

  private readonly disposePicture: PictureDisposer<TPicture>;
  private _isValid = true;
  private _isDisposed = false;

  constructor(init: TileInit<TPicture>) {
    this.coordinate = init.coordinate;
    this.zoomBucket = init.zoomBucket;
    this.picture = init.picture;
    this.cellRange = init.cellRange;
    this.disposePicture = init.disposePicture ?? disposeIfDisposable;
  }

  get key(): TileKey {
    return createTileKey(this.coordinate, this.zoomBucket);
  }

  /**
   * False once the underlying cells changed. An invalid tile is replaced by
   * a fresh render, never revalidated.
   */
  get isValid(): boolean {
    return this._isValid;
  }

  get isDisposed(): boolean {
    return this._isDisposed;
  }

  invalidate(): void {
    this._isValid = false;
  }

  /**
   * Release the picture. Safe to call more than once; only the first call
   * reaches the disposer. The tile counts as disposed even if the disposer throws.
   */
  dispose(): void {
    if (this._isDisposed) return;
    this._isDisposed = true;
    this.disposePicture(this.picture);
  }

  containsCell(row: number, col: number): boolean {
    return rangeContains(this.cellRange, row, col);
  }

  intersectsCellRange(range: CellRange): boolean {
    return rangesOverlap(this.cellRange, range);
  }
}
