/**
 * GridTiles Engine - Tile Coordinate
 *
 * Position in a fixed-size tile grid laid over content pixels. (0, 0) is the
 * top-left tile. The grid ignores row/column sizes entirely; translating a
 * tile into cells is TileManager's job.
 */

import type { Rect } from '../types/index.js';
import { isEmptyRect, rectBottom, rectRight } from '../types/index.js';
import { IndexOutOfRangeError } from '../errors/index.js';

/**
 * Subtracted from a rect's far corner before locating its last tile, so a
 * rect ending exactly on a tile edge does not pull in the next tile.
 */
export const TILE_EDGE_EPSILON = 0.001;

export class TileCoordinate {
  readonly row: number;
  readonly column: number;

  constructor(row: number, column: number) {
    if (row < 0 || column < 0) {
      throw new IndexOutOfRangeError(
        `Tile coordinate must be non-negative: (${row}, ${column})`,
        Math.min(row, column),
        0,
        Number.MAX_SAFE_INTEGER
      );
    }
    this.row = row;
    this.column = column;
  }

  /**
   * Tile containing a pixel. Negative pixels clamp to row/column 0.
   */
  static fromPixel(x: number, y: number, tileWidth: number, tileHeight: number): TileCoordinate {
    const column = Math.floor(x / tileWidth);
    const row = Math.floor(y / tileHeight);
    return new TileCoordinate(Math.max(0, row), Math.max(0, column));
  }

  /**
   * All tiles touching a rect, row-major (left to right, then top to bottom).
   * This order is the paint order.
   */
  static tilesCovering(rect: Rect, tileWidth: number, tileHeight: number): TileCoordinate[] {
    if (isEmptyRect(rect)) return [];

    const start = TileCoordinate.fromPixel(rect.x, rect.y, tileWidth, tileHeight);
    const end = TileCoordinate.fromPixel(
      rectRight(rect) - TILE_EDGE_EPSILON,
      rectBottom(rect) - TILE_EDGE_EPSILON,
      tileWidth,
      tileHeight
    );

    const tiles: TileCoordinate[] = [];
    for (let row = start.row; row <= end.row; row++) {
      for (let col = start.column; col <= end.column; col++) {
        tiles.push(new TileCoordinate(row, col));
      }
    }
    return tiles;
  }

  /** Pixel rectangle covered by this tile. */
  pixelBounds(tileWidth: number, tileHeight: number): Rect {
    return {
      x: this.column * tileWidth,
      y: this.row * tileHeight,
      width: tileWidth,
      height: tileHeight,
    };
  }

  /** Neighbor offset by the deltas, clamped at the top/left edge. */
  offset(rowDelta: number, columnDelta: number): TileCoordinate {
    return new TileCoordinate(
      Math.max(0, this.row + rowDelta),
      Math.max(0, this.column + columnDelta)
    );
  }

  equals(other: TileCoordinate): boolean {
    return this.row === other.row && this.column === other.column;
  }

  toString(): string {
    return `TileCoordinate(row: ${this.row}, col: ${this.column})`;
  }
}
