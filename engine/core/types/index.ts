/**
 * GridTiles Engine - Core Type Definitions
 * Geometry types shared by the layout and tile layers
 */

import { IndexOutOfRangeError } from '../errors/index.js';

// ============================================================================
// Cell Reference Types
// ============================================================================

export interface CellRef {
  row: number;
  col: number;
}

/**
 * Rectangular block of cells. Both corners are inclusive.
 */
export interface CellRange {
  startRow: number;
  startCol: number;
  endRow: number;
  endCol: number;
}

/**
 * Create a validated cell range.
 * Corners must be non-negative and ordered (start <= end).
 */
export function createRange(
  startRow: number,
  startCol: number,
  endRow: number,
  endCol: number
): CellRange {
  if (startRow < 0 || startCol < 0) {
    throw new IndexOutOfRangeError(
      `Invalid range start: (${startRow}, ${startCol})`,
      Math.min(startRow, startCol),
      0,
      Number.MAX_SAFE_INTEGER
    );
  }
  if (endRow < startRow || endCol < startCol) {
    throw new IndexOutOfRangeError(
      `Invalid range end: (${endRow}, ${endCol}) before (${startRow}, ${startCol})`,
      endRow < startRow ? endRow : endCol,
      endRow < startRow ? startRow : startCol,
      Number.MAX_SAFE_INTEGER
    );
  }
  return { startRow, startCol, endRow, endCol };
}

export function rangeContains(range: CellRange, row: number, col: number): boolean {
  return row >= range.startRow && row <= range.endRow &&
         col >= range.startCol && col <= range.endCol;
}

export function rangesOverlap(a: CellRange, b: CellRange): boolean {
  return !(a.endRow < b.startRow || b.endRow < a.startRow ||
           a.endCol < b.startCol || b.endCol < a.startCol);
}

export function rangesEqual(a: CellRange, b: CellRange): boolean {
  return a.startRow === b.startRow && a.startCol === b.startCol &&
         a.endRow === b.endRow && a.endCol === b.endCol;
}

export function rangeRowCount(range: CellRange): number {
  return range.endRow - range.startRow + 1;
}

export function rangeColCount(range: CellRange): number {
  return range.endCol - range.startCol + 1;
}

// ============================================================================
// Pixel Geometry Types
// ============================================================================

/**
 * Axis-aligned rectangle in content pixels (unzoomed).
 */
export interface Rect {
  x: number;
  y: number;
  width: number;
  height: number;
}

export interface Point {
  x: number;
  y: number;
}

export interface Size {
  width: number;
  height: number;
}

export function rectFromLTRB(left: number, top: number, right: number, bottom: number): Rect {
  return { x: left, y: top, width: right - left, height: bottom - top };
}

export function rectRight(rect: Rect): number {
  return rect.x + rect.width;
}

export function rectBottom(rect: Rect): number {
  return rect.y + rect.height;
}

export function isEmptyRect(rect: Rect): boolean {
  return rect.width <= 0 || rect.height <= 0;
}
