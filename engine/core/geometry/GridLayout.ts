/**
 * GridTiles Engine - Grid Layout
 *
 * Two-dimensional geometry over a row SpanIndex and a column SpanIndex.
 * Holds no cell content; every method is a pure lookup on the two axes.
 */

import type { CellRef, Rect, Size } from '../types/index.js';
import { rectFromLTRB } from '../types/index.js';
import { NOT_FOUND, SpanIndex } from './SpanIndex.js';
import type { SpanRange } from './SpanIndex.js';

export interface GridLayoutOptions {
  rows: SpanIndex;
  columns: SpanIndex;
}

export class GridLayout {
  readonly rows: SpanIndex;
  readonly columns: SpanIndex;

  constructor(options: GridLayoutOptions) {
    this.rows = options.rows;
    this.columns = options.columns;
  }

  /**
   * Shorthand for a uniform grid.
   */
  static uniform(rowCount: number, columnCount: number, rowHeight: number, columnWidth: number): GridLayout {
    return new GridLayout({
      rows: new SpanIndex({ count: rowCount, defaultSize: rowHeight }),
      columns: new SpanIndex({ count: columnCount, defaultSize: columnWidth }),
    });
  }

  // ===========================================================================
  // Dimensions
  // ===========================================================================

  get rowCount(): number {
    return this.rows.count;
  }

  get columnCount(): number {
    return this.columns.count;
  }

  get defaultRowHeight(): number {
    return this.rows.defaultSize;
  }

  get defaultColumnWidth(): number {
    return this.columns.defaultSize;
  }

  get totalHeight(): number {
    return this.rows.totalSize;
  }

  get totalWidth(): number {
    return this.columns.totalSize;
  }

  get totalSize(): Size {
    return { width: this.totalWidth, height: this.totalHeight };
  }

  // ===========================================================================
  // Cell Geometry
  // ===========================================================================

  /**
   * Bounds of a single cell in content pixels.
   */
  cellBounds(row: number, col: number): Rect {
    return {
      x: this.columns.positionAt(col),
      y: this.rows.positionAt(row),
      width: this.columns.sizeAt(col),
      height: this.rows.sizeAt(row),
    };
  }

  /**
   * Cell under a content-space point, or null outside the content.
   */
  cellAt(x: number, y: number): CellRef | null {
    const row = this.rows.indexAtPosition(y);
    const col = this.columns.indexAtPosition(x);

    if (row === NOT_FOUND || col === NOT_FOUND) return null;

    return { row, col };
  }

  /**
   * Bounds of an inclusive cell range.
   * The far edges use positionAt(end + 1), so a range ending on the last
   * row/column reaches exactly totalHeight/totalWidth.
   */
  rangeBounds(startRow: number, startCol: number, endRow: number, endCol: number): Rect {
    return rectFromLTRB(
      this.columns.positionAt(startCol),
      this.rows.positionAt(startRow),
      this.columns.positionAt(endCol + 1),
      this.rows.positionAt(endRow + 1)
    );
  }

  // ===========================================================================
  // Axis Lookups
  // ===========================================================================

  /** Row at a y position, or NOT_FOUND. */
  getRowAt(y: number): number {
    return this.rows.indexAtPosition(y);
  }

  /** Column at an x position, or NOT_FOUND. */
  getColumnAt(x: number): number {
    return this.columns.indexAtPosition(x);
  }

  getRowTop(row: number): number {
    return this.rows.positionAt(row);
  }

  getColumnLeft(col: number): number {
    return this.columns.positionAt(col);
  }

  getRowHeight(row: number): number {
    return this.rows.sizeAt(row);
  }

  getColumnWidth(col: number): number {
    return this.columns.sizeAt(col);
  }

  getRowEnd(row: number): number {
    return this.rows.endPositionAt(row);
  }

  getColumnEnd(col: number): number {
    return this.columns.endPositionAt(col);
  }

  setRowHeight(row: number, height: number): void {
    this.rows.setSize(row, height);
  }

  setColumnWidth(col: number, width: number): void {
    this.columns.setSize(col, width);
  }

  /**
   * Rows intersecting [top, top + height).
   */
  getVisibleRows(top: number, height: number): SpanRange {
    return this.rows.getRange(top, top + height);
  }

  /**
   * Columns intersecting [left, left + width).
   */
  getVisibleColumns(left: number, width: number): SpanRange {
    return this.columns.getRange(left, left + width);
  }
}
