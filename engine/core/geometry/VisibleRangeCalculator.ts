/**
 * GridTiles Engine - Visible Range Calculator
 *
 * Converts a content-space viewport rectangle into the minimal range of
 * cells it touches, and back.
 */

import type { CellRange, Rect } from '../types/index.js';
import { createRange, rangeContains, rangesOverlap } from '../types/index.js';
import type { GridLayout } from './GridLayout.js';

export class VisibleRangeCalculator {
  private layout: GridLayout;

  constructor(layout: GridLayout) {
    this.layout = layout;
  }

  getLayout(): GridLayout {
    return this.layout;
  }

  /**
   * Every cell at least partially inside the viewport.
   */
  visibleRange(viewport: Rect): CellRange {
    const rows = this.layout.getVisibleRows(viewport.y, viewport.height);
    const cols = this.layout.getVisibleColumns(viewport.x, viewport.width);

    return createRange(rows.startIndex, cols.startIndex, rows.endIndex, cols.endIndex);
  }

  /**
   * Visible range grown by rowPadding/colPadding cells on each side,
   * clamped to the grid. Used to render just past the viewport edge.
   */
  visibleRangeWithPadding(viewport: Rect, rowPadding: number = 1, colPadding: number = 1): CellRange {
    const base = this.visibleRange(viewport);

    return {
      startRow: Math.max(0, base.startRow - rowPadding),
      startCol: Math.max(0, base.startCol - colPadding),
      endRow: Math.min(this.layout.rowCount - 1, base.endRow + rowPadding),
      endCol: Math.min(this.layout.columnCount - 1, base.endCol + colPadding),
    };
  }

  /**
   * Padded range for a number of prefetch tile rings.
   * One ring is one tile's worth of default-sized cells on each axis.
   */
  prefetchRange(viewport: Rect, rings: number, tileSize: number): CellRange {
    const rowPadding = Math.ceil((rings * tileSize) / this.layout.defaultRowHeight);
    const colPadding = Math.ceil((rings * tileSize) / this.layout.defaultColumnWidth);
    return this.visibleRangeWithPadding(viewport, rowPadding, colPadding);
  }

  isCellVisible(row: number, col: number, viewport: Rect): boolean {
    return rangeContains(this.visibleRange(viewport), row, col);
  }

  isRangeVisible(range: CellRange, viewport: Rect): boolean {
    return rangesOverlap(range, this.visibleRange(viewport));
  }

  /**
   * Smallest content rectangle that fully contains the range.
   */
  minimalViewportFor(range: CellRange): Rect {
    return this.layout.rangeBounds(range.startRow, range.startCol, range.endRow, range.endCol);
  }
}
