/**
 * GridTiles Engine - Tile Manager
 *
 * Serves the tiles covering a viewport: cached tiles when valid, fresh renders
 * otherwise.
 *
 * Frame protocol (single-threaded, synchronous):
 * 1. tiles = manager.getTilesForViewport(viewport, bucket)
 * 2. paint tiles in array order
 * 3. manager.cleanup()
 *
 * Invalidation is pull-based: invalidate*() only flags tiles, and the next
 * getTilesForViewport() re-renders the flagged ones it needs.
 *
 * @example
 * ```typescript
 * const manager = new TileManager({
 *   layout: GridLayout.uniform(1000, 100, 25, 100),
 *   renderer: { renderTile: ({ bounds }) => drawCells(bounds) },
 *   config: { tileSize: 256, maxCachedTiles: 64 },
 * });
 *
 * const tiles = manager.getTilesForViewport(viewport, zoom.zoomBucket);
 * for (const tile of tiles) blit(tile.picture, tile.coordinate);
 * manager.cleanup();
 * ```
 */

import type { CellRange, Rect } from '../types/index.js';
import { createRange } from '../types/index.js';
import { NOT_FOUND } from '../geometry/SpanIndex.js';
import type { GridLayout } from '../geometry/GridLayout.js';
import type { ZoomBucket } from '../geometry/ZoomTransform.js';
import { TileCache } from './TileCache.js';
import type { TileCacheStats } from './TileCache.js';
import { createTileConfig } from './TileConfig.js';
import type { TileConfig } from './TileConfig.js';
import { TileCoordinate, TILE_EDGE_EPSILON } from './TileCoordinate.js';
import { Tile, createTileKey } from './Tile.js';
import type { PictureDisposer, TileKey } from './Tile.js';

// =============================================================================
// Renderer Interface
// =============================================================================

export interface TileRenderRequest {
  coordinate: TileCoordinate;
  /** Tile's pixel bounds in content coordinates */
  bounds: Rect;
  /** Cells under bounds, clamped to the grid */
  cellRange: CellRange;
  zoomBucket: ZoomBucket;
}

/**
 * Produces the drawable for one tile. Must complete synchronously; errors
 * propagate out of getTilesForViewport().
 */
export interface TileRenderer<TPicture> {
  renderTile(request: TileRenderRequest): TPicture;
}

export interface TileManagerOptions<TPicture> {
  layout: GridLayout;
  renderer: TileRenderer<TPicture>;
  config?: Partial<TileConfig>;
  /** Releases a picture when its tile is disposed. Defaults to picture.dispose() if present */
  disposePicture?: PictureDisposer<TPicture>;
}

// =============================================================================
// Tile Manager
// =============================================================================

export class TileManager<TPicture = unknown> {
  readonly config: Readonly<TileConfig>;

  private layout: GridLayout;
  private renderer: TileRenderer<TPicture>;
  private disposePicture: PictureDisposer<TPicture> | undefined;
  private cache: TileCache<TPicture>;
  private disposed = false;

  constructor(options: TileManagerOptions<TPicture>) {
    this.config = createTileConfig(options.config);
    this.layout = options.layout;
    this.renderer = options.renderer;
    this.disposePicture = options.disposePicture;
    this.cache = new TileCache<TPicture>(this.config.maxCachedTiles);
  }

  getLayout(): GridLayout {
    return this.layout;
  }

  get isDisposed(): boolean {
    return this.disposed;
  }

  // ===========================================================================
  // Tile Retrieval
  // ===========================================================================

  /**
   * Tiles covering the viewport at a zoom bucket, in row-major tile order.
   * Missing or invalid tiles are rendered and cached before returning.
   */
  getTilesForViewport(viewport: Rect, zoomBucket: ZoomBucket): Tile<TPicture>[] {
    this.assertNotDisposed();

    const tiles: Tile<TPicture>[] = [];
    for (const coordinate of this.getTileCoordinatesForViewport(viewport)) {
      const key = createTileKey(coordinate, zoomBucket);
      let tile = this.cache.get(key);

      if (!tile || !tile.isValid) {
        tile = this.renderTile(coordinate, zoomBucket);
        this.cache.put(key, tile);
      }

      tiles.push(tile);
    }

    return tiles;
  }

  getTileCoordinatesForViewport(viewport: Rect): TileCoordinate[] {
    return TileCoordinate.tilesCovering(viewport, this.config.tileSize, this.config.tileSize);
  }

  /**
   * Cells under a tile's pixel bounds.
   * Tiles reaching past the content clamp onto the last row/column, so the
   * result is always a valid range inside the grid.
   */
  getCellRangeForTile(coordinate: TileCoordinate): CellRange {
    const bounds = coordinate.pixelBounds(this.config.tileSize, this.config.tileSize);
    const maxRow = this.layout.rowCount - 1;
    const maxCol = this.layout.columnCount - 1;

    let startRow = this.layout.getRowAt(bounds.y);
    let startCol = this.layout.getColumnAt(bounds.x);
    let endRow = this.layout.getRowAt(bounds.y + bounds.height - TILE_EDGE_EPSILON);
    let endCol = this.layout.getColumnAt(bounds.x + bounds.width - TILE_EDGE_EPSILON);

    // Bounds start at >= 0, so NOT_FOUND on any edge means past the content end
    if (startRow === NOT_FOUND) startRow = maxRow;
    if (startCol === NOT_FOUND) startCol = maxCol;
    if (endRow === NOT_FOUND) endRow = maxRow;
    if (endCol === NOT_FOUND) endCol = maxCol;

    return createRange(startRow, startCol, endRow, endCol);
  }

  /** Cached tile for a key, or undefined. Counts as a use for LRU purposes. */
  getTile(key: TileKey): Tile<TPicture> | undefined {
    return this.cache.get(key);
  }

  // ===========================================================================
  // Invalidation & Lifecycle
  // ===========================================================================

  invalidateRange(range: CellRange): void {
    this.cache.invalidateRange(range);
  }

  invalidateZoomBucket(zoomBucket: ZoomBucket): void {
    this.cache.invalidateZoomBucket(zoomBucket);
  }

  invalidateAll(): void {
    this.cache.invalidateAll();
  }

  /** Dispose all cached tiles now. Not for use between fetch and paint. */
  clearCache(): void {
    this.cache.clear();
  }

  /** Release tiles evicted during the last frame. Call once after each paint. */
  cleanup(): void {
    this.cache.cleanup();
  }

  getStats(): TileCacheStats {
    return this.cache.getStats();
  }

  /** Release every tile. The manager cannot serve tiles afterwards. */
  dispose(): void {
    if (this.disposed) return;
    this.disposed = true;
    this.cache.dispose();
  }

  // ===========================================================================
  // Internals
  // ===========================================================================

  private renderTile(coordinate: TileCoordinate, zoomBucket: ZoomBucket): Tile<TPicture> {
    const bounds = coordinate.pixelBounds(this.config.tileSize, this.config.tileSize);
    const cellRange = this.getCellRangeForTile(coordinate);

    const picture = this.renderer.renderTile({ coordinate, bounds, cellRange, zoomBucket });

    return new Tile<TPicture>({
      coordinate,
      zoomBucket,
      picture,
      cellRange,
      disposePicture: this.disposePicture,
    });
  }

  private assertNotDisposed(): void {
    if (this.disposed) {
      throw new Error('TileManager has been disposed');
    }
  }
}
