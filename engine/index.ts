/**
 * GridTiles Engine
 *
 * Geometry and tile caching for very large, zoomable spreadsheet grids:
 * - O(log n) index <-> pixel lookups over per-row/column sizes
 * - Zoom transform with level-of-detail buckets
 * - Viewport -> visible cell range calculation
 * - Fixed-size tile grid with an LRU tile cache and deferred disposal
 *
 * @example
 * ```typescript
 * import { GridLayout, TileManager, ZoomTransform } from '@gridtiles/engine';
 *
 * const layout = GridLayout.uniform(1_000_000, 16_384, 21, 100);
 * const zoom = new ZoomTransform({ scale: 1.0 });
 * const tiles = new TileManager({ layout, renderer });
 *
 * // Per frame
 * const viewport = zoom.screenToContentRect({ x: scrollX, y: scrollY, width: 1200, height: 800 });
 * for (const tile of tiles.getTilesForViewport(viewport, zoom.zoomBucket)) {
 *   paint(tile.picture, tile.coordinate);
 * }
 * tiles.cleanup();
 * ```
 */

export * from './core/index.js';
