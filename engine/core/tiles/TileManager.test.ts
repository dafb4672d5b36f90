/**
 * TileManager Tests
 *
 * Test coverage:
 * - Viewport -> tile coverage and row-major ordering
 * - Render-on-miss, cache hits, re-render after invalidation
 * - Tile -> cell range translation (including tiles past the content)
 * - Eviction with deferred disposal across a frame
 * - clearCache / dispose teardown
 * - End-to-end frame loop with a zoom transform and a resized row
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { TileManager } from './TileManager.js';
import type { TileRenderer, TileRenderRequest } from './TileManager.js';
import { TileCoordinate } from './TileCoordinate.js';
import { createTileKey } from './Tile.js';
import { GridLayout } from '../geometry/GridLayout.js';
import { ZoomTransform } from '../geometry/ZoomTransform.js';

// =============================================================================
// Recording Renderer
// =============================================================================

interface TestPicture {
  serial: number;
  request: TileRenderRequest;
  dispose: () => void;
}

class RecordingRenderer implements TileRenderer<TestPicture> {
  renderCallCount = 0;
  requests: TileRenderRequest[] = [];

  renderTile(request: TileRenderRequest): TestPicture {
    this.renderCallCount++;
    this.requests.push(request);
    return { serial: this.renderCallCount, request, dispose: vi.fn() };
  }

  renderedCoordinates(): Array<[number, number]> {
    return this.requests.map((r) => [r.coordinate.row, r.coordinate.column]);
  }
}

// =============================================================================
// Tests
// =============================================================================

describe('TileManager', () => {
  let layout: GridLayout;
  let renderer: RecordingRenderer;
  let manager: TileManager<TestPicture>;

  beforeEach(() => {
    // 1000 rows x 25px = 25000px tall, 100 columns x 100px = 10000px wide
    layout = GridLayout.uniform(1000, 100, 25, 100);
    renderer = new RecordingRenderer();
    manager = new TileManager<TestPicture>({
      layout,
      renderer,
      config: { tileSize: 256, maxCachedTiles: 10 },
    });
  });

  afterEach(() => {
    manager.dispose();
  });

  describe('construction', () => {
    it('should merge config with defaults', () => {
      expect(manager.config).toEqual({ tileSize: 256, maxCachedTiles: 10, prefetchRings: 1 });
      expect(manager.getLayout()).toBe(layout);
    });

    it('should reject invalid config', () => {
      expect(() => new TileManager({ layout, renderer, config: { maxCachedTiles: 0 } })).toThrow();
      expect(() => new TileManager({ layout, renderer, config: { tileSize: -1 } })).toThrow();
    });
  });

  // ===========================================================================
  // Tile Retrieval
  // ===========================================================================

  describe('getTilesForViewport', () => {
    it('should return one tile for a viewport inside the first tile', () => {
      const tiles = manager.getTilesForViewport({ x: 10, y: 10, width: 100, height: 25 }, 'full');

      expect(tiles).toHaveLength(1);
      expect(tiles[0].coordinate.equals(new TileCoordinate(0, 0))).toBe(true);
    });

    it('should cover a 512x512 viewport with four tiles', () => {
      const tiles = manager.getTilesForViewport({ x: 0, y: 0, width: 512, height: 512 }, 'full');

      expect(tiles).toHaveLength(4);
      expect(renderer.renderCallCount).toBe(4);
    });

    it('should return tiles in row-major order', () => {
      const tiles = manager.getTilesForViewport({ x: 128, y: 128, width: 512, height: 256 }, 'full');

      expect(tiles.map((t) => [t.coordinate.row, t.coordinate.column])).toEqual([
        [0, 0], [0, 1], [0, 2],
        [1, 0], [1, 1], [1, 2],
      ]);
      expect(renderer.renderedCoordinates()).toEqual([
        [0, 0], [0, 1], [0, 2],
        [1, 0], [1, 1], [1, 2],
      ]);
    });

    it('should serve cached tiles without re-rendering', () => {
      const first = manager.getTilesForViewport({ x: 0, y: 0, width: 256, height: 256 }, 'full');
      const second = manager.getTilesForViewport({ x: 0, y: 0, width: 256, height: 256 }, 'full');

      expect(renderer.renderCallCount).toBe(1);
      expect(second[0]).toBe(first[0]);
    });

    it('should render separately per zoom bucket', () => {
      manager.getTilesForViewport({ x: 0, y: 0, width: 256, height: 256 }, 'full');
      manager.getTilesForViewport({ x: 0, y: 0, width: 256, height: 256 }, 'half');

      expect(renderer.renderCallCount).toBe(2);
      expect(renderer.requests.map((r) => r.zoomBucket)).toEqual(['full', 'half']);
    });

    it('should pass pixel bounds and cell range to the renderer', () => {
      manager.getTilesForViewport({ x: 300, y: 300, width: 10, height: 10 }, 'full');

      const request = renderer.requests[0];
      expect(request.bounds).toEqual({ x: 256, y: 256, width: 256, height: 256 });
      // rows [256, 512) -> 10..20, columns [256, 512) -> 2..5
      expect(request.cellRange).toEqual({ startRow: 10, startCol: 2, endRow: 20, endCol: 5 });
    });

    it('should return nothing for an empty viewport', () => {
      expect(manager.getTilesForViewport({ x: 0, y: 0, width: 0, height: 0 }, 'full')).toEqual([]);
      expect(renderer.renderCallCount).toBe(0);
    });

    it('should propagate renderer failures', () => {
      const failing = new TileManager({
        layout,
        renderer: {
          renderTile: () => {
            throw new Error('out of memory');
          },
        },
      });

      expect(() => failing.getTilesForViewport({ x: 0, y: 0, width: 10, height: 10 }, 'full'))
        .toThrow('out of memory');
      failing.dispose();
    });
  });

  // ===========================================================================
  // Cell Ranges
  // ===========================================================================

  describe('getCellRangeForTile', () => {
    it('should translate the first tile', () => {
      // rows [0, 256) -> 0..10, columns [0, 256) -> 0..2
      expect(manager.getCellRangeForTile(new TileCoordinate(0, 0)))
        .toEqual({ startRow: 0, startCol: 0, endRow: 10, endCol: 2 });
    });

    it('should follow custom row heights', () => {
      layout.setRowHeight(0, 256);

      expect(manager.getCellRangeForTile(new TileCoordinate(0, 0)))
        .toEqual({ startRow: 0, startCol: 0, endRow: 0, endCol: 2 });
      expect(manager.getCellRangeForTile(new TileCoordinate(1, 0)))
        .toEqual({ startRow: 1, startCol: 0, endRow: 11, endCol: 2 });
    });

    it('should clamp a tile straddling the content end', () => {
      // columns end at 10000; tile column 39 spans [9984, 10240)
      expect(manager.getCellRangeForTile(new TileCoordinate(0, 39)))
        .toEqual({ startRow: 0, startCol: 99, endRow: 10, endCol: 99 });
    });

    it('should clamp a tile entirely past the content onto the last cells', () => {
      expect(manager.getCellRangeForTile(new TileCoordinate(500, 500)))
        .toEqual({ startRow: 999, startCol: 99, endRow: 999, endCol: 99 });
    });
  });

  // ===========================================================================
  // Invalidation
  // ===========================================================================

  describe('invalidation', () => {
    const viewport = { x: 0, y: 0, width: 512, height: 256 };

    it('should re-render tiles intersecting an invalidated range', () => {
      const before = manager.getTilesForViewport(viewport, 'full');

      // tile (0, 0) holds columns 0..2, tile (0, 1) columns 2..5
      manager.invalidateRange({ startRow: 5, startCol: 4, endRow: 5, endCol: 4 });

      expect(before[0].isValid).toBe(true);
      expect(before[1].isValid).toBe(false);

      const after = manager.getTilesForViewport(viewport, 'full');

      expect(renderer.renderCallCount).toBe(3);
      expect(after[0]).toBe(before[0]);
      expect(after[1]).not.toBe(before[1]);
      expect(after[1].isValid).toBe(true);
    });

    it('should defer disposal of the replaced stale tile to cleanup', () => {
      const [, stale] = manager.getTilesForViewport(viewport, 'full');
      manager.invalidateAll();
      manager.getTilesForViewport(viewport, 'full');

      expect(stale.isDisposed).toBe(false);

      manager.cleanup();

      expect(stale.isDisposed).toBe(true);
      expect(stale.picture.dispose).toHaveBeenCalledTimes(1);
    });

    it('should re-render only the invalidated bucket', () => {
      manager.getTilesForViewport(viewport, 'full');
      manager.getTilesForViewport(viewport, 'half');

      manager.invalidateZoomBucket('half');
      manager.getTilesForViewport(viewport, 'full');
      manager.getTilesForViewport(viewport, 'half');

      expect(renderer.requests.map((r) => r.zoomBucket)).toEqual(['full', 'full', 'half', 'half', 'half', 'half']);
    });
  });

  // ===========================================================================
  // Eviction & Lifecycle
  // ===========================================================================

  describe('eviction and lifecycle', () => {
    it('should keep tiles fetched this frame alive until cleanup', () => {
      // 4x3 = 12 tiles with room for 10: the first two are evicted mid-frame
      const tiles = manager.getTilesForViewport({ x: 0, y: 0, width: 1024, height: 768 }, 'full');

      expect(tiles).toHaveLength(12);
      expect(manager.getStats().size).toBe(10);
      expect(tiles.every((t) => !t.isDisposed)).toBe(true);

      manager.cleanup();

      expect(tiles.filter((t) => t.isDisposed).map((t) => [t.coordinate.row, t.coordinate.column]))
        .toEqual([[0, 0], [0, 1]]);
      expect(manager.getTile(createTileKey(new TileCoordinate(0, 0), 'full'))).toBeUndefined();
      expect(manager.getTile(createTileKey(new TileCoordinate(2, 3), 'full'))).toBe(tiles[11]);
    });

    it('should dispose every cached tile on clearCache', () => {
      const tiles = manager.getTilesForViewport({ x: 0, y: 0, width: 512, height: 512 }, 'full');

      manager.clearCache();

      expect(tiles.every((t) => t.isDisposed)).toBe(true);
      expect(manager.getStats().size).toBe(0);

      manager.getTilesForViewport({ x: 0, y: 0, width: 512, height: 512 }, 'full');
      expect(renderer.renderCallCount).toBe(8);
    });

    it('should use the supplied picture disposer', () => {
      const disposePicture = vi.fn();
      const custom = new TileManager<TestPicture>({ layout, renderer, disposePicture });
      const [tile] = custom.getTilesForViewport({ x: 0, y: 0, width: 10, height: 10 }, 'full');

      custom.dispose();

      expect(disposePicture).toHaveBeenCalledWith(tile.picture);
      expect(tile.picture.dispose).not.toHaveBeenCalled();
    });

    it('should refuse to serve tiles after dispose', () => {
      const tiles = manager.getTilesForViewport({ x: 0, y: 0, width: 256, height: 256 }, 'full');

      manager.dispose();
      manager.dispose();

      expect(manager.isDisposed).toBe(true);
      expect(tiles[0].isDisposed).toBe(true);
      expect(() => manager.getTilesForViewport({ x: 0, y: 0, width: 256, height: 256 }, 'full'))
        .toThrow('TileManager has been disposed');
    });
  });

  // ===========================================================================
  // Frame Loop
  // ===========================================================================

  describe('frame loop', () => {
    it('should render, zoom, resize and stay within the cache bound', () => {
      const zoom = new ZoomTransform({ scale: 1.0 });
      const screen = { x: 0, y: 0, width: 800, height: 600 };

      const paint = () => {
        const viewport = zoom.screenToContentRect(screen);
        const tiles = manager.getTilesForViewport(viewport, zoom.zoomBucket);
        const drawn = tiles.map((t) => t.picture.serial);
        manager.cleanup();
        return drawn;
      };

      // 800x600 at 100% -> 4 x 3 tiles
      expect(paint()).toHaveLength(12);

      // 50% doubles the content area: 1600x1200 -> 7 x 5 tiles
      zoom.setScale(0.5);
      expect(zoom.zoomBucket).toBe('half');
      expect(paint()).toHaveLength(35);
      expect(manager.getStats().size).toBe(10);

      // resizing a row invalidates its tiles in every bucket
      zoom.setScale(1.0);
      const rendersBefore = renderer.renderCallCount;
      layout.setRowHeight(0, 50);
      manager.invalidateRange({ startRow: 0, startCol: 0, endRow: layout.rowCount - 1, endCol: layout.columnCount - 1 });
      paint();

      expect(layout.rows.positionAt(1)).toBe(50);
      expect(renderer.renderCallCount - rendersBefore).toBe(12);
      expect(manager.getStats().pendingDisposal).toBe(0);
    });
  });
});
