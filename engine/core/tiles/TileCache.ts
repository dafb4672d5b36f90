/**
 * GridTiles Engine - Tile Cache
 *
 * LRU cache of rendered tiles with deferred disposal.
 *
 * Lifecycle of a tile:
 *   absent -> present(valid) -> present(invalid) -> pending disposal -> disposed
 *
 * Eviction only moves a tile to the pending list. The painter may still be
 * drawing it in the current frame, so its picture is released by cleanup(),
 * which the consumer calls once the frame has been painted.
 *
 * Recency is the insertion order of the backing Map: get() deletes and
 * re-inserts, so the first entry is always the least recently used.
 */

import type { CellRange } from '../types/index.js';
import { InvalidConfigError } from '../errors/index.js';
import type { ZoomBucket } from '../geometry/ZoomTransform.js';
import { tileKeyString } from './Tile.js';
import type { Tile, TileKey } from './Tile.js';

export interface TileCacheStats {
  /** Live entries */
  size: number;
  maxTiles: number;
  /** Evicted or replaced tiles awaiting cleanup() */
  pendingDisposal: number;
  hits: number;
  misses: number;
  /** Entries pushed out by capacity */
  evictions: number;
  /** Entries pushed out by a put() on the same key */
  replacements: number;
  /** Pictures released so far */
  disposals: number;
}

interface CacheEntry<TPicture> {
  key: TileKey;
  tile: Tile<TPicture>;
}

export class TileCache<TPicture = unknown> {
  readonly maxTiles: number;

  private entries: Map<string, CacheEntry<TPicture>> = new Map();
  private pendingDisposal: Tile<TPicture>[] = [];

  private hits = 0;
  private misses = 0;
  private evictions = 0;
  private replacements = 0;
  private disposals = 0;

  constructor(maxTiles: number) {
    if (!Number.isInteger(maxTiles) || maxTiles <= 0) {
      throw new InvalidConfigError('maxTiles', `Max tiles must be a positive integer, got ${maxTiles}`);
    }
    this.maxTiles = maxTiles;
  }

  get size(): number {
    return this.entries.size;
  }

  get isEmpty(): boolean {
    return this.entries.size === 0;
  }

  get pendingDisposalCount(): number {
    return this.pendingDisposal.length;
  }

  // ===========================================================================
  // Lookup / Insert
  // ===========================================================================

  /**
   * Cached tile for key, marked most recently used. Invalid tiles are
   * returned too; the caller decides whether to re-render.
   */
  get(key: TileKey): Tile<TPicture> | undefined {
    const id = tileKeyString(key);
    const entry = this.entries.get(id);
    if (!entry) {
      this.misses++;
      return undefined;
    }

    this.hits++;
    this.entries.delete(id);
    this.entries.set(id, entry);
    return entry.tile;
  }

  /** Presence check without touching recency. */
  containsKey(key: TileKey): boolean {
    return this.entries.has(tileKeyString(key));
  }

  /**
   * Insert a tile as most recently used.
   * A tile already stored under key, and any tile evicted to make room, go to
   * the pending-disposal list; nothing is disposed here.
   */
  put(key: TileKey, tile: Tile<TPicture>): void {
    const id = tileKeyString(key);

    const existing = this.entries.get(id);
    if (existing) {
      this.entries.delete(id);
      if (existing.tile !== tile) {
        this.pendingDisposal.push(existing.tile);
        this.replacements++;
      }
    }

    while (this.entries.size >= this.maxTiles) {
      this.evictOldest();
    }

    this.entries.set(id, { key, tile });
  }

  /**
   * Remove without disposing. The caller takes ownership of the returned tile.
   */
  remove(key: TileKey): Tile<TPicture> | undefined {
    const id = tileKeyString(key);
    const entry = this.entries.get(id);
    if (!entry) return undefined;

    this.entries.delete(id);
    return entry.tile;
  }

  /** Valid tiles cached for a bucket, least recently used first. */
  getValidTilesForZoom(zoomBucket: ZoomBucket): Tile<TPicture>[] {
    const tiles: Tile<TPicture>[] = [];
    for (const { key, tile } of this.entries.values()) {
      if (key.zoomBucket === zoomBucket && tile.isValid) {
        tiles.push(tile);
      }
    }
    return tiles;
  }

  // ===========================================================================
  // Invalidation
  // ===========================================================================

  /** Mark tiles whose cells overlap range as invalid. They stay cached. */
  invalidateRange(range: CellRange): void {
    for (const { tile } of this.entries.values()) {
      if (tile.intersectsCellRange(range)) {
        tile.invalidate();
      }
    }
  }

  invalidateZoomBucket(zoomBucket: ZoomBucket): void {
    for (const { key, tile } of this.entries.values()) {
      if (key.zoomBucket === zoomBucket) {
        tile.invalidate();
      }
    }
  }

  invalidateAll(): void {
    for (const { tile } of this.entries.values()) {
      tile.invalidate();
    }
  }

  // ===========================================================================
  // Resource Release
  // ===========================================================================

  /**
   * Dispose every tile evicted or replaced since the last cleanup.
   * Call once per paint, after the painter is done with the frame's tiles.
   */
  cleanup(): void {
    const pending = this.pendingDisposal;
    this.pendingDisposal = [];
    for (const tile of pending) {
      this.release(tile);
    }
  }

  /**
   * Dispose every live tile immediately and empty the cache.
   * For teardown and hard resets, not for use mid-frame.
   */
  clear(): void {
    const live = Array.from(this.entries.values());
    this.entries.clear();
    for (const { tile } of live) {
      this.release(tile);
    }
  }

  /** Release everything, live and pending. */
  dispose(): void {
    this.clear();
    this.cleanup();
  }

  getStats(): TileCacheStats {
    return {
      size: this.entries.size,
      maxTiles: this.maxTiles,
      pendingDisposal: this.pendingDisposal.length,
      hits: this.hits,
      misses: this.misses,
      evictions: this.evictions,
      replacements: this.replacements,
      disposals: this.disposals,
    };
  }

  private evictOldest(): void {
    const oldest = this.entries.keys().next();
    if (oldest.done) return;

    const entry = this.entries.get(oldest.value);
    this.entries.delete(oldest.value);
    if (entry) {
      this.pendingDisposal.push(entry.tile);
      this.evictions++;
    }
  }

  private release(tile: Tile<TPicture>): void {
    if (tile.isDisposed) return;
    try {
      tile.dispose();
      this.disposals++;
    } catch (error) {
      console.error('Tile dispose error:', error);
    }
  }
}
