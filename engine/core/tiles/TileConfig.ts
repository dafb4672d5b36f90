/**
 * GridTiles Engine - Tile Configuration
 */

import { InvalidConfigError } from '../errors/index.js';
import type { ZoomBucket } from '../geometry/ZoomTransform.js';

export const DEFAULT_TILE_SIZE = 256;
export const DEFAULT_MAX_CACHED_TILES = 100;
export const DEFAULT_PREFETCH_RINGS = 1;

export interface TileConfig {
  /** Tile edge length in content pixels (tiles are square). Default 256 */
  tileSize: number;
  /** LRU capacity of the tile cache. Default 100 */
  maxCachedTiles: number;
  /**
   * Tile rings to prefetch beyond the viewport. Default 1.
   * Read by the caller's padding policy (VisibleRangeCalculator.prefetchRange);
   * TileManager itself only renders what it is asked for.
   */
  prefetchRings: number;
}

/**
 * Merge options with defaults and validate.
 * The result is frozen; derive a new config to change it.
 */
export function createTileConfig(options: Partial<TileConfig> = {}): Readonly<TileConfig> {
  const config: TileConfig = {
    tileSize: options.tileSize ?? DEFAULT_TILE_SIZE,
    maxCachedTiles: options.maxCachedTiles ?? DEFAULT_MAX_CACHED_TILES,
    prefetchRings: options.prefetchRings ?? DEFAULT_PREFETCH_RINGS,
  };

  if (!(config.tileSize > 0) || !Number.isFinite(config.tileSize)) {
    throw new InvalidConfigError('tileSize', `Tile size must be positive, got ${config.tileSize}`);
  }
  if (!Number.isInteger(config.maxCachedTiles) || config.maxCachedTiles <= 0) {
    throw new InvalidConfigError(
      'maxCachedTiles',
      `Max cached tiles must be a positive integer, got ${config.maxCachedTiles}`
    );
  }
  if (!Number.isInteger(config.prefetchRings) || config.prefetchRings < 0) {
    throw new InvalidConfigError(
      'prefetchRings',
      `Prefetch rings must be a non-negative integer, got ${config.prefetchRings}`
    );
  }

  return Object.freeze(config);
}

/** Screen size of one tile at a zoom scale. */
export function tileSizeForZoom(config: TileConfig, zoom: number): number {
  return config.tileSize * zoom;
}

/**
 * Content area a tile would cover under a bucket's level of detail:
 * lower zoom, larger coverage.
 */
export function zoomBucketTileSize(config: TileConfig, bucket: ZoomBucket): number {
  switch (bucket) {
    case 'tenth':
      return config.tileSize * 10;
    case 'quarter':
      return config.tileSize * 4;
    case 'forty':
    case 'half':
      return config.tileSize * 2;
    case 'full':
      return config.tileSize;
    case 'twoX':
      return Math.floor(config.tileSize / 2);
    case 'quadruple':
      return Math.floor(config.tileSize / 4);
  }
}

/** Tiles needed to span a dimension along one axis. */
export function tileCountForDimension(config: TileConfig, dimension: number): number {
  return Math.ceil(dimension / config.tileSize);
}

export function tileConfigsEqual(a: TileConfig, b: TileConfig): boolean {
  return a.tileSize === b.tileSize &&
         a.maxCachedTiles === b.maxCachedTiles &&
         a.prefetchRings === b.prefetchRings;
}
