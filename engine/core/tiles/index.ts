/**
 * GridTiles Engine - Tile Module Exports
 */

export {
  createTileConfig,
  tileSizeForZoom,
  zoomBucketTileSize,
  tileCountForDimension,
  tileConfigsEqual,
  DEFAULT_TILE_SIZE,
  DEFAULT_MAX_CACHED_TILES,
  DEFAULT_PREFETCH_RINGS,
} from './TileConfig.js';
export type { TileConfig } from './TileConfig.js';
export { TileCoordinate, TILE_EDGE_EPSILON } from './TileCoordinate.js';
export {
  Tile,
  createTileKey,
  tileKeyString,
  tileKeysEqual,
  disposeIfDisposable,
} from './Tile.js';
export type { TileKey, TileInit, PictureDisposer } from './Tile.js';
export { TileCache } from './TileCache.js';
export type { TileCacheStats } from './TileCache.js';
export { TileManager } from './TileManager.js';
export type {
  TileRenderer,
  TileRenderRequest,
  TileManagerOptions,
} from './TileManager.js';
