/**
 * GridTiles Engine - Core Module Exports
 *
 * This is the main entry point for the GridTiles geometry and tile engine.
 */

// Types - export all
export * from './types/index.js';

// Errors
export { IndexOutOfRangeError, InvalidConfigError, checkIndex } from './errors/index.js';

// Geometry (spans, layout, zoom, visible ranges)
export * from './geometry/index.js';

// Tiles (coordinates, cache, manager)
export * from './tiles/index.js';
