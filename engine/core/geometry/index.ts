/**
 * GridTiles Engine - Geometry Module Exports
 */

export { SpanIndex, NOT_FOUND, SPAN_EDGE_EPSILON, spanLength } from './SpanIndex.js';
export type { SpanRange, SpanIndexOptions } from './SpanIndex.js';
export { GridLayout } from './GridLayout.js';
export type { GridLayoutOptions } from './GridLayout.js';
export {
  ZoomTransform,
  ZOOM_BUCKETS,
  DEFAULT_MIN_SCALE,
  DEFAULT_MAX_SCALE,
  DEFAULT_ZOOM_STEP,
  zoomBucketFromScale,
  zoomBucketIndex,
  compareZoomBuckets,
  shouldRenderText,
  shouldRenderGridlines,
  gridlineStrokeWidth,
} from './ZoomTransform.js';
export type { ZoomBucket, ZoomTransformOptions } from './ZoomTransform.js';
export { VisibleRangeCalculator } from './VisibleRangeCalculator.js';
