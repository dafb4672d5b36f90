/**
 * GridTiles Engine - Zoom Transform
 *
 * Scale factor between screen pixels and content pixels, plus the discrete
 * level-of-detail buckets tiles are cached and drawn under.
 *
 * At scale 1.0 screen and content coordinates coincide; at 2.0 content
 * appears twice as large on screen.
 */

import type { Point, Rect } from '../types/index.js';
import { InvalidConfigError } from '../errors/index.js';

export const DEFAULT_MIN_SCALE = 0.1;
export const DEFAULT_MAX_SCALE = 4.0;
export const DEFAULT_ZOOM_STEP = 0.25;

// =============================================================================
// Zoom Buckets
// =============================================================================

/**
 * Level-of-detail buckets, lowest zoom first.
 * tenth: <25%, quarter: <40%, forty: <50%, half: <100%,
 * full: <200%, twoX: <300%, quadruple: the rest.
 */
export const ZOOM_BUCKETS = ['tenth', 'quarter', 'forty', 'half', 'full', 'twoX', 'quadruple'] as const;

export type ZoomBucket = typeof ZOOM_BUCKETS[number];

export function zoomBucketFromScale(scale: number): ZoomBucket {
  if (scale < 0.25) return 'tenth';
  if (scale < 0.4) return 'quarter';
  if (scale < 0.5) return 'forty';
  if (scale < 1.0) return 'half';
  if (scale < 2.0) return 'full';
  if (scale < 3.0) return 'twoX';
  return 'quadruple';
}

/** Position of a bucket in ZOOM_BUCKETS (0 = lowest zoom). */
export function zoomBucketIndex(bucket: ZoomBucket): number {
  return ZOOM_BUCKETS.indexOf(bucket);
}

/** Negative if a is a lower zoom than b, positive if higher, 0 if equal. */
export function compareZoomBuckets(a: ZoomBucket, b: ZoomBucket): number {
  return zoomBucketIndex(a) - zoomBucketIndex(b);
}

/** Text is unreadable below 25%; skip it. */
export function shouldRenderText(bucket: ZoomBucket): boolean {
  return bucket !== 'tenth';
}

/** Gridlines are hidden below 40%. */
export function shouldRenderGridlines(bucket: ZoomBucket): boolean {
  return bucket !== 'tenth' && bucket !== 'quarter';
}

/**
 * Gridline stroke width in content pixels, chosen so lines stay about one
 * screen pixel wide once the bucket's scale is applied.
 */
export function gridlineStrokeWidth(bucket: ZoomBucket): number {
  switch (bucket) {
    case 'tenth':
    case 'quarter':
      return 5.0;
    case 'forty':
      return 2.0;
    case 'half':
      return 1.5;
    case 'full':
      return 1.0;
    case 'twoX':
      return 0.5;
    case 'quadruple':
      return 0.25;
  }
}

// =============================================================================
// Zoom Transform
// =============================================================================

export interface ZoomTransformOptions {
  /** Initial scale (clamped). Default 1.0 */
  scale?: number;
  /** Lower clamp bound. Default 0.1 */
  minScale?: number;
  /** Upper clamp bound. Default 4.0 */
  maxScale?: number;
}

export class ZoomTransform {
  readonly minScale: number;
  readonly maxScale: number;

  private _scale: number;
  private readonly initialScale: number;

  constructor(options: ZoomTransformOptions = {}) {
    const minScale = options.minScale ?? DEFAULT_MIN_SCALE;
    const maxScale = options.maxScale ?? DEFAULT_MAX_SCALE;

    if (!(minScale > 0)) {
      throw new InvalidConfigError('minScale', `minScale must be positive, got ${minScale}`);
    }
    if (!(maxScale >= minScale)) {
      throw new InvalidConfigError('maxScale', `maxScale (${maxScale}) must be >= minScale (${minScale})`);
    }

    const scale = options.scale ?? 1.0;
    if (Number.isNaN(scale)) {
      throw new InvalidConfigError('scale', 'scale must be a number, got NaN');
    }

    this.minScale = minScale;
    this.maxScale = maxScale;
    this._scale = this.clamp(scale);
    this.initialScale = this._scale;
  }

  // ===========================================================================
  // Scale
  // ===========================================================================

  get scale(): number {
    return this._scale;
  }

  /** Set scale, clamped to [minScale, maxScale]. NaN leaves the scale unchanged. */
  setScale(value: number): void {
    if (Number.isNaN(value)) return;
    this._scale = this.clamp(value);
  }

  /** Current zoom as a rounded percentage (100 = 100%). */
  get percentage(): number {
    return Math.round(this._scale * 100);
  }

  setPercentage(percent: number): void {
    this.setScale(percent / 100);
  }

  get canZoomIn(): boolean {
    return this._scale < this.maxScale;
  }

  get canZoomOut(): boolean {
    return this._scale > this.minScale;
  }

  zoomBy(factor: number): void {
    this.setScale(this._scale * factor);
  }

  zoomIn(step: number = DEFAULT_ZOOM_STEP): void {
    this.setScale(this._scale + step);
  }

  zoomOut(step: number = DEFAULT_ZOOM_STEP): void {
    this.setScale(this._scale - step);
  }

  /** Return to the scale given at construction. */
  reset(): void {
    this._scale = this.initialScale;
  }

  /**
   * Bucket for the current scale. Derived on every read so it can never
   * disagree with scale.
   */
  get zoomBucket(): ZoomBucket {
    return zoomBucketFromScale(this._scale);
  }

  // ===========================================================================
  // Coordinate Conversion
  // ===========================================================================

  screenToContent(value: number): number {
    return value / this._scale;
  }

  contentToScreen(value: number): number {
    return value * this._scale;
  }

  screenToContentPoint(point: Point): Point {
    return { x: point.x / this._scale, y: point.y / this._scale };
  }

  contentToScreenPoint(point: Point): Point {
    return { x: point.x * this._scale, y: point.y * this._scale };
  }

  screenToContentRect(rect: Rect): Rect {
    return {
      x: rect.x / this._scale,
      y: rect.y / this._scale,
      width: rect.width / this._scale,
      height: rect.height / this._scale,
    };
  }

  contentToScreenRect(rect: Rect): Rect {
    return {
      x: rect.x * this._scale,
      y: rect.y * this._scale,
      width: rect.width * this._scale,
      height: rect.height * this._scale,
    };
  }

  private clamp(value: number): number {
    return Math.max(this.minScale, Math.min(this.maxScale, value));
  }
}
