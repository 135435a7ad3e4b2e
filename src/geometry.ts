/**
 * Shared geometry utilities for bounding-box overlap detection and
 * extent calculation.
 *
 * Pure functions with no model dependency.
 */

import type { Point } from './types';

// ── Types ──────────────────────────────────────────────────────────────────

export type { Point };

export interface Rect {
  x: number;
  y: number;
  width: number;
  height: number;
}

export interface Bounds {
  minX: number;
  minY: number;
  maxX: number;
  maxY: number;
}

// ── Bounding-box overlap ───────────────────────────────────────────────────

/** Check if two axis-aligned rectangles overlap.  Touching edges do not count. */
export function rectsOverlap(a: Rect, b: Rect): boolean {
  return a.x < b.x + b.width && a.x + a.width > b.x && a.y < b.y + b.height && a.y + a.height > b.y;
}

/** Area (px²) of the intersection of two rectangles; 0 when disjoint. */
export function overlapArea(a: Rect, b: Rect): number {
  const w = Math.min(a.x + a.width, b.x + b.width) - Math.max(a.x, b.x);
  const h = Math.min(a.y + a.height, b.y + b.height) - Math.max(a.y, b.y);
  return w > 0 && h > 0 ? w * h : 0;
}

/** Stable string key for a rectangle, used to detect identical boxes. */
export function rectKey(r: Rect): string {
  return `${r.x},${r.y},${r.width},${r.height}`;
}

// ── Extents ────────────────────────────────────────────────────────────────

/**
 * Bounding box of a set of rectangles.
 * Returns `undefined` for an empty input.
 */
export function boundsOf(rects: Iterable<Rect>): Bounds | undefined {
  let minX = Infinity;
  let minY = Infinity;
  let maxX = -Infinity;
  let maxY = -Infinity;
  for (const r of rects) {
    minX = Math.min(minX, r.x);
    minY = Math.min(minY, r.y);
    maxX = Math.max(maxX, r.x + r.width);
    maxY = Math.max(maxY, r.y + r.height);
  }
  if (minX === Infinity) return undefined;
  return { minX, minY, maxX, maxY };
}

/** Bounding box of a set of points. */
export function pointBounds(points: Iterable<Point>): Bounds | undefined {
  let minX = Infinity;
  let minY = Infinity;
  let maxX = -Infinity;
  let maxY = -Infinity;
  for (const p of points) {
    minX = Math.min(minX, p.x);
    minY = Math.min(minY, p.y);
    maxX = Math.max(maxX, p.x);
    maxY = Math.max(maxY, p.y);
  }
  if (minX === Infinity) return undefined;
  return { minX, minY, maxX, maxY };
}

/** Clamp `value` into `[min, max]`; `min` wins when the range is empty. */
export function clamp(value: number, min: number, max: number): number {
  return Math.max(min, Math.min(value, max));
}
