/**
 * Coordinate normalisation for raw layout output.
 *
 * Translates the minimum corner to the diagram margin, optionally inverts
 * Y (`maxY - y`) for tools whose Y axis grows upward, and optionally
 * scales tool units into pixels.
 */

import { DIAGRAM_MARGIN, LAYOUT_SCALE_X, LAYOUT_SCALE_Y } from '../constants';
import { pointBounds } from '../geometry';
import type { Point } from '../types';
import type { RawLayout } from './types';

export function normalizeLayout(raw: RawLayout): Map<string, Point> {
  const bounds = pointBounds(raw.positions.values());
  const result = new Map<string, Point>();
  if (!bounds) return result;

  const scaleX = raw.applyScale ? LAYOUT_SCALE_X : 1;
  const scaleY = raw.applyScale ? LAYOUT_SCALE_Y : 1;

  for (const [id, p] of raw.positions) {
    const dy = raw.flipY ? bounds.maxY - p.y : p.y - bounds.minY;
    result.set(id, {
      x: (p.x - bounds.minX) * scaleX + DIAGRAM_MARGIN,
      y: dy * scaleY + DIAGRAM_MARGIN,
    });
  }
  return result;
}
