/**
 * Pool and lane rectangle sizing from their contents.
 */

import {
  DEFAULT_POOL_HEIGHT,
  DEFAULT_POOL_WIDTH,
  LANE_PADDING,
  MIN_POOL_HEIGHT,
  MIN_POOL_WIDTH,
  POOL_HEADER_WIDTH,
  type Size,
} from '../constants';
import { boundsOf, type Rect } from '../geometry';
import { hasPosition, shapeRect } from '../model';
import type { Lane, Pool, Shape } from '../types';

/**
 * Size that contains every positioned member plus padding and the header
 * band, floored at the minimum pool size.  Explicit dimensions win.
 */
export function calculatePoolSize(pool: Pool, members: readonly Shape[], padding = LANE_PADDING): Size {
  if (pool.width && pool.height) return { width: pool.width, height: pool.height };

  const bounds = boundsOf(members.filter(hasPosition).map(shapeRect));
  if (!bounds) return { width: DEFAULT_POOL_WIDTH, height: DEFAULT_POOL_HEIGHT };

  return {
    width: Math.max(bounds.maxX - bounds.minX + padding * 2 + POOL_HEADER_WIDTH, MIN_POOL_WIDTH),
    height: Math.max(bounds.maxY - bounds.minY + padding * 2, MIN_POOL_HEIGHT),
  };
}

/**
 * Pool-relative lane rectangles: the pool's height split evenly, lanes
 * stacked after the header band.  A lane with its own width and height
 * keeps them.
 */
export function calculateLaneSizes(pool: Pool, lanes: readonly Lane[]): Map<string, Rect> {
  const result = new Map<string, Rect>();
  if (lanes.length === 0) return result;

  const laneWidth = (pool.width || DEFAULT_POOL_WIDTH) - POOL_HEADER_WIDTH;
  const laneHeight = (pool.height || DEFAULT_POOL_HEIGHT) / lanes.length;

  let y = 0;
  for (const lane of lanes) {
    const size: Size =
      lane.width && lane.height
        ? { width: lane.width, height: lane.height }
        : { width: laneWidth, height: laneHeight };
    result.set(lane.id, { x: POOL_HEADER_WIDTH, y, ...size });
    y += laneHeight;
  }
  return result;
}
