/**
 * Best-effort overlap avoidance for incrementally placed shapes.
 *
 * Candidates step down by {@link OVERLAP_STEP_Y}; after
 * {@link OVERLAP_MAX_VERTICAL_SHIFTS} shifts the search moves one column
 * right and back to the starting row.  The search never blocks: after
 * {@link OVERLAP_MAX_ATTEMPTS} candidates the least-overlapping one wins.
 */

import {
  NODE_HORIZONTAL_GAP,
  OVERLAP_MAX_ATTEMPTS,
  OVERLAP_MAX_VERTICAL_SHIFTS,
  OVERLAP_STEP_Y,
} from '../constants';
import { overlapArea, type Rect } from '../geometry';
import type { Point } from '../types';

export function avoidOverlap(candidate: Rect, obstacles: readonly Rect[]): Point {
  let x = candidate.x;
  let y = candidate.y;
  let shifts = 0;
  let best: Point = { x, y };
  let bestArea = Infinity;

  for (let attempt = 0; attempt < OVERLAP_MAX_ATTEMPTS; attempt++) {
    const rect = { x, y, width: candidate.width, height: candidate.height };
    const area = obstacles.reduce((sum, o) => sum + overlapArea(rect, o), 0);
    if (area === 0) return { x, y };
    if (area < bestArea) {
      best = { x, y };
      bestArea = area;
    }

    if (shifts < OVERLAP_MAX_VERTICAL_SHIFTS) {
      y += OVERLAP_STEP_Y;
      shifts++;
    } else {
      x += candidate.width + NODE_HORIZONTAL_GAP;
      y = candidate.y;
      shifts = 0;
    }
  }

  return best;
}
