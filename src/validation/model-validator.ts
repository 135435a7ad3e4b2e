/**
 * Structural checks over a diagram model.
 *
 * Works on resolved and unresolved models alike: the overlap check only
 * compares shapes that carry full geometry and share a container.
 */

import { LABELED_TYPES } from '../constants';
import { rectsOverlap } from '../geometry';
import { isPositioned } from '../model';
import type { DiagramModel, PositionedShape } from '../types';

export type ValidationLevel = 'error' | 'warning' | 'info';

export interface ValidationWarning {
  level: ValidationLevel;
  /** Offending shape or connector id; absent for model-wide findings. */
  elementId?: string;
  message: string;
}

function checkStartEnd(model: DiagramModel): ValidationWarning[] {
  const warnings: ValidationWarning[] = [];
  if (!model.shapes.some((s) => s.type === 'startEvent')) {
    warnings.push({ level: 'warning', message: 'Diagram has no start event' });
  }
  if (!model.shapes.some((s) => s.type === 'endEvent')) {
    warnings.push({ level: 'warning', message: 'Diagram has no end event' });
  }
  return warnings;
}

function checkReferences(model: DiagramModel): ValidationWarning[] {
  const ids = new Set(model.shapes.map((s) => s.id));
  const warnings: ValidationWarning[] = [];
  for (const c of model.connectors) {
    if (!ids.has(c.source)) {
      warnings.push({
        level: 'error',
        elementId: c.id,
        message: `Connector '${c.id}' has invalid source reference: '${c.source}'`,
      });
    }
    if (!ids.has(c.target)) {
      warnings.push({
        level: 'error',
        elementId: c.id,
        message: `Connector '${c.id}' has invalid target reference: '${c.target}'`,
      });
    }
  }
  return warnings;
}

/** Shapes not reachable, ignoring edge direction, from any start event. */
function checkConnectivity(model: DiagramModel): ValidationWarning[] {
  const starts = model.shapes.filter((s) => s.type === 'startEvent').map((s) => s.id);
  if (starts.length === 0) return [];

  const adjacency = new Map<string, string[]>(model.shapes.map((s) => [s.id, []]));
  for (const c of model.connectors) {
    const out = adjacency.get(c.source);
    const inc = adjacency.get(c.target);
    if (!out || !inc) continue;
    out.push(c.target);
    inc.push(c.source);
  }

  const visited = new Set<string>();
  const queue = [...starts];
  while (queue.length > 0) {
    const id = queue.shift();
    if (id === undefined || visited.has(id)) continue;
    visited.add(id);
    for (const next of adjacency.get(id) ?? []) {
      if (!visited.has(next)) queue.push(next);
    }
  }

  return model.shapes
    .filter((s) => !visited.has(s.id))
    .map((s) => ({
      level: 'info' as const,
      elementId: s.id,
      message: `Shape '${s.id}' is not connected to the main flow`,
    }));
}

function checkOverlaps(model: DiagramModel): ValidationWarning[] {
  const byParent = new Map<string, PositionedShape[]>();
  for (const shape of model.shapes) {
    if (!isPositioned(shape)) continue;
    const key = shape.parent ?? '';
    const group = byParent.get(key);
    if (group) group.push(shape);
    else byParent.set(key, [shape]);
  }

  const warnings: ValidationWarning[] = [];
  for (const group of byParent.values()) {
    group.forEach((a, i) => {
      for (const b of group.slice(i + 1)) {
        if (!rectsOverlap(a, b)) continue;
        warnings.push({ level: 'warning', elementId: a.id, message: `Shape '${a.id}' overlaps with '${b.id}'` });
      }
    });
  }
  return warnings;
}

function checkLabels(model: DiagramModel): ValidationWarning[] {
  return model.shapes
    .filter((s) => LABELED_TYPES.has(s.type) && !s.name)
    .map((s) => ({ level: 'info' as const, elementId: s.id, message: `Shape '${s.id}' has no label` }));
}

export function validateModel(model: DiagramModel): ValidationWarning[] {
  return [
    ...checkStartEnd(model),
    ...checkReferences(model),
    ...checkConnectivity(model),
    ...checkOverlaps(model),
    ...checkLabels(model),
  ];
}
