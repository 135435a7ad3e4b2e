/**
 * Decoding of untyped tool arguments into a {@link DiagramModel}.
 *
 * Every failure raises a {@link ModelValidationError} carrying the JSON
 * path of the first offending field.
 */

import { ModelValidationError } from '../errors';
import { createDiagramModel } from '../model';
import type { Connector, DiagramModel, Lane, Point, Pool, Shape } from '../types';

type JsonObject = Record<string, unknown>;

function isObject(value: unknown): value is JsonObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function requireObject(value: unknown, path: string): JsonObject {
  if (!isObject(value)) throw new ModelValidationError(path, 'expected an object');
  return value;
}

function requireString(obj: JsonObject, key: string, path: string): string {
  const value = obj[key];
  if (typeof value !== 'string' || value === '') {
    throw new ModelValidationError(`${path}.${key}`, 'expected a non-empty string');
  }
  return value;
}

function optionalString(obj: JsonObject, key: string, path: string): string | undefined {
  const value = obj[key];
  if (value === undefined || value === null) return undefined;
  if (typeof value !== 'string') throw new ModelValidationError(`${path}.${key}`, 'expected a string');
  return value;
}

/** Missing or null numbers stay unset; anything else must be finite. */
function optionalNumber(obj: JsonObject, key: string, path: string): number | undefined {
  const value = obj[key];
  if (value === undefined || value === null) return undefined;
  if (typeof value !== 'number' || !Number.isFinite(value)) {
    throw new ModelValidationError(`${path}.${key}`, 'expected a finite number');
  }
  return value;
}

function optionalArray<T>(
  obj: JsonObject,
  key: string,
  path: string,
  decode: (item: unknown, itemPath: string) => T
): T[] {
  const value = obj[key];
  if (value === undefined || value === null) return [];
  if (!Array.isArray(value)) throw new ModelValidationError(`${path}.${key}`, 'expected an array');
  return value.map((item, i) => decode(item, `${path}.${key}[${i}]`));
}

function decodeString(item: unknown, path: string): string {
  if (typeof item !== 'string') throw new ModelValidationError(path, 'expected a string');
  return item;
}

function decodePoint(item: unknown, path: string): Point {
  const obj = requireObject(item, path);
  const x = optionalNumber(obj, 'x', path);
  const y = optionalNumber(obj, 'y', path);
  if (x === undefined || y === undefined) throw new ModelValidationError(path, 'expected x and y');
  return { x, y };
}

function decodeShape(item: unknown, path: string): Shape {
  const obj = requireObject(item, path);
  const properties = obj.properties === undefined ? {} : requireObject(obj.properties, `${path}.properties`);
  return {
    id: requireString(obj, 'id', path),
    type: requireString(obj, 'type', path),
    name: optionalString(obj, 'name', path),
    x: optionalNumber(obj, 'x', path),
    y: optionalNumber(obj, 'y', path),
    width: optionalNumber(obj, 'width', path),
    height: optionalNumber(obj, 'height', path),
    parent: optionalString(obj, 'parent', path),
    subContainer: optionalString(obj, 'subContainer', path),
    properties: { ...properties },
  };
}

function decodeConnector(item: unknown, path: string): Connector {
  const obj = requireObject(item, path);
  return {
    id: requireString(obj, 'id', path),
    kind: optionalString(obj, 'kind', path) ?? 'sequenceFlow',
    source: requireString(obj, 'source', path),
    target: requireString(obj, 'target', path),
    name: optionalString(obj, 'name', path),
    waypoints: optionalArray(obj, 'waypoints', path, decodePoint),
  };
}

function decodePool(item: unknown, path: string): Pool {
  const obj = requireObject(item, path);
  return {
    id: requireString(obj, 'id', path),
    name: optionalString(obj, 'name', path),
    subModel: optionalString(obj, 'subModel', path),
    x: optionalNumber(obj, 'x', path),
    y: optionalNumber(obj, 'y', path),
    width: optionalNumber(obj, 'width', path),
    height: optionalNumber(obj, 'height', path),
  };
}

function decodeLane(item: unknown, path: string): Lane {
  const obj = requireObject(item, path);
  return {
    id: requireString(obj, 'id', path),
    name: optionalString(obj, 'name', path),
    poolId: requireString(obj, 'poolId', path),
    x: optionalNumber(obj, 'x', path),
    y: optionalNumber(obj, 'y', path),
    width: optionalNumber(obj, 'width', path),
    height: optionalNumber(obj, 'height', path),
    memberIds: optionalArray(obj, 'memberIds', path, decodeString),
  };
}

function assertUniqueIds(items: ReadonlyArray<{ id: string }>, path: string): void {
  const seen = new Set<string>();
  items.forEach((item, i) => {
    if (seen.has(item.id)) throw new ModelValidationError(`${path}[${i}].id`, `duplicate id '${item.id}'`);
    seen.add(item.id);
  });
}

export function decodeDiagramModel(value: unknown, path = 'model'): DiagramModel {
  const obj = requireObject(value, path);
  const flag = obj.hasExplicitCoordinates;
  if (flag !== undefined && typeof flag !== 'boolean') {
    throw new ModelValidationError(`${path}.hasExplicitCoordinates`, 'expected a boolean');
  }

  const shapes = optionalArray(obj, 'shapes', path, decodeShape);
  assertUniqueIds(shapes, `${path}.shapes`);
  const pools = optionalArray(obj, 'pools', path, decodePool);
  assertUniqueIds(pools, `${path}.pools`);
  const lanes = optionalArray(obj, 'lanes', path, decodeLane);
  assertUniqueIds(lanes, `${path}.lanes`);

  return createDiagramModel({
    shapes,
    connectors: optionalArray(obj, 'connectors', path, decodeConnector),
    pools,
    lanes,
    hasExplicitCoordinates: flag,
    name: optionalString(obj, 'name', path),
  });
}
