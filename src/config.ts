/**
 * Environment configuration for the layout server.
 *
 * - `DIAGRAM_LAYOUT_MODE`: `use-external-tool` (default) or `preserve`
 * - `DIAGRAM_LAYOUT_DIRECTION`: a direction name or `LR` / `TB` / `RL` / `BT`
 * - `DIAGRAM_LAYOUT_DEBUG`: `1`, `true` or `yes` enables debug logging
 */

import { ConfigurationError } from './errors';
import { LAYOUT_DIRECTIONS, LAYOUT_MODES, type LayoutDirection, type LayoutMode } from './types';

export interface LayoutConfig {
  mode: LayoutMode;
  direction: LayoutDirection;
  debug: boolean;
}

export const DEFAULT_LAYOUT_CONFIG: Readonly<LayoutConfig> = {
  mode: 'use-external-tool',
  direction: 'left-to-right',
  debug: false,
};

const DIRECTION_CODES: Readonly<Record<string, LayoutDirection>> = {
  LR: 'left-to-right',
  TB: 'top-to-bottom',
  RL: 'right-to-left',
  BT: 'bottom-to-top',
};

const TRUTHY = new Set(['1', 'true', 'yes']);
const FALSY = new Set(['', '0', 'false', 'no']);

export function parseLayoutMode(value: string): LayoutMode {
  const mode = LAYOUT_MODES.find((m) => m === value);
  if (!mode) {
    throw new ConfigurationError(`Unknown layout mode '${value}'; expected one of ${LAYOUT_MODES.join(', ')}`);
  }
  return mode;
}

export function parseLayoutDirection(value: string): LayoutDirection {
  const direction = DIRECTION_CODES[value.toUpperCase()] ?? LAYOUT_DIRECTIONS.find((d) => d === value);
  if (!direction) {
    throw new ConfigurationError(
      `Unknown layout direction '${value}'; expected one of ${LAYOUT_DIRECTIONS.join(', ')} or LR, TB, RL, BT`
    );
  }
  return direction;
}

function parseFlag(name: string, value: string): boolean {
  const normalized = value.trim().toLowerCase();
  if (TRUTHY.has(normalized)) return true;
  if (FALSY.has(normalized)) return false;
  throw new ConfigurationError(`Invalid boolean for ${name}: '${value}'`);
}

export function loadLayoutConfig(env: NodeJS.ProcessEnv = process.env): LayoutConfig {
  const mode = env.DIAGRAM_LAYOUT_MODE;
  const direction = env.DIAGRAM_LAYOUT_DIRECTION;
  const debug = env.DIAGRAM_LAYOUT_DEBUG;
  return {
    mode: mode ? parseLayoutMode(mode) : DEFAULT_LAYOUT_CONFIG.mode,
    direction: direction ? parseLayoutDirection(direction) : DEFAULT_LAYOUT_CONFIG.direction,
    debug: debug !== undefined ? parseFlag('DIAGRAM_LAYOUT_DEBUG', debug) : DEFAULT_LAYOUT_CONFIG.debug,
  };
}
