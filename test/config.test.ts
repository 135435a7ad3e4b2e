import { describe, test, expect } from 'vitest';
import { DEFAULT_LAYOUT_CONFIG, loadLayoutConfig, parseLayoutDirection, parseLayoutMode } from '../src/config';
import { ConfigurationError } from '../src/errors';

describe('parseLayoutMode', () => {
  test('accepts known modes', () => {
    expect(parseLayoutMode('preserve')).toBe('preserve');
    expect(parseLayoutMode('use-external-tool')).toBe('use-external-tool');
  });

  test('rejects anything else', () => {
    expect(() => parseLayoutMode('auto')).toThrow(
      "Unknown layout mode 'auto'; expected one of use-external-tool, preserve"
    );
  });
});

describe('parseLayoutDirection', () => {
  test('accepts full names and short codes in any case', () => {
    expect(parseLayoutDirection('top-to-bottom')).toBe('top-to-bottom');
    expect(parseLayoutDirection('LR')).toBe('left-to-right');
    expect(parseLayoutDirection('bt')).toBe('bottom-to-top');
  });

  test('rejects unknown directions with a ConfigurationError', () => {
    expect(() => parseLayoutDirection('diagonal')).toThrow(ConfigurationError);
  });
});

describe('loadLayoutConfig', () => {
  test('returns the defaults for an empty environment', () => {
    expect(loadLayoutConfig({})).toEqual(DEFAULT_LAYOUT_CONFIG);
  });

  test('reads every variable', () => {
    expect(
      loadLayoutConfig({
        DIAGRAM_LAYOUT_MODE: 'preserve',
        DIAGRAM_LAYOUT_DIRECTION: 'TB',
        DIAGRAM_LAYOUT_DEBUG: 'Yes',
      })
    ).toEqual({ mode: 'preserve', direction: 'top-to-bottom', debug: true });
  });

  test('treats empty and falsy debug values as off', () => {
    expect(loadLayoutConfig({ DIAGRAM_LAYOUT_DEBUG: '' }).debug).toBe(false);
    expect(loadLayoutConfig({ DIAGRAM_LAYOUT_DEBUG: '0' }).debug).toBe(false);
  });

  test('rejects a malformed debug flag', () => {
    expect(() => loadLayoutConfig({ DIAGRAM_LAYOUT_DEBUG: 'sometimes' })).toThrow(
      "Invalid boolean for DIAGRAM_LAYOUT_DEBUG: 'sometimes'"
    );
  });
});
