import { describe, expect, it } from 'vitest';

import {
  COLOR_CODES,
  lookupAddStyle,
  lookupColor,
  lookupRemoveStyle,
  STYLE_ADD_CODES,
  STYLE_REMOVE_CODES,
} from '../../src/compiler/tables.js';

describe('code tables', () => {
  it('keeps add codes within 0-9', () => {
    for (const code of Object.values(STYLE_ADD_CODES)) {
      expect(code).toBeGreaterThanOrEqual(0);
      expect(code).toBeLessThanOrEqual(9);
    }
  });

  it('keeps remove codes within 22-29', () => {
    for (const code of Object.values(STYLE_REMOVE_CODES)) {
      expect(code).toBeGreaterThanOrEqual(22);
      expect(code).toBeLessThanOrEqual(29);
    }
  });

  it('pairs every Fg color with a Bg color ten higher', () => {
    for (const [name, code] of Object.entries(COLOR_CODES)) {
      if (name.endsWith('Fg')) {
        expect(lookupColor(name.replace(/Fg$/, 'Bg'))).toBe(code + 10);
      }
    }
  });

  it('freezes the tables', () => {
    expect(Object.isFrozen(STYLE_ADD_CODES)).toBe(true);
    expect(Object.isFrozen(STYLE_REMOVE_CODES)).toBe(true);
    expect(Object.isFrozen(COLOR_CODES)).toBe(true);
  });
});

describe('lookups', () => {
  it('finds known keywords', () => {
    expect(lookupAddStyle('Inverse')).toBe(7);
    expect(lookupRemoveStyle('Dim')).toBe(22);
    expect(lookupColor('DefaultFg')).toBe(39);
  });

  it('returns null for unknown keywords', () => {
    expect(lookupAddStyle('Sparkle')).toBeNull();
    expect(lookupRemoveStyle('Reset')).toBeNull();
    expect(lookupColor('PurpleFg')).toBeNull();
  });

  it('ignores inherited object properties', () => {
    expect(lookupAddStyle('toString')).toBeNull();
    expect(lookupColor('constructor')).toBeNull();
  });

  it('is case sensitive', () => {
    expect(lookupAddStyle('bold')).toBeNull();
  });
});
