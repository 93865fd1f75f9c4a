import { describe, it, expect } from 'vitest';
import { formatListOrdinal, formatOrderedMarker, resolveMarkerX } from './list-marker-utils.js';
import { DEFAULT_LIST_INDENT, LIST_MARKER_GAP } from './layout-constants.js';

describe('formatListOrdinal', () => {
  it('formats decimals', () => {
    expect(formatListOrdinal(1, 'decimal')).toBe('1');
    expect(formatListOrdinal(42, 'decimal')).toBe('42');
  });

  it('formats letters with bijective carry', () => {
    expect(formatListOrdinal(1, 'lowerLetter')).toBe('a');
    expect(formatListOrdinal(26, 'lowerLetter')).toBe('z');
    expect(formatListOrdinal(27, 'lowerLetter')).toBe('aa');
    expect(formatListOrdinal(28, 'upperLetter')).toBe('AB');
  });

  it('formats roman numerals', () => {
    expect(formatListOrdinal(4, 'upperRoman')).toBe('IV');
    expect(formatListOrdinal(9, 'lowerRoman')).toBe('ix');
    expect(formatListOrdinal(1994, 'upperRoman')).toBe('MCMXCIV');
  });

  it('falls back to decimal for ordinals letters and numerals cannot express', () => {
    expect(formatListOrdinal(0, 'lowerRoman')).toBe('0');
    expect(formatListOrdinal(-3, 'upperLetter')).toBe('-3');
  });
});

describe('formatOrderedMarker', () => {
  it('appends a period', () => {
    expect(formatOrderedMarker(3)).toBe('3.');
    expect(formatOrderedMarker(3, 'lowerRoman')).toBe('iii.');
  });
});

describe('resolveMarkerX', () => {
  it('right-aligns the marker against the gap', () => {
    expect(resolveMarkerX(30, 5, 10)).toBe(15);
  });

  it('clamps wide markers to the gutter edge', () => {
    expect(resolveMarkerX(10, 5, 20)).toBe(0);
  });

  it('uses a 10mm indent and a 2mm gap by default', () => {
    expect(DEFAULT_LIST_INDENT).toBeCloseTo(28.3465, 3);
    expect(LIST_MARKER_GAP).toBeCloseTo(5.6693, 3);
  });
});
