/**
 * Shared utilities for list marker text.
 *
 * Markers are computed once when a list is built, so the numbering of an item
 * never changes when the list is split across pages.
 */

import type { ListMarkerFormat } from '@pagewright/contracts';

const ROMAN_NUMERALS: ReadonlyArray<[number, string]> = [
  [1000, 'm'],
  [900, 'cm'],
  [500, 'd'],
  [400, 'cd'],
  [100, 'c'],
  [90, 'xc'],
  [50, 'l'],
  [40, 'xl'],
  [10, 'x'],
  [9, 'ix'],
  [5, 'v'],
  [4, 'iv'],
  [1, 'i'],
];

const toRoman = (value: number): string => {
  let remaining = value;
  let result = '';
  for (const [amount, numeral] of ROMAN_NUMERALS) {
    while (remaining >= amount) {
      result += numeral;
      remaining -= amount;
    }
  }
  return result;
};

/**
 * Bijective base-26 letters: 1 → a, 26 → z, 27 → aa.
 */
const toLetters = (value: number): string => {
  let remaining = value;
  let result = '';
  while (remaining > 0) {
    const index = (remaining - 1) % 26;
    result = String.fromCharCode(97 + index) + result;
    remaining = Math.floor((remaining - 1) / 26);
  }
  return result;
};

/**
 * Formats a list ordinal. Roman and letter formats need a positive ordinal;
 * anything else falls back to decimal.
 *
 * @example
 * formatListOrdinal(4, 'upperRoman') // 'IV'
 * formatListOrdinal(28, 'lowerLetter') // 'ab'
 */
export function formatListOrdinal(value: number, format: ListMarkerFormat): string {
  if (!Number.isInteger(value) || value < 1 || format === 'decimal') {
    return String(value);
  }
  switch (format) {
    case 'lowerLetter':
      return toLetters(value);
    case 'upperLetter':
      return toLetters(value).toUpperCase();
    case 'lowerRoman':
      return toRoman(value);
    case 'upperRoman':
      return toRoman(value).toUpperCase();
  }
}

/** Marker text for an ordered list item, e.g. `3.` or `iv.` */
export function formatOrderedMarker(value: number, format: ListMarkerFormat = 'decimal'): string {
  return `${formatListOrdinal(value, format)}.`;
}

/**
 * Horizontal offset of a marker drawn right-aligned against the content,
 * clamped to the left edge of the gutter.
 */
export function resolveMarkerX(indent: number, markerGap: number, markerWidth: number): number {
  return Math.max(0, indent - markerGap - markerWidth);
}
