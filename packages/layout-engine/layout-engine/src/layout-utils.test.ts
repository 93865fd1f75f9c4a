import { describe, expect, it } from 'vitest';
import type { LaidOutLine } from '@pagewright/measuring-text';
import { createStyle } from '@pagewright/style-engine';
import { alignOffset, baselineOffset, fractionsFromWeights, sliceLines, sliceRuns } from './layout-utils.js';

const makeLine = (lineHeight: number): LaidOutLine => ({
  segments: [],
  width: 0,
  ascent: lineHeight * 0.8,
  descent: lineHeight * 0.2,
  lineHeight,
  start: { run: 0, offset: 0 },
  end: { run: 0, offset: 0 },
  hyphenated: false,
  overflow: false,
  hardBreak: false,
});

describe('sliceLines', () => {
  const lines = [makeLine(10), makeLine(10), makeLine(10)];

  it('takes the lines that fit in the available height', () => {
    expect(sliceLines(lines, 0, 25, false)).toEqual({ toLine: 2, height: 20 });
  });

  it('takes a line that fits exactly', () => {
    expect(sliceLines(lines, 0, 30, false)).toEqual({ toLine: 3, height: 30 });
  });

  it('starts from the given index', () => {
    expect(sliceLines(lines, 1, 100, false)).toEqual({ toLine: 3, height: 20 });
  });

  it('takes nothing when the first line is too tall', () => {
    expect(sliceLines(lines, 0, 5, false)).toEqual({ toLine: 0, height: 0 });
  });

  it('forces one line at the top of a page', () => {
    expect(sliceLines(lines, 0, 5, true)).toEqual({ toLine: 1, height: 10 });
  });
});

describe('baselineOffset', () => {
  it('splits extra leading above and below the glyphs', () => {
    expect(baselineOffset({ ascent: 8, descent: 2, lineHeight: 12 })).toBe(9);
  });

  it('is the ascent when the line is exactly as tall as the glyphs', () => {
    expect(baselineOffset({ ascent: 8, descent: 2, lineHeight: 10 })).toBe(8);
  });
});

describe('alignOffset', () => {
  it('offsets by the free space', () => {
    expect(alignOffset('left', 100, 40)).toBe(0);
    expect(alignOffset('center', 100, 40)).toBe(30);
    expect(alignOffset('right', 100, 40)).toBe(60);
  });

  it('never offsets content wider than the area', () => {
    expect(alignOffset('right', 100, 140)).toBe(0);
  });
});

describe('fractionsFromWeights', () => {
  it('normalizes weights', () => {
    expect(fractionsFromWeights([1, 3])).toEqual([0.25, 0.75]);
  });

  it('splits evenly when every weight is zero', () => {
    expect(fractionsFromWeights([0, 0])).toEqual([0.5, 0.5]);
  });
});

describe('sliceRuns', () => {
  const bold = createStyle({ bold: true });
  const runs = [{ text: 'Hello ' }, { text: 'world', style: bold }];

  it('keeps the text from the position onwards', () => {
    expect(sliceRuns(runs, { run: 0, offset: 3 })).toEqual([{ text: 'lo ' }, { text: 'world', style: bold }]);
  });

  it('drops runs emptied by the slice', () => {
    expect(sliceRuns(runs, { run: 0, offset: 6 })).toEqual([{ text: 'world', style: bold }]);
  });

  it('slices inside a later run', () => {
    expect(sliceRuns(runs, { run: 1, offset: 2 })).toEqual([{ text: 'rld', style: bold }]);
  });
});
