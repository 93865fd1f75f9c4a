import type { Alignment, ContainerElement, TextRun } from '@pagewright/contracts';
import type { LaidOutLine, TextPosition } from '@pagewright/measuring-text';
import { WIDTH_EPSILON } from '@pagewright/common';

/** Finished slot in a horizontal container or table row. Renders nothing. */
export const EMPTY_ELEMENT: ContainerElement = Object.freeze({
  kind: 'container',
  direction: 'vertical',
  children: Object.freeze([]),
  columnFractions: Object.freeze([]),
});

/**
 * Counts the lines from `startIndex` that fit in `availableHeight`.
 *
 * With `force` set (the area is at the top of a page) at least one line is
 * taken even when it is taller than the space left.
 */
export function sliceLines(
  lines: readonly LaidOutLine[],
  startIndex: number,
  availableHeight: number,
  force: boolean,
): { toLine: number; height: number } {
  let height = 0;
  let index = startIndex;

  while (index < lines.length) {
    const lineHeight = lines[index].lineHeight || 0;
    if (height + lineHeight > availableHeight + WIDTH_EPSILON) {
      break;
    }
    height += lineHeight;
    index += 1;
  }

  if (index === startIndex && force && startIndex < lines.length) {
    height = lines[startIndex].lineHeight || 0;
    index += 1;
  }

  return {
    toLine: index,
    height,
  };
}

/**
 * Distance from the top of a line box to its baseline. Extra leading is split
 * evenly above and below the glyphs.
 */
export const baselineOffset = (line: Pick<LaidOutLine, 'ascent' | 'descent' | 'lineHeight'>): number =>
  (line.lineHeight - (line.ascent + line.descent)) / 2 + line.ascent;

export const alignOffset = (alignment: Alignment, available: number, width: number): number => {
  const free = available - width;
  if (free <= 0) return 0;
  switch (alignment) {
    case 'center':
      return free / 2;
    case 'right':
      return free;
    case 'left':
      return 0;
  }
};

/**
 * Normalizes weights to fractions summing to 1. Callers validate the weights
 * first; an all-zero list splits evenly.
 */
export function fractionsFromWeights(weights: readonly number[]): number[] {
  const total = weights.reduce((sum, weight) => sum + weight, 0);
  if (total <= 0) return weights.map(() => 1 / weights.length);
  return weights.map((weight) => weight / total);
}

/** Runs holding only the text from `from` onwards. */
export function sliceRuns(runs: readonly TextRun[], from: TextPosition): TextRun[] {
  const sliced: TextRun[] = [];
  runs.forEach((run, index) => {
    if (index < from.run) return;
    const text = index === from.run ? run.text.slice(from.offset) : run.text;
    if (text.length === 0) return;
    sliced.push(run.style ? { text, style: run.style } : { text });
  });
  return sliced;
}
