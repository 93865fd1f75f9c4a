/**
 * Test-only helpers shared by the layout-engine unit tests.
 *
 * Metrics are fixed-width: every glyph is half the font size wide, ascent is
 * 0.8 and descent 0.2 of the size. At the 10pt base style a glyph is 5 wide,
 * a line is 10 tall and the baseline sits 8 below the line top.
 *
 * DO NOT import this file from production code.
 */

import { expect } from 'vitest';
import {
  LayoutError,
  type DrawInstruction,
  type Hyphenator,
  type RectInstruction,
  type TextInstruction,
} from '@pagewright/contracts';
import { createStyle } from '@pagewright/style-engine';
import { createFixedWidthFontMetrics, createTextMeasurer } from '@pagewright/measuring-text';
import { createRenderContext } from '../render-element.js';
import type { RenderContext } from '../types.js';

export const BASE_STYLE = createStyle({ fontSize: 10 });

export function createTestContext(options: { hyphenator?: Hyphenator; locale?: string } = {}): RenderContext {
  const measurer = createTextMeasurer({
    fontMetrics: createFixedWidthFontMetrics(),
    hyphenator: options.hyphenator,
    locale: options.locale,
  });
  return createRenderContext(measurer);
}

export const textInstructions = (instructions: readonly DrawInstruction[]): TextInstruction[] =>
  instructions.filter((instruction): instruction is TextInstruction => instruction.kind === 'text');

export const rectInstructions = (instructions: readonly DrawInstruction[]): RectInstruction[] =>
  instructions.filter((instruction): instruction is RectInstruction => instruction.kind === 'rect');

export const drawnText = (instructions: readonly DrawInstruction[]): string[] =>
  textInstructions(instructions).map((instruction) => instruction.text);

/** Runs `fn` and returns the LayoutError it throws, failing when it throws anything else. */
export const expectLayoutError = (fn: () => unknown, code: LayoutError['code']): LayoutError => {
  try {
    fn();
  } catch (error) {
    expect(error).toBeInstanceOf(LayoutError);
    if (error instanceof LayoutError) {
      expect(error.code).toBe(code);
      return error;
    }
  }
  throw new Error(`expected a ${code} error`);
};
