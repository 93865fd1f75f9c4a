import { describe, expect, it } from 'vitest';
import { LayoutArea } from './area.js';
import { paragraph, text } from './elements.js';
import { renderParagraph, renderText } from './layout-paragraph.js';
import { BASE_STYLE, createTestContext, drawnText, rectInstructions, textInstructions } from './test-utils/fixtures.js';

const ctx = createTestContext();

/** Area whose page already holds 10 units of content above it. */
const usedArea = (width: number, height: number): LayoutArea => {
  const page = LayoutArea.create(0, 0, width, height + 10);
  page.advance(10);
  return page.sub();
};

describe('renderParagraph', () => {
  it('draws each word on the baseline of its line', () => {
    const area = LayoutArea.create(0, 0, 200, 100);
    const result = renderParagraph(paragraph('Hello world'), area, BASE_STYLE, ctx);

    expect(result).toEqual({ status: 'done', height: 10 });
    expect(textInstructions(area.instructions).map(({ x, y, text: drawn }) => [x, y, drawn])).toEqual([
      [0, 8, 'Hello'],
      [30, 8, 'world'],
    ]);
  });

  it('wraps words that do not fit on the line', () => {
    const area = LayoutArea.create(0, 0, 60, 100);
    const result = renderParagraph(paragraph('Hello world again'), area, BASE_STYLE, ctx);

    expect(result).toEqual({ status: 'done', height: 20 });
    expect(textInstructions(area.instructions).map(({ x, y, text: drawn }) => [x, y, drawn])).toEqual([
      [0, 8, 'Hello'],
      [30, 8, 'world'],
      [0, 18, 'again'],
    ]);
  });

  it('returns the text of the undrawn lines as the remainder', () => {
    const area = usedArea(40, 25);
    const element = paragraph('one two three four');
    const result = renderParagraph(element, area, BASE_STYLE, ctx);

    expect(result.status).toBe('partial');
    expect(result.height).toBe(20);
    expect(drawnText(area.instructions)).toEqual(['one', 'two', 'three']);
    if (result.status === 'partial') {
      expect(result.remainder).toEqual({ kind: 'paragraph', runs: [{ text: 'four' }], alignment: 'left' });
    }
  });

  it('returns itself when no line fits below earlier content', () => {
    const area = usedArea(100, 5);
    const element = paragraph('Hi');
    const result = renderParagraph(element, area, BASE_STYLE, ctx);

    expect(result).toEqual({ status: 'partial', height: 0, remainder: element });
    expect(area.instructions).toHaveLength(0);
  });

  it('draws a line taller than an empty page and reports the overflow', () => {
    const area = LayoutArea.create(0, 0, 100, 5);
    const result = renderParagraph(paragraph('Hi'), area, BASE_STYLE, ctx);

    expect(result).toEqual({ status: 'done', height: 5 });
    expect(drawnText(area.instructions)).toEqual(['Hi']);
    expect(area.overflows).toEqual([{ elementKind: 'paragraph', axis: 'height', overflow: 5 }]);
  });

  it('reports a word wider than the area', () => {
    const area = LayoutArea.create(0, 0, 30, 100);
    renderParagraph(paragraph('abcdefghij'), area, BASE_STYLE, ctx);

    expect(drawnText(area.instructions)).toEqual(['abcdefghij']);
    expect(area.overflows).toEqual([{ elementKind: 'paragraph', axis: 'width', overflow: 20 }]);
  });

  it('aligns lines', () => {
    const centered = LayoutArea.create(0, 0, 100, 100);
    renderParagraph(paragraph('abc', { alignment: 'center' }), centered, BASE_STYLE, ctx);
    expect(textInstructions(centered.instructions)[0].x).toBe(42.5);

    const right = LayoutArea.create(0, 0, 100, 100);
    renderParagraph(paragraph('abc', { alignment: 'right' }), right, BASE_STYLE, ctx);
    expect(textInstructions(right.instructions)[0].x).toBe(85);
  });

  it('justifies every line but the last', () => {
    const area = LayoutArea.create(0, 0, 50, 100);
    renderParagraph(paragraph('aa bb cc dd', { alignment: 'justify' }), area, BASE_STYLE, ctx);

    expect(textInstructions(area.instructions).map(({ x, text: drawn }) => [x, drawn])).toEqual([
      [0, 'aa'],
      [20, 'bb'],
      [40, 'cc'],
      [0, 'dd'],
    ]);
  });

  it('inherits the surrounding style and applies run styles', () => {
    const area = LayoutArea.create(0, 0, 200, 100);
    renderParagraph(paragraph(['plain ', { text: 'bold', style: { bold: true } }]), area, BASE_STYLE, ctx);

    const [plain, bold] = textInstructions(area.instructions);
    expect([plain.style.fontSize, plain.style.bold]).toEqual([10, false]);
    expect([bold.style.fontSize, bold.style.bold]).toEqual([10, true]);
  });

  it('underlines and strikes through text with bars', () => {
    const area = LayoutArea.create(0, 0, 200, 100);
    renderParagraph(paragraph({ text: 'ab', style: { underline: true, strikethrough: true } }), area, BASE_STYLE, ctx);

    const [underline, strike] = rectInstructions(area.instructions);
    expect([underline.x, underline.y, underline.width, underline.height]).toEqual([0, 9, 10, 0.5]);
    expect(strike.y).toBeCloseTo(5);
    expect(strike.width).toBe(10);
  });

  it('gives an empty paragraph the height of one line', () => {
    const area = LayoutArea.create(0, 0, 200, 100);
    const result = renderParagraph(paragraph(''), area, BASE_STYLE, ctx);

    expect(result).toEqual({ status: 'done', height: 10 });
    expect(area.instructions).toHaveLength(0);
  });
});

describe('renderText', () => {
  it('draws a single line without wrapping and reports the width overflow', () => {
    const area = LayoutArea.create(0, 0, 30, 100);
    const result = renderText(text('abcd efgh'), area, BASE_STYLE, ctx);

    expect(result).toEqual({ status: 'done', height: 10 });
    expect(drawnText(area.instructions)).toEqual(['abcd efgh']);
    expect(area.overflows).toEqual([{ elementKind: 'text', axis: 'width', overflow: 15 }]);
  });

  it('moves to the next page when the line does not fit', () => {
    const area = usedArea(100, 4);
    const element = text('x');
    expect(renderText(element, area, BASE_STYLE, ctx)).toEqual({ status: 'partial', height: 0, remainder: element });
  });
});
