import { describe, expect, it } from 'vitest';
import type { DrawInstruction, Page, PdfWriter, TextInstruction } from '@pagewright/contracts';
import { createStyle } from '@pagewright/style-engine';
import {
  createDictionaryHyphenator,
  createFixedWidthFontMetrics,
  createTextMeasurer,
} from '@pagewright/measuring-text';
import {
  LayoutArea,
  createDocument,
  createRenderContext,
  image,
  layoutDocument,
  pageBreak,
  paragraph,
  renderElement,
  spacer,
  table,
  verticalLayout,
} from '@pagewright/layout-engine';
import { createPdfPainter } from '@pagewright/painter-pdf';

// Fixed-width metrics at 10pt: glyphs are 5 wide, lines 10 tall, baselines 8 below the line top.
const STYLE = { fontSize: 10 };

/** 500pt of content height, 160pt wide. */
const tallPage = {
  pageSize: { w: 200, h: 540 },
  margins: { top: 20, right: 20, bottom: 20, left: 20 },
  defaultStyle: STYLE,
};

const texts = (instructions: readonly DrawInstruction[]): TextInstruction[] =>
  instructions.filter((instruction): instruction is TextInstruction => instruction.kind === 'text');

/** Words on the same baseline joined into one line of text. */
const linesOf = (page: Page): string[] => {
  const lines = new Map<number, string[]>();
  for (const { y, text } of texts(page.instructions)) {
    lines.set(y, [...(lines.get(y) ?? []), text]);
  }
  return [...lines.values()].map((words) => words.join(' '));
};

const wordsOf = (page: Page): string[] => texts(page.instructions).map(({ text }) => text);

describe('pagination scenarios', () => {
  it('splits a paragraph of 3.4 lines on a page with room for 3', () => {
    const element = paragraph('aaaa bbbb cccc dddd eeee ffff gggg hhhh iiii jj');
    const ctx = createRenderContext(createTextMeasurer({ fontMetrics: createFixedWidthFontMetrics() }));
    const area = LayoutArea.create(0, 0, 80, 30);

    const result = renderElement(element, area, createStyle(STYLE), ctx);
    expect(result).toEqual({ status: 'partial', height: 30, remainder: paragraph('jj') });

    const layout = layoutDocument(
      createDocument([element], {
        pageSize: { w: 100, h: 50 },
        margins: { top: 10, right: 10, bottom: 10, left: 10 },
        defaultStyle: STYLE,
      }),
    );
    expect(layout.pages.map(linesOf)).toEqual([['aaaa bbbb cccc', 'dddd eeee ffff', 'gggg hhhh iiii'], ['jj']]);
  });

  it('draws an image taller than the space left at the top of the next page', () => {
    const logo = { id: 'logo' };
    const layout = layoutDocument(
      createDocument([spacer(47), paragraph('before'), image(logo, { width: 50, height: 30 })], tallPage),
    );

    expect(layout.pages).toHaveLength(2);
    expect(wordsOf(layout.pages[0])).toEqual(['before']);
    expect(layout.pages[0].instructions.some((instruction) => instruction.kind === 'image')).toBe(false);
    expect(layout.pages[1].instructions).toEqual([{ kind: 'image', x: 20, y: 20, width: 50, height: 30, image: logo }]);
    expect(layout.diagnostics).toEqual([]);
  });

  it('starts a new page at a break inside a container with most of the page unused', () => {
    const layout = layoutDocument(
      createDocument([verticalLayout([spacer(9), paragraph('top'), pageBreak(), paragraph('next')])], tallPage),
    );

    expect(layout.pages).toHaveLength(2);
    // The last line ends 100pt into the 500pt content area.
    expect(texts(layout.pages[0].instructions).map(({ y, text }) => [y, text])).toEqual([[118, 'top']]);
    expect(texts(layout.pages[1].instructions).map(({ y, text }) => [y, text])).toEqual([[28, 'next']]);
  });

  it('moves a table row that does not fit to the next page with the rows after it', () => {
    const tall = Array.from({ length: 9 }, (_, index) => `line${index + 1}`).join('\n');
    const rows = [1, 2, 3, 4, 5].map((row) => [
      paragraph(row === 3 ? tall : `r${row}c1`),
      paragraph(`r${row}c2`),
    ]);
    const layout = layoutDocument(createDocument([spacer(40), table({ columnWeights: [1, 1], rows })], tallPage));

    expect(layout.pages.map(wordsOf)).toEqual([
      ['r1c1', 'r1c2', 'r2c1', 'r2c2'],
      [
        'line1',
        'line2',
        'line3',
        'line4',
        'line5',
        'line6',
        'line7',
        'line8',
        'line9',
        'r3c2',
        'r4c1',
        'r4c2',
        'r5c1',
        'r5c2',
      ],
    ]);
  });
});

describe('hyphenation tie-break', () => {
  const hyphenator = createDictionaryHyphenator({ 'en-US': ['pag-i-na-tion'] });

  const layoutWord = (contentWidth: number): string[][] =>
    layoutDocument(
      createDocument([paragraph('pagination')], {
        pageSize: { w: contentWidth + 20, h: 100 },
        margins: { top: 10, right: 10, bottom: 10, left: 10 },
        defaultStyle: STYLE,
        hyphenation: { locale: 'en-US' },
      }),
      { hyphenator },
    ).pages.map(wordsOf);

  it('keeps a prefix whose width with the hyphen equals the line width', () => {
    expect(layoutWord(35)).toEqual([['pagina-', 'tion']]);
  });

  it('falls back to the previous break point when the line is one unit narrower', () => {
    expect(layoutWord(34)).toEqual([['pagi-', 'nation']]);
  });
});

describe('painting a layout', () => {
  it('replays every page through the writer in page order', () => {
    const calls: string[] = [];
    const writer: PdfWriter = {
      beginPage: (page) => calls.push(`begin ${page.number}`),
      drawText: (x, y, text) => calls.push(`text ${x},${y} ${text}`),
      drawRect: (x, y, width, height) => calls.push(`rect ${x},${y} ${width}x${height}`),
      drawImage: (x, y, width, height, handle) => calls.push(`image ${x},${y} ${width}x${height} ${handle.id}`),
      endPage: (page) => calls.push(`end ${page.number}`),
    };
    const layout = layoutDocument(
      createDocument([paragraph('first'), pageBreak(), image({ id: 'logo' }, { width: 10, height: 10 })], tallPage),
    );

    createPdfPainter(writer).paint(layout);
    expect(calls).toEqual(['begin 1', 'text 20,28 first', 'end 1', 'begin 2', 'image 20,20 10x10 logo', 'end 2']);
  });
});
