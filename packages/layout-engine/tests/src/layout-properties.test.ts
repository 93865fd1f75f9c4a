/**
 * Properties that must hold for any input: checked over seeded random
 * paragraphs and tables so failures reproduce.
 */

import { describe, expect, it } from 'vitest';
import type { DrawInstruction, Element, Page, ParagraphElement, TextInstruction } from '@pagewright/contracts';
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
  layoutDocument,
  paragraph,
  renderElement,
  runLayout,
  table,
  type RenderContext,
} from '@pagewright/layout-engine';

const STYLE = createStyle({ fontSize: 10 });
const SEEDS = [1, 2, 3, 5, 8, 13, 21, 34];

const WORDS = [
  'amber',
  'birch',
  'cobalt',
  'delta',
  'ember',
  'fjord',
  'granite',
  'harbor',
  'indigo',
  'juniper',
  'kestrel',
  'lantern',
  'meadow',
  'nimbus',
  'orchard',
  'pepper',
  'quartz',
  'river',
  'saffron',
  'thistle',
];

const hyphenator = createDictionaryHyphenator({
  'en-US': ['cob-alt', 'gran-ite', 'har-bor', 'in-di-go', 'ju-ni-per', 'kes-trel', 'saf-fron', 'this-tle'],
});

/** Small seeded generator (mulberry32). */
function createRandom(seed: number) {
  let state = seed >>> 0;
  const next = (): number => {
    state = (state + 0x6d2b79f5) >>> 0;
    let t = state;
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
  const int = (min: number, max: number): number => min + Math.floor(next() * (max - min + 1));
  const pick = <T>(items: readonly T[]): T => items[int(0, items.length - 1)];
  return { int, pick };
}

type Random = ReturnType<typeof createRandom>;

const randomText = (random: Random): string =>
  Array.from({ length: random.int(1, 40) }, () => random.pick(WORDS)).join(random.int(0, 5) === 0 ? '  ' : ' ');

/** Letters only: whitespace and inserted hyphens are not content. */
const content = (text: string): string => text.replace(/[\s-]/g, '');

const texts = (instructions: readonly DrawInstruction[]): TextInstruction[] =>
  instructions.filter((instruction): instruction is TextInstruction => instruction.kind === 'text');

const drawnContent = (area: LayoutArea): string => content(texts(area.instructions).map(({ text }) => text).join(''));

const paragraphText = (element: ParagraphElement): string => element.runs.map((run) => run.text).join('');

const createContext = (hyphenate: boolean): RenderContext =>
  createRenderContext(
    createTextMeasurer({
      fontMetrics: createFixedWidthFontMetrics(),
      hyphenator: hyphenate ? hyphenator : null,
      locale: hyphenate ? 'en-US' : null,
    }),
  );

/** Renders a paragraph onto fresh areas until it finishes. */
function renderAcrossAreas(element: ParagraphElement, random: Random, width: number, ctx: RenderContext): LayoutArea[] {
  const areas: LayoutArea[] = [];
  let current: Element = element;
  while (areas.length < 500) {
    const area = LayoutArea.create(0, 0, width, random.int(10, 60));
    areas.push(area);
    const result = renderElement(current, area, STYLE, ctx);
    if (result.status === 'done') return areas;
    current = result.remainder;
  }
  throw new Error('paragraph did not finish within 500 areas');
}

describe('paragraph properties', () => {
  it.each(SEEDS)('conserves text between a page and its remainder (seed %i)', (seed) => {
    const random = createRandom(seed);
    const ctx = createContext(true);
    for (let round = 0; round < 20; round += 1) {
      const element = paragraph(randomText(random));
      const area = LayoutArea.create(0, 0, random.int(20, 120), random.int(10, 60));
      const result = renderElement(element, area, STYLE, ctx);

      const rest = result.status === 'partial' && result.remainder.kind === 'paragraph' ? result.remainder : null;
      expect(drawnContent(area) + content(rest ? paragraphText(rest) : '')).toBe(content(paragraphText(element)));
    }
  });

  it.each(SEEDS)('loses no content across pages (seed %i)', (seed) => {
    const random = createRandom(seed);
    const ctx = createContext(true);
    for (let round = 0; round < 10; round += 1) {
      const element = paragraph(randomText(random));
      const areas = renderAcrossAreas(element, random, random.int(20, 120), ctx);

      expect(areas.map(drawnContent).join('')).toBe(content(paragraphText(element)));
    }
  });

  it.each(SEEDS)('keeps every line within the width when nothing overflows (seed %i)', (seed) => {
    const random = createRandom(seed);
    const ctx = createContext(false);
    for (let round = 0; round < 10; round += 1) {
      // The longest word is 7 glyphs (35pt), so every word fits on its own.
      const width = random.int(40, 120);
      const areas = renderAcrossAreas(paragraph(randomText(random)), random, width, ctx);

      for (const area of areas) {
        expect(area.overflows).toEqual([]);
        for (const instruction of texts(area.instructions)) {
          expect(instruction.x + instruction.width).toBeLessThanOrEqual(width + 1e-6);
        }
      }
    }
  });
});

describe('table properties', () => {
  const pageOf = (pages: readonly Page[], token: string): number[] =>
    pages
      .filter((page) => texts(page.instructions).some(({ text }) => text === token))
      .map((page) => page.number);

  it.each(SEEDS)('never splits a row that fits on an empty page (seed %i)', (seed) => {
    const random = createRandom(seed);
    const rowCount = random.int(5, 25);
    // Each cell holds 1-4 lines; the 50pt content height always fits a whole row.
    const rows = Array.from({ length: rowCount }, (_, row) =>
      [0, 1].map((column) =>
        paragraph(Array.from({ length: random.int(1, 4) }, (_, line) => `r${row}c${column}l${line}`).join('\n')),
      ),
    );
    const layout = layoutDocument(
      createDocument([table({ columnWeights: [1, 1], rows })], {
        pageSize: { w: 220, h: 70 },
        margins: { top: 10, right: 10, bottom: 10, left: 10 },
        defaultStyle: { fontSize: 10 },
      }),
    );

    const expected = rows.flatMap((cells) => cells.flatMap((cell) => paragraphText(cell).split('\n')));
    const drawn = layout.pages.flatMap((page) => texts(page.instructions).map(({ text }) => text));
    expect([...drawn].sort()).toEqual([...expected].sort());

    for (let row = 0; row < rowCount; row += 1) {
      const tokens = expected.filter((token) => token.startsWith(`r${row}c`));
      expect(new Set(tokens.flatMap((token) => pageOf(layout.pages, token))).size).toBe(1);
    }
  });
});

describe('determinism', () => {
  it.each(SEEDS)('produces identical pages for the same document (seed %i)', (seed) => {
    const random = createRandom(seed);
    const elements = Array.from({ length: 12 }, () => paragraph(randomText(random)));
    const document = createDocument(elements, {
      pageSize: { w: 150, h: 120 },
      margins: { top: 10, right: 10, bottom: 10, left: 10 },
      defaultStyle: { fontSize: 10 },
      hyphenation: { locale: 'en-US' },
    });

    expect(runLayout(document, { hyphenator })).toEqual(runLayout(document, { hyphenator }));
  });
});
