import { describe, expect, it } from 'vitest';
import { LIST_MARKER_GAP } from '@pagewright/common';
import { LayoutArea } from './area.js';
import { listItem, orderedList, pageBreak, paragraph, unorderedList, verticalLayout } from './elements.js';
import { renderList, renderListItem } from './layout-list.js';
import { BASE_STYLE, createTestContext, drawnText, textInstructions } from './test-utils/fixtures.js';

const ctx = createTestContext();

describe('renderListItem', () => {
  it('indents the content and right-aligns the marker in the gutter', () => {
    const area = LayoutArea.create(0, 0, 100, 100);
    const item = listItem(paragraph('aa'), { marker: '1.', indent: 20, markerGap: 5 });

    expect(renderListItem(item, area, BASE_STYLE, ctx)).toEqual({ status: 'done', height: 10 });
    expect(textInstructions(area.instructions).map(({ x, y, text }) => [x, y, text])).toEqual([
      [20, 8, 'aa'],
      [5, 8, '1.'],
    ]);
  });

  it('draws the marker only on the page where the item starts', () => {
    const item = listItem(paragraph('aa bb cc'), { marker: '-', indent: 10, markerGap: 2 });
    const first = LayoutArea.create(0, 0, 30, 25);
    const result = renderListItem(item, first, BASE_STYLE, ctx);

    expect(drawnText(first.instructions)).toEqual(['aa', 'bb', '-']);
    expect(textInstructions(first.instructions)[2].x).toBe(3);
    expect(result).toEqual({
      status: 'partial',
      height: 20,
      remainder: {
        ...item,
        content: { kind: 'paragraph', runs: [{ text: 'cc' }], alignment: 'left' },
        markerDrawn: true,
      },
    });
    if (result.status !== 'partial') return;

    const second = LayoutArea.create(0, 0, 30, 25);
    renderListItem(result.remainder, second, BASE_STYLE, ctx);
    expect(drawnText(second.instructions)).toEqual(['cc']);
  });

  it('returns itself without a marker when no content fits', () => {
    const page = LayoutArea.create(0, 0, 100, 15);
    page.advance(10);
    const area = page.sub();
    const item = listItem(paragraph('aa'), { marker: '1.' });

    expect(renderListItem(item, area, BASE_STYLE, ctx)).toEqual({ status: 'partial', height: 0, remainder: item });
    expect(area.instructions).toHaveLength(0);
  });

  it('keeps the marker with content that starts after a page break', () => {
    const item = listItem(verticalLayout([pageBreak(), paragraph('body')]), { marker: '1.' });
    const first = LayoutArea.create(0, 0, 200, 100);
    const result = renderListItem(item, first, BASE_STYLE, ctx);

    expect(result).toEqual({
      status: 'partial',
      height: 0,
      remainder: { ...item, content: verticalLayout([paragraph('body')]) },
    });
    expect(first.instructions).toEqual([]);
    if (result.status !== 'partial') return;

    const second = LayoutArea.create(0, 0, 200, 100);
    expect(renderListItem(result.remainder, second, BASE_STYLE, ctx)).toEqual({ status: 'done', height: 10 });
    expect(drawnText(second.instructions)).toEqual(['body', '1.']);
  });
});

describe('renderList', () => {
  it('numbers items in order', () => {
    const area = LayoutArea.create(0, 0, 100, 100);
    const result = renderList(orderedList([paragraph('aa'), paragraph('bb')], { indent: 20 }), area, BASE_STYLE, ctx);

    expect(result).toEqual({ status: 'done', height: 20 });
    const drawn = textInstructions(area.instructions);
    expect(drawn.map(({ text }) => text)).toEqual(['aa', '1.', 'bb', '2.']);
    expect(drawn[1].x).toBeCloseTo(20 - LIST_MARKER_GAP - 10);
  });

  it('keeps the remaining items with their markers when the list splits', () => {
    const area = LayoutArea.create(0, 0, 100, 15);
    const element = orderedList([paragraph('aa'), paragraph('bb')], { indent: 20 });
    const result = renderList(element, area, BASE_STYLE, ctx);

    expect(result).toEqual({ status: 'partial', height: 10, remainder: { ...element, items: [element.items[1]] } });
    if (result.status !== 'partial' || result.remainder.kind !== 'list') return;

    const next = LayoutArea.create(0, 0, 100, 100);
    renderList(result.remainder, next, BASE_STYLE, ctx);
    expect(drawnText(next.instructions)).toEqual(['bb', '2.']);
  });

  it('indents nested lists without a marker of their own', () => {
    const area = LayoutArea.create(0, 0, 100, 100);
    const element = unorderedList(
      [paragraph('a'), unorderedList([paragraph('b')], { bullet: '*', indent: 10 })],
      { bullet: '-', indent: 10 },
    );
    renderList(element, area, BASE_STYLE, ctx);

    expect(textInstructions(area.instructions).map(({ x, text }) => [x, text])).toEqual([
      [10, 'a'],
      [0, '-'],
      [20, 'b'],
      [10, '*'],
    ]);
  });
});
