import type { ContainerElement, Element, RenderResult, Style } from '@pagewright/contracts';
import { mergeStyles } from '@pagewright/style-engine';
import type { LayoutArea } from './area.js';
import type { RenderContext } from './types.js';
import { EMPTY_ELEMENT } from './layout-utils.js';

export type SequenceOutcome<TElement extends Element> =
  | { status: 'done'; height: number; pageBreak: boolean }
  /** `rest` is null when nothing was placed and the sequence is unchanged. */
  | { status: 'partial'; height: number; rest: TElement[] | null };

/**
 * Renders children top to bottom. Stops at the first child that only
 * partially fits, so no later sibling is drawn below an unfinished one, and at
 * the first child that asks for a page break.
 */
export function renderSequence<TElement extends Element>(
  children: readonly TElement[],
  area: LayoutArea,
  renderChild: (child: TElement, area: LayoutArea) => RenderResult<TElement>,
): SequenceOutcome<TElement> {
  const cursor = area.sub();
  for (let index = 0; index < children.length; index += 1) {
    const child = children[index];
    const result = renderChild(child, cursor.sub());
    cursor.advance(result.height);

    if (result.status === 'partial') {
      if (index === 0 && cursor.consumed === 0 && result.remainder === child) {
        return { status: 'partial', height: 0, rest: null };
      }
      return { status: 'partial', height: cursor.consumed, rest: [result.remainder, ...children.slice(index + 1)] };
    }

    if (result.pageBreak) {
      const rest = children.slice(index + 1);
      if (rest.length === 0) {
        return { status: 'done', height: cursor.consumed, pageBreak: true };
      }
      return { status: 'partial', height: cursor.consumed, rest };
    }
  }
  return { status: 'done', height: cursor.consumed, pageBreak: false };
}

/** Maps a sequence outcome onto the render result of the element that owns the sequence. */
export function sequenceResult<TOwner extends Element, TElement extends Element>(
  owner: TOwner,
  outcome: SequenceOutcome<TElement>,
  withRest: (rest: readonly TElement[]) => TOwner,
): RenderResult<TOwner> {
  if (outcome.status === 'done') {
    return outcome.pageBreak
      ? { status: 'done', height: outcome.height, pageBreak: true }
      : { status: 'done', height: outcome.height };
  }
  if (!outcome.rest) {
    return { status: 'partial', height: 0, remainder: owner };
  }
  return { status: 'partial', height: outcome.height, remainder: withRest(Object.freeze(outcome.rest)) };
}

function renderStack(element: ContainerElement, area: LayoutArea, style: Style, ctx: RenderContext): RenderResult {
  const outcome = renderSequence(element.children, area, (child, childArea) => ctx.render(child, childArea, style));
  return sequenceResult(element, outcome, (children) => Object.freeze({ ...element, children }));
}

/**
 * Side-by-side children sharing the width by their fractions. The container
 * is as tall as its tallest child; finished children leave an empty slot in
 * the remainder so the columns keep their positions on the next page. Page
 * break requests from children are ignored.
 */
function renderColumns(element: ContainerElement, area: LayoutArea, style: Style, ctx: RenderContext): RenderResult {
  const remainders: Element[] = [];
  let offset = 0;
  let height = 0;
  let partial = false;

  for (let index = 0; index < element.children.length; index += 1) {
    const child = element.children[index];
    const width = area.width * (element.columnFractions[index] ?? 0);
    const result = ctx.render(child, area.column(offset, width), style);
    offset += width;
    height = Math.max(height, result.height);
    if (result.status === 'partial') {
      partial = true;
      remainders.push(result.remainder);
    } else {
      remainders.push(EMPTY_ELEMENT);
    }
  }

  if (!partial) {
    return { status: 'done', height };
  }
  const changed = remainders.some((remainder, index) => remainder !== element.children[index]);
  if (!changed) {
    return { status: 'partial', height: 0, remainder: element };
  }
  return {
    status: 'partial',
    height,
    remainder: Object.freeze({ ...element, children: Object.freeze(remainders) }),
  };
}

export function renderContainer(
  element: ContainerElement,
  area: LayoutArea,
  inherited: Style,
  ctx: RenderContext,
): RenderResult {
  const style = mergeStyles(inherited, element.style);
  return element.direction === 'horizontal'
    ? renderColumns(element, area, style, ctx)
    : renderStack(element, area, style, ctx);
}
