import type { Element, FramedElement, PaddedElement, RenderResult, Style, StyledElement } from '@pagewright/contracts';
import { mergeStyles } from '@pagewright/style-engine';
import { WIDTH_EPSILON } from '@pagewright/common';
import type { LayoutArea } from './area.js';
import type { RenderContext } from './types.js';

type Wrapper = PaddedElement | FramedElement | StyledElement;

/**
 * Lifts a child's result to its wrapper. A child that placed nothing leaves
 * the wrapper untouched so the caller sees no progress.
 */
function wrapResult<TWrapper extends Wrapper>(
  wrapper: TWrapper,
  result: RenderResult,
  height: number,
  rebuild: (child: Element) => TWrapper,
): RenderResult<TWrapper> {
  if (result.status === 'done') {
    return result.pageBreak ? { status: 'done', height, pageBreak: true } : { status: 'done', height };
  }
  if (result.height === 0 && result.remainder === wrapper.child) {
    return { status: 'partial', height: 0, remainder: wrapper };
  }
  return { status: 'partial', height, remainder: rebuild(result.remainder) };
}

/**
 * Top padding is applied on the first page the child renders on and bottom
 * padding on the last; left and right apply on every page.
 */
export function renderPadded(element: PaddedElement, area: LayoutArea, style: Style, ctx: RenderContext): RenderResult {
  const { padding } = element;
  const top = element.started ? 0 : padding.top;
  const result = ctx.render(element.child, area.inset(padding.left, top, padding.right, padding.bottom), style);
  const bottom = result.status === 'done' ? padding.bottom : 0;
  const height = Math.min(area.height, top + result.height + bottom);
  return wrapResult(element, result, height, (child) => Object.freeze({ ...element, child, started: true }));
}

export function renderStyled(
  element: StyledElement,
  area: LayoutArea,
  inherited: Style,
  ctx: RenderContext,
): RenderResult {
  const result = ctx.render(element.child, area, mergeStyles(inherited, element.style));
  return wrapResult(element, result, result.height, (child) => Object.freeze({ ...element, child }));
}

/**
 * Frame of filled rectangles around the child. Side edges are drawn on every
 * page; the top edge only where the child starts and the bottom edge only
 * where it ends. Edges that do not fit the area are drawn below it and
 * reported as overflow, never over the child.
 */
export function renderFramed(element: FramedElement, area: LayoutArea, style: Style, ctx: RenderContext): RenderResult {
  const t = element.thickness;
  const top = element.started ? 0 : t;
  const result = ctx.render(element.child, area.inset(t, top, t, t), style);
  const done = result.status === 'done';
  const frameHeight = top + result.height + (done ? t : 0);
  const height = Math.min(area.height, frameHeight);

  const placed = wrapResult(element, result, height, (child) => Object.freeze({ ...element, child, started: true }));
  if (placed.status === 'partial' && placed.remainder === element) {
    return placed;
  }

  if (frameHeight > area.height + WIDTH_EPSILON) {
    area.reportOverflow({ elementKind: 'framed', axis: 'height', overflow: frameHeight - area.height });
  }
  area.drawRect(0, 0, t, frameHeight, element.color);
  area.drawRect(area.width - t, 0, t, frameHeight, element.color);
  if (top > 0) area.drawRect(0, 0, area.width, t, element.color);
  if (done) area.drawRect(0, frameHeight - t, area.width, t, element.color);
  return placed;
}
