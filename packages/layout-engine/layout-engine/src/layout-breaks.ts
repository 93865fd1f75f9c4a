import type { RenderResult, SpacerElement, Style } from '@pagewright/contracts';
import { resolveStyle } from '@pagewright/style-engine';
import { WIDTH_EPSILON } from '@pagewright/common';
import type { LayoutArea } from './area.js';
import type { RenderContext } from './types.js';

export function renderPageBreak(): RenderResult {
  return { status: 'done', height: 0, pageBreak: true };
}

/**
 * Blank space of `lines` lines at the inherited line height. Space that does
 * not fit is carried to the next page.
 */
export function renderSpacer(element: SpacerElement, area: LayoutArea, style: Style, ctx: RenderContext): RenderResult {
  const { lineHeight } = ctx.measurer.lineMetrics(resolveStyle(style));
  const total = element.lines * lineHeight;
  if (total <= area.height + WIDTH_EPSILON) {
    return { status: 'done', height: Math.min(total, area.height) };
  }
  if (area.height <= 0) {
    return { status: 'partial', height: 0, remainder: element };
  }
  const lines = element.lines - area.height / lineHeight;
  return { status: 'partial', height: area.height, remainder: Object.freeze({ ...element, lines }) };
}
