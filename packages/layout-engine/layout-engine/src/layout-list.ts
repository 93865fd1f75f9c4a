import type { ListElement, ListItemElement, RenderResult, Style } from '@pagewright/contracts';
import { mergeStyles, resolveStyle } from '@pagewright/style-engine';
import { resolveMarkerX } from '@pagewright/common';
import type { LayoutArea } from './area.js';
import type { RenderContext } from './types.js';
import { baselineOffset } from './layout-utils.js';
import { renderSequence, sequenceResult } from './layout-container.js';

function drawMarker(item: ListItemElement, marker: string, area: LayoutArea, style: Style, ctx: RenderContext): void {
  const resolved = resolveStyle(style);
  const width = ctx.measurer.measure(marker, resolved);
  const baseline = baselineOffset(ctx.measurer.lineMetrics(resolved));
  area.drawText(resolveMarkerX(item.indent, item.markerGap, width), baseline, marker, resolved, width);
}

/**
 * Content is indented by the item's hanging indent; the marker is
 * right-aligned in the gutter on the first line. The marker goes on the page
 * where the item's content starts and is never repeated.
 */
export function renderListItem(
  item: ListItemElement,
  area: LayoutArea,
  inherited: Style,
  ctx: RenderContext,
): RenderResult<ListItemElement> {
  const style = mergeStyles(inherited, item.style);
  const result = ctx.render(item.content, area.inset(item.indent, 0, 0, 0), style);
  // Content that only passed a page break has not started on this page.
  const started = result.status === 'done' || result.height > 0;

  const marker = item.markerDrawn || !started ? null : item.marker;
  if (marker !== null) {
    drawMarker(item, marker, area, style, ctx);
  }

  if (result.status === 'done') {
    return result;
  }
  if (!started && result.remainder === item.content) {
    return { status: 'partial', height: 0, remainder: item };
  }
  return {
    status: 'partial',
    height: result.height,
    remainder: Object.freeze({ ...item, content: result.remainder, markerDrawn: item.markerDrawn || marker !== null }),
  };
}

export function renderList(element: ListElement, area: LayoutArea, inherited: Style, ctx: RenderContext): RenderResult {
  const style = mergeStyles(inherited, element.style);
  const outcome = renderSequence(element.items, area, (item, itemArea) => renderListItem(item, itemArea, style, ctx));
  return sequenceResult(element, outcome, (items) => Object.freeze({ ...element, items }));
}
