import type { Element, RenderResult, Style } from '@pagewright/contracts';
import type { TextMeasurer } from '@pagewright/measuring-text';
import type { LayoutArea } from './area.js';
import type { RenderContext } from './types.js';
import { renderParagraph, renderText } from './layout-paragraph.js';
import { renderContainer } from './layout-container.js';
import { renderTable } from './layout-table.js';
import { renderList, renderListItem } from './layout-list.js';
import { renderExternalBlock, renderImage } from './layout-image.js';
import { renderPageBreak, renderSpacer } from './layout-breaks.js';
import { renderFramed, renderPadded, renderStyled } from './layout-wrappers.js';

export function renderElement(element: Element, area: LayoutArea, style: Style, ctx: RenderContext): RenderResult {
  switch (element.kind) {
    case 'paragraph':
      return renderParagraph(element, area, style, ctx);
    case 'text':
      return renderText(element, area, style, ctx);
    case 'container':
      return renderContainer(element, area, style, ctx);
    case 'table':
      return renderTable(element, area, style, ctx);
    case 'list':
      return renderList(element, area, style, ctx);
    case 'list-item':
      return renderListItem(element, area, style, ctx);
    case 'image':
      return renderImage(element, area);
    case 'external':
      return renderExternalBlock(element, area);
    case 'page-break':
      return renderPageBreak();
    case 'spacer':
      return renderSpacer(element, area, style, ctx);
    case 'padded':
      return renderPadded(element, area, style, ctx);
    case 'styled':
      return renderStyled(element, area, style, ctx);
    case 'framed':
      return renderFramed(element, area, style, ctx);
  }
}

export function createRenderContext(measurer: TextMeasurer): RenderContext {
  const ctx: RenderContext = {
    measurer,
    render: (element, area, style) => renderElement(element, area, style, ctx),
  };
  return ctx;
}
