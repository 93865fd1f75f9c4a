import type { Element, RenderResult, Style } from '@pagewright/contracts';
import type { TextMeasurer } from '@pagewright/measuring-text';
import type { LayoutArea } from './area.js';

/**
 * Shared state for one layout run. `render` dispatches on the element kind so
 * composite elements can render their children without importing every
 * renderer.
 */
export type RenderContext = {
  measurer: TextMeasurer;
  render(element: Element, area: LayoutArea, style: Style): RenderResult;
};
