import type { Alignment, ExternalElement, ImageElement, RenderResult } from '@pagewright/contracts';
import { WIDTH_EPSILON } from '@pagewright/common';
import type { LayoutArea } from './area.js';
import { alignOffset } from './layout-utils.js';

type Block<TElement extends ImageElement | ExternalElement> = {
  element: TElement;
  width: number;
  height: number;
  alignment: Alignment;
  draw(dx: number): void;
};

/**
 * Unsplittable block of fixed size. Moves to the next page rather than being
 * cut; at the top of a page it is drawn even if it is too tall.
 */
function placeBlock<TElement extends ImageElement | ExternalElement>(
  area: LayoutArea,
  block: Block<TElement>,
): RenderResult<TElement> {
  const { element, width, height } = block;
  if (height > area.height + WIDTH_EPSILON) {
    if (!area.isFresh) {
      return { status: 'partial', height: 0, remainder: element };
    }
    area.reportOverflow({ elementKind: element.kind, axis: 'height', overflow: height - area.height });
  }
  if (width > area.width + WIDTH_EPSILON) {
    area.reportOverflow({ elementKind: element.kind, axis: 'width', overflow: width - area.width });
  }
  block.draw(alignOffset(block.alignment, area.width, width));
  return { status: 'done', height: Math.min(height, area.height) };
}

export function renderImage(element: ImageElement, area: LayoutArea): RenderResult {
  return placeBlock(area, {
    element,
    width: element.width,
    height: element.height,
    alignment: element.alignment,
    draw: (dx) => area.drawImage(dx, 0, element.width, element.height, element.image),
  });
}

/** Output of an external renderer, translated into the area unchanged. */
export function renderExternalBlock(element: ExternalElement, area: LayoutArea): RenderResult {
  const { content } = element;
  return placeBlock(area, {
    element,
    width: content.width,
    height: content.height,
    alignment: element.alignment,
    draw: (dx) => area.place(content.instructions, dx, 0),
  });
}
