import type {
  ParagraphAlignment,
  ParagraphElement,
  RenderResult,
  ResolvedStyle,
  Style,
  TextElement,
} from '@pagewright/contracts';
import { mergeStyles, resolveStyle } from '@pagewright/style-engine';
import { breakLines, type LaidOutLine, type StyledRun } from '@pagewright/measuring-text';
import { WIDTH_EPSILON } from '@pagewright/common';
import type { LayoutArea } from './area.js';
import type { RenderContext } from './types.js';
import { alignOffset, baselineOffset, sliceLines, sliceRuns } from './layout-utils.js';

// Decoration geometry as fractions of the font size.
const DECORATION_THICKNESS = 0.05;
const UNDERLINE_OFFSET = 0.1;
const STRIKETHROUGH_OFFSET = 0.3;

/** Underline and strikethrough bars under/through a drawn segment. */
export function drawDecorations(
  area: LayoutArea,
  x: number,
  baseline: number,
  width: number,
  style: ResolvedStyle,
): void {
  const thickness = style.fontSize * DECORATION_THICKNESS;
  if (style.underline) {
    area.drawRect(x, baseline + style.fontSize * UNDERLINE_OFFSET, width, thickness, style.color);
  }
  if (style.strikethrough) {
    area.drawRect(x, baseline - style.fontSize * STRIKETHROUGH_OFFSET, width, thickness, style.color);
  }
}

function drawLine(
  area: LayoutArea,
  line: LaidOutLine,
  top: number,
  alignment: ParagraphAlignment,
  isLastLine: boolean,
): void {
  const baseline = top + baselineOffset(line);
  let offset = 0;
  let gap = 0;

  if (alignment === 'justify') {
    const lastWord = line.segments.length > 0 ? line.segments[line.segments.length - 1].word : 0;
    const free = area.width - line.width;
    // The closing line of a paragraph and lines ended by a newline stay ragged.
    if (!isLastLine && !line.hardBreak && !line.overflow && lastWord > 0 && free > 0) {
      gap = free / lastWord;
    }
  } else {
    offset = alignOffset(alignment, area.width, line.width);
  }

  for (const segment of line.segments) {
    const x = offset + segment.x + segment.word * gap;
    area.drawText(x, baseline, segment.text, segment.style, segment.width);
    drawDecorations(area, x, baseline, segment.width, segment.style);
  }
}

/**
 * A paragraph with no visible text still takes one line of its style, the
 * way an empty paragraph does in a word processor.
 */
function renderBlankParagraph(
  element: ParagraphElement,
  area: LayoutArea,
  style: Style,
  ctx: RenderContext,
): RenderResult {
  const { lineHeight } = ctx.measurer.lineMetrics(resolveStyle(style));
  if (lineHeight > area.height + WIDTH_EPSILON) {
    if (!area.isFresh) return { status: 'partial', height: 0, remainder: element };
    area.reportOverflow({ elementKind: 'paragraph', axis: 'height', overflow: lineHeight - area.height });
  }
  return { status: 'done', height: Math.min(lineHeight, area.height) };
}

/**
 * Breaks the paragraph at the area width and draws the lines that fit.
 *
 * The remainder is a new paragraph holding only the text of the undrawn
 * lines, so it can be broken again at a different width. At the top of a page
 * one line is always drawn, even if it is taller than the page.
 */
export function renderParagraph(
  element: ParagraphElement,
  area: LayoutArea,
  inherited: Style,
  ctx: RenderContext,
): RenderResult {
  const style = mergeStyles(inherited, element.style);
  const runs: StyledRun[] = element.runs.map((run) => ({
    text: run.text,
    style: resolveStyle(mergeStyles(style, run.style)),
  }));
  const lines = breakLines(runs, area.width, ctx.measurer);
  if (lines.length === 0) {
    return renderBlankParagraph(element, area, style, ctx);
  }

  const { toLine, height } = sliceLines(lines, 0, area.height, area.isFresh);
  if (toLine === 0) {
    return { status: 'partial', height: 0, remainder: element };
  }

  let top = 0;
  for (let index = 0; index < toLine; index += 1) {
    const line = lines[index];
    drawLine(area, line, top, element.alignment, index === lines.length - 1);
    if (line.overflow) {
      area.reportOverflow({ elementKind: 'paragraph', axis: 'width', overflow: line.width - area.width });
    }
    top += line.lineHeight;
  }
  if (height > area.height + WIDTH_EPSILON) {
    area.reportOverflow({ elementKind: 'paragraph', axis: 'height', overflow: height - area.height });
  }

  const consumed = Math.min(height, area.height);
  if (toLine >= lines.length) {
    return { status: 'done', height: consumed };
  }
  return {
    status: 'partial',
    height: consumed,
    remainder: Object.freeze({ ...element, runs: Object.freeze(sliceRuns(element.runs, lines[toLine].start)) }),
  };
}

/** Draws a single unwrapped line. Text wider than the area is reported, not broken. */
export function renderText(element: TextElement, area: LayoutArea, inherited: Style, ctx: RenderContext): RenderResult {
  const style = mergeStyles(inherited, element.style);
  const pieces = element.runs.map((run) => {
    const resolved = resolveStyle(mergeStyles(style, run.style));
    return { text: run.text, style: resolved, width: ctx.measurer.measure(run.text, resolved) };
  });

  const metricStyles = pieces.length > 0 ? pieces.map((piece) => piece.style) : [resolveStyle(style)];
  const line = { ascent: 0, descent: 0, lineHeight: 0 };
  for (const metricStyle of metricStyles) {
    const metrics = ctx.measurer.lineMetrics(metricStyle);
    line.ascent = Math.max(line.ascent, metrics.ascent);
    line.descent = Math.max(line.descent, metrics.descent);
    line.lineHeight = Math.max(line.lineHeight, metrics.lineHeight);
  }

  if (line.lineHeight > area.height + WIDTH_EPSILON) {
    if (!area.isFresh) return { status: 'partial', height: 0, remainder: element };
    area.reportOverflow({ elementKind: 'text', axis: 'height', overflow: line.lineHeight - area.height });
  }

  const baseline = baselineOffset(line);
  let x = 0;
  for (const piece of pieces) {
    area.drawText(x, baseline, piece.text, piece.style, piece.width);
    drawDecorations(area, x, baseline, piece.width, piece.style);
    x += piece.width;
  }
  if (x > area.width + WIDTH_EPSILON) {
    area.reportOverflow({ elementKind: 'text', axis: 'width', overflow: x - area.width });
  }
  return { status: 'done', height: Math.min(line.lineHeight, area.height) };
}
