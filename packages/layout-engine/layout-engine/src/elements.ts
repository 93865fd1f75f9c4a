import {
  LayoutError,
  type Alignment,
  type CellDecorator,
  type ContainerElement,
  type Element,
  type ExternalContent,
  type ExternalElement,
  type ExternalRenderer,
  type FrameCellDecorator,
  type FramedElement,
  type ImageElement,
  type ImageHandle,
  type ListElement,
  type ListItemElement,
  type ListMarkerFormat,
  type PaddedElement,
  type PageBreakElement,
  type PageMargins,
  type ParagraphAlignment,
  type ParagraphElement,
  type Rgb,
  type SpacerElement,
  type Style,
  type StyleInit,
  type StyledElement,
  type TableElement,
  type TableRow,
  type TextElement,
  type TextRun,
} from '@pagewright/contracts';
import { BLACK, callCollaborator, createStyle, isValidColor, resolveStyle } from '@pagewright/style-engine';
import { DEFAULT_BULLET, DEFAULT_LIST_INDENT, LIST_MARKER_GAP, formatOrderedMarker } from '@pagewright/common';
import { fractionsFromWeights } from './layout-utils.js';

export type TextRunInit = { text: string; style?: StyleInit };

export type ParagraphContent = string | TextRunInit | ReadonlyArray<string | TextRunInit>;

const isNonNegativeFinite = (value: number): boolean => Number.isFinite(value) && value >= 0;
const isPositiveFinite = (value: number): boolean => Number.isFinite(value) && value > 0;

const invalidElement = (message: string, details?: unknown): LayoutError =>
  new LayoutError('INVALID_ELEMENT', message, details);

const optionalStyle = (init: StyleInit | undefined): { style?: Style } => (init ? { style: createStyle(init) } : {});

const isRunList = (content: ParagraphContent): content is ReadonlyArray<string | TextRunInit> =>
  typeof content !== 'string' && !('text' in content);

function toRuns(content: ParagraphContent): TextRun[] {
  const items: ReadonlyArray<string | TextRunInit> = isRunList(content) ? content : [content];
  return items.map((item) =>
    typeof item === 'string'
      ? Object.freeze({ text: item })
      : Object.freeze({ text: item.text, ...optionalStyle(item.style) }),
  );
}

// ---------------------------------------------------------------------------
// Text
// ---------------------------------------------------------------------------

export type ParagraphOptions = {
  style?: StyleInit;
  alignment?: ParagraphAlignment;
};

/** Wrapped text. Accepts a string, a styled run, or a mix of both. */
export function paragraph(content: ParagraphContent, options: ParagraphOptions = {}): ParagraphElement {
  return Object.freeze({
    kind: 'paragraph',
    runs: Object.freeze(toRuns(content)),
    alignment: options.alignment ?? 'left',
    ...optionalStyle(options.style),
  });
}

/** A single line of text that is never wrapped. */
export function text(content: ParagraphContent, options: { style?: StyleInit } = {}): TextElement {
  return Object.freeze({
    kind: 'text',
    runs: Object.freeze(toRuns(content)),
    ...optionalStyle(options.style),
  });
}

// ---------------------------------------------------------------------------
// Containers
// ---------------------------------------------------------------------------

export function verticalLayout(children: readonly Element[], options: { style?: StyleInit } = {}): ContainerElement {
  return Object.freeze({
    kind: 'container',
    direction: 'vertical',
    children: Object.freeze([...children]),
    columnFractions: Object.freeze([]),
    ...optionalStyle(options.style),
  });
}

/**
 * Side-by-side children. Widths follow `weights` (one per child), or are
 * equal when no weights are given.
 */
export function horizontalLayout(
  children: readonly Element[],
  options: { weights?: readonly number[]; style?: StyleInit } = {},
): ContainerElement {
  const weights = options.weights ?? children.map(() => 1);
  if (weights.length !== children.length) {
    throw invalidElement(`horizontal layout has ${children.length} children but ${weights.length} weights`, {
      children: children.length,
      weights: weights.length,
    });
  }
  if (!weights.every(isNonNegativeFinite) || (weights.length > 0 && !weights.some((weight) => weight > 0))) {
    throw invalidElement('horizontal layout weights must be non-negative and not all zero', { weights });
  }
  return Object.freeze({
    kind: 'container',
    direction: 'horizontal',
    children: Object.freeze([...children]),
    columnFractions: Object.freeze(fractionsFromWeights(weights)),
    ...optionalStyle(options.style),
  });
}

// ---------------------------------------------------------------------------
// Tables
// ---------------------------------------------------------------------------

export type FrameCellDecoratorOptions = {
  inner?: boolean;
  outer?: boolean;
  continuation?: boolean;
  thickness?: number;
  color?: Rgb;
};

/** Cell borders drawn as filled rectangles. Every border is on by default. */
export function frameCellDecorator(options: FrameCellDecoratorOptions = {}): FrameCellDecorator {
  const thickness = options.thickness ?? 1;
  if (!isPositiveFinite(thickness)) {
    throw invalidElement(`frame thickness must be positive, got ${thickness}`, { thickness });
  }
  const color = options.color ?? BLACK;
  if (!isValidColor(color)) {
    throw new LayoutError('INVALID_STYLE', 'frame color channels must be integers in 0-255', { color });
  }
  return Object.freeze({
    kind: 'frame',
    inner: options.inner ?? true,
    outer: options.outer ?? true,
    continuation: options.continuation ?? true,
    thickness,
    color,
  });
}

function validateColumnWeights(columnWeights: readonly number[]): void {
  if (columnWeights.length === 0) {
    throw new LayoutError('MALFORMED_TABLE', 'table must have at least one column', { columnWeights });
  }
  const invalid = columnWeights.findIndex((weight) => !isNonNegativeFinite(weight));
  if (invalid !== -1) {
    throw new LayoutError('MALFORMED_TABLE', `column weight ${invalid} must be a non-negative number`, {
      columnWeights,
      column: invalid,
    });
  }
  if (!columnWeights.some((weight) => weight > 0)) {
    throw new LayoutError('MALFORMED_TABLE', 'at least one column weight must be positive', { columnWeights });
  }
}

function validateRow(cells: readonly Element[], columns: number, rowIndex: number, header: boolean): TableRow {
  if (cells.length !== columns) {
    const label = header ? 'header row' : 'row';
    throw new LayoutError(
      'MALFORMED_TABLE',
      `${label} ${rowIndex} has ${cells.length} cells but the table has ${columns} columns`,
      { row: rowIndex, header, expected: columns, actual: cells.length },
    );
  }
  return Object.freeze({ cells: Object.freeze([...cells]) });
}

export type TableOptions = {
  /** One weight per column; widths are proportional to the weights. */
  columnWeights: readonly number[];
  rows?: ReadonlyArray<readonly Element[]>;
  /** Rows repeated at the top of every page the table continues on. */
  headerRows?: ReadonlyArray<readonly Element[]>;
  decorator?: CellDecorator;
  style?: StyleInit;
};

/**
 * Builds a table. Column fractions are fixed here, before any row renders.
 *
 * @throws {LayoutError} MALFORMED_TABLE for zero columns, invalid weights, or
 *   a row whose cell count differs from the column count.
 */
export function table(options: TableOptions): TableElement {
  const { columnWeights } = options;
  validateColumnWeights(columnWeights);
  const columns = columnWeights.length;
  const headerRows = (options.headerRows ?? []).map((cells, index) => validateRow(cells, columns, index, true));
  const rows = (options.rows ?? []).map((cells, index) => validateRow(cells, columns, index, false));
  return Object.freeze({
    kind: 'table',
    columnWeights: Object.freeze([...columnWeights]),
    columnFractions: Object.freeze(fractionsFromWeights(columnWeights)),
    headerRows: Object.freeze(headerRows),
    rows: Object.freeze(rows),
    continued: false,
    ...(options.decorator ? { decorator: options.decorator } : {}),
    ...optionalStyle(options.style),
  });
}

/**
 * Incremental table construction. Each pushed row is checked against the
 * column count immediately.
 */
export class TableBuilder {
  private readonly rows: (readonly Element[])[] = [];
  private readonly headerRows: (readonly Element[])[] = [];
  private decorator?: CellDecorator;
  private style?: StyleInit;

  constructor(private readonly columnWeights: readonly number[]) {
    validateColumnWeights(columnWeights);
  }

  pushRow(cells: readonly Element[]): this {
    validateRow(cells, this.columnWeights.length, this.rows.length, false);
    this.rows.push(cells);
    return this;
  }

  pushHeaderRow(cells: readonly Element[]): this {
    validateRow(cells, this.columnWeights.length, this.headerRows.length, true);
    this.headerRows.push(cells);
    return this;
  }

  setCellDecorator(decorator: CellDecorator): this {
    this.decorator = decorator;
    return this;
  }

  setStyle(style: StyleInit): this {
    this.style = style;
    return this;
  }

  build(): TableElement {
    return table({
      columnWeights: this.columnWeights,
      rows: this.rows,
      headerRows: this.headerRows,
      decorator: this.decorator,
      style: this.style,
    });
  }
}

// ---------------------------------------------------------------------------
// Lists
// ---------------------------------------------------------------------------

export type ListItemOptions = {
  /** Marker text; null draws the item without a marker. */
  marker?: string | null;
  indent?: number;
  markerGap?: number;
  style?: StyleInit;
};

export function listItem(content: Element, options: ListItemOptions = {}): ListItemElement {
  const indent = options.indent ?? DEFAULT_LIST_INDENT;
  const markerGap = options.markerGap ?? LIST_MARKER_GAP;
  if (!isNonNegativeFinite(indent) || !isNonNegativeFinite(markerGap)) {
    throw invalidElement('list indent and marker gap must be non-negative', { indent, markerGap });
  }
  return Object.freeze({
    kind: 'list-item',
    content,
    marker: options.marker ?? null,
    indent,
    markerGap,
    markerDrawn: false,
    ...optionalStyle(options.style),
  });
}

/**
 * Turns list entries into items. Nested lists are indented without a marker;
 * prebuilt items are kept as they are.
 */
function toItems(
  items: readonly Element[],
  markerFor: (ordinal: number) => string,
  indent: number | undefined,
): ListItemElement[] {
  let ordinal = 0;
  return items.map((item) => {
    if (item.kind === 'list-item') return item;
    if (item.kind === 'list') return listItem(item, { marker: null, indent });
    const marker = markerFor(ordinal);
    ordinal += 1;
    return listItem(item, { marker, indent });
  });
}

export type OrderedListOptions = {
  start?: number;
  format?: ListMarkerFormat;
  indent?: number;
  style?: StyleInit;
};

/** Numbered list. Markers are assigned here and never change when the list splits. */
export function orderedList(items: readonly Element[], options: OrderedListOptions = {}): ListElement {
  const start = options.start ?? 1;
  if (!Number.isInteger(start)) {
    throw invalidElement(`ordered list start must be an integer, got ${start}`, { start });
  }
  const format = options.format ?? 'decimal';
  return Object.freeze({
    kind: 'list',
    items: Object.freeze(toItems(items, (ordinal) => formatOrderedMarker(start + ordinal, format), options.indent)),
    ...optionalStyle(options.style),
  });
}

export type UnorderedListOptions = {
  bullet?: string;
  indent?: number;
  style?: StyleInit;
};

export function unorderedList(items: readonly Element[], options: UnorderedListOptions = {}): ListElement {
  const bullet = options.bullet ?? DEFAULT_BULLET;
  return Object.freeze({
    kind: 'list',
    items: Object.freeze(toItems(items, () => bullet, options.indent)),
    ...optionalStyle(options.style),
  });
}

// ---------------------------------------------------------------------------
// Images and external content
// ---------------------------------------------------------------------------

export type ImageOptions = {
  width: number;
  height: number;
  /** Uniform scale applied to width and height. */
  scale?: number;
  alignment?: Alignment;
};

export function image(handle: ImageHandle, options: ImageOptions): ImageElement {
  const scale = options.scale ?? 1;
  const width = options.width * scale;
  const height = options.height * scale;
  if (!isPositiveFinite(width) || !isPositiveFinite(height)) {
    throw invalidElement(`image size must be positive, got ${width}x${height}`, { width, height, scale });
  }
  return Object.freeze({ kind: 'image', image: handle, width, height, alignment: options.alignment ?? 'left' });
}

/** Pre-measured content, e.g. a typeset formula or highlighted code. */
export function externalBlock(content: ExternalContent, options: { alignment?: Alignment } = {}): ExternalElement {
  if (!isPositiveFinite(content.width) || !isPositiveFinite(content.height)) {
    throw invalidElement(`external content size must be positive, got ${content.width}x${content.height}`, {
      width: content.width,
      height: content.height,
    });
  }
  return Object.freeze({
    kind: 'external',
    content: Object.freeze({ ...content, instructions: Object.freeze([...content.instructions]) }),
    alignment: options.alignment ?? 'left',
  });
}

/** Runs an external renderer once and wraps its output as a block. */
export function renderExternal<TSource>(
  renderer: ExternalRenderer<TSource>,
  source: TSource,
  options: { style?: StyleInit; alignment?: Alignment } = {},
): ExternalElement {
  const style = resolveStyle(createStyle(options.style));
  const content = callCollaborator('external renderer', () => renderer.render(source, style));
  return externalBlock(content, { alignment: options.alignment });
}

// ---------------------------------------------------------------------------
// Breaks and spacing
// ---------------------------------------------------------------------------

const PAGE_BREAK: PageBreakElement = Object.freeze({ kind: 'page-break' });

/** Ends the current page. */
export function pageBreak(): PageBreakElement {
  return PAGE_BREAK;
}

/** Vertical space of `lines` lines at the inherited line height. */
export function spacer(lines = 1): SpacerElement {
  if (!isNonNegativeFinite(lines)) {
    throw invalidElement(`spacer lines must be non-negative, got ${lines}`, { lines });
  }
  return Object.freeze({ kind: 'spacer', lines });
}

// ---------------------------------------------------------------------------
// Wrappers
// ---------------------------------------------------------------------------

/** Insets a child. A single number pads all four sides. */
export function padded(child: Element, padding: number | Partial<PageMargins>): PaddedElement {
  const sides =
    typeof padding === 'number'
      ? { top: padding, right: padding, bottom: padding, left: padding }
      : { top: padding.top ?? 0, right: padding.right ?? 0, bottom: padding.bottom ?? 0, left: padding.left ?? 0 };
  if (![sides.top, sides.right, sides.bottom, sides.left].every(isNonNegativeFinite)) {
    throw invalidElement('padding must be non-negative', { padding: sides });
  }
  return Object.freeze({ kind: 'padded', child, padding: Object.freeze(sides), started: false });
}

/** Applies a style to a subtree. */
export function styled(child: Element, style: StyleInit): StyledElement {
  return Object.freeze({ kind: 'styled', child, style: createStyle(style) });
}

/** Draws a frame around a child. */
export function framed(child: Element, options: { thickness?: number; color?: Rgb } = {}): FramedElement {
  const thickness = options.thickness ?? 1;
  if (!isPositiveFinite(thickness)) {
    throw invalidElement(`frame thickness must be positive, got ${thickness}`, { thickness });
  }
  const color = options.color ?? BLACK;
  if (!isValidColor(color)) {
    throw new LayoutError('INVALID_STYLE', 'frame color channels must be integers in 0-255', { color });
  }
  return Object.freeze({ kind: 'framed', child, thickness, color, started: false });
}
