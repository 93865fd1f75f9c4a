export { LayoutError, isLayoutError, type LayoutErrorCode } from './errors.js';

// ---------------------------------------------------------------------------
// Geometry
// ---------------------------------------------------------------------------

/** Page dimensions in points. */
export type PageSize = { w: number; h: number };

export type PageMargins = {
  top: number;
  right: number;
  bottom: number;
  left: number;
};

/** Red, green and blue channels, each an integer in 0–255. */
export type Rgb = Readonly<{ r: number; g: number; b: number }>;

export type Alignment = 'left' | 'center' | 'right';

export type ParagraphAlignment = Alignment | 'justify';

// ---------------------------------------------------------------------------
// Styles
// ---------------------------------------------------------------------------

/**
 * Every field a style can carry. A {@link Style} holds any subset of these;
 * a {@link ResolvedStyle} holds all of them.
 */
export type StyleFields = {
  fontFamily: string;
  /** Font size in points. Always positive. */
  fontSize: number;
  bold: boolean;
  italic: boolean;
  underline: boolean;
  strikethrough: boolean;
  color: Rgb;
  /** Multiplier applied to the font size to obtain the line height. */
  lineSpacing: number;
};

/** Input accepted by style constructors. Fields left undefined are inherited. */
export type StyleInit = Partial<StyleFields>;

/**
 * Immutable style value recording only its explicitly-set fields.
 * Produced by `createStyle` and `mergeStyles`; never mutated afterwards.
 */
export type Style = Readonly<Partial<StyleFields>>;

export type ResolvedStyle = Readonly<StyleFields>;

export type FontVariant = { bold: boolean; italic: boolean };

/**
 * Opaque font reference handed out by the font-metrics collaborator.
 * `key` identifies the face and is used for memoizing measurements.
 */
export type FontHandle = { readonly key: string };

export type ImageHandle = { readonly id: string };

// ---------------------------------------------------------------------------
// Draw instructions
// ---------------------------------------------------------------------------

/**
 * Text run positioned on its baseline. `y` is the baseline, measured from the
 * top edge of the page.
 */
export type TextInstruction = {
  kind: 'text';
  x: number;
  y: number;
  text: string;
  style: ResolvedStyle;
  width: number;
};

export type RectInstruction = {
  kind: 'rect';
  x: number;
  y: number;
  width: number;
  height: number;
  fill: Rgb;
};

export type ImageInstruction = {
  kind: 'image';
  x: number;
  y: number;
  width: number;
  height: number;
  image: ImageHandle;
};

export type DrawInstruction = TextInstruction | RectInstruction | ImageInstruction;

// ---------------------------------------------------------------------------
// Elements
// ---------------------------------------------------------------------------

export type TextRun = {
  readonly text: string;
  readonly style?: Style;
};

export type ParagraphElement = {
  readonly kind: 'paragraph';
  readonly runs: readonly TextRun[];
  readonly alignment: ParagraphAlignment;
  readonly style?: Style;
};

/** A single unwrapped line of text. */
export type TextElement = {
  readonly kind: 'text';
  readonly runs: readonly TextRun[];
  readonly style?: Style;
};

export type ContainerDirection = 'vertical' | 'horizontal';

export type ContainerElement = {
  readonly kind: 'container';
  readonly direction: ContainerDirection;
  readonly children: readonly Element[];
  /** Width fractions per child; only used by horizontal containers. */
  readonly columnFractions: readonly number[];
  readonly style?: Style;
};

export type TableRow = {
  readonly cells: readonly Element[];
};

export type FrameCellDecorator = {
  readonly kind: 'frame';
  /** Draw borders between cells. */
  readonly inner: boolean;
  /** Draw the border around the table. */
  readonly outer: boolean;
  /** Draw the border where the table is split across pages. */
  readonly continuation: boolean;
  readonly thickness: number;
  readonly color: Rgb;
};

export type CellDecorator = FrameCellDecorator;

export type TableElement = {
  readonly kind: 'table';
  readonly columnWeights: readonly number[];
  /** Column widths as fractions of the available width, summing to 1. */
  readonly columnFractions: readonly number[];
  readonly headerRows: readonly TableRow[];
  readonly rows: readonly TableRow[];
  readonly decorator?: CellDecorator;
  /** True for the remainder of a table already started on an earlier page. */
  readonly continued: boolean;
  readonly style?: Style;
};

export type ListMarkerFormat = 'decimal' | 'lowerLetter' | 'upperLetter' | 'lowerRoman' | 'upperRoman';

export type ListItemElement = {
  readonly kind: 'list-item';
  readonly content: Element;
  /** Marker text, or null for an item drawn without one. */
  readonly marker: string | null;
  /** Hanging indent reserved for the marker. */
  readonly indent: number;
  /** Gap between the marker and the item content. */
  readonly markerGap: number;
  /** Set once the marker has been drawn on an earlier page. */
  readonly markerDrawn: boolean;
  readonly style?: Style;
};

export type ListElement = {
  readonly kind: 'list';
  readonly items: readonly ListItemElement[];
  readonly style?: Style;
};

export type ImageElement = {
  readonly kind: 'image';
  readonly image: ImageHandle;
  readonly width: number;
  readonly height: number;
  readonly alignment: Alignment;
};

export type PageBreakElement = {
  readonly kind: 'page-break';
};

/** Vertical space measured in lines of the inherited style. */
export type SpacerElement = {
  readonly kind: 'spacer';
  readonly lines: number;
};

/** Pre-measured content produced by an external renderer. */
export type ExternalContent = {
  readonly width: number;
  readonly height: number;
  /** Instructions positioned relative to the content's top-left corner. */
  readonly instructions: readonly DrawInstruction[];
};

export type ExternalElement = {
  readonly kind: 'external';
  readonly content: ExternalContent;
  readonly alignment: Alignment;
};

export type PaddedElement = {
  readonly kind: 'padded';
  readonly child: Element;
  readonly padding: Readonly<PageMargins>;
  /** Set once the element has rendered on an earlier page. */
  readonly started: boolean;
};

export type StyledElement = {
  readonly kind: 'styled';
  readonly child: Element;
  readonly style: Style;
};

export type FramedElement = {
  readonly kind: 'framed';
  readonly child: Element;
  readonly thickness: number;
  readonly color: Rgb;
  readonly started: boolean;
};

export type Element =
  | ParagraphElement
  | TextElement
  | ContainerElement
  | TableElement
  | ListElement
  | ListItemElement
  | ImageElement
  | PageBreakElement
  | SpacerElement
  | ExternalElement
  | PaddedElement
  | StyledElement
  | FramedElement;

export type ElementKind = Element['kind'];

/**
 * Outcome of rendering an element into an area.
 *
 * `height` never exceeds the area's remaining height at call time. A partial
 * result carries a new element holding only the unrendered content; an element
 * that placed nothing returns itself as the remainder.
 */
export type RenderResult<TElement extends Element = Element> =
  | { status: 'done'; height: number; pageBreak?: boolean }
  | { status: 'partial'; height: number; remainder: TElement };

// ---------------------------------------------------------------------------
// Layout output
// ---------------------------------------------------------------------------

export type LayoutDiagnostic = {
  code: 'CONTENT_OVERFLOW';
  message: string;
  pageNumber: number;
  elementKind: ElementKind;
  axis: 'width' | 'height';
  /** Amount by which the unit exceeds the content area, in points. */
  overflow: number;
};

export type PageInfo = {
  number: number;
  size: PageSize;
  margins: PageMargins;
};

export type Page = PageInfo & {
  instructions: readonly DrawInstruction[];
};

export type Layout = {
  pageSize: PageSize;
  pages: Page[];
  diagnostics: LayoutDiagnostic[];
};

// ---------------------------------------------------------------------------
// Collaborators
// ---------------------------------------------------------------------------

export type LineMetrics = { ascent: number; descent: number };

export interface FontMetricsProvider {
  /** Returns null when the family cannot be resolved. */
  resolveFont(family: string, variant: FontVariant): FontHandle | null;
  glyphWidth(char: string, font: FontHandle, size: number): number;
  lineMetrics(font: FontHandle, size: number): LineMetrics;
}

export interface Hyphenator {
  /** Valid break offsets inside `word`, in ascending order. */
  hyphenate(word: string, locale: string): readonly number[];
}

export interface PdfWriter {
  beginPage(page: PageInfo): void;
  drawText(x: number, baselineY: number, text: string, style: ResolvedStyle): void;
  drawRect(x: number, y: number, width: number, height: number, fill: Rgb): void;
  drawImage(x: number, y: number, width: number, height: number, image: ImageHandle): void;
  endPage(page: PageInfo): void;
}

/** Math, highlighted code and similar renderers that produce pre-measured content. */
export interface ExternalRenderer<TSource> {
  render(source: TSource, style: ResolvedStyle): ExternalContent;
}
