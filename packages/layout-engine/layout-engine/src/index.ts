import {
  LayoutError,
  isLayoutError,
  type Element,
  type FontMetricsProvider,
  type Hyphenator,
  type Layout,
  type LayoutDiagnostic,
} from '@pagewright/contracts';
import { createFixedWidthFontMetrics, createTextMeasurer } from '@pagewright/measuring-text';
import { resolveDocumentConfig, type DocumentConfig, type DocumentConfigInput } from './config.js';
import { createPaginator, type PageState, type Paginator } from './paginator.js';
import { createRenderContext } from './render-element.js';
import type { RenderContext } from './types.js';
import { layoutLog } from './debug.js';

export type LayoutDocument = {
  readonly elements: readonly Element[];
  readonly config: DocumentConfig;
};

export type LayoutOptions = {
  /** Glyph and line metrics. Defaults to fixed-width metrics that resolve every family. */
  fontMetrics?: FontMetricsProvider;
  /** Enables mid-word breaks together with `hyphenation.locale` in the document config. */
  hyphenator?: Hyphenator | null;
  /** Called for every content overflow, in page order, as pages are finalized. */
  onDiagnostic?: (diagnostic: LayoutDiagnostic) => void;
};

export type LayoutOutcome = { ok: true; layout: Layout } | { ok: false; layout: Layout; error: LayoutError };

/**
 * Consecutive partial results that consumed nothing on an empty page before
 * the run is considered stuck. Runs of page breaks stay well below this.
 */
const MAX_EMPTY_PAGE_PARTIALS = 100;

type LayoutState = { kind: 'filling'; page: PageState } | { kind: 'pageFull' };

/**
 * Bundles the top-level elements with a validated configuration.
 *
 * @throws {LayoutError} INVALID_CONFIG when the configuration is rejected.
 */
export function createDocument(elements: readonly Element[], config?: DocumentConfigInput): LayoutDocument {
  return Object.freeze({
    elements: Object.freeze([...elements]),
    config: resolveDocumentConfig(config ?? {}),
  });
}

/**
 * Page allocator. An explicit loop over a work queue: the head element is
 * rendered into the active page's area until it finishes; a partial result
 * replaces the head with its remainder and closes the page.
 */
function paginate(document: LayoutDocument, ctx: RenderContext, paginator: Paginator): void {
  const { config } = document;
  const queue: Element[] = [...document.elements];
  let head = 0;
  let emptyPartials = 0;
  let state: LayoutState = { kind: 'filling', page: paginator.startNewPage() };

  while (head < queue.length) {
    if (state.kind === 'pageFull') {
      paginator.finalizePage();
      state = { kind: 'filling', page: paginator.startNewPage() };
      continue;
    }

    const { area } = state.page;
    if (!area.isFresh && area.height < config.pageFullThreshold) {
      layoutLog(`[layout] page ${state.page.page.number} full`, { remaining: area.height });
      state = { kind: 'pageFull' };
      continue;
    }

    const element = queue[head];
    const fresh = area.isFresh;
    const result = ctx.render(element, area.sub(), config.defaultStyle);
    area.advance(result.height);

    if (result.status === 'done') {
      head += 1;
      emptyPartials = 0;
      if (result.pageBreak) {
        layoutLog(`[layout] page break on page ${state.page.page.number}`);
        state = { kind: 'pageFull' };
      }
      continue;
    }

    if (fresh && result.height === 0) {
      emptyPartials += 1;
      if (result.remainder === element || emptyPartials > MAX_EMPTY_PAGE_PARTIALS) {
        throw new LayoutError(
          'LAYOUT_STALLED',
          `${element.kind} element cannot be placed on an empty page (page ${state.page.page.number})`,
          { elementKind: element.kind, pageNumber: state.page.page.number },
        );
      }
    } else {
      emptyPartials = 0;
    }

    queue[head] = result.remainder;
    state = { kind: 'pageFull' };
  }

  // A page closed by a trailing break is still pending; no new page is opened after it.
  if (state.kind === 'pageFull' || state.page.area.hasContent || paginator.pages.length === 0) {
    paginator.finalizePage();
  }
}

/**
 * Lays out a document. Fatal errors do not throw: the outcome carries the
 * error together with the pages finalized before the failing element.
 * Non-layout exceptions (bugs) propagate.
 */
export function runLayout(document: LayoutDocument, options: LayoutOptions = {}): LayoutOutcome {
  const { config } = document;
  const measurer = createTextMeasurer({
    fontMetrics: options.fontMetrics ?? createFixedWidthFontMetrics(),
    hyphenator: options.hyphenator,
    locale: config.hyphenationLocale,
  });
  const paginator = createPaginator({
    pageSize: config.pageSize,
    margins: config.margins,
    onDiagnostic: options.onDiagnostic,
  });

  const snapshot = (): Layout => ({
    pageSize: { ...config.pageSize },
    pages: [...paginator.pages],
    diagnostics: [...paginator.diagnostics],
  });

  try {
    paginate(document, createRenderContext(measurer), paginator);
    return { ok: true, layout: snapshot() };
  } catch (error) {
    if (isLayoutError(error)) {
      layoutLog(`[layout] stopped with ${error.code}: ${error.message}`);
      return { ok: false, layout: snapshot(), error };
    }
    throw error;
  }
}

/**
 * Same as {@link runLayout}, but throws on failure.
 *
 * @throws {LayoutError} the failing error, with the finalized pages in
 *   `details.pages`.
 */
export function layoutDocument(document: LayoutDocument, options: LayoutOptions = {}): Layout {
  const outcome = runLayout(document, options);
  if (outcome.ok) return outcome.layout;

  const { error, layout } = outcome;
  const details = typeof error.details === 'object' && error.details !== null ? error.details : {};
  throw new LayoutError(error.code, error.message, { ...details, pages: layout.pages }, { cause: error.cause });
}

export {
  DEFAULT_MARGINS,
  DEFAULT_PAGE_FULL_THRESHOLD,
  DEFAULT_PAGE_SIZE,
  contentBox,
  documentConfigSchema,
  resolveDocumentConfig,
} from './config.js';
export type { DocumentConfig, DocumentConfigInput } from './config.js';
export { LayoutArea, type OverflowReport } from './area.js';
export { createPaginator, type PageState, type Paginator, type PaginatorOptions } from './paginator.js';
export { createRenderContext, renderElement } from './render-element.js';
export type { RenderContext } from './types.js';
export { renderSequence, type SequenceOutcome } from './layout-container.js';
export { EMPTY_ELEMENT, sliceLines } from './layout-utils.js';
export * from './elements.js';
export { LayoutError, isLayoutError };
