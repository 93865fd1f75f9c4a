import type { LayoutDiagnostic, Page, PageInfo, PageMargins, PageSize } from '@pagewright/contracts';
import { callCollaborator } from '@pagewright/style-engine';
import { LayoutArea, type OverflowReport } from './area.js';
import { contentBox } from './config.js';
import { layoutLog } from './debug.js';

export type PageState = {
  page: PageInfo;
  /** Content area of the page: page size minus margins. */
  area: LayoutArea;
};

export type PaginatorOptions = {
  pageSize: PageSize;
  margins: PageMargins;
  onDiagnostic?: (diagnostic: LayoutDiagnostic) => void;
};

const toDiagnostic = (report: OverflowReport, pageNumber: number): LayoutDiagnostic => ({
  code: 'CONTENT_OVERFLOW',
  message:
    `${report.elementKind} exceeds the content ${report.axis} ` +
    `by ${report.overflow.toFixed(2)}pt on page ${pageNumber}`,
  pageNumber,
  elementKind: report.elementKind,
  axis: report.axis,
  overflow: report.overflow,
});

/**
 * Page bookkeeping for a layout run: hands out the content area of each new
 * page and turns the active page into an immutable {@link Page} on finalize.
 */
export function createPaginator(opts: PaginatorOptions) {
  const pages: Page[] = [];
  const diagnostics: LayoutDiagnostic[] = [];
  let current: PageState | null = null;

  const startNewPage = (): PageState => {
    const { width, height } = contentBox(opts);
    const page: PageInfo = {
      number: pages.length + 1,
      size: { ...opts.pageSize },
      margins: { ...opts.margins },
    };
    const state: PageState = { page, area: LayoutArea.create(opts.margins.left, opts.margins.top, width, height) };
    current = state;
    layoutLog(`[paginator] start page ${page.number}`, { width, height });
    return state;
  };

  const finalizePage = (): Page | null => {
    if (!current) return null;
    const { page, area } = current;
    current = null;

    const finished: Page = { ...page, instructions: Object.freeze([...area.instructions]) };
    pages.push(finished);
    layoutLog(`[paginator] finalize page ${page.number}`, {
      consumed: area.consumed,
      instructions: finished.instructions.length,
    });

    for (const report of area.overflows) {
      const diagnostic = toDiagnostic(report, page.number);
      diagnostics.push(diagnostic);
      layoutLog('[paginator] content overflow', diagnostic);
      const { onDiagnostic } = opts;
      if (onDiagnostic) callCollaborator('diagnostic listener', () => onDiagnostic(diagnostic));
    }
    return finished;
  };

  return {
    pages,
    diagnostics,
    startNewPage,
    finalizePage,
  } as const;
}

export type Paginator = ReturnType<typeof createPaginator>;
