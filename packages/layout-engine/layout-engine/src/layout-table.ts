import type { CellDecorator, Element, RenderResult, Style, TableElement, TableRow } from '@pagewright/contracts';
import { mergeStyles } from '@pagewright/style-engine';
import type { LayoutArea } from './area.js';
import type { RenderContext } from './types.js';
import { EMPTY_ELEMENT } from './layout-utils.js';
import { layoutLog } from './debug.js';

type TableGeometry = {
  xs: number[];
  widths: number[];
  /** Border thickness, 0 without a decorator. */
  thickness: number;
  decorator?: CellDecorator;
};

type RowBorders = { top: boolean; bottom: boolean };

type CellsOutcome = {
  contentHeight: number;
  complete: boolean;
  /** Per cell: the unrendered rest, or an empty slot for finished cells. */
  remainders: Element[];
};

function tableGeometry(element: TableElement, width: number): TableGeometry {
  const xs: number[] = [];
  const widths: number[] = [];
  let x = 0;
  for (const fraction of element.columnFractions) {
    xs.push(x);
    widths.push(width * fraction);
    x += width * fraction;
  }
  return { xs, widths, thickness: element.decorator?.thickness ?? 0, decorator: element.decorator };
}

const hasLeftBorder = (geometry: TableGeometry, column: number): boolean => {
  const { decorator } = geometry;
  if (!decorator) return false;
  return column === 0 ? decorator.outer : decorator.inner;
};

const hasRightBorder = (geometry: TableGeometry, column: number): boolean =>
  Boolean(geometry.decorator?.outer) && column === geometry.widths.length - 1;

/**
 * Renders every cell of a row side by side. Border bands are reserved inside
 * each cell where the decorator draws.
 */
function renderCells(
  cells: readonly Element[],
  area: LayoutArea,
  style: Style,
  ctx: RenderContext,
  geometry: TableGeometry,
  borders: RowBorders,
  asFresh: boolean,
): CellsOutcome {
  const t = geometry.thickness;
  let contentHeight = 0;
  let complete = true;
  const remainders: Element[] = [];

  cells.forEach((cell, column) => {
    const left = hasLeftBorder(geometry, column) ? t : 0;
    const right = hasRightBorder(geometry, column) ? t : 0;
    const cellArea = area
      .column(geometry.xs[column], geometry.widths[column])
      .inset(left, borders.top ? t : 0, right, borders.bottom ? t : 0);
    const result = ctx.render(cell, asFresh ? cellArea.asFresh() : cellArea, style);
    contentHeight = Math.max(contentHeight, result.height);
    if (result.status === 'partial') {
      complete = false;
      remainders.push(result.remainder);
    } else {
      remainders.push(EMPTY_ELEMENT);
    }
  });

  return { contentHeight, complete, remainders };
}

function drawRowBorders(area: LayoutArea, geometry: TableGeometry, height: number, borders: RowBorders): void {
  const { decorator, thickness: t } = geometry;
  if (!decorator) return;
  geometry.widths.forEach((width, column) => {
    const x = geometry.xs[column];
    if (hasLeftBorder(geometry, column)) area.drawRect(x, 0, t, height, decorator.color);
    if (hasRightBorder(geometry, column)) area.drawRect(x + width - t, 0, t, height, decorator.color);
  });
  if (borders.top) area.drawRect(0, 0, area.width, t, decorator.color);
  if (borders.bottom) area.drawRect(0, height - t, area.width, t, decorator.color);
}

const rowHeight = (outcome: CellsOutcome, geometry: TableGeometry, borders: RowBorders, available: number): number =>
  Math.min(
    available,
    outcome.contentHeight + (borders.top ? geometry.thickness : 0) + (borders.bottom ? geometry.thickness : 0),
  );

const noProgress = (cells: readonly Element[], outcome: CellsOutcome): boolean =>
  !outcome.complete && outcome.remainders.every((remainder, column) => remainder === cells[column]);

/**
 * Lays out one page's share of the table. Returns null when a header row
 * does not fit, or when the first body row fits only on a page without them.
 */
function renderFragment(
  element: TableElement,
  area: LayoutArea,
  style: Style,
  ctx: RenderContext,
  geometry: TableGeometry,
  withHeaders: boolean,
): RenderResult | null {
  const { decorator } = geometry;
  const tableFresh = area.isFresh;
  const fork = area.fork();
  let placed = 0;

  const topBorder = (): boolean => {
    if (!decorator) return false;
    if (placed > 0) return decorator.inner;
    return element.continued ? decorator.continuation : decorator.outer;
  };

  /** Renders a whole row into a throwaway fork and keeps it only if every cell finished. */
  const placeRow = (row: TableRow, isLast: boolean): boolean => {
    const rowArea = fork.fork();
    const borders = { top: topBorder(), bottom: isLast && Boolean(decorator?.outer) };
    const outcome = renderCells(row.cells, rowArea, style, ctx, geometry, borders, false);
    if (!outcome.complete) return false;
    const height = rowHeight(outcome, geometry, borders, rowArea.height);
    drawRowBorders(rowArea, geometry, height, borders);
    rowArea.commit();
    fork.advance(height);
    placed += 1;
    return true;
  };

  if (withHeaders) {
    for (let index = 0; index < element.headerRows.length; index += 1) {
      const isLast = element.rows.length === 0 && index === element.headerRows.length - 1;
      if (!placeRow(element.headerRows[index], isLast)) return null;
    }
  }

  for (let index = 0; index < element.rows.length; index += 1) {
    const row = element.rows[index];
    const isLast = index === element.rows.length - 1;
    if (placeRow(row, isLast)) continue;

    if (index === 0 && !tableFresh) {
      layoutLog('[table] first row does not fit, moving table to next page');
      return { status: 'partial', height: 0, remainder: element };
    }

    if (index === 0) {
      if (withHeaders) return null;

      // Taller than a whole page: split the row cell by cell. The bottom band is
      // reserved for whichever edge ends up drawn.
      const rowArea = fork.fork();
      const closing = isLast && Boolean(decorator?.outer);
      const borders = { top: topBorder(), bottom: closing || Boolean(decorator?.continuation) };
      const outcome = renderCells(row.cells, rowArea, style, ctx, geometry, borders, true);
      if (noProgress(row.cells, outcome)) {
        return { status: 'partial', height: 0, remainder: element };
      }
      const finalBorders = outcome.complete
        ? { ...borders, bottom: closing }
        : { ...borders, bottom: Boolean(decorator?.continuation) };
      const height = rowHeight(outcome, geometry, finalBorders, rowArea.height);
      drawRowBorders(rowArea, geometry, height, finalBorders);
      rowArea.commit();
      fork.advance(height);
      placed += 1;
      if (outcome.complete) continue;

      layoutLog('[table] split row across pages', { columns: row.cells.length });
      fork.commit();
      const rest: TableRow = Object.freeze({ cells: Object.freeze(outcome.remainders) });
      return {
        status: 'partial',
        height: fork.consumed,
        remainder: Object.freeze({
          ...element,
          rows: Object.freeze([rest, ...element.rows.slice(1)]),
          continued: true,
        }),
      };
    }

    if (decorator?.continuation && fork.height >= geometry.thickness) {
      fork.drawRect(0, 0, fork.width, geometry.thickness, decorator.color);
      fork.advance(geometry.thickness);
    }
    fork.commit();
    return {
      status: 'partial',
      height: fork.consumed,
      remainder: Object.freeze({ ...element, rows: Object.freeze(element.rows.slice(index)), continued: true }),
    };
  }

  fork.commit();
  return { status: 'done', height: fork.consumed };
}

/**
 * Rows are atomic: a row that does not fit below earlier rows moves to the
 * next page whole. Only a first row that cannot fit on an empty page is split.
 * Header rows are drawn at the top of every page the table occupies; when they
 * leave no room for a body row on an empty page they are left out there.
 */
export function renderTable(
  element: TableElement,
  area: LayoutArea,
  inherited: Style,
  ctx: RenderContext,
): RenderResult {
  const style = mergeStyles(inherited, element.style);
  const geometry = tableGeometry(element, area.width);

  if (element.headerRows.length > 0) {
    const withHeaders = renderFragment(element, area, style, ctx, geometry, true);
    const headersFit = withHeaders !== null && !(withHeaders.status === 'partial' && withHeaders.height === 0);
    if (headersFit || !area.isFresh) {
      return withHeaders ?? { status: 'partial', height: 0, remainder: element };
    }
    layoutLog('[table] header rows do not fit on an empty page, omitting them');
  }

  const withoutHeaders = renderFragment(element, area, style, ctx, geometry, false);
  return withoutHeaders ?? { status: 'partial', height: 0, remainder: element };
}
