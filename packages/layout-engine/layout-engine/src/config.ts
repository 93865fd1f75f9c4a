import { z } from 'zod';
import { LayoutError, type PageMargins, type PageSize, type Style } from '@pagewright/contracts';
import { createStyle } from '@pagewright/style-engine';

export const DEFAULT_PAGE_SIZE: PageSize = { w: 612, h: 792 }; // US Letter portrait in points
export const DEFAULT_MARGINS: PageMargins = { top: 72, right: 72, bottom: 72, left: 72 };
export const DEFAULT_PAGE_FULL_THRESHOLD = 1;

const dimension = z.number().finite();

const colorSchema = z.object({
  r: z.number().int().min(0).max(255),
  g: z.number().int().min(0).max(255),
  b: z.number().int().min(0).max(255),
});

const styleSchema = z
  .object({
    fontFamily: z.string().trim().min(1).optional(),
    fontSize: dimension.positive().optional(),
    bold: z.boolean().optional(),
    italic: z.boolean().optional(),
    underline: z.boolean().optional(),
    strikethrough: z.boolean().optional(),
    color: colorSchema.optional(),
    lineSpacing: dimension.positive().optional(),
  })
  .strict();

export const documentConfigSchema = z
  .object({
    pageSize: z.object({ w: dimension.positive(), h: dimension.positive() }).strict().optional(),
    margins: z
      .object({
        top: dimension.nonnegative(),
        right: dimension.nonnegative(),
        bottom: dimension.nonnegative(),
        left: dimension.nonnegative(),
      })
      .partial()
      .strict()
      .optional(),
    defaultStyle: styleSchema.optional(),
    hyphenation: z
      .object({ locale: z.string().trim().min(1) })
      .strict()
      .optional(),
    /** Remaining height below which a non-empty page counts as full. */
    pageFullThreshold: dimension.positive().optional(),
  })
  .strict();

export type DocumentConfigInput = z.input<typeof documentConfigSchema>;

export type DocumentConfig = {
  pageSize: PageSize;
  margins: PageMargins;
  defaultStyle: Style;
  hyphenationLocale: string | null;
  pageFullThreshold: number;
};

/**
 * Validates caller configuration and fills the documented defaults
 * (US Letter, 72pt margins, a 1pt page-full threshold).
 *
 * @throws {LayoutError} INVALID_CONFIG when validation fails or the margins
 *   leave no content area.
 */
export function resolveDocumentConfig(input: unknown = {}): DocumentConfig {
  const parsed = documentConfigSchema.safeParse(input ?? {});
  if (!parsed.success) {
    const summary = parsed.error.issues
      .map((issue) => `${issue.path.length > 0 ? issue.path.join('.') : '(root)'}: ${issue.message}`)
      .join('; ');
    throw new LayoutError('INVALID_CONFIG', `Invalid document configuration: ${summary}`, {
      issues: parsed.error.issues,
    });
  }

  const { data } = parsed;
  const pageSize: PageSize = data.pageSize ? { w: data.pageSize.w, h: data.pageSize.h } : { ...DEFAULT_PAGE_SIZE };
  const margins: PageMargins = {
    top: data.margins?.top ?? DEFAULT_MARGINS.top,
    right: data.margins?.right ?? DEFAULT_MARGINS.right,
    bottom: data.margins?.bottom ?? DEFAULT_MARGINS.bottom,
    left: data.margins?.left ?? DEFAULT_MARGINS.left,
  };

  const contentWidth = pageSize.w - margins.left - margins.right;
  const contentHeight = pageSize.h - margins.top - margins.bottom;
  if (contentWidth <= 0 || contentHeight <= 0) {
    throw new LayoutError('INVALID_CONFIG', 'pageSize and margins yield non-positive content area', {
      pageSize,
      margins,
      contentWidth,
      contentHeight,
    });
  }

  return {
    pageSize,
    margins,
    defaultStyle: createStyle(data.defaultStyle),
    hyphenationLocale: data.hyphenation?.locale ?? null,
    pageFullThreshold: data.pageFullThreshold ?? DEFAULT_PAGE_FULL_THRESHOLD,
  };
}

/** Width and height left for content once margins are taken off the page. */
export function contentBox(config: Pick<DocumentConfig, 'pageSize' | 'margins'>): { width: number; height: number } {
  return {
    width: config.pageSize.w - config.margins.left - config.margins.right,
    height: config.pageSize.h - config.margins.top - config.margins.bottom,
  };
}
