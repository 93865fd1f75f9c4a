import type { FontHandle, FontMetricsProvider, FontVariant, LineMetrics } from '@pagewright/contracts';

export type FixedWidthFontMetricsOptions = {
  /** Advance width of every glyph as a fraction of the font size. Defaults to 0.5. */
  charWidth?: number;
  /** Per-character advance widths, as fractions of the font size. */
  widths?: Readonly<Record<string, number>>;
  /** Families the provider resolves. Any family resolves when omitted. */
  families?: readonly string[];
  /** Ascent as a fraction of the font size. Defaults to 0.8. */
  ascent?: number;
  /** Descent as a fraction of the font size. Defaults to 0.2. */
  descent?: number;
};

/**
 * Deterministic font metrics with a fixed advance per glyph. Measurements do
 * not depend on any installed font, which keeps layouts reproducible across
 * machines; useful for previews, tests and CI.
 */
export function createFixedWidthFontMetrics(options: FixedWidthFontMetricsOptions = {}): FontMetricsProvider {
  const charWidth = options.charWidth ?? 0.5;
  const widths = options.widths ?? {};
  const ascent = options.ascent ?? 0.8;
  const descent = options.descent ?? 0.2;
  const families = options.families ? new Set(options.families) : null;

  return {
    resolveFont(family: string, variant: FontVariant): FontHandle | null {
      if (families && !families.has(family)) return null;
      return { key: `${family}${variant.bold ? ':bold' : ''}${variant.italic ? ':italic' : ''}` };
    },
    glyphWidth(char: string, _font: FontHandle, size: number): number {
      return (widths[char] ?? charWidth) * size;
    },
    lineMetrics(_font: FontHandle, size: number): LineMetrics {
      return { ascent: ascent * size, descent: descent * size };
    },
  };
}
