import {
  LayoutError,
  type FontHandle,
  type FontMetricsProvider,
  type Hyphenator,
  type ResolvedStyle,
} from '@pagewright/contracts';
import { callCollaborator, resolveFont } from '@pagewright/style-engine';

export type TextLineMetrics = {
  ascent: number;
  descent: number;
  /** Font size times the style's line spacing. */
  lineHeight: number;
};

export type TextMeasurer = {
  /** Sum of glyph advances for `text` in the style's font and size. */
  measure(text: string, style: ResolvedStyle): number;
  lineMetrics(style: ResolvedStyle): TextLineMetrics;
  /**
   * Intra-word break offsets, ascending and unique, strictly inside `word`.
   * Empty when hyphenation is disabled.
   */
  breakCandidates(word: string): readonly number[];
  resolveFont(style: ResolvedStyle): FontHandle;
};

export type TextMeasurerOptions = {
  fontMetrics: FontMetricsProvider;
  hyphenator?: Hyphenator | null;
  /** Locale passed to the hyphenator. Hyphenation is off without one. */
  locale?: string | null;
};

const isNonNegativeFinite = (value: number): boolean => Number.isFinite(value) && value >= 0;

/**
 * Creates a measurer over the font-metrics and hyphenator collaborators.
 *
 * Results are memoized on the returned instance only; separate measurers share
 * nothing, so independent documents can be measured side by side.
 */
export function createTextMeasurer(options: TextMeasurerOptions): TextMeasurer {
  const { fontMetrics } = options;
  const hyphenator = options.hyphenator ?? null;
  const locale = options.locale ?? null;

  const fontCache = new Map<string, FontHandle>();
  const glyphCache = new Map<string, number>();
  const metricsCache = new Map<string, TextLineMetrics>();
  const candidateCache = new Map<string, readonly number[]>();

  const fontFor = (style: ResolvedStyle): FontHandle => {
    const key = `${style.fontFamily}|${style.bold ? 'b' : ''}${style.italic ? 'i' : ''}`;
    const cached = fontCache.get(key);
    if (cached) return cached;
    const font = resolveFont(style, fontMetrics);
    fontCache.set(key, font);
    return font;
  };

  const glyphWidth = (char: string, font: FontHandle, size: number): number => {
    const key = `${font.key}|${size}|${char}`;
    const cached = glyphCache.get(key);
    if (cached !== undefined) return cached;
    const width = callCollaborator('font metrics', () => fontMetrics.glyphWidth(char, font, size));
    if (!isNonNegativeFinite(width)) {
      throw new LayoutError('COLLABORATOR_FAILURE', `font metrics returned an invalid width for "${char}": ${width}`, {
        collaborator: 'font metrics',
        font: font.key,
        size,
      });
    }
    glyphCache.set(key, width);
    return width;
  };

  const measure = (text: string, style: ResolvedStyle): number => {
    if (text.length === 0) return 0;
    const font = fontFor(style);
    let width = 0;
    for (const char of text) {
      width += glyphWidth(char, font, style.fontSize);
    }
    return width;
  };

  const lineMetrics = (style: ResolvedStyle): TextLineMetrics => {
    const font = fontFor(style);
    const key = `${font.key}|${style.fontSize}|${style.lineSpacing}`;
    const cached = metricsCache.get(key);
    if (cached) return cached;
    const { ascent, descent } = callCollaborator('font metrics', () => fontMetrics.lineMetrics(font, style.fontSize));
    if (!isNonNegativeFinite(ascent) || !isNonNegativeFinite(descent)) {
      throw new LayoutError('COLLABORATOR_FAILURE', `font metrics returned invalid line metrics for ${font.key}`, {
        collaborator: 'font metrics',
        font: font.key,
        size: style.fontSize,
      });
    }
    const metrics: TextLineMetrics = { ascent, descent, lineHeight: style.fontSize * style.lineSpacing };
    metricsCache.set(key, metrics);
    return metrics;
  };

  const breakCandidates = (word: string): readonly number[] => {
    if (!hyphenator || !locale || word.length < 2) return [];
    const cached = candidateCache.get(word);
    if (cached) return cached;
    const raw = callCollaborator('hyphenator', () => hyphenator.hyphenate(word, locale));
    const offsets = Array.from(
      new Set(raw.filter((offset) => Number.isInteger(offset) && offset > 0 && offset < word.length)),
    ).sort((a, b) => a - b);
    candidateCache.set(word, offsets);
    return offsets;
  };

  return {
    measure,
    lineMetrics,
    breakCandidates,
    resolveFont: fontFor,
  };
}
