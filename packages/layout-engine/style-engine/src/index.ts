/**
 * @pagewright/style-engine
 *
 * Immutable style values and the cascade that resolves them. A style records
 * only the fields set on it; children inherit by merging their own fields over
 * the parent's (see `mergeStyles`), and `resolveStyle` fills whatever is still
 * unset from the defaults right before text is measured.
 */

import {
  LayoutError,
  isLayoutError,
  type FontHandle,
  type FontMetricsProvider,
  type ResolvedStyle,
  type Style,
  type StyleFields,
  type StyleInit,
} from '@pagewright/contracts';
import { BLACK, isValidColor } from './colors.js';
import { EMPTY_STYLE, STYLE_FIELDS, assignField, mergeStyles } from './cascade.js';

export { combineStyles, explicitFields, mergeStyles, EMPTY_STYLE } from './cascade.js';
export { BLACK, isValidColor, parseHexColor, rgb } from './colors.js';

export const DEFAULT_FONT_FAMILY = 'Helvetica';
export const DEFAULT_FONT_SIZE = 12;
export const DEFAULT_LINE_SPACING = 1;

export const DEFAULT_RESOLVED_STYLE: ResolvedStyle = Object.freeze({
  fontFamily: DEFAULT_FONT_FAMILY,
  fontSize: DEFAULT_FONT_SIZE,
  bold: false,
  italic: false,
  underline: false,
  strikethrough: false,
  color: BLACK,
  lineSpacing: DEFAULT_LINE_SPACING,
});

const isPositiveFinite = (value: number): boolean => Number.isFinite(value) && value > 0;

/**
 * Validates the explicitly-set fields of `init` and returns them as a frozen style.
 *
 * @throws {LayoutError} INVALID_STYLE for a non-positive size or line spacing,
 *   an empty font family or a color channel outside 0–255.
 */
export function createStyle(init: StyleInit = {}): Style {
  const problems: string[] = [];
  if (init.fontSize !== undefined && !isPositiveFinite(init.fontSize)) {
    problems.push(`fontSize must be a positive number, got ${init.fontSize}`);
  }
  if (init.lineSpacing !== undefined && !isPositiveFinite(init.lineSpacing)) {
    problems.push(`lineSpacing must be a positive number, got ${init.lineSpacing}`);
  }
  if (init.fontFamily !== undefined && init.fontFamily.trim() === '') {
    problems.push('fontFamily must not be empty');
  }
  if (init.color !== undefined && !isValidColor(init.color)) {
    problems.push('color channels must be integers in 0-255');
  }
  if (problems.length > 0) {
    throw new LayoutError('INVALID_STYLE', `Invalid style: ${problems.join('; ')}`, { style: init, problems });
  }

  const style: Partial<StyleFields> = {};
  for (const field of STYLE_FIELDS) {
    const value = init[field];
    if (value !== undefined) {
      assignField(style, field, value);
    }
  }
  if (style.color) {
    style.color = Object.freeze({ r: style.color.r, g: style.color.g, b: style.color.b });
  }
  return Object.freeze(style);
}

/**
 * Fills every unset field from `defaults` and then from the built-in defaults
 * (Helvetica 12pt, line spacing 1, black, no emphasis).
 */
export function resolveStyle(style?: Style | null, defaults?: Style | null): ResolvedStyle {
  const effective = mergeStyles(defaults ?? EMPTY_STYLE, style);
  return Object.freeze({
    fontFamily: effective.fontFamily ?? DEFAULT_RESOLVED_STYLE.fontFamily,
    fontSize: effective.fontSize ?? DEFAULT_RESOLVED_STYLE.fontSize,
    bold: effective.bold ?? DEFAULT_RESOLVED_STYLE.bold,
    italic: effective.italic ?? DEFAULT_RESOLVED_STYLE.italic,
    underline: effective.underline ?? DEFAULT_RESOLVED_STYLE.underline,
    strikethrough: effective.strikethrough ?? DEFAULT_RESOLVED_STYLE.strikethrough,
    color: effective.color ?? DEFAULT_RESOLVED_STYLE.color,
    lineSpacing: effective.lineSpacing ?? DEFAULT_RESOLVED_STYLE.lineSpacing,
  });
}

/**
 * Runs a collaborator call, wrapping anything it throws as COLLABORATOR_FAILURE.
 * Layout errors raised inside the callback pass through unchanged.
 */
export function callCollaborator<T>(collaborator: string, operation: () => T): T {
  try {
    return operation();
  } catch (error) {
    if (isLayoutError(error)) throw error;
    const reason = error instanceof Error ? error.message : String(error);
    throw new LayoutError(
      'COLLABORATOR_FAILURE',
      `${collaborator} failed: ${reason}`,
      { collaborator },
      { cause: error },
    );
  }
}

/**
 * Resolves the font face for a style through the font-metrics collaborator.
 *
 * @throws {LayoutError} INVALID_STYLE when the family cannot be resolved,
 *   COLLABORATOR_FAILURE when the collaborator throws.
 */
export function resolveFont(style: ResolvedStyle, fontMetrics: FontMetricsProvider): FontHandle {
  const font = callCollaborator('font metrics', () =>
    fontMetrics.resolveFont(style.fontFamily, { bold: style.bold, italic: style.italic }),
  );
  if (!font) {
    throw new LayoutError('INVALID_STYLE', `Unknown font family "${style.fontFamily}"`, {
      fontFamily: style.fontFamily,
      bold: style.bold,
      italic: style.italic,
    });
  }
  return font;
}

