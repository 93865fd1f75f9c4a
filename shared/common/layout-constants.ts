/**
 * Layout constants shared between the layout engine and its callers.
 * All values are in points.
 */

/** Millimetres to points. */
export const MM_TO_PT = 72 / 25.4;

/** Hanging indent reserved for list markers (10mm). */
export const DEFAULT_LIST_INDENT = 10 * MM_TO_PT;

/** Gap between a list marker and the item content (2mm). */
export const LIST_MARKER_GAP = 2 * MM_TO_PT;

/** Default bullet for unordered lists (en dash). */
export const DEFAULT_BULLET = '–';

/** Tolerance used when comparing widths and heights. */
export const WIDTH_EPSILON = 0.0001;
