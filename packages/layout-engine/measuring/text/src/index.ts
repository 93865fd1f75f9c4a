export {
  createTextMeasurer,
  type TextLineMetrics,
  type TextMeasurer,
  type TextMeasurerOptions,
} from './text-measurer.js';
export {
  breakLines,
  HYPHEN,
  type LaidOutLine,
  type LineSegment,
  type StyledRun,
  type TextPosition,
} from './line-breaker.js';
export { createFixedWidthFontMetrics, type FixedWidthFontMetricsOptions } from './fixed-metrics.js';
export { createDictionaryHyphenator, type HyphenationDictionaries } from './dictionary-hyphenator.js';
