const layoutDebugEnabled =
  typeof process !== 'undefined' && typeof process.env !== 'undefined' && Boolean(process.env.PAGEWRIGHT_DEBUG_LAYOUT);

/** Debug tracing for pagination decisions; silent unless PAGEWRIGHT_DEBUG_LAYOUT is set. */
export const layoutLog = (...args: unknown[]): void => {
  if (!layoutDebugEnabled) return;

  console.log(...args);
};
