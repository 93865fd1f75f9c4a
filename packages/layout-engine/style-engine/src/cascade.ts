import type { Style, StyleFields } from '@pagewright/contracts';

const STYLE_FIELDS = [
  'fontFamily',
  'fontSize',
  'bold',
  'italic',
  'underline',
  'strikethrough',
  'color',
  'lineSpacing',
] as const satisfies readonly (keyof StyleFields)[];

const EMPTY_STYLE: Style = Object.freeze({});

/**
 * Merges two styles. Fields explicitly set on `override` win; everything else
 * falls through to `base`. Neither input is modified and the result is frozen.
 */
export function mergeStyles(base?: Style | null, override?: Style | null): Style {
  if (!override) return base ?? EMPTY_STYLE;
  if (!base) return override;

  const merged: Partial<StyleFields> = {};
  for (const field of STYLE_FIELDS) {
    const value = override[field] ?? base[field];
    if (value !== undefined) {
      assignField(merged, field, value);
    }
  }
  return Object.freeze(merged);
}

/**
 * Combines a cascade of styles left to right, later entries taking precedence.
 * Null and undefined entries are skipped.
 */
export function combineStyles(styles: ReadonlyArray<Style | null | undefined>): Style {
  if (!styles || styles.length === 0) return EMPTY_STYLE;
  return styles.reduce<Style>((acc, style) => mergeStyles(acc, style), EMPTY_STYLE);
}

/** Returns the fields explicitly set on a style. */
export function explicitFields(style: Style): (keyof StyleFields)[] {
  return STYLE_FIELDS.filter((field) => style[field] !== undefined);
}

export function assignField<K extends keyof StyleFields>(
  target: Partial<StyleFields>,
  field: K,
  value: StyleFields[K],
): void {
  target[field] = value;
}

export { STYLE_FIELDS, EMPTY_STYLE };
