import { LayoutError, type Rgb } from '@pagewright/contracts';

export const BLACK: Rgb = Object.freeze({ r: 0, g: 0, b: 0 });

const HEX_COLOR = /^#?([0-9a-f]{2})([0-9a-f]{2})([0-9a-f]{2})$/i;

const isChannel = (value: number): boolean => Number.isInteger(value) && value >= 0 && value <= 255;

export function isValidColor(color: Rgb): boolean {
  return isChannel(color.r) && isChannel(color.g) && isChannel(color.b);
}

export function rgb(r: number, g: number, b: number): Rgb {
  const color = { r, g, b };
  if (!isValidColor(color)) {
    throw new LayoutError('INVALID_STYLE', `Color channels must be integers in 0-255, got (${r}, ${g}, ${b})`, {
      color,
    });
  }
  return Object.freeze(color);
}

/**
 * Parses `#RRGGBB` (the leading hash is optional).
 *
 * @example
 * parseHexColor('#ff8000') // { r: 255, g: 128, b: 0 }
 */
export function parseHexColor(value: string): Rgb {
  const match = HEX_COLOR.exec(value.trim());
  if (!match) {
    throw new LayoutError('INVALID_STYLE', `Invalid hex color "${value}"`, { value });
  }
  const [, r, g, b] = match;
  return rgb(parseInt(r, 16), parseInt(g, 16), parseInt(b, 16));
}
