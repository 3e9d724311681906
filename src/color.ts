// Color parsing and packing. Colors are carried as unsigned 32-bit RGBA.

export const TRANSPARENT = 0x00000000;
export const BLACK = 0x000000FF;

/**
 * Pack RGBA components into a single unsigned 32-bit value
 */
export function packRGBA(r: number, g: number, b: number, a: number = 255): number {
  return (((r & 0xFF) << 24) | ((g & 0xFF) << 16) | ((b & 0xFF) << 8) | (a & 0xFF)) >>> 0;
}

/**
 * Unpack a 32-bit RGBA value into components
 */
export function unpackRGBA(color: number): { r: number; g: number; b: number; a: number } {
  return {
    r: (color >>> 24) & 0xFF,
    g: (color >>> 16) & 0xFF,
    b: (color >>> 8) & 0xFF,
    a: color & 0xFF,
  };
}

/**
 * Convert packed RGBA to CSS color string
 */
export function rgbaToCss(color: number): string {
  const { r, g, b, a } = unpackRGBA(color);
  if (a === 255) {
    return `rgb(${r},${g},${b})`;
  }
  return `rgba(${r},${g},${b},${(a / 255).toFixed(2)})`;
}

const NAMED_COLORS: Readonly<Record<string, number>> = Object.freeze({
  black: packRGBA(0, 0, 0),
  white: packRGBA(255, 255, 255),
  red: packRGBA(255, 0, 0),
  green: packRGBA(0, 128, 0),
  lime: packRGBA(0, 255, 0),
  blue: packRGBA(0, 0, 255),
  navy: packRGBA(0, 0, 128),
  yellow: packRGBA(255, 255, 0),
  cyan: packRGBA(0, 255, 255),
  aqua: packRGBA(0, 255, 255),
  magenta: packRGBA(255, 0, 255),
  fuchsia: packRGBA(255, 0, 255),
  orange: packRGBA(255, 165, 0),
  purple: packRGBA(128, 0, 128),
  pink: packRGBA(255, 192, 203),
  gray: packRGBA(128, 128, 128),
  grey: packRGBA(128, 128, 128),
  silver: packRGBA(192, 192, 192),
  maroon: packRGBA(128, 0, 0),
  olive: packRGBA(128, 128, 0),
  teal: packRGBA(0, 128, 128),
  transparent: TRANSPARENT,
});

function channel(text: string): number | undefined {
  if (text.endsWith('%')) {
    const pct = Number(text.slice(0, -1));
    return Number.isFinite(pct) ? Math.round(Math.min(100, Math.max(0, pct)) * 2.55) : undefined;
  }
  const value = Number(text);
  return Number.isFinite(value) ? Math.round(Math.min(255, Math.max(0, value))) : undefined;
}

function alphaChannel(text: string | undefined): number | undefined {
  if (text === undefined) return 255;
  const value = text.endsWith('%') ? Number(text.slice(0, -1)) / 100 : Number(text);
  return Number.isFinite(value) ? Math.round(Math.min(1, Math.max(0, value)) * 255) : undefined;
}

/**
 * Parse a CSS color (hex, rgb()/rgba(), named) to packed RGBA.
 * Returns undefined for anything that is not a color.
 */
export function parseColor(css: string): number | undefined {
  const text = css.trim().toLowerCase();

  if (text.startsWith('#')) {
    const hex = text.slice(1);
    if (!/^[0-9a-f]+$/.test(hex)) return undefined;
    if (hex.length === 3 || hex.length === 4) {
      const [r, g, b, a = 'f'] = hex.split('');
      return packRGBA(parseInt(r + r, 16), parseInt(g + g, 16), parseInt(b + b, 16), parseInt(a + a, 16));
    }
    if (hex.length === 6 || hex.length === 8) {
      const a = hex.length === 8 ? parseInt(hex.slice(6, 8), 16) : 255;
      return packRGBA(
        parseInt(hex.slice(0, 2), 16),
        parseInt(hex.slice(2, 4), 16),
        parseInt(hex.slice(4, 6), 16),
        a
      );
    }
    return undefined;
  }

  const fnMatch = text.match(/^rgba?\(\s*([^)]*)\)$/);
  if (fnMatch) {
    const args = fnMatch[1].split(/\s*,\s*|\s*\/\s*|\s+/).filter(Boolean);
    if (args.length !== 3 && args.length !== 4) return undefined;
    const r = channel(args[0]);
    const g = channel(args[1]);
    const b = channel(args[2]);
    const a = alphaChannel(args[3]);
    if (r === undefined || g === undefined || b === undefined || a === undefined) return undefined;
    return packRGBA(r, g, b, a);
  }

  return Object.hasOwn(NAMED_COLORS, text) ? NAMED_COLORS[text] : undefined;
}
