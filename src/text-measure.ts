// Text metrics for layout
// Width is a fixed fraction of the font size per glyph, doubled for wide
// (CJK, emoji) glyphs; combining marks take no space.

import { StyleboxConfig } from './config/mod.ts';
import type { ComputedStyle } from './properties.ts';

export interface TextMetricsOptions {
  /** Advance of one narrow glyph as a fraction of the font size */
  charWidth?: number;
  /** Line height factor used for `line-height: normal` */
  lineHeight?: number;
}

export interface TextMeasurement {
  width: number;
  height: number;
  lines: string[];
}

type TextStyle = Pick<ComputedStyle, 'fontSize' | 'lineHeight'>;

function isZeroWidth(codePoint: number): boolean {
  return (codePoint >= 0x0300 && codePoint <= 0x036F) ||
    (codePoint >= 0x200B && codePoint <= 0x200F) ||
    (codePoint >= 0xFE00 && codePoint <= 0xFE0F) ||
    (codePoint >= 0x20D0 && codePoint <= 0x20FF);
}

function isWide(codePoint: number): boolean {
  return (codePoint >= 0x1100 && codePoint <= 0x115F) ||
    (codePoint >= 0x2E80 && codePoint <= 0xA4CF) ||
    (codePoint >= 0xAC00 && codePoint <= 0xD7A3) ||
    (codePoint >= 0xF900 && codePoint <= 0xFAFF) ||
    (codePoint >= 0xFF00 && codePoint <= 0xFF60) ||
    (codePoint >= 0xFFE0 && codePoint <= 0xFFE6) ||
    (codePoint >= 0x1F300 && codePoint <= 0x1FAFF) ||
    (codePoint >= 0x20000 && codePoint <= 0x3FFFD);
}

/**
 * Width of a string in narrow-glyph units
 */
export function glyphUnits(text: string): number {
  let units = 0;
  for (const char of text) {
    const codePoint = char.codePointAt(0) ?? 0;
    if (codePoint < 32 || isZeroWidth(codePoint)) continue;
    units += isWide(codePoint) ? 2 : 1;
  }
  return units;
}

/** Collapse whitespace runs to single spaces and trim */
export function collapseWhitespace(text: string): string {
  return text.replace(/\s+/g, ' ').trim();
}

export class TextMeasurer {
  private _charWidth: number;
  private _lineHeight: number;

  constructor(options: TextMetricsOptions = {}) {
    this._charWidth = options.charWidth ?? 0.5;
    this._lineHeight = options.lineHeight ?? 1.2;
  }

  static fromConfig(config: StyleboxConfig = StyleboxConfig.get()): TextMeasurer {
    return new TextMeasurer({ charWidth: config.textCharWidth, lineHeight: config.textLineHeight });
  }

  get charWidth(): number {
    return this._charWidth;
  }

  measureWidth(text: string, style: TextStyle): number {
    return glyphUnits(text) * style.fontSize * this._charWidth;
  }

  lineHeight(style: TextStyle): number {
    const lineHeight = style.lineHeight;
    if (lineHeight === 'normal') return style.fontSize * this._lineHeight;
    if (typeof lineHeight === 'number') return lineHeight;
    return style.fontSize * lineHeight.factor;
  }

  /** Width of the widest word: the narrowest the text can wrap to */
  minContentWidth(text: string, style: TextStyle): number {
    let widest = 0;
    for (const word of collapseWhitespace(text).split(' ')) {
      widest = Math.max(widest, this.measureWidth(word, style));
    }
    return widest;
  }

  maxContentWidth(text: string, style: TextStyle): number {
    return this.measureWidth(collapseWhitespace(text), style);
  }

  /**
   * Greedy word wrap. A word wider than `maxWidth` sits alone on its line.
   */
  wrap(text: string, style: TextStyle, maxWidth: number): string[] {
    const normalized = collapseWhitespace(text);
    if (normalized === '') return [];

    const lines: string[] = [];
    let current = '';
    for (const word of normalized.split(' ')) {
      const candidate = current === '' ? word : `${current} ${word}`;
      if (current !== '' && this.measureWidth(candidate, style) > maxWidth) {
        lines.push(current);
        current = word;
      } else {
        current = candidate;
      }
    }
    lines.push(current);
    return lines;
  }

  measure(text: string, style: TextStyle, maxWidth: number = Infinity): TextMeasurement {
    const lines = this.wrap(text, style, maxWidth);
    const width = lines.reduce((widest, line) => Math.max(widest, this.measureWidth(line, style)), 0);
    return { width, height: lines.length * this.lineHeight(style), lines };
  }
}
