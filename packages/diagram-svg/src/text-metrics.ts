/**
 * Text measurement used by the layout engines to size legends, titles and
 * axis labels before anything is drawn.
 */

/**
 * Measures rendered text for a font file at a pixel size.
 */
export interface GlyphMetrics {
  measureWidth(text: string, font: Uint8Array, pixelSize: number): number;
  measureHeight(font: Uint8Array, pixelSize: number): number;
}

/** Average advance of one character, as a fraction of the pixel size. */
export const FALLBACK_CHAR_WIDTH = 0.53;

/**
 * Uses the glyph metrics when both a metrics provider and font bytes are
 * available; otherwise estimates from the character count.
 */
export class TextMeasurer {
  constructor(
    private readonly metrics?: GlyphMetrics,
    private readonly font?: Uint8Array,
  ) {}

  width(text: string, size: number): number {
    if (this.metrics && this.font) {
      return this.metrics.measureWidth(text, this.font, size);
    }
    return [...text].length * size * FALLBACK_CHAR_WIDTH;
  }

  height(size: number): number {
    if (this.metrics && this.font) {
      return this.metrics.measureHeight(this.font, size);
    }
    return size;
  }

  /** Widest of `texts`, 0 when empty. */
  maxWidth(texts: Iterable<string>, size: number): number {
    let widest = 0;
    for (const text of texts) {
      widest = Math.max(widest, this.width(text, size));
    }
    return widest;
  }
}
