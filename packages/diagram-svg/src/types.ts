/**
 * Core types for chart rendering
 */

import type { AppLogObj, Logger } from '@chartscript/logger';
import type { VectorDocument } from './document/document';
import type { GlyphMetrics } from './text-metrics';

/**
 * Options for rendering a chart
 */
export interface RenderOptions {
  /** Canvas width; a `width` in the chart's config header wins. Default 800 */
  width?: number;

  /** Requested canvas height. Default 600 */
  height?: number;

  /** Font family written into the SVG. Default "Liberation Sans" */
  fontFamily?: string;

  /** Glyph metrics used to measure text; needs `font` as well */
  metrics?: GlyphMetrics;

  /** Font file bytes handed to `metrics` */
  font?: Uint8Array;

  /** Replaces the default series/slice palette */
  palette?: readonly string[];

  logger?: Logger<AppLogObj>;
}

/**
 * A laid out chart in both vector and SVG form.
 */
export interface RenderedChart {
  document: VectorDocument;
  svg: string;
  width: number;
  height: number;
}
