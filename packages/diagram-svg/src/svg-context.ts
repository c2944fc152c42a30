import { registerWindow, SVG, type Svg } from '@svgdotjs/svg.js';
import { createSVGWindow } from 'svgdom';

export interface SvgContext {
  canvas: Svg;
  toSvg(): string;
  dispose(): void;
}

/**
 * Create a detached svg.js canvas backed by an svgdom window, so documents
 * can be built without a browser.
 */
export function createSvgContext(width: number, height: number): SvgContext {
  const window = createSVGWindow();
  registerWindow(window, window.document);

  const canvas = SVG().size('100%', height).viewbox(0, 0, width, height);

  return {
    canvas,
    toSvg: () => canvas.svg(),
    dispose: () => {
      canvas.remove();
    },
  };
}
