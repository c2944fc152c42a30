import type { Container, Element } from '@svgdotjs/svg.js';
import { createSvgContext } from '../svg-context';
import { type Attributes, type DocumentNode, formatTransform, type VectorDocument } from './document';

function applyAttributes(element: Element, attrs: Attributes): void {
  for (const [name, value] of Object.entries(attrs)) {
    element.attr(name, value);
  }
}

function draw(parent: Container, node: DocumentNode): void {
  switch (node.kind) {
    case 'style':
      parent.element('style').words(node.css);
      return;
    case 'group': {
      const group = parent.group();
      applyAttributes(group, node.attrs);
      if (node.transform) {
        group.attr('transform', formatTransform(node.transform));
      }
      for (const child of node.children) {
        draw(group, child);
      }
      return;
    }
    case 'rect':
      applyAttributes(parent.rect(node.width, node.height).attr({ x: node.x, y: node.y }), node.attrs);
      return;
    case 'circle':
      applyAttributes(parent.circle(node.r * 2).attr({ cx: node.cx, cy: node.cy, r: node.r }), node.attrs);
      return;
    case 'line':
      applyAttributes(parent.line(node.x1, node.y1, node.x2, node.y2), node.attrs);
      return;
    case 'path':
      // Set `d` as an attribute so svg.js keeps the path text as written.
      applyAttributes(parent.path().attr('d', node.d), node.attrs);
      return;
    case 'text': {
      const text = parent.plain(node.content).attr({ x: node.x, y: node.y });
      if (node.anchor) text.attr('text-anchor', node.anchor);
      if (node.baseline) text.attr('dominant-baseline', node.baseline);
      if (node.transform) text.attr('transform', formatTransform(node.transform));
      applyAttributes(text, node.attrs);
      return;
    }
  }
}

/**
 * Serialize a vector document to an SVG string.
 */
export function toSvg(document: VectorDocument): string {
  const ctx = createSvgContext(document.width, document.height);
  const { canvas } = ctx;

  canvas.attr('style', `max-width: ${document.maxWidth}px; background-color: white;`);
  for (const node of document.children) {
    draw(canvas, node);
  }

  const svg = ctx.toSvg();
  ctx.dispose();
  return svg;
}
