/**
 * Work Item Movement SVG Renderer
 *
 * Pipeline: WorkItemMovement → layoutWorkItemMovement() → DocumentBuilder → SVG string
 */

import type { WorkItemMovement } from '@chartscript/parser';
import { DocumentBuilder, type Point } from './document/document';
import { toSvg } from './document/serialize';
import { layoutWorkItemMovement, WORK_ITEM_LAYOUT, type WorkItemRowLayout } from './layout/work-item-layout';
import { resolveRender } from './render-context';
import { BACKGROUND, GUIDE_LINE, INK, WORK_ITEM_FONT_SIZES } from './themes/default';
import type { RenderedChart, RenderOptions } from './types';

function workItemStyle(fontFamily: string): string {
  const font = `"${fontFamily}", sans-serif`;
  const sizes = WORK_ITEM_FONT_SIZES;
  return [
    `.chart-title { text-anchor: middle; font-size: ${sizes.title}px; fill: ${INK}; font-family: ${font}; }`,
    `.column-label { font-size: ${sizes.column}px; fill: ${INK}; font-family: ${font}; text-anchor: middle; }`,
    `.column-line { stroke: ${GUIDE_LINE}; stroke-width: 1px; }`,
    `.item-label { font-size: ${sizes.item}px; fill: ${INK}; font-family: ${font}; text-anchor: middle; }`,
    `.item-circle { fill: ${INK}; }`,
    `.item-arrow { stroke: ${INK}; stroke-width: 1px; fill: none; }`,
    `.arrow-head { fill: ${INK}; }`,
    `.circle-text { fill: white; font-size: ${sizes.circle}px; font-family: ${font}; text-anchor: middle; dominant-baseline: middle; font-weight: bold; }`,
  ].join('\n');
}

function trianglePath([tip, left, right]: [Point, Point, Point]): string {
  return `M ${tip.x},${tip.y} L ${left.x},${left.y} L ${right.x},${right.y} Z`;
}

function drawRow(builder: DocumentBuilder, row: WorkItemRowLayout): void {
  for (const circle of [row.from, row.to]) {
    builder
      .circle(circle.x, circle.y, WORK_ITEM_LAYOUT.circleRadius, { class: 'item-circle' })
      .text(circle.x, circle.y, String(circle.points), {
        anchor: 'middle',
        baseline: 'middle',
        attrs: { class: 'circle-text' },
      });
  }

  const { shaft } = row;
  builder.line(shaft.x1, shaft.y1, shaft.x2, shaft.y2, { class: 'item-arrow' });
  builder.path(trianglePath(row.head), { class: 'arrow-head' });

  const { label } = row;
  if (row.vertical) {
    builder.text(label.x, label.y, label.text, {
      baseline: 'middle',
      attrs: { class: 'item-label', style: `text-anchor: ${label.side ?? 'start'}` },
    });
  } else {
    builder.text(label.x, label.y, label.text, {
      baseline: 'text-after-edge',
      attrs: { class: 'item-label' },
    });
  }
}

/**
 * Lay out and draw a work item movement chart.
 */
export function renderWorkItemMovement(chart: WorkItemMovement, options: RenderOptions = {}): RenderedChart {
  const { layout: ctx, fontFamily } = resolveRender(chart.config, options, []);
  const layout = layoutWorkItemMovement(chart, ctx);

  const builder = new DocumentBuilder(layout.width, layout.height);
  builder.style(workItemStyle(fontFamily));
  builder.rect(0, 0, layout.width, layout.height, { fill: BACKGROUND });

  builder.openGroup({ class: 'main' });

  if (layout.title) {
    builder.text(layout.title.x, layout.title.y, layout.title.text, {
      anchor: 'middle',
      baseline: 'middle',
      attrs: { class: 'chart-title' },
    });
  }

  for (const column of layout.columns) {
    builder
      .text(column.x, column.labelY, column.name, { attrs: { class: 'column-label' } })
      .line(column.x, column.top, column.x, column.bottom, { class: 'column-line' });
  }

  for (const row of layout.rows) {
    drawRow(builder, row);
  }

  builder.closeGroup();

  const document = builder.build();
  return { document, svg: toSvg(document), width: layout.width, height: layout.height };
}
