/**
 * XY Chart SVG Renderer
 *
 * Pipeline: XYChart → layoutXYChart() → DocumentBuilder → SVG string
 */

import type { XYChart } from '@chartscript/parser';
import { DocumentBuilder } from './document/document';
import { toSvg } from './document/serialize';
import { LEGEND, type LegendLayout } from './layout/legend';
import { type LineSeriesLayout, layoutXYChart, type XYChartLayout } from './layout/xychart-layout';
import { resolveRender } from './render-context';
import { BACKGROUND, INK, XY_PALETTE } from './themes/default';
import type { RenderedChart, RenderOptions } from './types';

const MARKER_HALF = 4;
const DIAMOND_RADIUS = 5;

function xyStyle(layout: XYChartLayout, fontFamily: string): string {
  const font = `"${fontFamily}", sans-serif`;
  return [
    `.chart-title { text-anchor: middle; font-size: ${layout.fonts.title}px; fill: ${INK}; font-family: ${font}; }`,
    `.axis-line { stroke: ${INK}; stroke-width: 2px; fill: none; }`,
    `.axis-label { font-size: ${layout.fonts.label}px; fill: ${INK}; font-family: ${font}; }`,
    `.axis-title { font-size: ${layout.fonts.axisTitle}px; fill: ${INK}; font-family: ${font}; }`,
    `.tick { stroke: ${INK}; stroke-width: 2px; fill: none; }`,
  ].join('\n');
}

function drawLine(builder: DocumentBuilder, line: LineSeriesLayout): void {
  if (line.path) {
    builder.path(line.path, {
      stroke: line.color,
      'stroke-width': 2,
      fill: 'none',
      class: `line-plot-${line.seriesIndex}`,
      ...(line.dashed ? { 'stroke-dasharray': '5,5' } : {}),
    });
  }

  for (const { x, y } of line.marker ? line.points : []) {
    if (line.marker === 'square') {
      builder.rect(x - MARKER_HALF, y - MARKER_HALF, 2 * MARKER_HALF, 2 * MARKER_HALF, {
        fill: line.color,
        stroke: 'none',
      });
    } else {
      const d = DIAMOND_RADIUS;
      builder.path(`M ${x},${y - d} L ${x + d},${y} L ${x},${y + d} L ${x - d},${y} Z`, {
        fill: line.color,
        stroke: 'none',
      });
    }
  }
}

function drawLegend(builder: DocumentBuilder, legend: LegendLayout, fontFamily: string): void {
  builder.openGroup({ class: 'legend' });
  legend.entries.forEach((entry, index) => {
    builder
      .openGroup({}, { translate: { x: legend.x, y: legend.y + index * LEGEND.rowHeight } })
      .rect(0, 0, LEGEND.icon, LEGEND.icon, {
        fill: entry.color,
        stroke: '#000000',
        'stroke-width': '1px',
        'fill-opacity': 1,
      })
      .text(LEGEND.icon + LEGEND.iconGap, LEGEND.icon * 0.75, entry.label, {
        attrs: { 'font-family': `${fontFamily}, sans-serif`, 'font-size': legend.fontSize },
      })
      .closeGroup();
  });
  builder.closeGroup();
}

/**
 * Lay out and draw an XY chart.
 */
export function renderXYChart(chart: XYChart, options: RenderOptions = {}): RenderedChart {
  const { layout: ctx, fontFamily } = resolveRender(chart.config, options, XY_PALETTE);
  const layout = layoutXYChart(chart, ctx);
  const { plot } = layout;
  const bottom = plot.top + plot.height;
  const right = plot.left + plot.width;

  const builder = new DocumentBuilder(layout.width, layout.height);
  builder.style(xyStyle(layout, fontFamily));
  builder.rect(0, 0, layout.width, layout.height, { class: 'background', fill: BACKGROUND });

  builder.openGroup({ class: 'main' });

  if (layout.title) {
    builder
      .openGroup({ class: 'chart-title' })
      .text(layout.title.x, layout.title.y, layout.title.text, {
        anchor: 'middle',
        baseline: 'middle',
        attrs: { class: 'chart-title' },
      })
      .closeGroup();
  }

  // Bars first so lines stay on top
  builder.openGroup({ class: 'plot' });
  for (const bar of layout.bars) {
    builder.rect(bar.x, bar.y, bar.width, bar.height, {
      'stroke-width': 0,
      stroke: bar.color,
      fill: bar.color,
      class: `bar-plot-${bar.seriesIndex}`,
    });
  }
  for (const line of layout.lines) {
    drawLine(builder, line);
  }
  builder.closeGroup();

  builder.openGroup({ class: 'bottom-axis' });
  builder
    .openGroup({ class: 'axis-line' })
    .path(`M ${plot.left},${bottom} L ${right},${bottom}`, { class: 'axis-line' })
    .closeGroup();
  builder.openGroup({ class: 'label' });
  for (const label of layout.xLabels) {
    if (layout.verticalLabels) {
      builder.text(label.x, label.y, label.text, {
        anchor: 'end',
        baseline: 'middle',
        transform: { rotate: { angle: -90, cx: label.x, cy: label.y } },
        attrs: { class: 'axis-label' },
      });
    } else {
      builder.text(label.x, label.y, label.text, {
        anchor: 'middle',
        baseline: 'text-before-edge',
        attrs: { class: 'axis-label' },
      });
    }
  }
  builder.closeGroup();
  builder.openGroup({ class: 'ticks' });
  for (const label of layout.xLabels) {
    builder.path(`M ${label.x},${bottom + 1} L ${label.x},${bottom + 6}`, { class: 'tick' });
  }
  builder.closeGroup();
  builder.closeGroup();

  builder.openGroup({ class: 'left-axis' });
  builder
    .openGroup({ class: 'axis-line' })
    .path(`M ${plot.left},${plot.top} L ${plot.left},${bottom}`, { class: 'axis-line' })
    .closeGroup();
  builder.openGroup({ class: 'label' });
  for (const tick of layout.yTicks) {
    builder.text(layout.yLabelX, tick.y, tick.label, {
      anchor: 'end',
      baseline: 'middle',
      attrs: { class: 'axis-label' },
    });
  }
  builder.closeGroup();
  builder.openGroup({ class: 'ticks' });
  for (const tick of layout.yTicks) {
    builder.path(`M ${plot.left - 1},${tick.y} L ${plot.left - 6},${tick.y}`, { class: 'tick' });
  }
  builder.closeGroup();
  const { yTitle } = layout;
  builder
    .openGroup({ class: 'title' })
    .text(yTitle.x, yTitle.y, yTitle.text, {
      anchor: 'middle',
      baseline: 'text-after-edge',
      transform: { rotate: { angle: 270, cx: yTitle.x, cy: yTitle.y } },
      attrs: { class: 'axis-title' },
    })
    .closeGroup();
  builder.closeGroup();

  builder.closeGroup();

  if (layout.legend) {
    drawLegend(builder, layout.legend, fontFamily);
  }

  const document = builder.build();
  return { document, svg: toSvg(document), width: layout.width, height: layout.height };
}
