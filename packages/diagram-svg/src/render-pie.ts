/**
 * Pie Chart SVG Renderer
 *
 * Pipeline: PieChart → layoutPie() → DocumentBuilder → SVG string
 */

import type { PieChart } from '@chartscript/parser';
import { DocumentBuilder } from './document/document';
import { toSvg } from './document/serialize';
import { layoutPie, PIE_LAYOUT, type PieLayout } from './layout/pie-layout';
import { resolveRender } from './render-context';
import { PIE_PALETTE, PIE_VARIABLES } from './themes/default';
import type { ThemeVariables } from './themes/variables';
import type { RenderedChart, RenderOptions } from './types';

function pieStyle(layout: PieLayout, variables: ThemeVariables, fontFamily: string): string {
  const v = (key: keyof typeof PIE_VARIABLES) => variables.string(key, PIE_VARIABLES[key]);
  const font = `"${fontFamily}", sans-serif`;

  return [
    `.pieCircle { stroke: ${v('pieStrokeColor')}; stroke-width: ${v('pieStrokeWidth')}; fill-opacity: ${v('pieOpacity')}; }`,
    `.pieOuterCircle { stroke: ${v('pieOuterStrokeColor')}; stroke-width: ${v('pieOuterStrokeWidth')}; fill: none; }`,
    `.pieTitleText { text-anchor: middle; font-size: ${layout.fonts.title}px; fill: ${v('pieTitleTextColor')}; font-family: ${font}; }`,
    `.slice { font-family: ${font}; fill: ${v('pieSectionTextColor')}; font-size: ${layout.fonts.section}px; text-anchor: middle; }`,
    `.legend text { fill: ${v('pieLegendTextColor')}; font-family: ${font}; font-size: ${layout.fonts.legend}px; }`,
  ].join('\n');
}

/**
 * Lay out and draw a pie chart.
 */
export function renderPieChart(chart: PieChart, options: RenderOptions = {}): RenderedChart {
  const { layout: ctx, fontFamily } = resolveRender(chart.config, options, PIE_PALETTE);
  const layout = layoutPie(chart, ctx);
  const { variables } = ctx;
  const fontAttr = `${fontFamily}, sans-serif`;

  const builder = new DocumentBuilder(layout.width, layout.height);
  builder.style(pieStyle(layout, variables, fontFamily));

  for (const entry of layout.legend) {
    builder
      .openGroup({ class: 'legend' }, { translate: { x: entry.x, y: entry.y } })
      .rect(0, 0, PIE_LAYOUT.legendIcon, PIE_LAYOUT.legendIcon, {
        fill: entry.color,
        stroke: variables.string('pieStrokeColor', PIE_VARIABLES.pieStrokeColor),
        'fill-opacity': variables.string('pieOpacity', PIE_VARIABLES.pieOpacity),
      })
      .text(22, 14, entry.text, { attrs: { 'font-family': fontAttr } })
      .closeGroup();
  }

  builder.openGroup({}, { translate: layout.center });

  for (const slice of layout.slices) {
    builder.path(slice.path, { class: 'pieCircle', fill: slice.color });
    if (slice.percentLabel) {
      builder.text(slice.percentLabel.x, slice.percentLabel.y, slice.percentLabel.text, {
        anchor: 'middle',
        baseline: 'central',
        attrs: { class: 'slice', 'font-family': fontAttr, 'font-size': layout.fonts.section },
      });
    }
  }

  // Drawn after the slices so it covers their outer strokes
  builder.circle(0, 0, layout.radius, { class: 'pieOuterCircle' });

  if (layout.title) {
    builder.text(layout.title.x, layout.title.y, layout.title.text, {
      anchor: 'middle',
      attrs: { class: 'pieTitleText', 'font-family': fontAttr },
    });
  }

  builder.closeGroup();

  const document = builder.build();
  return { document, svg: toSvg(document), width: layout.width, height: layout.height };
}
