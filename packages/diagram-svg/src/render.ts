import { type ChartDocument, ChartType } from '@chartscript/parser';
import { RenderPhase } from '@chartscript/constants';
import { renderPieChart } from './render-pie';
import { renderWorkItemMovement } from './render-work-item-movement';
import { renderXYChart } from './render-xychart';
import type { RenderedChart, RenderOptions } from './types';

function renderByType(chart: ChartDocument, options: RenderOptions): RenderedChart {
  switch (chart.type) {
    case ChartType.PIE:
      return renderPieChart(chart, options);
    case ChartType.XY_CHART:
      return renderXYChart(chart, options);
    case ChartType.WORK_ITEM_MOVEMENT:
      return renderWorkItemMovement(chart, options);
  }
}

/**
 * Render any parsed chart with the renderer for its type.
 */
export function renderChart(chart: ChartDocument, options: RenderOptions = {}): RenderedChart {
  const rendered = renderByType(chart, options);
  options.logger?.debug('Chart rendered', {
    phase: RenderPhase.SERIALIZE,
    chartType: chart.type,
    width: rendered.width,
    height: rendered.height,
  });
  return rendered;
}
