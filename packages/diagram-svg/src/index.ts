/**
 * @chartscript/diagram-svg - Server-side SVG renderer for charts
 *
 * Lays out pie, XY and work item movement charts and writes them as SVG.
 * Uses svg.js + svgdom for SVG generation, so no browser is needed.
 */

// ---- Entry points ----
export { renderChart } from './render';
export { renderPieChart } from './render-pie';
export { renderXYChart } from './render-xychart';
export { renderWorkItemMovement } from './render-work-item-movement';
export type { RenderedChart, RenderOptions } from './types';

// ---- Layout ----
export { layoutPie, slicePath } from './layout/pie-layout';
export type { PieLayout, PieLegendEntryLayout, PieSliceLayout } from './layout/pie-layout';
export { layoutXYChart, yTickValues, tickLabel } from './layout/xychart-layout';
export type { BarLayout, LineSeriesLayout, PlotArea, XYChartLayout } from './layout/xychart-layout';
export { columnPositions, layoutWorkItemMovement } from './layout/work-item-layout';
export type { ColumnLayout, WorkItemLayout, WorkItemRowLayout } from './layout/work-item-layout';
export type { LayoutContext } from './layout/context';

// ---- Shared ----
export { DocumentBuilder } from './document/document';
export type { DocumentNode, Transform, VectorDocument } from './document/document';
export { toSvg } from './document/serialize';
export { TextMeasurer, FALLBACK_CHAR_WIDTH } from './text-metrics';
export type { GlyphMetrics } from './text-metrics';
export { ThemeVariables } from './themes/variables';
export { DEFAULT_FONT_FAMILY, PIE_PALETTE, XY_PALETTE } from './themes/default';

// ---- Rasterization ----
export { rasterizeDocument, RasterizationError } from './raster';
export type { Rasterizer, RasterRequest, RasterStage } from './raster';
