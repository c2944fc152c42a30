/**
 * XY Chart Layout Engine
 *
 * Reserves room for the title, legend and axis labels, then maps categories
 * and values into the plot rectangle that remains.
 */

import type { Series, XYChart } from '@chartscript/parser';
import { RenderPhase } from '@chartscript/constants';
import type { Point } from '../document/document';
import { paletteColor, XY_AXIS_TITLE_FONT_SIZE, XY_FONT_SIZES } from '../themes/default';
import type { LayoutContext } from './context';
import { legendHeight, type LegendLayout, legendWidth } from './legend';

// ---- Layout result types ----

export interface PlotArea {
  left: number;
  top: number;
  width: number;
  height: number;
}

export interface BarLayout {
  seriesIndex: number;
  x: number;
  y: number;
  width: number;
  height: number;
  color: string;
}

export type MarkerShape = 'square' | 'diamond';

export interface LineSeriesLayout {
  seriesIndex: number;
  color: string;
  dashed: boolean;
  points: Point[];
  /** `M x,y L x,y ...`; empty when the series has no drawable points */
  path: string;
  marker?: MarkerShape;
}

export interface AxisLabelLayout {
  text: string;
  x: number;
  y: number;
}

export interface YTickLayout {
  value: number;
  label: string;
  y: number;
}

export interface XYFonts {
  title: number;
  label: number;
  axisTitle: number;
  legend: number;
}

export interface XYChartLayout {
  width: number;
  height: number;
  fonts: XYFonts;
  title?: AxisLabelLayout;
  plot: PlotArea;
  categoryWidth: number;
  verticalLabels: boolean;
  bars: BarLayout[];
  lines: LineSeriesLayout[];
  xLabels: AxisLabelLayout[];
  yTicks: YTickLayout[];
  /** Right edge of the y tick labels */
  yLabelX: number;
  yTitle: AxisLabelLayout;
  legend?: LegendLayout;
}

// ---- Constants ----

export const XY_LAYOUT = {
  margin: 35,
  legendGap: 20,
  titleGap: 20,
  labelToAxisGap: 10,
  titleToLabelsGap: 12,
  axisTitleWidth: 20,
  minLabelGap: 5,
  horizontalLabelSpace: 40,
  verticalLabelPadding: 20,
  barFill: 0.8,
  tickCount: 11,
} as const;

// ---- Helpers ----

/**
 * The 11 tick values from `max` down to `min`.
 */
export function yTickValues(min: number, max: number): number[] {
  const steps = XY_LAYOUT.tickCount - 1;
  return Array.from({ length: XY_LAYOUT.tickCount }, (_, i) => max - (i * (max - min)) / steps);
}

/** Integer part, the way tick labels are printed. */
export function tickLabel(value: number): string {
  return String(Math.trunc(value));
}

/**
 * Color of series `index`: entry `index` of `xyChart.plotColorPalette`, or
 * the palette.
 */
export function seriesColor(ctx: LayoutContext, index: number): string {
  return ctx.variables.listItem('xyChart.plotColorPalette', index) ?? paletteColor(ctx.palette, index);
}

function markerShape(ctx: LayoutContext, index: number): MarkerShape | undefined {
  const shape = ctx.variables.listItem('xyChart.plotPoints', index);
  return shape === 'square' || shape === 'diamond' ? shape : undefined;
}

function isDashed(ctx: LayoutContext, index: number): boolean {
  return ctx.variables.listItem('xyChart.strokeStyles', index) === 'dashed';
}

// ---- Layout ----

export function layoutXYChart(chart: XYChart, ctx: LayoutContext): XYChartLayout {
  const { width, height, measurer, variables } = ctx;
  const L = XY_LAYOUT;

  const fonts: XYFonts = {
    title: variables.fontSize('xyChart.titleFontSize', XY_FONT_SIZES['xyChart.titleFontSize']),
    label: variables.fontSize('xyChart.labelFontSize', XY_FONT_SIZES['xyChart.labelFontSize']),
    axisTitle: XY_AXIS_TITLE_FONT_SIZE,
    legend: variables.fontSize('xyChart.legendFontSize', XY_FONT_SIZES['xyChart.legendFontSize']),
  };

  const legendLabels = chart.legend;
  const legendSpace = legendLabels ? legendWidth(legendLabels, measurer, fonts.legend) : 0;
  const legendGap = legendLabels ? L.legendGap : 0;

  const titleHeight = chart.title !== undefined ? measurer.height(fonts.title) : 0;
  const titleGap = chart.title !== undefined ? L.titleGap : 0;

  const { min, max } = chart.yAxis;
  const tickValues = yTickValues(min, max);
  const maxYLabelWidth = measurer.maxWidth(tickValues.map(tickLabel), fonts.label);

  const labels = chart.xAxis.labels;
  const categories = labels.length;
  let verticalLabels = false;
  if (categories > 0) {
    const estimatedCategoryWidth = (width - 2 * L.margin - (maxYLabelWidth + L.margin)) / categories;
    verticalLabels = labels.some(
      (label) => measurer.width(label, fonts.label) + L.minLabelGap > estimatedCategoryWidth,
    );
    if (verticalLabels) {
      ctx.logger?.debug('Switched x-axis labels to vertical', {
        phase: RenderPhase.LAYOUT,
        chartType: chart.type,
        estimatedCategoryWidth,
      });
    }
  }

  const ySpace = maxYLabelWidth + L.labelToAxisGap + L.titleToLabelsGap + L.axisTitleWidth;
  const xSpace = verticalLabels
    ? measurer.maxWidth(labels, fonts.label) + L.verticalLabelPadding
    : L.horizontalLabelSpace;

  const plot: PlotArea = {
    left: L.margin + ySpace,
    top: L.margin + titleHeight + titleGap,
    width: Math.max(0, width - 2 * L.margin - ySpace - legendSpace - legendGap),
    height: Math.max(0, height - 2 * L.margin - titleHeight - titleGap - xSpace),
  };
  const bottom = plot.top + plot.height;

  const categoryWidth = categories > 0 ? plot.width / categories : 0;
  const barWidth = categoryWidth * L.barFill;
  const range = max - min;
  const yScale = range > 0 ? plot.height / range : 0;
  const centerX = (index: number) => plot.left + index * categoryWidth + categoryWidth / 2;
  const valueY = (value: number) => bottom - (value - min) * yScale;

  const bars: BarLayout[] = [];
  for (let category = 0; category < categories; category++) {
    const stack = chart.series
      .map((series, seriesIndex) => ({ series, seriesIndex }))
      .filter(({ series }) => series.kind === 'bar' && category < series.data.length)
      .map(({ series, seriesIndex }) => ({ seriesIndex, value: series.data[category] ?? 0 }))
      .sort((a, b) => b.value - a.value);

    for (const { seriesIndex, value } of stack) {
      const barHeight = Math.max(0, (value - min) * yScale);
      bars.push({
        seriesIndex,
        x: plot.left + category * categoryWidth + (categoryWidth - barWidth) / 2,
        y: bottom - barHeight,
        width: barWidth,
        height: barHeight,
        color: seriesColor(ctx, seriesIndex),
      });
    }
  }

  const lines: LineSeriesLayout[] = [];
  chart.series.forEach((series: Series, seriesIndex) => {
    if (series.kind !== 'line') return;
    const points = series.data
      .slice(0, categories)
      .map((value, index) => ({ x: centerX(index), y: valueY(value) }));
    lines.push({
      seriesIndex,
      color: seriesColor(ctx, seriesIndex),
      dashed: isDashed(ctx, seriesIndex),
      points,
      path: points.map((p, index) => `${index === 0 ? 'M' : 'L'} ${p.x},${p.y}`).join(' '),
      marker: markerShape(ctx, seriesIndex),
    });
  });

  const labelHeight = measurer.height(fonts.label);
  const xLabels = labels.map((text, index) => ({
    text,
    x: centerX(index),
    y: verticalLabels ? bottom + L.labelToAxisGap + labelHeight / 2 : bottom + 20,
  }));

  const yTicks = tickValues.map((value, i) => ({
    value,
    label: tickLabel(value),
    y: plot.top + (i * plot.height) / (L.tickCount - 1),
  }));

  const yLabelX = plot.left - L.labelToAxisGap;
  const yTitle = {
    text: chart.yAxis.title,
    x: yLabelX - maxYLabelWidth - L.titleToLabelsGap,
    y: plot.top + plot.height / 2,
  };

  const legend: LegendLayout | undefined = legendLabels && {
    x: width - L.margin - legendSpace,
    y: plot.top + plot.height / 2 - legendHeight(legendLabels.length) / 2,
    width: legendSpace,
    fontSize: fonts.legend,
    entries: legendLabels.map((label, index) => ({ label, color: seriesColor(ctx, index) })),
  };

  return {
    width,
    height,
    fonts,
    title:
      chart.title === undefined
        ? undefined
        : { text: chart.title, x: width / 2, y: L.margin + titleHeight / 2 },
    plot,
    categoryWidth,
    verticalLabels,
    bars,
    lines,
    xLabels,
    yTicks,
    yLabelX,
    yTitle,
    legend,
  };
}
