/**
 * Pie Chart Layout Engine
 *
 * Sizes the legend and title first, gives the pie what is left of the width,
 * and shrinks the radius only when the result would exceed the requested
 * height.
 */

import type { PieChart } from '@chartscript/parser';
import { RenderPhase } from '@chartscript/constants';
import type { Point } from '../document/document';
import { paletteColor, PIE_FONT_SIZES } from '../themes/default';
import type { LayoutContext } from './context';

// ---- Layout result types ----

export interface PieSliceLayout {
  index: number;
  color: string;
  startAngle: number;
  endAngle: number;
  /** Path relative to the pie center */
  path: string;
  /** Percentage label relative to the pie center, when `showData` is set */
  percentLabel?: Point & { text: string };
}

export interface PieLegendEntryLayout {
  x: number;
  y: number;
  color: string;
  text: string;
}

export interface PieFonts {
  title: number;
  section: number;
  legend: number;
}

export interface PieLayout {
  width: number;
  height: number;
  center: Point;
  radius: number;
  legendWidth: number;
  titleHeight: number;
  fonts: PieFonts;
  /** Title position relative to the pie center */
  title?: Point & { text: string };
  slices: PieSliceLayout[];
  legend: PieLegendEntryLayout[];
}

// ---- Constants ----

export const PIE_LAYOUT = {
  verticalMargin: 35,
  sideMargin: 30,
  legendGap: 20,
  titleGap: 20,
  legendIcon: 18,
  legendIconGap: 22,
  legendRightMargin: 20,
  legendRowHeight: 22,
  radiusFill: 0.9,
  labelRadius: 0.75,
  titleOffset: 30,
} as const;

const FULL_TURN = 2 * Math.PI;
const FULL_TURN_TOLERANCE = 1e-9;

// ---- Layout ----

export function legendEntryText(label: string, value: number): string {
  return `${label} [${value}]`;
}

/**
 * Color of slice `index`: the `pie<n>` variable (1-based) or the palette.
 */
export function sliceColor(ctx: LayoutContext, index: number): string {
  return ctx.variables.get(`pie${index + 1}`) ?? paletteColor(ctx.palette, index);
}

/**
 * Slice outline from `startAngle` to `endAngle` (radians, 0 = 3 o'clock,
 * clockwise) around the origin. A slice covering the whole circle is drawn
 * as two half arcs, since one arc with equal end points draws nothing.
 */
export function slicePath(radius: number, startAngle: number, endAngle: number): string {
  const sx = radius * Math.cos(startAngle);
  const sy = radius * Math.sin(startAngle);

  if (endAngle - startAngle >= FULL_TURN - FULL_TURN_TOLERANCE) {
    const mx = radius * Math.cos(startAngle + Math.PI);
    const my = radius * Math.sin(startAngle + Math.PI);
    return `M${sx},${sy} A${radius},${radius},0,0,1,${mx},${my} A${radius},${radius},0,0,1,${sx},${sy} Z`;
  }

  const ex = radius * Math.cos(endAngle);
  const ey = radius * Math.sin(endAngle);
  const largeArc = endAngle - startAngle > Math.PI ? 1 : 0;
  return `M${sx},${sy} A${radius},${radius},0,${largeArc},1,${ex},${ey} L0,0 Z`;
}

export function layoutPie(chart: PieChart, ctx: LayoutContext): PieLayout {
  const { width, height, measurer, variables } = ctx;
  const L = PIE_LAYOUT;

  const fonts: PieFonts = {
    title: variables.fontSize('pieTitleTextSize', PIE_FONT_SIZES.pieTitleTextSize),
    section: variables.fontSize('pieSectionTextSize', PIE_FONT_SIZES.pieSectionTextSize),
    legend: variables.fontSize('pieLegendTextSize', PIE_FONT_SIZES.pieLegendTextSize),
  };

  const entries = chart.data.map((slice) => legendEntryText(slice.label, slice.value));
  const legendWidth =
    L.legendIcon + L.legendIconGap + measurer.maxWidth(entries, fonts.legend) + L.legendRightMargin;

  const hasTitle = chart.title !== undefined;
  const titleHeight = hasTitle ? measurer.height(fonts.title) : 0;
  const titleGap = hasTitle ? L.titleGap : 0;

  const availableWidth = width - 2 * L.sideMargin - legendWidth - L.legendGap;
  const legendHeight = chart.data.length * L.legendRowHeight;

  let radius = (availableWidth / 2) * L.radiusFill;
  const optimalHeight =
    2 * L.verticalMargin + titleHeight + titleGap + Math.max(2 * radius, legendHeight);

  let canvasHeight = optimalHeight;
  if (optimalHeight > height) {
    const availableHeight = height - 2 * L.verticalMargin - titleHeight - titleGap;
    radius = Math.min(availableWidth / 2, availableHeight / 2) * L.radiusFill;
    canvasHeight = height;
    ctx.logger?.debug('Pie height constrained', {
      phase: RenderPhase.LAYOUT,
      chartType: chart.type,
      optimalHeight,
      height,
      radius,
    });
  }
  radius = Math.max(0, radius);

  const contentHeight = Math.max(2 * radius, legendHeight);
  const center: Point = {
    x: L.sideMargin + availableWidth / 2,
    y: L.verticalMargin + titleHeight + titleGap + contentHeight / 2,
  };

  const total = chart.data.reduce((sum, slice) => sum + slice.value, 0);
  const slices: PieSliceLayout[] = [];
  if (total > 0) {
    let angle = -Math.PI / 2;
    chart.data.forEach((slice, index) => {
      const span = (slice.value / total) * FULL_TURN;
      const endAngle = angle + span;
      const layout: PieSliceLayout = {
        index,
        color: sliceColor(ctx, index),
        startAngle: angle,
        endAngle,
        path: slicePath(radius, angle, endAngle),
      };
      if (chart.showData) {
        const mid = angle + span / 2;
        const labelRadius = radius * L.labelRadius;
        layout.percentLabel = {
          x: labelRadius * Math.cos(mid),
          y: labelRadius * Math.sin(mid),
          text: `${Math.round((slice.value / total) * 100)}%`,
        };
      }
      slices.push(layout);
      angle = endAngle;
    });
  }

  const legendX = width - L.sideMargin - legendWidth;
  const legendTop = center.y - chart.data.length * (L.legendRowHeight / 2);
  const legend = entries.map((text, index) => ({
    x: legendX,
    y: legendTop + index * L.legendRowHeight,
    color: sliceColor(ctx, index),
    text,
  }));

  return {
    width,
    height: Math.trunc(canvasHeight),
    center,
    radius,
    legendWidth,
    titleHeight,
    fonts,
    title: chart.title === undefined ? undefined : { x: 0, y: -radius - L.titleOffset, text: chart.title },
    slices,
    legend,
  };
}
