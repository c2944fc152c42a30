import type { TextMeasurer } from '../text-metrics';

/**
 * Swatch-and-label legend shared by the XY chart.
 */
export const LEGEND = {
  icon: 18,
  iconGap: 4,
  rowHeight: 22,
  rightMargin: 20,
} as const;

export interface LegendEntryLayout {
  label: string;
  color: string;
}

export interface LegendLayout {
  x: number;
  y: number;
  width: number;
  fontSize: number;
  entries: LegendEntryLayout[];
}

export function legendWidth(labels: readonly string[], measurer: TextMeasurer, fontSize: number): number {
  return LEGEND.icon + LEGEND.iconGap + measurer.maxWidth(labels, fontSize) + LEGEND.rightMargin;
}

export function legendHeight(count: number): number {
  return count * LEGEND.rowHeight;
}
