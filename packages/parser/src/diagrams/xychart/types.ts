import type { ChartConfig, ChartType } from "../../types";

export type SeriesKind = "bar" | "line";

export interface XAxis {
	labels: string[];
}

export interface YAxis {
	title: string;
	min: number;
	/** Always greater than `min` once the chart has been validated */
	max: number;
}

/**
 * Value `i` belongs to x-axis category `i`; values past the last category are
 * not drawn.
 */
export interface Series {
	kind: SeriesKind;
	data: number[];
}

export interface XYChart {
	type: ChartType.XY_CHART;
	config?: ChartConfig;
	title?: string;
	legend?: string[];
	xAxis: XAxis;
	yAxis: YAxis;
	series: Series[];
}
