import type { ChartConfig, ChartType } from "../../types";

export interface PieSlice {
	label: string;
	value: number;
}

export interface PieChart {
	type: ChartType.PIE;
	config?: ChartConfig;
	/** Draw percentage labels on the slices */
	showData: boolean;
	title?: string;
	data: PieSlice[];
}
