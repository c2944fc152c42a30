import type { ChartConfig, ChartType } from "../../types";

/**
 * One work item moving from one column to another.
 */
export interface WorkItem {
	/** e.g. `NP-213` */
	id: string;
	fromState: string;
	fromPoints: number;
	toState: string;
	toPoints: number;
}

export interface WorkItemMovement {
	type: ChartType.WORK_ITEM_MOVEMENT;
	config?: ChartConfig;
	title?: string;
	columns: string[];
	items: WorkItem[];
}

/** Change in story points across the move; negative when points dropped. */
export function pointsChange(item: WorkItem): number {
	return item.toPoints - item.fromPoints;
}
