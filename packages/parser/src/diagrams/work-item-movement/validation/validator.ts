import { ParserErrors } from "@chartscript/constants";
import { ChartValidationError } from "../../../errors";
import type { WorkItemMovement } from "../types";

export interface ColumnViolation {
	itemId: string;
	state: string;
	columns: string[];
}

function hasColumn(columns: readonly string[], state: string): boolean {
	const wanted = state.toLowerCase();
	return columns.some((column) => column.toLowerCase() === wanted);
}

/**
 * Every state an item names that matches no column (case-insensitively),
 * in item order, `fromState` before `toState`.
 */
export function findWorkItemViolations(chart: WorkItemMovement): ColumnViolation[] {
	const violations: ColumnViolation[] = [];

	for (const item of chart.items) {
		for (const state of [item.fromState, item.toState]) {
			if (!hasColumn(chart.columns, state)) {
				violations.push({ itemId: item.id, state, columns: [...chart.columns] });
			}
		}
	}

	return violations;
}

/**
 * @throws ChartValidationError for the first unknown column reference
 */
export function validateWorkItemMovement(chart: WorkItemMovement): void {
	const [first] = findWorkItemViolations(chart);
	if (first) {
		throw new ChartValidationError(ParserErrors.UNKNOWN_COLUMN(first.itemId, first.state, first.columns), first);
	}
}
