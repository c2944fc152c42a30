import { ParserErrors } from "@chartscript/constants";
import { ChartValidationError } from "../../errors";
import type { XYChart } from "./types";

/**
 * @throws ChartValidationError when the y-axis range is empty or inverted
 */
export function validateXYChart(chart: XYChart): void {
	const { min, max } = chart.yAxis;
	if (!(max > min)) {
		throw new ChartValidationError(ParserErrors.INVALID_Y_RANGE(min, max));
	}
}
