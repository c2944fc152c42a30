import { ParserErrors } from "@chartscript/constants";
import type { ChartType } from "./types";

/**
 * Maximum number of characters of unconsumed input quoted in error messages.
 */
const CONTEXT_LENGTH = 40;

function excerpt(remaining: string): string {
	const firstLine = remaining.split("\n", 1)[0] ?? "";
	return firstLine.length > CONTEXT_LENGTH
		? `${firstLine.slice(0, CONTEXT_LENGTH)}...`
		: firstLine;
}

/**
 * The source text does not match a dialect grammar.
 *
 * `remaining` holds the unconsumed input at the point of failure.
 */
export class ChartParseError extends Error {
	readonly code: "PARSE_ERROR" | "UNKNOWN_CHART_TYPE" = "PARSE_ERROR";
	readonly remaining: string;
	readonly chartType?: ChartType;

	constructor(message: string, remaining: string, chartType?: ChartType) {
		super(remaining.trim().length > 0 ? `${message} at "${excerpt(remaining)}"` : `${message} at end of input`);
		this.name = "ChartParseError";
		this.remaining = remaining;
		this.chartType = chartType;
	}
}

/**
 * No dialect keyword matched after the optional theming header.
 */
export class UnknownChartTypeError extends ChartParseError {
	override readonly code = "UNKNOWN_CHART_TYPE";

	constructor(remaining: string) {
		super(ParserErrors.UNKNOWN_CHART_TYPE, remaining);
		this.name = "UnknownChartTypeError";
	}
}

/**
 * A parsed chart breaks a cross-field rule (unknown column, empty y range).
 */
export class ChartValidationError extends Error {
	readonly code = "VALIDATION_ERROR";
	readonly itemId?: string;
	readonly state?: string;
	readonly columns?: readonly string[];

	constructor(
		message: string,
		details: { itemId?: string; state?: string; columns?: readonly string[] } = {},
	) {
		super(message);
		this.name = "ChartValidationError";
		this.itemId = details.itemId;
		this.state = details.state;
		this.columns = details.columns;
	}
}
