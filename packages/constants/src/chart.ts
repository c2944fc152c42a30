/**
 * Leading keyword of each chart dialect, in detection order.
 */
export const ChartKeywords = {
	WORK_ITEM_MOVEMENT: "work-item-movement",
	XY_CHART: "xychart-beta",
	PIE: "pie",
} as const;

/**
 * Delimiters of the theming header, e.g. `%%{init: {'theme': 'dark'}}%%`.
 */
export const ConfigHeader = {
	OPEN: "%%{init:",
	CLOSE: "}%%",
} as const;

export const ParserErrors = {
	UNKNOWN_CHART_TYPE:
		"Unknown chart type: expected one of work-item-movement, xychart-beta, pie",
	EXPECTED: (what: string, dialect: string) =>
		`Failed to parse ${dialect}: expected ${what}`,
	TRAILING_INPUT: (dialect: string) =>
		`Failed to parse ${dialect}: unexpected input after the chart body`,
	UNKNOWN_COLUMN: (itemId: string, state: string, columns: readonly string[]) =>
		`Work item '${itemId}' references column '${state}' which does not exist. Available columns are: ${JSON.stringify(columns)}`,
	INVALID_Y_RANGE: (min: number, max: number) =>
		`y-axis range is empty: max (${max}) must be greater than min (${min})`,
	RASTER_PARSE: (detail: string) => `SVG parsing error: ${detail}`,
	RASTER_RENDER: (detail: string) => `Raster rendering error: ${detail}`,
} as const;
