/**
 * Chart dialect detected from the leading keyword of the source text.
 */
export enum ChartType {
	PIE = "pie",
	XY_CHART = "xychart",
	WORK_ITEM_MOVEMENT = "work-item-movement",
}

/**
 * Settings read from the `%%{init: ...}%%` theming header.
 */
export interface ChartConfig {
	/** Theme name, "base" when the header does not name one */
	readonly theme: string;
	/** Flattened theme variables; nested keys are joined with "." */
	readonly themeVariables: ReadonlyMap<string, string>;
	/** Canvas width override in pixels */
	readonly width?: number;
}

/**
 * Successful match of a recognizer: the matched value and the input after it.
 */
export interface Parsed<T> {
	value: T;
	rest: string;
}
