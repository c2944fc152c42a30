import { ChartKeywords } from "@chartscript/constants";
import { DialectErrors } from "../../common/expect";
import { parseLabelList, parseNumberList } from "../../common/labels";
import { number, quotedString, skipSpaces, skipWhitespace, tag, takeUntilAny } from "../../common/tokens";
import { type ChartConfig, ChartType, type Parsed } from "../../types";
import type { Series, SeriesKind, XAxis, XYChart, YAxis } from "./types";

const errors = new DialectErrors("xychart", ChartType.XY_CHART);

/** `[label, ...]` including both brackets */
function bracketedLabels(input: string, what: string): Parsed<string[]> {
	const open = errors.required(tag(input, "["), `'[' before ${what}`, input);
	const list = errors.required(parseLabelList(open.rest), what, open.rest);
	const close = errors.required(tag(list.rest, "]"), `']' after ${what}`, list.rest);
	return { value: list.value, rest: close.rest };
}

function parseXAxis(input: string): Parsed<XAxis> {
	const keyword = errors.required(tag(input, "x-axis"), "'x-axis'", input);
	const labels = bracketedLabels(skipSpaces(keyword.rest), "x-axis labels");
	return { value: { labels: labels.value }, rest: labels.rest };
}

/** `y-axis "<title>" <min> --> <max>` */
function parseYAxis(input: string): Parsed<YAxis> {
	const keyword = errors.required(tag(input, "y-axis"), "'y-axis'", input);
	let rest = skipSpaces(keyword.rest);

	const title = errors.required(quotedString(rest), "quoted y-axis title", rest);
	rest = skipSpaces(title.rest);
	const min = errors.required(number(rest), "y-axis minimum", rest);
	rest = skipSpaces(min.rest);
	const arrow = errors.required(tag(rest, "-->"), "'-->'", rest);
	rest = skipSpaces(arrow.rest);
	const max = errors.required(number(rest), "y-axis maximum", rest);

	return { value: { title: title.value, min: min.value, max: max.value }, rest: max.rest };
}

function seriesKind(keyword: string): SeriesKind {
	return keyword === "line" ? "line" : "bar";
}

/** `<keyword> [<number>, ...]`; unknown keywords are bar series */
function parseSeries(input: string): Parsed<Series> {
	const keyword = takeUntilAny(input, [" ", "\t", "[", "\r", "\n"]);
	let rest = skipSpaces(keyword.rest);

	const open = errors.required(tag(rest, "["), "'[' before series values", rest);
	const values = errors.required(parseNumberList(open.rest), "series values", open.rest);
	rest = errors.required(tag(values.rest, "]"), "']' after series values", values.rest).rest;

	return { value: { kind: seriesKind(keyword.value.trim()), data: values.value }, rest };
}

/**
 * Parse an XY chart starting at the `xychart-beta` keyword.
 *
 * ```
 * xychart-beta
 *   title "Days in review"
 *   legend [Before, After]
 *   x-axis [A-1, A-2, "B, C"]
 *   y-axis "Days" 0 --> 10
 *   bar [2, 4, 6]
 *   line [1, 3.5, 5]
 * ```
 */
export function parseXYChart(input: string, config?: ChartConfig): XYChart {
	const keyword = errors.required(tag(input, ChartKeywords.XY_CHART), `'${ChartKeywords.XY_CHART}'`, input);
	let rest = skipWhitespace(keyword.rest);

	let title: string | undefined;
	const titleTag = tag(rest, "title ");
	if (titleTag) {
		const value = errors.required(quotedString(titleTag.rest), "quoted title", titleTag.rest);
		title = value.value;
		rest = skipWhitespace(value.rest);
	}

	let legend: string[] | undefined;
	const legendTag = tag(rest, "legend");
	if (legendTag) {
		const labels = bracketedLabels(skipSpaces(legendTag.rest), "legend labels");
		legend = labels.value;
		rest = skipWhitespace(labels.rest);
	}

	const xAxis = parseXAxis(rest);
	rest = skipWhitespace(xAxis.rest);
	const yAxis = parseYAxis(rest);
	rest = skipWhitespace(yAxis.rest);

	// Every remaining line must be a series, so nothing can trail the body.
	const series: Series[] = [];
	while (rest.length > 0) {
		const next = parseSeries(rest);
		series.push(next.value);
		rest = skipWhitespace(next.rest);
	}

	return {
		type: ChartType.XY_CHART,
		config,
		title,
		legend,
		xAxis: xAxis.value,
		yAxis: yAxis.value,
		series,
	};
}
