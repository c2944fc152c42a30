import { ChartKeywords } from "@chartscript/constants";
import { DialectErrors } from "../../common/expect";
import { number, quotedString, restOfLine, skipSpaces, skipWhitespace, tag } from "../../common/tokens";
import { type ChartConfig, ChartType, type Parsed } from "../../types";
import type { PieChart, PieSlice } from "./types";

const errors = new DialectErrors("pie chart", ChartType.PIE);

/**
 * `"<label>": <number>`. Returns `undefined` when no quoted label starts the
 * input; a label that is not followed by a value is an error.
 */
function parseSlice(input: string): Parsed<PieSlice> | undefined {
	const label = quotedString(input);
	if (!label) {
		return undefined;
	}
	const colon = errors.required(tag(label.rest, ":"), "':' after slice label", label.rest);
	const afterColon = skipSpaces(colon.rest);
	const value = errors.required(number(afterColon), "slice value", afterColon);

	return { value: { label: label.value, value: value.value }, rest: value.rest };
}

/**
 * Parse a pie chart starting at the `pie` keyword.
 *
 * ```
 * pie showData title Story points
 *   "Done": 262
 *   "To Do": 129
 * ```
 */
export function parsePieChart(input: string, config?: ChartConfig): PieChart {
	const keyword = errors.required(tag(input, ChartKeywords.PIE), `'${ChartKeywords.PIE}'`, input);
	let rest = skipSpaces(keyword.rest);

	const showData = tag(rest, "showData");
	if (showData) {
		rest = skipSpaces(showData.rest);
	}

	let title: string | undefined;
	const titleTag = tag(rest, "title ");
	if (titleTag) {
		const line = restOfLine(titleTag.rest);
		title = line.value.trimEnd();
		rest = line.rest;
	}

	const data: PieSlice[] = [];
	rest = skipWhitespace(rest);
	for (let slice = parseSlice(rest); slice; slice = parseSlice(rest)) {
		data.push(slice.value);
		rest = skipWhitespace(slice.rest);
	}

	errors.ensureEnd(rest);

	return { type: ChartType.PIE, config, showData: showData !== undefined, title, data };
}
