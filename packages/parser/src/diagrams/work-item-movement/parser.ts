import { ChartKeywords } from "@chartscript/constants";
import { DialectErrors } from "../../common/expect";
import { parseLabelList } from "../../common/labels";
import { integer, quotedString, skipSpaces, skipWhitespace, tag, takeUntilAny } from "../../common/tokens";
import { type ChartConfig, ChartType, type Parsed } from "../../types";
import type { WorkItem, WorkItemMovement } from "./types";

const errors = new DialectErrors("work item movement chart", ChartType.WORK_ITEM_MOVEMENT);

const ITEM_ID_PATTERN = /^\p{L}+-\d+/u;

function parseColumns(input: string): Parsed<string[]> {
	const keyword = errors.required(tag(input, "columns"), "'columns'", input);
	const afterKeyword = skipSpaces(keyword.rest);
	const open = errors.required(tag(afterKeyword, "["), "'[' before column names", afterKeyword);
	const list = errors.required(parseLabelList(open.rest), "column names", open.rest);
	const close = errors.required(tag(list.rest, "]"), "']' after column names", list.rest);
	return { value: list.value, rest: close.rest };
}

/** `<state>: <points>`, where the state is the rest of the line before `:` */
function parseStatePoints(input: string): Parsed<[state: string, points: number]> {
	const state = takeUntilAny(input, [":", "\n"]);
	const colon = errors.required(tag(state.rest, ":"), "':' after state", state.rest);
	const afterColon = skipSpaces(colon.rest);
	const points = errors.required(integer(afterColon), "story points", afterColon);
	return { value: [state.value.trim(), points.value], rest: points.rest };
}

/** `<ID> <state>: <points> -> <state>: <points>` */
function parseItem(input: string): Parsed<WorkItem> {
	const id = ITEM_ID_PATTERN.exec(input);
	if (!id) {
		throw errors.expected("work item id such as ABC-123", input);
	}

	const from = parseStatePoints(skipSpaces(input.slice(id[0].length)));
	const afterFrom = skipSpaces(from.rest);
	const arrow = errors.required(tag(afterFrom, "->"), "'->'", afterFrom);
	const to = parseStatePoints(skipSpaces(arrow.rest));

	const [fromState, fromPoints] = from.value;
	const [toState, toPoints] = to.value;
	return { value: { id: id[0], fromState, fromPoints, toState, toPoints }, rest: to.rest };
}

/**
 * Parse a work item movement chart starting at the `work-item-movement`
 * keyword.
 *
 * ```
 * work-item-movement
 *   title 'Sprint 12'
 *   columns [To Do, In Progress, Done]
 *   NP-1 To Do: 3 -> Done: 5
 * ```
 *
 * Column references are not checked here; see `validateWorkItemMovement`.
 */
export function parseWorkItemMovement(input: string, config?: ChartConfig): WorkItemMovement {
	const keyword = errors.required(
		tag(input, ChartKeywords.WORK_ITEM_MOVEMENT),
		`'${ChartKeywords.WORK_ITEM_MOVEMENT}'`,
		input,
	);
	let rest = skipWhitespace(keyword.rest);

	let title: string | undefined;
	const titleTag = tag(rest, "title");
	if (titleTag) {
		const afterTitle = skipSpaces(titleTag.rest);
		const value = errors.required(quotedString(afterTitle), "quoted title", afterTitle);
		title = value.value;
		rest = skipWhitespace(value.rest);
	}

	const columns = parseColumns(rest);
	rest = skipWhitespace(columns.rest);

	const items: WorkItem[] = [];
	while (rest.length > 0) {
		const item = parseItem(rest);
		items.push(item.value);
		rest = skipWhitespace(item.rest);
	}

	return { type: ChartType.WORK_ITEM_MOVEMENT, config, title, columns: columns.value, items };
}
