import type { Parsed } from "../types";
import { number, quotedString, skipSpaces, skipWhitespace, takeUntilAny } from "./tokens";

/**
 * Parse one label: double-quoted, single-quoted, or the bare text up to the
 * next `,` or `]` (trimmed). Quoted labels may contain commas.
 */
export function parseLabel(input: string): Parsed<string> {
	const start = skipWhitespace(input);
	const quoted = quotedString(start);
	if (quoted) {
		return quoted;
	}
	const bare = takeUntilAny(start, [",", "]"]);
	return { value: bare.value.trim(), rest: bare.rest };
}

/**
 * Parse `label (, label)*` up to the closing bracket, which is left in `rest`.
 * Returns `undefined` when something other than `,` or `]` follows a label
 * or the input ends before the bracket.
 */
export function parseLabelList(input: string): Parsed<string[]> | undefined {
	const labels: string[] = [];
	let remaining = skipWhitespace(input);

	while (!remaining.startsWith("]")) {
		if (remaining.length === 0) {
			return undefined;
		}
		const label = parseLabel(remaining);
		labels.push(label.value);
		remaining = skipWhitespace(label.rest);

		if (remaining.startsWith(",")) {
			remaining = skipWhitespace(remaining.slice(1));
		} else if (!remaining.startsWith("]")) {
			return undefined;
		}
	}

	return { value: labels, rest: remaining };
}

/**
 * Parse `number (, number)*` up to the closing bracket, which is left in `rest`.
 * An empty list is allowed.
 */
export function parseNumberList(input: string): Parsed<number[]> | undefined {
	const values: number[] = [];
	let remaining = skipSpaces(input);

	if (remaining.startsWith("]")) {
		return { value: values, rest: remaining };
	}

	for (;;) {
		const value = number(remaining);
		if (!value) {
			return undefined;
		}
		values.push(value.value);
		remaining = skipSpaces(value.rest);

		if (!remaining.startsWith(",")) {
			break;
		}
		remaining = skipSpaces(remaining.slice(1));
	}

	return remaining.startsWith("]") ? { value: values, rest: remaining } : undefined;
}
