import type { Parsed } from "../types";

/**
 * Recognizers shared by every dialect.
 *
 * Each takes the remaining input and returns the matched value plus the input
 * after it, or `undefined` when the input does not start with a match.
 * None of them throw.
 */

const NUMBER_PATTERN = /^-?\d+(?:\.\d+)?/;
const INTEGER_PATTERN = /^\d+/;

/** Skip spaces, tabs, carriage returns and newlines. */
export function skipWhitespace(input: string): string {
	return input.replace(/^\s+/, "");
}

/** Skip spaces and tabs only, staying on the current line. */
export function skipSpaces(input: string): string {
	return input.replace(/^[ \t]+/, "");
}

export function tag(input: string, literal: string): Parsed<string> | undefined {
	if (!input.startsWith(literal)) {
		return undefined;
	}
	return { value: literal, rest: input.slice(literal.length) };
}

/**
 * Match `"..."` or `'...'`. Contents are taken verbatim up to the next
 * occurrence of the opening quote character; there are no escapes.
 */
export function quotedString(input: string): Parsed<string> | undefined {
	const quote = input[0];
	if (quote !== '"' && quote !== "'") {
		return undefined;
	}
	const end = input.indexOf(quote, 1);
	if (end === -1) {
		return undefined;
	}
	return { value: input.slice(1, end), rest: input.slice(end + 1) };
}

/**
 * Optional leading `-`, digits, optional `.` and digits. Digit runs too long
 * for a finite double do not match.
 */
export function number(input: string): Parsed<number> | undefined {
	const match = NUMBER_PATTERN.exec(input);
	if (!match) {
		return undefined;
	}
	const value = Number.parseFloat(match[0]);
	if (!Number.isFinite(value)) {
		return undefined;
	}
	return { value, rest: input.slice(match[0].length) };
}

/** A run of decimal digits that fits a finite double. */
export function integer(input: string): Parsed<number> | undefined {
	const match = INTEGER_PATTERN.exec(input);
	if (!match) {
		return undefined;
	}
	const value = Number.parseInt(match[0], 10);
	if (!Number.isFinite(value)) {
		return undefined;
	}
	return { value, rest: input.slice(match[0].length) };
}

/**
 * Take everything before the first character in `stops`, or the whole input
 * when none occurs. Always succeeds, possibly with an empty value.
 */
export function takeUntilAny(input: string, stops: readonly string[]): Parsed<string> {
	let end = 0;
	while (end < input.length && !stops.includes(input.charAt(end))) {
		end++;
	}
	return { value: input.slice(0, end), rest: input.slice(end) };
}

/**
 * Text up to (not including) the next newline, or the rest of the input.
 */
export function restOfLine(input: string): Parsed<string> {
	return takeUntilAny(input, ["\n"]);
}
