import { describe, expect, it } from "vitest";
import {
	integer,
	number,
	quotedString,
	restOfLine,
	skipSpaces,
	skipWhitespace,
	tag,
	takeUntilAny,
} from "../../src/common/tokens";
import { parseLabel, parseLabelList, parseNumberList } from "../../src/common/labels";

describe("Token utilities", () => {
	describe("Feature: Whitespace", () => {
		it("should skip spaces, tabs and newlines", () => {
			expect(skipWhitespace(" \t\r\n pie")).toBe("pie");
		});

		it("should stop skipSpaces at a newline", () => {
			expect(skipSpaces(" \t\nbar")).toBe("\nbar");
		});
	});

	describe("Feature: Literals", () => {
		it("should match a tag and return the rest", () => {
			expect(tag("x-axis [a]", "x-axis")).toEqual({ value: "x-axis", rest: " [a]" });
		});

		it("should return undefined when the tag is absent", () => {
			expect(tag("y-axis", "x-axis")).toBeUndefined();
		});
	});

	describe("Feature: Quoted strings", () => {
		it("should read double-quoted text verbatim", () => {
			expect(quotedString('"A, {B}" rest')).toEqual({ value: "A, {B}", rest: " rest" });
		});

		it("should read single-quoted text containing double quotes", () => {
			expect(quotedString(`'say "hi"':`)).toEqual({ value: 'say "hi"', rest: ":" });
		});

		it("should fail on an unterminated quote", () => {
			expect(quotedString('"open')).toBeUndefined();
		});

		it("should fail when no quote starts the input", () => {
			expect(quotedString("plain")).toBeUndefined();
		});
	});

	describe("Feature: Numbers", () => {
		it("should parse negative decimals", () => {
			expect(number("-12.5]")).toEqual({ value: -12.5, rest: "]" });
		});

		it("should leave a trailing dot without digits", () => {
			expect(number("3.x")).toEqual({ value: 3, rest: ".x" });
		});

		it("should reject a sign in integers", () => {
			expect(integer("-3")).toBeUndefined();
			expect(integer("42 pts")).toEqual({ value: 42, rest: " pts" });
		});

		it("should not match digit runs beyond double range", () => {
			const huge = "9".repeat(400);

			expect(number(huge)).toBeUndefined();
			expect(number(`-${huge}`)).toBeUndefined();
			expect(integer(huge)).toBeUndefined();
		});
	});

	describe("Feature: Take until", () => {
		it("should stop at the first stop character", () => {
			expect(takeUntilAny("bar [1]", [" ", "["])).toEqual({ value: "bar", rest: " [1]" });
		});

		it("should take the whole input when no stop occurs", () => {
			expect(takeUntilAny("line", [","])).toEqual({ value: "line", rest: "" });
		});

		it("should read to the end of the line", () => {
			expect(restOfLine("Sales\nnext")).toEqual({ value: "Sales", rest: "\nnext" });
		});
	});

	describe("Feature: Labels", () => {
		it("should trim bare labels", () => {
			expect(parseLabel("  Simple Label , next")).toEqual({ value: "Simple Label", rest: ", next" });
		});

		it("should parse a mixed label list up to the bracket", () => {
			const result = parseLabelList(`"A,B", 'C,D', Simple, "Another, Label"]`);

			expect(result).toEqual({ value: ["A,B", "C,D", "Simple", "Another, Label"], rest: "]" });
		});

		it("should accept an empty list", () => {
			expect(parseLabelList(" ]")).toEqual({ value: [], rest: "]" });
		});

		it("should fail when a quoted label is followed by junk", () => {
			expect(parseLabelList(`"A" B]`)).toBeUndefined();
		});

		it("should fail when the bracket never closes", () => {
			expect(parseLabelList("A, B")).toBeUndefined();
		});
	});

	describe("Feature: Number lists", () => {
		it("should parse numbers with optional spaces around commas", () => {
			expect(parseNumberList("2 ,4,  8.5]")).toEqual({ value: [2, 4, 8.5], rest: "]" });
		});

		it("should accept an empty list", () => {
			expect(parseNumberList("]")).toEqual({ value: [], rest: "]" });
		});

		it("should fail on a non-numeric entry", () => {
			expect(parseNumberList("1, two]")).toBeUndefined();
		});
	});
});
