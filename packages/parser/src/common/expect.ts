import { ParserErrors } from "@chartscript/constants";
import { ChartParseError } from "../errors";
import type { ChartType, Parsed } from "../types";
import { skipWhitespace } from "./tokens";

/**
 * Failure reporting bound to one dialect, so parsers can write
 * `required(tag(rest, "x-axis"), "'x-axis'", rest)`.
 */
export class DialectErrors {
	constructor(
		private readonly dialect: string,
		private readonly chartType: ChartType,
	) {}

	expected(what: string, at: string): ChartParseError {
		return new ChartParseError(ParserErrors.EXPECTED(what, this.dialect), at, this.chartType);
	}

	required<T>(result: Parsed<T> | undefined, what: string, at: string): Parsed<T> {
		if (!result) {
			throw this.expected(what, at);
		}
		return result;
	}

	/**
	 * Only whitespace may follow a chart body.
	 */
	ensureEnd(rest: string): void {
		const remaining = skipWhitespace(rest);
		if (remaining.length > 0) {
			throw new ChartParseError(ParserErrors.TRAILING_INPUT(this.dialect), remaining, this.chartType);
		}
	}
}
