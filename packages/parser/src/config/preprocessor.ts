import { ConfigHeader, RenderPhase } from "@chartscript/constants";
import type { AppLogObj, Logger } from "@chartscript/logger";
import { skipWhitespace } from "../common/tokens";
import type { ChartConfig } from "../types";
import { flattenThemeVariables } from "./flatten";
import { parseObjectLiteral } from "./object-literal";

const DEFAULT_THEME = "base";
const WIDTH_PATTERN = /^\d+$/;

export interface PreprocessResult {
	/** Parsed header, or `undefined` when the input has none */
	config?: ChartConfig;
	/** Input after the header (the whole input when there is no header) */
	rest: string;
}

/**
 * Reads the optional `%%{init: {...}}%%` header in front of a chart.
 *
 * Malformed entries inside the header are dropped and logged at debug level;
 * a header never causes a parse failure.
 */
export class ConfigPreprocessor {
	preprocess(input: string, logger?: Logger<AppLogObj>): PreprocessResult {
		const start = skipWhitespace(input);
		if (!start.startsWith(ConfigHeader.OPEN)) {
			return { rest: input };
		}

		const close = start.indexOf(ConfigHeader.CLOSE, ConfigHeader.OPEN.length);
		if (close === -1) {
			logger?.debug("Unterminated config header ignored", { phase: RenderPhase.PREPROCESS });
			return { rest: input };
		}

		const body = start.slice(ConfigHeader.OPEN.length, close);
		const config = this.buildConfig(body, logger);
		return { config, rest: start.slice(close + ConfigHeader.CLOSE.length) };
	}

	/**
	 * Build a config from the header body (the text between the delimiters).
	 */
	buildConfig(body: string, logger?: Logger<AppLogObj>): ChartConfig {
		const { value: root, dropped } = parseObjectLiteral(body);

		for (const fragment of dropped) {
			logger?.debug("Dropped config entry", { phase: RenderPhase.PREPROCESS, fragment });
		}

		const theme = root.get("theme");
		const width = root.get("width");
		const themeVariables = root.get("themeVariables");

		return {
			theme: typeof theme === "string" ? theme : DEFAULT_THEME,
			themeVariables:
				themeVariables instanceof Map ? flattenThemeVariables(themeVariables) : new Map<string, string>(),
			width: typeof width === "string" && WIDTH_PATTERN.test(width) ? Number.parseInt(width, 10) : undefined,
		};
	}
}
