import { ChartKeywords } from "@chartscript/constants";
import { skipWhitespace } from "../common/tokens";
import { UnknownChartTypeError } from "../errors";
import { ChartType } from "../types";

export interface DetectedChart {
	chartType: ChartType;
	/** Source text starting at the dialect keyword */
	rest: string;
}

const DETECTION_ORDER: ReadonlyArray<[keyword: string, chartType: ChartType]> = [
	[ChartKeywords.WORK_ITEM_MOVEMENT, ChartType.WORK_ITEM_MOVEMENT],
	[ChartKeywords.XY_CHART, ChartType.XY_CHART],
	[ChartKeywords.PIE, ChartType.PIE],
];

/**
 * ChartTypeDetector picks the dialect from the leading keyword and hands the
 * text, keyword included, to the matching dialect parser.
 */
export class ChartTypeDetector {
	/**
	 * @throws UnknownChartTypeError when no keyword matches
	 */
	detect(input: string): DetectedChart {
		const start = skipWhitespace(input);

		for (const [keyword, chartType] of DETECTION_ORDER) {
			if (start.startsWith(keyword)) {
				return { chartType, rest: start };
			}
		}

		throw new UnknownChartTypeError(start);
	}
}
