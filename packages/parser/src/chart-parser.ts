import { RenderPhase, RenderPhaseLabels } from "@chartscript/constants";
import type { AppLogObj, Logger } from "@chartscript/logger";
import { ChartTypeDetector } from "./chart-detection/detector";
import { ConfigPreprocessor } from "./config/preprocessor";
import { parsePieChart } from "./diagrams/pie/parser";
import { parseWorkItemMovement } from "./diagrams/work-item-movement/parser";
import { validateWorkItemMovement } from "./diagrams/work-item-movement/validation/validator";
import { parseXYChart } from "./diagrams/xychart/parser";
import { validateXYChart } from "./diagrams/xychart/validator";
import type { ChartDocument } from "./document";
import { ChartType } from "./types";

/**
 * ChartParser runs the header preprocessor, the dialect detector, the dialect
 * parser and the dialect's validation, in that order.
 */
export class ChartParser {
	private readonly preprocessor = new ConfigPreprocessor();
	private readonly detector = new ChartTypeDetector();

	/**
	 * @throws ChartParseError when the text matches no dialect grammar
	 * @throws ChartValidationError when the parsed chart is inconsistent
	 */
	parse(text: string, logger?: Logger<AppLogObj>): ChartDocument {
		const { config, rest } = this.preprocessor.preprocess(text, logger);
		if (config) {
			logger?.debug(`${RenderPhaseLabels[RenderPhase.PREPROCESS]} read`, {
				theme: config.theme,
				count: config.themeVariables.size,
			});
		}

		const detected = this.detector.detect(rest);
		logger?.debug(`${RenderPhaseLabels[RenderPhase.DETECT]} done`, { chartType: detected.chartType });

		const chart = this.parseDialect(detected.chartType, detected.rest, config);
		this.validate(chart);
		return chart;
	}

	private parseDialect(
		chartType: ChartType,
		body: string,
		config: ChartDocument["config"],
	): ChartDocument {
		switch (chartType) {
			case ChartType.PIE:
				return parsePieChart(body, config);
			case ChartType.XY_CHART:
				return parseXYChart(body, config);
			case ChartType.WORK_ITEM_MOVEMENT:
				return parseWorkItemMovement(body, config);
		}
	}

	private validate(chart: ChartDocument): void {
		switch (chart.type) {
			case ChartType.XY_CHART:
				validateXYChart(chart);
				break;
			case ChartType.WORK_ITEM_MOVEMENT:
				validateWorkItemMovement(chart);
				break;
			case ChartType.PIE:
				break;
		}
	}
}

/**
 * Parse and validate chart source text.
 */
export function parseChart(text: string, logger?: Logger<AppLogObj>): ChartDocument {
	return new ChartParser().parse(text, logger);
}
