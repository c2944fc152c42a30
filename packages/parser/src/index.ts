// Entry point
export { parseChart, ChartParser } from "./chart-parser";
export type { ChartDocument } from "./document";
export { ChartType } from "./types";
export type { ChartConfig, Parsed } from "./types";
export { ChartParseError, UnknownChartTypeError, ChartValidationError } from "./errors";

// Stages
export { ConfigPreprocessor } from "./config/preprocessor";
export type { PreprocessResult } from "./config/preprocessor";
export { parseObjectLiteral } from "./config/object-literal";
export type { ConfigObject, ConfigValue, ObjectLiteralResult } from "./config/object-literal";
export { flattenThemeVariables } from "./config/flatten";
export { ChartTypeDetector } from "./chart-detection/detector";
export type { DetectedChart } from "./chart-detection/detector";

// Token utilities
export {
	integer,
	number,
	quotedString,
	restOfLine,
	skipSpaces,
	skipWhitespace,
	tag,
	takeUntilAny,
} from "./common/tokens";
export { parseLabel, parseLabelList, parseNumberList } from "./common/labels";

// Dialects
export * from "./diagrams/pie";
export * from "./diagrams/xychart";
export * from "./diagrams/work-item-movement";
