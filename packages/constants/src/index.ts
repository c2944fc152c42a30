export { ChartKeywords, ConfigHeader, ParserErrors } from "./chart";
export { RenderPhase, RenderPhaseLabels } from "./pipeline";
export { CLIErrors, CLIDescriptions } from "./cli";
