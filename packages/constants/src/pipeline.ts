/**
 * Stages a chart passes through from source text to SVG.
 */
export enum RenderPhase {
	READ = "read",
	PREPROCESS = "preprocess",
	DETECT = "detect",
	PARSE = "parse",
	VALIDATE = "validate",
	LAYOUT = "layout",
	SERIALIZE = "serialize",
	WRITE = "write",
}

/**
 * Human-readable labels for each phase, used in log messages.
 */
export const RenderPhaseLabels: Record<RenderPhase, string> = {
	[RenderPhase.READ]: "Read",
	[RenderPhase.PREPROCESS]: "Config header",
	[RenderPhase.DETECT]: "Chart type detection",
	[RenderPhase.PARSE]: "Parse",
	[RenderPhase.VALIDATE]: "Validate",
	[RenderPhase.LAYOUT]: "Layout",
	[RenderPhase.SERIALIZE]: "Serialize",
	[RenderPhase.WRITE]: "Write",
};
