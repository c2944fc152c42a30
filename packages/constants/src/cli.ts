export const CLIErrors = {
	MISSING_SUBCOMMAND: "Missing subcommand. Usage: chartscript render <input>",
	CONFLICTING_FLAGS:
		"Conflicting flags: --verbose and --quiet cannot be used together",
	NOT_SVG: (path: string) =>
		`Unsupported output file: "${path}". Expected .svg extension`,
	INVALID_DIMENSION: "must be a positive integer",
	READ_FAILED: (path: string, reason: string) =>
		`Failed to read input file "${path}": ${reason}`,
	WRITE_FAILED: (path: string, reason: string) =>
		`Failed to write SVG file "${path}": ${reason}`,
} as const;

export const CLIDescriptions = {
	PROGRAM: "Render pie, XY and work-item movement charts from text to SVG",
	RENDER: "Parse a chart file and write it as SVG",
} as const;
