import type { RenderResult } from "./render-pipeline";
import type { OutputMode } from "./types";

/**
 * Reports render progress and formats output based on mode.
 */
export class ProgressReporter {
    private mode: OutputMode;

    constructor(mode: OutputMode = "normal") {
        this.mode = mode;
    }

    /**
     * Announce the file being rendered.
     */
    start(input: string): void {
        if (this.mode === "verbose") {
            console.log(`Rendering ${input}...`);
        } else if (this.mode === "json") {
            console.log(JSON.stringify({ type: "start", input }));
        }
    }

    /**
     * Display the completion summary.
     */
    complete(result: RenderResult): void {
        if (this.mode === "json") {
            console.log(JSON.stringify({
                type: "complete",
                input: result.input,
                output: result.output,
                chartType: result.chartType,
                width: result.width,
                height: result.height,
                bytesWritten: result.bytesWritten,
            }));
        } else if (this.mode !== "quiet") {
            console.log(this.formatRenderResult(result));
            if (this.mode === "verbose") {
                console.log(this.formatVerboseDetails(result));
            }
        }
    }

    formatRenderResult(result: RenderResult): string {
        return `Rendered ${result.chartType ?? "chart"} (${result.width ?? 0}x${result.height ?? 0}) to ${result.output}`;
    }

    private formatVerboseDetails(result: RenderResult): string {
        return [`  Input: ${result.input}`, `  Bytes written: ${result.bytesWritten}`].join("\n");
    }
}
