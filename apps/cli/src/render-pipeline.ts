import { readFile, writeFile } from "node:fs/promises";
import { CLIErrors, RenderPhase } from "@chartscript/constants";
import { renderChart } from "@chartscript/diagram-svg";
import type { AppLogObj, Logger } from "@chartscript/logger";
import { ChartParseError, ChartValidationError, type ChartType, parseChart } from "@chartscript/parser";
import type { RenderConfig } from "./types";

/**
 * Error that occurred while turning one chart file into SVG.
 */
export interface RenderError {
    phase: RenderPhase;
    path: string;
    message: string;
    /**
     * `PARSE_ERROR`, `UNKNOWN_CHART_TYPE`, `VALIDATION_ERROR`, or a system
     * error code such as `ENOENT` for read and write failures.
     */
    code: string;
}

export interface RenderResult {
    input: string;
    output: string;
    chartType?: ChartType;
    width?: number;
    height?: number;
    bytesWritten: number;
    errors: RenderError[];
}

/**
 * Pipeline contract for injectable pipeline implementations.
 */
export interface Pipeline {
    run(config: RenderConfig, logger: Logger<AppLogObj>): Promise<RenderResult>;
}

function systemCode(error: unknown): string {
    if (error instanceof Error && "code" in error && typeof error.code === "string") {
        return error.code;
    }
    return "EIO";
}

function reason(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
}

/**
 * Reads a chart file, renders it and writes the SVG:
 * read → parse (config header, detection, dialect, validation) → layout → write.
 */
export class RenderPipeline implements Pipeline {
    async run(config: RenderConfig, logger: Logger<AppLogObj>): Promise<RenderResult> {
        const result: RenderResult = {
            input: config.input,
            output: config.output,
            bytesWritten: 0,
            errors: [],
        };

        let source: string;
        try {
            source = await readFile(config.input, "utf-8");
        } catch (error) {
            result.errors.push({
                phase: RenderPhase.READ,
                path: config.input,
                message: CLIErrors.READ_FAILED(config.input, reason(error)),
                code: systemCode(error),
            });
            return result;
        }
        logger.debug("Chart source read", { file: config.input, count: source.length });

        let svg: string;
        try {
            const chart = parseChart(source, logger);
            const rendered = renderChart(chart, {
                width: config.width,
                height: config.height,
                fontFamily: config.font,
                logger,
            });
            result.chartType = chart.type;
            result.width = rendered.width;
            result.height = rendered.height;
            svg = rendered.svg;
        } catch (error) {
            if (error instanceof ChartParseError) {
                result.errors.push({ phase: RenderPhase.PARSE, path: config.input, message: error.message, code: error.code });
                return result;
            }
            if (error instanceof ChartValidationError) {
                result.errors.push({ phase: RenderPhase.VALIDATE, path: config.input, message: error.message, code: error.code });
                return result;
            }
            throw error;
        }

        try {
            await writeFile(config.output, svg, "utf-8");
        } catch (error) {
            result.errors.push({
                phase: RenderPhase.WRITE,
                path: config.output,
                message: CLIErrors.WRITE_FAILED(config.output, reason(error)),
                code: systemCode(error),
            });
            return result;
        }
        result.bytesWritten = Buffer.byteLength(svg, "utf-8");
        logger.debug("SVG written", { file: config.output, count: result.bytesWritten });

        return result;
    }
}
