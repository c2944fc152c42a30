import { basename, dirname, extname, join } from "node:path";
import { CLIErrors } from "@chartscript/constants";
import { createJsonLogger, createLogger, type LogMode } from "@chartscript/logger";
import { createProgram, parseArgs } from "./args";
import { ConfigLoader, DEFAULT_CONFIG } from "./config-loader";
import { ProgressReporter } from "./progress-reporter";
import type { Pipeline, RenderError } from "./render-pipeline";
import { ExitCode, type OutputMode, type RenderConfig, type RenderOptions, type RenderSettings } from "./types";

/**
 * The input path with its extension replaced by `.svg`.
 */
export function defaultOutputPath(input: string): string {
    return join(dirname(input), `${basename(input, extname(input))}.svg`);
}

/**
 * Main CLI class.
 */
export class CLI {
    private pipeline: Pipeline;

    constructor(pipeline: Pipeline) {
        this.pipeline = pipeline;
    }

    /**
     * Run CLI with given arguments.
     * @returns Exit code
     */
    async run(args: string[]): Promise<number> {
        // Default logger so argument errors are logged the same way
        let logger = createLogger("chartscript", "info");
        let options: RenderOptions;

        try {
            options = parseArgs(args);
        } catch (error) {
            logger.error(error instanceof Error ? error.message : String(error));
            return ExitCode.CONFIG_ERROR;
        }

        if (options.help) {
            console.log(createProgram().helpInformation());
            return ExitCode.SUCCESS;
        }

        if (options.version) {
            console.log(createProgram().version());
            return ExitCode.SUCCESS;
        }

        // Recreate logger with user's output mode
        const mode = this.getOutputMode(options);
        const LOG_MODE_MAP: Record<OutputMode, LogMode> = {
            quiet: "error",
            normal: "info",
            verbose: "debug",
            json: "debug",
        };
        logger = mode === "json"
            ? createJsonLogger("chartscript", LOG_MODE_MAP[mode])
            : createLogger("chartscript", LOG_MODE_MAP[mode]);

        let config: RenderConfig;
        try {
            config = await this.buildConfig(options);
        } catch (error) {
            logger.error(`Config error: ${error instanceof Error ? error.message : String(error)}`);
            return ExitCode.CONFIG_ERROR;
        }

        const reporter = new ProgressReporter(mode);
        reporter.start(config.input);

        const result = await this.pipeline.run(config, logger);

        if (result.errors.length > 0) {
            for (const err of result.errors) {
                logger.error(`[${err.phase}] ${err.path}: ${err.message}`, { code: err.code });
            }
            return this.getExitCode(result.errors);
        }

        reporter.complete(result);
        return ExitCode.SUCCESS;
    }

    /**
     * Build the render config: config file (unless --no-config), then CLI
     * flags on top.
     */
    async buildConfig(options: RenderOptions): Promise<RenderConfig> {
        let base: RenderSettings;

        if (options.noConfig) {
            base = { ...DEFAULT_CONFIG };
        } else {
            const configPath = options.configPath ?? ConfigLoader.findConfigFile();
            base = await ConfigLoader.load(configPath);
        }

        const merged = ConfigLoader.mergeWithCLI(base, {
            width: options.width,
            height: options.height,
            font: options.font,
        });

        const output = options.output ?? defaultOutputPath(options.input);
        if (extname(output).toLowerCase() !== ".svg") {
            throw new Error(CLIErrors.NOT_SVG(output));
        }

        return { ...merged, input: options.input, output };
    }

    private getOutputMode(options: RenderOptions): OutputMode {
        if (options.json) return "json";
        if (options.quiet) return "quiet";
        if (options.verbose) return "verbose";
        return "normal";
    }

    private getExitCode(errors: readonly RenderError[]): ExitCode {
        const code = errors[0]?.code;
        switch (code) {
            case "PARSE_ERROR":
            case "UNKNOWN_CHART_TYPE":
                return ExitCode.PARSE_ERROR;
            case "VALIDATION_ERROR":
                return ExitCode.VALIDATION_ERROR;
            default:
                return ExitCode.IO_ERROR;
        }
    }
}
