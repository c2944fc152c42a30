/**
 * CLI subcommand identifying which operation to perform.
 */
export enum Command {
    RENDER = "render",
}

/**
 * Exit codes for CLI process.
 */
export enum ExitCode {
    SUCCESS = 0,
    PARSE_ERROR = 1,
    CONFIG_ERROR = 2,
    VALIDATION_ERROR = 3,
    IO_ERROR = 4,
}

/**
 * Parsed CLI arguments.
 */
export interface RenderOptions {
    command: Command;
    input: string;
    output?: string;
    width?: number;
    height?: number;
    font?: string;
    configPath?: string;
    verbose: boolean;
    quiet: boolean;
    json: boolean;
    noConfig: boolean;
    help: boolean;
    version: boolean;
}

/**
 * Render settings read from a config file. Unset keys keep the renderer's
 * defaults.
 */
export interface RenderSettings {
    width?: number;
    height?: number;
    font?: string;
}

/**
 * Everything the render pipeline needs for one chart file.
 */
export interface RenderConfig extends RenderSettings {
    input: string;
    output: string;
}

/**
 * Output mode for formatting.
 */
export type OutputMode = "normal" | "verbose" | "quiet" | "json";
