import {
    Command as CommanderProgram,
    CommanderError,
    InvalidArgumentError,
} from "commander";
import { CLIDescriptions, CLIErrors } from "@chartscript/constants";
import { Command, type RenderOptions } from "./types";

const VERSION = "0.1.0";

/**
 * Parse and validate --width / --height values.
 */
function parseDimension(value: string): number {
    if (!/^\d+$/.test(value)) {
        throw new InvalidArgumentError(CLIErrors.INVALID_DIMENSION);
    }
    const n = Number.parseInt(value, 10);
    if (n < 1) {
        throw new InvalidArgumentError(CLIErrors.INVALID_DIMENSION);
    }
    return n;
}

/**
 * Create the commander program with all subcommands.
 */
export function createProgram(): CommanderProgram {
    const program = new CommanderProgram();
    program
        .name("chartscript")
        .description(CLIDescriptions.PROGRAM)
        .version(VERSION)
        .exitOverride()
        .configureOutput({
            writeOut: () => {},
            writeErr: () => {},
        });

    program
        .command("render")
        .description(CLIDescriptions.RENDER)
        .argument("<input>", "chart source file")
        .option("-o, --output <file>", "SVG file to write (default: input with .svg extension)")
        .option("-w, --width <px>", "canvas width", parseDimension)
        .option("-H, --height <px>", "canvas height", parseDimension)
        .option("--font <family>", "font family written into the SVG")
        .option("--config <path>", "use specific config file")
        .option("--no-config", "skip config file loading")
        .option("-v, --verbose", "show detailed output", false)
        .option("-q, --quiet", "show errors only", false)
        .option("--json", "output as JSON lines", false);

    return program;
}

function stringOption(opts: Record<string, unknown>, key: string): string | undefined {
    const value = opts[key];
    return typeof value === "string" ? value : undefined;
}

function numberOption(opts: Record<string, unknown>, key: string): number | undefined {
    const value = opts[key];
    return typeof value === "number" ? value : undefined;
}

function flag(opts: Record<string, unknown>, key: string): boolean {
    return opts[key] === true;
}

/**
 * Map commander-parsed options to our RenderOptions type.
 */
function buildRenderOptions(
    command: Command,
    input: string,
    opts: Record<string, unknown>,
): RenderOptions {
    // Post-parse validation: conflicting flags
    if (flag(opts, "verbose") && flag(opts, "quiet")) {
        throw new Error(CLIErrors.CONFLICTING_FLAGS);
    }

    return {
        command,
        input,
        output: stringOption(opts, "output"),
        width: numberOption(opts, "width"),
        height: numberOption(opts, "height"),
        font: stringOption(opts, "font"),
        configPath: stringOption(opts, "config"),
        verbose: flag(opts, "verbose"),
        quiet: flag(opts, "quiet"),
        json: flag(opts, "json"),
        noConfig: opts.config === false,
        help: false,
        version: false,
    };
}

function metaOptions(help: boolean, version: boolean): RenderOptions {
    return {
        command: Command.RENDER,
        input: "",
        verbose: false,
        quiet: false,
        json: false,
        noConfig: false,
        help,
        version,
    };
}

/**
 * Parse CLI arguments into RenderOptions using commander.
 *
 * @param args - Command-line arguments (without program name)
 * @throws Error if unknown flag, missing value, or invalid subcommand
 */
export function parseArgs(args: string[]): RenderOptions {
    const program = createProgram();

    let result: RenderOptions | undefined;

    for (const cmd of program.commands) {
        if (cmd.name() !== Command.RENDER) continue;

        cmd.action((input: string, opts: Record<string, unknown>) => {
            result = buildRenderOptions(Command.RENDER, input, opts);
        });
    }

    try {
        program.parse(args, { from: "user" });
    } catch (err) {
        if (err instanceof CommanderError) {
            switch (err.code) {
                case "commander.helpDisplayed":
                    return metaOptions(true, false);
                case "commander.version":
                    return metaOptions(false, true);
                // No subcommand: commander shows the help as an error
                case "commander.help":
                    throw new Error(CLIErrors.MISSING_SUBCOMMAND);
            }
            // Map commander error messages to our format
            throw new Error(err.message.replace(/^error: /, ""));
        }
        throw err;
    }

    if (!result) {
        throw new Error(CLIErrors.MISSING_SUBCOMMAND);
    }

    return result;
}
