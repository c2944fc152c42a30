import { describe, expect, it } from "vitest";
import { parseArgs } from "../src/args";
import { Command } from "../src/types";

describe("parseArgs", () => {
    // ============================================================
    // Feature: Subcommand Dispatch
    // ============================================================

    describe("Subcommand Dispatch", () => {
        it("should resolve render command with its input", () => {
            const result = parseArgs(["render", "charts/pets.chart"]);
            expect(result.command).toBe(Command.RENDER);
            expect(result.input).toBe("charts/pets.chart");
        });

        it("should throw for unknown subcommand", () => {
            expect(() => parseArgs(["draw", "pets.chart"])).toThrow("unknown command");
        });

        it("should throw when the input is missing", () => {
            expect(() => parseArgs(["render"])).toThrow("missing required argument 'input'");
        });

        it("should throw with usage when no subcommand is given", () => {
            expect(() => parseArgs([])).toThrow("Missing subcommand. Usage: chartscript render <input>");
        });

        it("should throw when only flags provided (no subcommand)", () => {
            expect(() => parseArgs(["--verbose"])).toThrow();
        });
    });

    // ============================================================
    // Feature: Output and Size
    // ============================================================

    describe("Output and Size", () => {
        it("should parse --output, --width, --height and --font", () => {
            const result = parseArgs([
                "render", "pets.chart",
                "-o", "out/pets.svg",
                "-w", "1024",
                "-H", "480",
                "--font", "Test Sans",
            ]);
            expect(result.output).toBe("out/pets.svg");
            expect(result.width).toBe(1024);
            expect(result.height).toBe(480);
            expect(result.font).toBe("Test Sans");
        });

        it("should leave unset sizes undefined", () => {
            const result = parseArgs(["render", "pets.chart"]);
            expect(result.output).toBeUndefined();
            expect(result.width).toBeUndefined();
            expect(result.height).toBeUndefined();
            expect(result.font).toBeUndefined();
        });

        it("should reject a width that is not a positive integer", () => {
            expect(() => parseArgs(["render", "pets.chart", "--width", "wide"])).toThrow("must be a positive integer");
            expect(() => parseArgs(["render", "pets.chart", "--width", "0"])).toThrow("must be a positive integer");
        });

        it("should reject a fractional height", () => {
            expect(() => parseArgs(["render", "pets.chart", "-H", "12.5"])).toThrow("must be a positive integer");
        });
    });

    // ============================================================
    // Feature: Boolean Flags
    // ============================================================

    describe("Boolean Flags", () => {
        it("should default every flag to false", () => {
            const result = parseArgs(["render", "pets.chart"]);
            expect(result.verbose).toBe(false);
            expect(result.quiet).toBe(false);
            expect(result.json).toBe(false);
            expect(result.noConfig).toBe(false);
        });

        it("should parse --verbose, --quiet and --json", () => {
            expect(parseArgs(["render", "pets.chart", "-v"]).verbose).toBe(true);
            expect(parseArgs(["render", "pets.chart", "-q"]).quiet).toBe(true);
            expect(parseArgs(["render", "pets.chart", "--json"]).json).toBe(true);
        });

        it("should reject --verbose together with --quiet", () => {
            expect(() => parseArgs(["render", "pets.chart", "-v", "-q"])).toThrow(
                "Conflicting flags: --verbose and --quiet cannot be used together",
            );
        });
    });

    // ============================================================
    // Feature: Config Flags
    // ============================================================

    describe("Config Flags", () => {
        it("should parse --config path", () => {
            const result = parseArgs(["render", "pets.chart", "--config", "settings.json"]);
            expect(result.configPath).toBe("settings.json");
            expect(result.noConfig).toBe(false);
        });

        it("should parse --no-config", () => {
            const result = parseArgs(["render", "pets.chart", "--no-config"]);
            expect(result.noConfig).toBe(true);
            expect(result.configPath).toBeUndefined();
        });
    });

    // ============================================================
    // Feature: Help and Version
    // ============================================================

    describe("Help and Version", () => {
        it("should return help flag for --help", () => {
            expect(parseArgs(["--help"]).help).toBe(true);
        });

        it("should return version flag for --version", () => {
            expect(parseArgs(["--version"]).version).toBe(true);
        });
    });
});
