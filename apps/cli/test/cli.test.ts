import { mkdtemp, readFile, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import type { AppLogObj, Logger } from "@chartscript/logger";
import { RenderPhase } from "@chartscript/constants";
import { afterAll, afterEach, beforeAll, beforeEach, describe, expect, it, type MockInstance, vi } from "vitest";
import { CLI, defaultOutputPath } from "../src/cli";
import { type Pipeline, RenderPipeline, type RenderResult } from "../src/render-pipeline";
import { ExitCode, type RenderConfig } from "../src/types";

/**
 * Records the config it receives and returns a canned result.
 */
class StubPipeline implements Pipeline {
    configs: RenderConfig[] = [];

    constructor(private readonly result: Partial<RenderResult> = {}) {}

    async run(config: RenderConfig, _logger: Logger<AppLogObj>): Promise<RenderResult> {
        this.configs.push(config);
        return { input: config.input, output: config.output, bytesWritten: 0, errors: [], ...this.result };
    }
}

describe("CLI", () => {
    let testDir: string;
    let logSpy: MockInstance<typeof console.log>;
    let consoleLogs: string[];

    beforeAll(async () => {
        testDir = await mkdtemp(join(tmpdir(), "chartscript-cli-"));
        await writeFile(join(testDir, "pets.chart"), 'pie\n"A": 1\n');
        await writeFile(join(testDir, "broken.chart"), 'pie\n"A" 1\n');
        await writeFile(join(testDir, "unknown.chart"), "gantt\n");
        await writeFile(
            join(testDir, "moves.chart"),
            "work-item-movement\ncolumns [Todo, Done]\nAB-1 Todo: 1 -> Review: 2\n",
        );
        await writeFile(join(testDir, "narrow.json"), JSON.stringify({ width: 640 }));
    });

    afterAll(async () => {
        await rm(testDir, { recursive: true, force: true });
    });

    beforeEach(() => {
        consoleLogs = [];
        logSpy = vi.spyOn(console, "log").mockImplementation((...args: unknown[]) => {
            consoleLogs.push(args.map(String).join(" "));
        });
    });

    afterEach(() => {
        logSpy.mockRestore();
    });

    // ============================================================
    // Feature: Help and Version
    // ============================================================

    describe("Help and Version", () => {
        it("should return SUCCESS for --help", async () => {
            const exitCode = await new CLI(new StubPipeline()).run(["--help"]);
            expect(exitCode).toBe(ExitCode.SUCCESS);
            expect(consoleLogs.some((line) => line.includes("Usage: chartscript"))).toBe(true);
        });

        it("should print the version for --version", async () => {
            const exitCode = await new CLI(new StubPipeline()).run(["--version"]);
            expect(exitCode).toBe(ExitCode.SUCCESS);
            expect(consoleLogs).toContain("0.1.0");
        });
    });

    // ============================================================
    // Feature: Exit Codes
    // ============================================================

    describe("Exit Codes", () => {
        it("should return SUCCESS and write the SVG beside the input", async () => {
            const input = join(testDir, "pets.chart");
            const exitCode = await new CLI(new RenderPipeline()).run(["render", input, "--no-config", "--quiet"]);

            expect(exitCode).toBe(ExitCode.SUCCESS);
            const svg = await readFile(join(testDir, "pets.svg"), "utf-8");
            expect(svg.startsWith("<svg")).toBe(true);
            expect(svg).toContain("A [1]");
        });

        it("should return PARSE_ERROR for a malformed chart", async () => {
            const input = join(testDir, "broken.chart");
            const exitCode = await new CLI(new RenderPipeline()).run(["render", input, "--no-config", "--quiet"]);
            expect(exitCode).toBe(ExitCode.PARSE_ERROR);
        });

        it("should return PARSE_ERROR for an unknown chart type", async () => {
            const input = join(testDir, "unknown.chart");
            const exitCode = await new CLI(new RenderPipeline()).run(["render", input, "--no-config", "--quiet"]);
            expect(exitCode).toBe(ExitCode.PARSE_ERROR);
        });

        it("should return VALIDATION_ERROR for a state that is not a column", async () => {
            const input = join(testDir, "moves.chart");
            const exitCode = await new CLI(new RenderPipeline()).run(["render", input, "--no-config", "--quiet"]);
            expect(exitCode).toBe(ExitCode.VALIDATION_ERROR);
        });

        it("should return IO_ERROR when the input does not exist", async () => {
            const input = join(testDir, "missing.chart");
            const exitCode = await new CLI(new RenderPipeline()).run(["render", input, "--no-config", "--quiet"]);
            expect(exitCode).toBe(ExitCode.IO_ERROR);
        });

        it("should return IO_ERROR when the output cannot be written", async () => {
            const input = join(testDir, "pets.chart");
            const output = join(testDir, "no-such-dir", "pets.svg");
            const exitCode = await new CLI(new RenderPipeline()).run([
                "render", input, "-o", output, "--no-config", "--quiet",
            ]);
            expect(exitCode).toBe(ExitCode.IO_ERROR);
        });

        it("should return CONFIG_ERROR for unknown flags", async () => {
            const exitCode = await new CLI(new StubPipeline()).run(["render", "pets.chart", "--colour"]);
            expect(exitCode).toBe(ExitCode.CONFIG_ERROR);
        });

        it("should return CONFIG_ERROR for a non-SVG output", async () => {
            const pipeline = new StubPipeline();
            const exitCode = await new CLI(pipeline).run(["render", "pets.chart", "-o", "pets.png", "--no-config", "-q"]);
            expect(exitCode).toBe(ExitCode.CONFIG_ERROR);
            expect(pipeline.configs).toHaveLength(0);
        });

        it("should return CONFIG_ERROR for a missing --config file", async () => {
            const exitCode = await new CLI(new StubPipeline()).run([
                "render", "pets.chart", "--config", join(testDir, "absent.json"), "-q",
            ]);
            expect(exitCode).toBe(ExitCode.CONFIG_ERROR);
        });

        it("should map the first pipeline error to its exit code", async () => {
            const pipeline = new StubPipeline({
                errors: [{ phase: RenderPhase.VALIDATE, path: "x.chart", message: "bad column", code: "VALIDATION_ERROR" }],
            });
            const exitCode = await new CLI(pipeline).run(["render", "x.chart", "--no-config", "-q"]);
            expect(exitCode).toBe(ExitCode.VALIDATION_ERROR);
        });
    });

    // ============================================================
    // Feature: Configuration
    // ============================================================

    describe("Configuration", () => {
        it("should pass CLI sizes and the default output to the pipeline", async () => {
            const pipeline = new StubPipeline();
            await new CLI(pipeline).run(["render", "charts/pets.chart", "-w", "500", "--font", "Test Sans", "--no-config", "-q"]);

            expect(pipeline.configs).toEqual([
                { input: "charts/pets.chart", output: join("charts", "pets.svg"), width: 500, height: undefined, font: "Test Sans" },
            ]);
        });

        it("should apply the width from --config", async () => {
            const input = join(testDir, "pets.chart");
            const output = join(testDir, "narrow.svg");
            const exitCode = await new CLI(new RenderPipeline()).run([
                "render", input, "-o", output, "--config", join(testDir, "narrow.json"), "-q",
            ]);

            expect(exitCode).toBe(ExitCode.SUCCESS);
            expect(await readFile(output, "utf-8")).toContain("max-width: 640px");
        });

        it("should let --width override the config file", async () => {
            const pipeline = new StubPipeline();
            await new CLI(pipeline).run(["render", "pets.chart", "--config", join(testDir, "narrow.json"), "-w", "700", "-q"]);

            expect(pipeline.configs[0]?.width).toBe(700);
        });
    });

    // ============================================================
    // Feature: Output Modes
    // ============================================================

    describe("Output Modes", () => {
        it("should print a JSON completion line in --json mode", async () => {
            const input = join(testDir, "pets.chart");
            const output = join(testDir, "json.svg");
            await new CLI(new RenderPipeline()).run(["render", input, "-o", output, "--no-config", "--json"]);

            const line = consoleLogs.find((entry) => entry.includes('"type":"complete"'));
            expect(line).toBeDefined();
            expect(JSON.parse(line ?? "{}")).toMatchObject({
                type: "complete",
                input,
                output,
                chartType: "pie",
                width: 800,
                height: 600,
            });
        });

        it("should print a summary in normal mode", async () => {
            const pipeline = new StubPipeline({ chartType: undefined, width: 800, height: 600 });
            await new CLI(pipeline).run(["render", "pets.chart", "--no-config"]);

            expect(consoleLogs).toContain("Rendered chart (800x600) to pets.svg");
        });
    });
});

describe("defaultOutputPath", () => {
    it("should replace the extension with .svg", () => {
        expect(defaultOutputPath(join("charts", "pets.chart"))).toBe(join("charts", "pets.svg"));
    });

    it("should append .svg to a path without extension", () => {
        expect(defaultOutputPath("pets")).toBe("pets.svg");
    });
});
