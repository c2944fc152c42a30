import { existsSync } from "node:fs";
import { readFile } from "node:fs/promises";
import { homedir } from "node:os";
import { dirname, join, resolve } from "node:path";
import type { RenderSettings } from "./types";

/**
 * Default built-in configuration: the renderer's own defaults apply.
 */
export const DEFAULT_CONFIG: RenderSettings = {};

/**
 * Config file search locations.
 */
const CONFIG_FILENAMES = ["chartscript.config.json", ".chartscript.json"];

export const CONFIG_ENV_VAR = "CHARTSCRIPT_CONFIG";

function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Loads and merges configuration from files and CLI options.
 */
export class ConfigLoader {
    /**
     * Find config file using priority order:
     * 1. CHARTSCRIPT_CONFIG env var
     * 2. Search up from startDir to git root
     * 3. User config (~/.config/chartscript/config.json)
     */
    static findConfigFile(
        startDir: string = process.cwd(),
        homeDir: string = homedir(),
    ): string | undefined {
        const envConfig = process.env[CONFIG_ENV_VAR];
        if (envConfig && existsSync(envConfig)) {
            return envConfig;
        }

        let currentDir = resolve(startDir);

        while (true) {
            for (const filename of CONFIG_FILENAMES) {
                const configPath = join(currentDir, filename);
                if (existsSync(configPath)) {
                    return configPath;
                }
            }

            if (existsSync(join(currentDir, ".git"))) {
                break;
            }

            const parentDir = dirname(currentDir);
            if (parentDir === currentDir) {
                break;
            }
            currentDir = parentDir;
        }

        const userConfig = join(homeDir, ".config", "chartscript", "config.json");
        if (existsSync(userConfig)) {
            return userConfig;
        }

        return undefined;
    }

    /**
     * Load configuration from file.
     * @throws Error if the file is not valid JSON or a setting has the wrong type
     */
    static async load(path?: string): Promise<RenderSettings> {
        if (!path) {
            return { ...DEFAULT_CONFIG };
        }

        const content = await readFile(path, "utf-8");
        let parsed: unknown;
        try {
            parsed = JSON.parse(content);
        } catch (error) {
            if (error instanceof SyntaxError) {
                throw new Error(`Invalid config file: parse error at ${path}`);
            }
            throw error;
        }

        if (!isRecord(parsed)) {
            throw new Error(`Invalid config file: expected an object at ${path}`);
        }
        return this.mergeWithDefaults(parsed, path);
    }

    /**
     * Merge user config with defaults.
     * Keys nested under `render` take priority over top-level ones.
     */
    private static mergeWithDefaults(
        userConfig: Record<string, unknown>,
        path: string,
    ): RenderSettings {
        const render = isRecord(userConfig.render) ? userConfig.render : {};
        const pick = (key: string): unknown => render[key] ?? userConfig[key];

        return {
            width: this.dimension(pick("width"), "width", path) ?? DEFAULT_CONFIG.width,
            height: this.dimension(pick("height"), "height", path) ?? DEFAULT_CONFIG.height,
            font: this.font(pick("font"), path) ?? DEFAULT_CONFIG.font,
        };
    }

    private static dimension(value: unknown, key: string, path: string): number | undefined {
        if (value === undefined) return undefined;
        if (typeof value !== "number" || !Number.isInteger(value) || value < 1) {
            throw new Error(`Invalid config file: "${key}" must be a positive integer at ${path}`);
        }
        return value;
    }

    private static font(value: unknown, path: string): string | undefined {
        if (value === undefined) return undefined;
        if (typeof value !== "string") {
            throw new Error(`Invalid config file: "font" must be a string at ${path}`);
        }
        return value;
    }

    /**
     * Merge base config with CLI options (CLI wins).
     */
    static mergeWithCLI(base: RenderSettings, cli: RenderSettings): RenderSettings {
        return {
            width: cli.width ?? base.width,
            height: cli.height ?? base.height,
            font: cli.font ?? base.font,
        };
    }
}
