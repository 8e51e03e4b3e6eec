import path from "path";
import fs from "fs/promises";
import yaml from "js-yaml";

import {
    ConfigError,
    MissingHomeError,
    errorMessage,
    isErrnoException,
} from "../utils/Error";

export const ROOT_DIR_NAME = ".rchidrun";
export const PLUGINS_DIR_NAME = "plugins";
export const SETTINGS_FILE_NAME = "config.yml";

/**
 * Process-wide locations, resolved once at startup and passed down
 */
export interface RchidrunConfig {
    home: string;
    rootDir: string;
    pluginsDir: string;
    settingsPath: string;
}

export interface RegistrySettings {
    /** Program that acquires registry packages */
    command: string;
    /** Its arguments; `{package}` and `{dir}` are substituted */
    args: string[];
}

export interface Settings {
    registry: RegistrySettings;
    download: { timeoutMs: number };
    prompt: { timeoutMs: number };
}

export const DEFAULT_SETTINGS: Settings = {
    registry: {
        command: "wasmer",
        args: ["install", "{package}", "--to", "{dir}"],
    },
    download: { timeoutMs: 0 },
    prompt: { timeoutMs: 0 },
};

/**
 * Derive every path from $HOME. Touches neither the disk nor the network,
 * so a missing home fails before anything else happens.
 */
export function resolveConfig(
    env: NodeJS.ProcessEnv = process.env,
): RchidrunConfig {
    const home = env.HOME;
    if (!home) {
        throw new MissingHomeError();
    }

    const rootDir = path.join(home, ROOT_DIR_NAME);
    return {
        home,
        rootDir,
        pluginsDir: path.join(rootDir, PLUGINS_DIR_NAME),
        settingsPath: path.join(rootDir, SETTINGS_FILE_NAME),
    };
}

/**
 * Read the optional settings file, falling back to defaults for anything
 * it leaves out
 */
export async function loadSettings(config: RchidrunConfig): Promise<Settings> {
    let content: string;
    try {
        content = await fs.readFile(config.settingsPath, "utf-8");
    } catch (e) {
        if (isErrnoException(e) && e.code === "ENOENT") {
            return DEFAULT_SETTINGS;
        }
        throw new ConfigError(config.settingsPath, errorMessage(e), e);
    }

    let raw: unknown;
    try {
        raw = yaml.load(content);
    } catch (e) {
        throw new ConfigError(config.settingsPath, errorMessage(e), e);
    }

    return parseSettings(raw, config.settingsPath);
}

export function parseSettings(raw: unknown, source: string): Settings {
    if (raw === undefined || raw === null) return DEFAULT_SETTINGS;
    if (!isRecord(raw)) {
        throw new ConfigError(source, "expected a mapping at the top level");
    }

    const registry = section(raw, "registry", source);
    const download = section(raw, "download", source);
    const prompt = section(raw, "prompt", source);

    return {
        registry: {
            command: stringField(
                registry,
                "command",
                DEFAULT_SETTINGS.registry.command,
                source,
            ),
            args: stringListField(
                registry,
                "args",
                DEFAULT_SETTINGS.registry.args,
                source,
            ),
        },
        download: {
            timeoutMs: timeoutField(
                download,
                DEFAULT_SETTINGS.download.timeoutMs,
                `${source} (download)`,
            ),
        },
        prompt: {
            timeoutMs: timeoutField(
                prompt,
                DEFAULT_SETTINGS.prompt.timeoutMs,
                `${source} (prompt)`,
            ),
        },
    };
}

function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === "object" && value !== null && !Array.isArray(value);
}

function section(
    raw: Record<string, unknown>,
    key: string,
    source: string,
): Record<string, unknown> {
    const value = raw[key];
    if (value === undefined || value === null) return {};
    if (!isRecord(value)) {
        throw new ConfigError(source, `'${key}' must be a mapping`);
    }
    return value;
}

function stringField(
    raw: Record<string, unknown>,
    key: string,
    fallback: string,
    source: string,
): string {
    const value = raw[key];
    if (value === undefined) return fallback;
    if (typeof value !== "string" || value.trim() === "") {
        throw new ConfigError(source, `'${key}' must be a non-empty string`);
    }
    return value;
}

function stringListField(
    raw: Record<string, unknown>,
    key: string,
    fallback: string[],
    source: string,
): string[] {
    const value = raw[key];
    if (value === undefined) return fallback;
    if (
        !Array.isArray(value) ||
        !value.every((item): item is string => typeof item === "string")
    ) {
        throw new ConfigError(source, `'${key}' must be a list of strings`);
    }
    return value;
}

function timeoutField(
    raw: Record<string, unknown>,
    fallback: number,
    source: string,
): number {
    const value = raw.timeoutMs;
    if (value === undefined) return fallback;
    if (typeof value !== "number" || !Number.isInteger(value) || value < 0) {
        throw new ConfigError(
            source,
            "'timeoutMs' must be a non-negative integer",
        );
    }
    return value;
}
