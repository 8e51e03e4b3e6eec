import path from "path";
import fs from "fs/promises";
import { randomBytes } from "crypto";

import {
    InvalidLanguageError,
    WriteError,
    isErrnoException,
} from "../utils/Error";

export const RUNTIME_FILE_NAME = "runtime.wasm";

export interface CacheEntry {
    language: string;
    path: string;
}

/**
 * Installed runtimes, one module per language under
 * `<pluginsDir>/<language>/runtime.wasm`. Whatever sits at that path is
 * trusted, validation happens once at install time.
 */
export class RuntimeCache {
    constructor(public readonly baseDir: string) {}

    pathFor(language: string): string {
        assertLanguage(language);
        return path.join(this.baseDir, language, RUNTIME_FILE_NAME);
    }

    async lookup(language: string): Promise<string | undefined> {
        const runtimePath = this.pathFor(language);
        return (await isFile(runtimePath)) ? runtimePath : undefined;
    }

    /**
     * Write through a temporary file in the same directory and rename it
     * into place, so the canonical path is either absent or complete
     */
    async commit(language: string, bytes: Uint8Array): Promise<CacheEntry> {
        const runtimePath = this.pathFor(language);
        const dir = path.dirname(runtimePath);
        const tmpPath = path.join(
            dir,
            `.${RUNTIME_FILE_NAME}.${process.pid}.${randomBytes(6).toString("hex")}.tmp`,
        );

        try {
            await fs.mkdir(dir, { recursive: true });
        } catch (e) {
            throw new WriteError(runtimePath, e);
        }

        try {
            await fs.writeFile(tmpPath, bytes);
            await fs.rename(tmpPath, runtimePath);
        } catch (e) {
            await fs.rm(tmpPath, { force: true });
            throw new WriteError(runtimePath, e);
        }

        return { language, path: runtimePath };
    }

    async listInstalled(): Promise<string[]> {
        let entries;
        try {
            entries = await fs.readdir(this.baseDir, { withFileTypes: true });
        } catch (e) {
            if (isErrnoException(e) && e.code === "ENOENT") return [];
            throw e;
        }

        const installed: string[] = [];
        for (const entry of entries) {
            if (!entry.isDirectory()) continue;
            const runtimePath = path.join(
                this.baseDir,
                entry.name,
                RUNTIME_FILE_NAME,
            );
            if (await isFile(runtimePath)) installed.push(entry.name);
        }
        return installed;
    }
}

export function isValidLanguage(language: string): boolean {
    return (
        language.length > 0 &&
        language !== "." &&
        language !== ".." &&
        !/[\\/\0]/.test(language)
    );
}

function assertLanguage(language: string): void {
    if (!isValidLanguage(language)) {
        throw new InvalidLanguageError(language);
    }
}

async function isFile(filePath: string): Promise<boolean> {
    try {
        return (await fs.stat(filePath)).isFile();
    } catch (e) {
        if (
            isErrnoException(e) &&
            (e.code === "ENOENT" || e.code === "ENOTDIR")
        ) {
            return false;
        }
        throw e;
    }
}
