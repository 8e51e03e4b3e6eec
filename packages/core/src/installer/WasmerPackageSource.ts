import os from "os";
import path from "path";
import fs from "fs/promises";
import { spawn } from "child_process";

import { IPackageSource } from "./PackageSource";
import { RegistrySettings, DEFAULT_SETTINGS } from "../config/Config";
import {
    PackageFetchError,
    RegistryUnavailableError,
    errorMessage,
    isErrnoException,
} from "../utils/Error";

/**
 * Implements package source on top of the Wasmer CLI. The package is
 * installed into a scratch directory and its first `.wasm` file is taken.
 */
export class WasmerPackageSource implements IPackageSource {
    constructor(
        private settings: RegistrySettings = DEFAULT_SETTINGS.registry,
    ) {}

    async fetchPackage(packageName: string): Promise<Uint8Array> {
        const workDir = await fs.mkdtemp(path.join(os.tmpdir(), "rchidrun-"));

        try {
            const args = this.settings.args.map((arg) =>
                arg
                    .replace(/\{package\}/g, packageName)
                    .replace(/\{dir\}/g, workDir),
            );
            await this.spawnInstall(packageName, args);

            const modulePath = await findWasmFile(workDir);
            if (!modulePath) {
                throw new PackageFetchError(
                    packageName,
                    "no .wasm file in the installed package",
                );
            }

            try {
                return await fs.readFile(modulePath);
            } catch (e) {
                throw new PackageFetchError(packageName, errorMessage(e), e);
            }
        } finally {
            await fs.rm(workDir, { recursive: true, force: true });
        }
    }

    private spawnInstall(packageName: string, args: string[]): Promise<void> {
        const command = this.settings.command;

        return new Promise<void>((resolve, reject) => {
            const child = spawn(command, args, { stdio: "inherit" });

            child.on("error", (err) => {
                if (isErrnoException(err) && err.code === "ENOENT") {
                    reject(new RegistryUnavailableError(command, err));
                } else {
                    reject(
                        new PackageFetchError(
                            packageName,
                            errorMessage(err),
                            err,
                        ),
                    );
                }
            });

            child.on("close", (code) => {
                if (code === 0) resolve();
                else
                    reject(
                        new PackageFetchError(
                            packageName,
                            `${command} exited with code ${code}`,
                        ),
                    );
            });
        });
    }
}

async function findWasmFile(dir: string): Promise<string | undefined> {
    const entries = await fs.readdir(dir, { withFileTypes: true });
    entries.sort((a, b) => a.name.localeCompare(b.name));

    for (const entry of entries) {
        const entryPath = path.join(dir, entry.name);
        if (entry.isFile() && entry.name.endsWith(".wasm")) {
            return entryPath;
        }
    }
    for (const entry of entries) {
        if (entry.isDirectory()) {
            const found = await findWasmFile(path.join(dir, entry.name));
            if (found) return found;
        }
    }
    return undefined;
}
