import path from "path";
import fs from "fs/promises";
import { constants } from "fs";
import { WASI } from "wasi";

import {
    ExecutionFaultError,
    ModuleLoadError,
    ScriptNotFoundError,
    errorMessage,
} from "../utils/Error";

/** Exit code reported when the runtime traps */
export const TRAP_EXIT_CODE = 134;

export interface ExecutionOutcome {
    exitCode: number;
    trapped: boolean;
    /** Present exactly when `trapped` is true */
    fault?: ExecutionFaultError;
}

export interface ExecuteOptions {
    /** argv[0] seen by the runtime */
    programName?: string;
    /** Directory preopened as "." */
    cwd?: string;
    env?: Record<string, string>;
    stdin?: number;
    stdout?: number;
    stderr?: number;
}

/**
 * Runs a cached runtime module in a WASI sandbox with the script as its
 * argument. The host's standard streams are handed to the module as they are.
 */
export class ExecutionEngine {
    async execute(
        modulePath: string,
        scriptPath: string,
        options: ExecuteOptions = {},
    ): Promise<ExecutionOutcome> {
        const module = await this.load(modulePath);

        const cwd = options.cwd ?? process.cwd();
        const hostScriptPath = path.resolve(cwd, scriptPath);
        await assertReadableFile(hostScriptPath, scriptPath);

        // The guest only sees preopened directories. A script outside the
        // working directory gets its own directory preopened at the host path.
        const preopens: Record<string, string> = { ".": cwd };
        let guestScriptPath = scriptPath;
        const relative = path.relative(cwd, hostScriptPath);
        if (path.isAbsolute(scriptPath) || relative.startsWith("..")) {
            const scriptDir = path.dirname(hostScriptPath);
            preopens[scriptDir] = scriptDir;
            guestScriptPath = hostScriptPath;
        }

        const wasi = new WASI({
            version: "preview1",
            args: [options.programName ?? "runtime", guestScriptPath],
            env: options.env ?? {},
            preopens,
            stdin: options.stdin ?? 0,
            stdout: options.stdout ?? 1,
            stderr: options.stderr ?? 2,
            returnOnExit: true,
        });

        let instance: WebAssembly.Instance;
        try {
            instance = await WebAssembly.instantiate(
                module,
                { wasi_snapshot_preview1: wasi.wasiImport },
            );
        } catch (e) {
            throw new ModuleLoadError(modulePath, errorMessage(e), e);
        }

        assertStartable(instance, modulePath);

        let exitCode: number;
        try {
            // Blocks until _start returns, proc_exit is called or a trap
            exitCode = wasi.start(instance);
        } catch (e) {
            // Past assertStartable a throw is the guest faulting
            // (unreachable, out-of-bounds access, stack exhaustion)
            return {
                exitCode: TRAP_EXIT_CODE,
                trapped: true,
                fault: new ExecutionFaultError(errorMessage(e), e),
            };
        }

        return { exitCode, trapped: false };
    }

    // Compiled on every run, the cached file may have changed since install
    private async load(modulePath: string): Promise<WebAssembly.Module> {
        let bytes: Uint8Array;
        try {
            bytes = await fs.readFile(modulePath);
        } catch (e) {
            throw new ModuleLoadError(modulePath, errorMessage(e), e);
        }

        try {
            return await WebAssembly.compile(new Uint8Array(bytes));
        } catch (e) {
            throw new ModuleLoadError(modulePath, errorMessage(e), e);
        }
    }
}

async function assertReadableFile(
    hostPath: string,
    scriptPath: string,
): Promise<void> {
    try {
        await fs.access(hostPath, constants.R_OK);
        const stat = await fs.stat(hostPath);
        if (!stat.isFile()) {
            throw new ScriptNotFoundError(scriptPath);
        }
    } catch (e) {
        if (e instanceof ScriptNotFoundError) throw e;
        throw new ScriptNotFoundError(scriptPath, e);
    }
}

/**
 * Host-side requirements of `wasi.start`, checked up front so that a failure
 * there is not mistaken for a trap
 */
function assertStartable(
    instance: WebAssembly.Instance,
    modulePath: string,
): void {
    const { memory, _start, _initialize } = instance.exports;
    if (typeof memory !== "object" || !("buffer" in memory)) {
        throw new ModuleLoadError(modulePath, "no exported memory");
    }
    if (typeof _start !== "function") {
        throw new ModuleLoadError(modulePath, "no exported '_start' function");
    }
    if (_initialize !== undefined) {
        throw new ModuleLoadError(
            modulePath,
            "reactor modules exporting '_initialize' cannot be started",
        );
    }
}
