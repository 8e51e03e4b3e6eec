import chalk from "chalk";

export type ErrorCode =
    | "MISSING_HOME"
    | "INVALID_LANGUAGE"
    | "SCRIPT_NOT_FOUND"
    | "INSTALLATION_ABORTED"
    | "INVALID_URL"
    | "REGISTRY_UNAVAILABLE"
    | "PACKAGE_FETCH"
    | "DOWNLOAD"
    | "INVALID_MODULE"
    | "MISSING_ENTRY_POINT"
    | "MODULE_LOAD"
    | "WRITE"
    | "EXECUTION_FAULT"
    | "CONFIG";

/**
 * Base class of every failure rchidrun reports. All of them are fatal,
 * nothing is retried.
 */
export class RchidrunError extends Error {
    public readonly code: ErrorCode;

    constructor(code: ErrorCode, message: string, cause?: unknown) {
        super(message, cause === undefined ? undefined : { cause });
        this.name = "RchidrunError";
        this.code = code;
    }
}

export class MissingHomeError extends RchidrunError {
    constructor() {
        super(
            "MISSING_HOME",
            "$HOME not set, cannot locate the runtime directory",
        );
        this.name = "MissingHomeError";
    }
}

export class InvalidLanguageError extends RchidrunError {
    constructor(public readonly language: string) {
        super(
            "INVALID_LANGUAGE",
            `'${language}' is not a valid language identifier`,
        );
        this.name = "InvalidLanguageError";
    }
}

export class ScriptNotFoundError extends RchidrunError {
    constructor(
        public readonly scriptPath: string,
        cause?: unknown,
    ) {
        super("SCRIPT_NOT_FOUND", `Script not found: ${scriptPath}`, cause);
        this.name = "ScriptNotFoundError";
    }
}

export class InstallationAbortedError extends RchidrunError {
    constructor(public readonly language: string) {
        super(
            "INSTALLATION_ABORTED",
            `Installation of '${language}' aborted`,
        );
        this.name = "InstallationAbortedError";
    }
}

export class InvalidUrlError extends RchidrunError {
    constructor(
        public readonly url: string,
        reason: string,
    ) {
        super("INVALID_URL", `Invalid runtime URL '${url}': ${reason}`);
        this.name = "InvalidUrlError";
    }
}

export class RegistryUnavailableError extends RchidrunError {
    constructor(command: string, cause?: unknown) {
        super(
            "REGISTRY_UNAVAILABLE",
            `'${command}' not found. Please install Wasmer (https://wasmer.io/).`,
            cause,
        );
        this.name = "RegistryUnavailableError";
    }
}

export class PackageFetchError extends RchidrunError {
    constructor(
        public readonly packageName: string,
        reason: string,
        cause?: unknown,
    ) {
        super(
            "PACKAGE_FETCH",
            `Failed to fetch package '${packageName}': ${reason}`,
            cause,
        );
        this.name = "PackageFetchError";
    }
}

export class DownloadError extends RchidrunError {
    constructor(
        public readonly url: string,
        reason: string,
        cause?: unknown,
    ) {
        super("DOWNLOAD", `Failed to download ${url}: ${reason}`, cause);
        this.name = "DownloadError";
    }
}

export class InvalidModuleError extends RchidrunError {
    constructor(reason: string, cause?: unknown) {
        super(
            "INVALID_MODULE",
            `Not a valid WebAssembly module: ${reason}`,
            cause,
        );
        this.name = "InvalidModuleError";
    }
}

export class MissingEntryPointError extends RchidrunError {
    constructor(reason: string) {
        super("MISSING_ENTRY_POINT", `Invalid WASI entry point: ${reason}`);
        this.name = "MissingEntryPointError";
    }
}

export class ModuleLoadError extends RchidrunError {
    constructor(
        public readonly modulePath: string,
        reason: string,
        cause?: unknown,
    ) {
        super(
            "MODULE_LOAD",
            `Failed to load runtime ${modulePath}: ${reason}`,
            cause,
        );
        this.name = "ModuleLoadError";
    }
}

export class WriteError extends RchidrunError {
    constructor(
        public readonly targetPath: string,
        cause?: unknown,
    ) {
        super("WRITE", `Failed to write ${targetPath}`, cause);
        this.name = "WriteError";
    }
}

export class ExecutionFaultError extends RchidrunError {
    constructor(reason: string, cause?: unknown) {
        super("EXECUTION_FAULT", `Runtime trapped: ${reason}`, cause);
        this.name = "ExecutionFaultError";
    }
}

export class ConfigError extends RchidrunError {
    constructor(
        public readonly settingsPath: string,
        reason: string,
        cause?: unknown,
    ) {
        super("CONFIG", `Invalid settings in ${settingsPath}: ${reason}`, cause);
        this.name = "ConfigError";
    }
}

// fs errors may belong to another realm, instanceof is unreliable
export function isErrnoException(e: unknown): e is NodeJS.ErrnoException {
    return typeof e === "object" && e !== null && "code" in e;
}

export function errorMessage(error: unknown): string {
    if (
        typeof error === "object" &&
        error !== null &&
        "message" in error &&
        typeof error.message === "string"
    ) {
        return error.message;
    }
    return String(error);
}

/**
 * Render any error the way the CLI reports it
 */
export function formatFatal(error: unknown): string {
    return `${chalk.red.bold("Fatal error:")} ${errorMessage(error)}`;
}
