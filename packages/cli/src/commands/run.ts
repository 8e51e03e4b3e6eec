import type { CommandModule } from "yargs";
import {
    ConfirmationGate,
    ExecuteOptions,
    ExecutionEngine,
    ExecutionOutcome,
    FetchFn,
    IPackageSource,
    Installer,
    Logger,
    Prompt,
    RuntimeCache,
    WasmerPackageSource,
    createLogger,
    createReadlinePrompt,
    formatFatal,
    loadSettings,
    resolveConfig,
} from "@rchidrun/core";

/** Exit code of any failure before the runtime starts */
export const FATAL_EXIT_CODE = 1;

export interface RunArgs {
    language: string;
    script: string;
}

/**
 * Collaborators `runScript` would otherwise take from the process
 */
export interface RunDependencies {
    env?: NodeJS.ProcessEnv;
    prompt?: Prompt;
    packageSource?: IPackageSource;
    fetch?: FetchFn;
    logger?: Logger;
    execute?: ExecuteOptions;
}

/**
 * Make sure the language's runtime is installed, then run the script with it
 */
export async function runScript(
    language: string,
    script: string,
    deps: RunDependencies = {},
): Promise<ExecutionOutcome> {
    const config = resolveConfig(deps.env ?? process.env);
    const settings = await loadSettings(config);
    const logger = deps.logger ?? createLogger();

    const cache = new RuntimeCache(config.pluginsDir);
    const installer = new Installer({
        cache,
        packageSource:
            deps.packageSource ?? new WasmerPackageSource(settings.registry),
        fetch: deps.fetch,
        downloadTimeoutMs: settings.download.timeoutMs,
        logger,
    });
    const gate = new ConfirmationGate({
        cache,
        installer,
        prompt:
            deps.prompt ??
            createReadlinePrompt({ timeoutMs: settings.prompt.timeoutMs }),
        logger,
    });

    const runtimePath = await gate.ensureAvailable(language);

    return new ExecutionEngine().execute(runtimePath, script, {
        programName: language,
        ...deps.execute,
    });
}

/**
 * Run the script and report any failure on `errors`, resolving with the
 * exit code the process should end with
 */
export async function runAndReport(
    language: string,
    script: string,
    deps: RunDependencies = {},
    errors: NodeJS.WritableStream = process.stderr,
): Promise<number> {
    try {
        const outcome = await runScript(language, script, deps);
        if (outcome.fault) {
            errors.write(`${formatFatal(outcome.fault)}\n`);
        }
        return outcome.exitCode;
    } catch (e) {
        errors.write(`${formatFatal(e)}\n`);
        return FATAL_EXIT_CODE;
    }
}

export const runCommand: CommandModule<{}, RunArgs> = {
    command: "run <language> <script>",
    describe: "Run a script with a language",
    builder: (yargs) =>
        yargs
            .positional("language", {
                describe: "Programming language (e.g., python, javascript)",
                type: "string",
                demandOption: true,
            })
            .positional("script", {
                describe: "Path to the script",
                type: "string",
                demandOption: true,
            }),
    handler: async (argv) => {
        process.exitCode = await runAndReport(argv.language, argv.script);
    },
};
