import chalk from "chalk";
import type { CommandModule } from "yargs";
import {
    RuntimeCache,
    formatFatal,
    resolveConfig,
    supportedLanguages,
} from "@rchidrun/core";

import { FATAL_EXIT_CODE } from "./run";

export interface SdkList {
    installed: string[];
    supported: { language: string; packageName: string }[];
}

export async function listSdks(
    env: NodeJS.ProcessEnv = process.env,
): Promise<SdkList> {
    const config = resolveConfig(env);
    const cache = new RuntimeCache(config.pluginsDir);

    return {
        installed: await cache.listInstalled(),
        supported: supportedLanguages(),
    };
}

export function formatSdkList(list: SdkList): string {
    const lines = [chalk.bold("Installed SDKs:")];
    if (list.installed.length === 0) {
        lines.push(chalk.dim("(none)"));
    }
    for (const language of list.installed) {
        lines.push(`- ${language}`);
    }

    lines.push("", chalk.bold("Supported languages (via Wasmer):"));
    for (const { language, packageName } of list.supported) {
        lines.push(`- ${language} ${chalk.dim(`(${packageName})`)}`);
    }
    return lines.join("\n");
}

export const listCommand: CommandModule = {
    command: "list",
    describe: "List installed SDKs and supported languages",
    handler: async () => {
        try {
            console.log(formatSdkList(await listSdks()));
        } catch (e) {
            console.error(formatFatal(e));
            process.exitCode = FATAL_EXIT_CODE;
        }
    },
};

export const sdkCommand: CommandModule = {
    command: "sdk <command>",
    describe: "Manage language runtimes",
    builder: (yargs) => yargs.command(listCommand).demandCommand(1),
    handler: () => {
        // subcommands do the work
    },
};
