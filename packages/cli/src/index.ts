#!/usr/bin/env node
import yargs from "yargs";
import { hideBin } from "yargs/helpers";
import { formatFatal } from "@rchidrun/core";

import { runCommand, FATAL_EXIT_CODE } from "./commands/run";
import { sdkCommand } from "./commands/sdk";

yargs(hideBin(process.argv))
    .scriptName("rchidrun")
    .usage("$0 <cmd> [args]")
    .command(runCommand)
    .command(sdkCommand)
    .demandCommand(1)
    .strict()
    .help()
    .parseAsync()
    .catch((e: unknown) => {
        console.error(formatFatal(e));
        process.exitCode = FATAL_EXIT_CODE;
    });
