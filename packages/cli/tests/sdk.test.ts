import os from "os";
import path from "path";
import fs from "fs";
import chalk from "chalk";

import { MissingHomeError, RuntimeCache, resolveConfig } from "@rchidrun/core";
import { FATAL_EXIT_CODE } from "../src/commands/run";
import { formatSdkList, listCommand, listSdks } from "../src/commands/sdk";

describe("sdk list", () => {
    let home: string;
    let level: typeof chalk.level;

    beforeEach(() => {
        home = fs.mkdtempSync(path.join(os.tmpdir(), "rchidrun-cli-"));
        level = chalk.level;
        chalk.level = 0;
    });

    afterEach(() => {
        chalk.level = level;
        fs.rmSync(home, { recursive: true, force: true });
        jest.restoreAllMocks();
    });

    test("lists installed runtimes and the predefined table", async () => {
        const cache = new RuntimeCache(resolveConfig({ HOME: home }).pluginsDir);
        await cache.commit("lua", Uint8Array.from([0]));

        const list = await listSdks({ HOME: home });

        expect(list.installed).toEqual(["lua"]);
        expect(formatSdkList(list)).toBe(
            [
                "Installed SDKs:",
                "- lua",
                "",
                "Supported languages (via Wasmer):",
                "- python (wasmer/python)",
                "- javascript (wasmer/quickjs)",
                "- ruby (wasmer/ruby)",
            ].join("\n"),
        );
    });

    test("nothing installed yet", async () => {
        const list = await listSdks({ HOME: home });

        expect(formatSdkList(list).split("\n").slice(0, 3)).toEqual([
            "Installed SDKs:",
            "(none)",
            "",
        ]);
        expect(fs.existsSync(path.join(home, ".rchidrun"))).toBe(false);
    });

    test("missing HOME fails before reading the disk", async () => {
        const readdir = jest.spyOn(fs.promises, "readdir");

        await expect(listSdks({})).rejects.toBeInstanceOf(MissingHomeError);
        expect(readdir).not.toHaveBeenCalled();
    });
});

describe("sdk list command", () => {
    let exitCode: typeof process.exitCode;
    let home: string | undefined;

    beforeEach(() => {
        exitCode = process.exitCode;
        home = process.env.HOME;
    });

    afterEach(() => {
        process.exitCode = exitCode;
        if (home === undefined) {
            delete process.env.HOME;
        } else {
            process.env.HOME = home;
        }
        jest.restoreAllMocks();
    });

    test("missing HOME sets the process exit code", async () => {
        const error = jest.spyOn(console, "error").mockImplementation(() => {});
        const log = jest.spyOn(console, "log").mockImplementation(() => {});
        delete process.env.HOME;

        await listCommand.handler({ _: [], $0: "rchidrun" });

        expect(process.exitCode).toBe(FATAL_EXIT_CODE);
        expect(log).not.toHaveBeenCalled();
        expect(error).toHaveBeenCalledTimes(1);
        expect(String(error.mock.calls[0][0])).toMatch(
            /Fatal error:.* \$HOME not set/,
        );
    });
});
