import path from "path";
import fs from "fs/promises";

import { RuntimeCache } from "../src/cache/RuntimeCache";
import { InvalidLanguageError, WriteError } from "../src/utils/Error";
import { makeTempDir, removeDir } from "./helpers/tmp";

describe("RuntimeCache", () => {
    let baseDir: string;
    let cache: RuntimeCache;

    beforeEach(async () => {
        baseDir = await makeTempDir();
        cache = new RuntimeCache(path.join(baseDir, "plugins"));
    });

    afterEach(async () => {
        jest.restoreAllMocks();
        await removeDir(baseDir);
    });

    test("path is fully determined by the language", () => {
        expect(cache.pathFor("python")).toBe(
            path.join(baseDir, "plugins", "python", "runtime.wasm"),
        );
    });

    test("lookup misses when nothing is installed", async () => {
        expect(await cache.lookup("python")).toBeUndefined();
    });

    test("commit creates missing directories and publishes the module", async () => {
        const entry = await cache.commit("python", Uint8Array.from([1, 2, 3]));

        expect(entry).toEqual({
            language: "python",
            path: cache.pathFor("python"),
        });
        expect(await cache.lookup("python")).toBe(entry.path);
        expect([...(await fs.readFile(entry.path))]).toEqual([1, 2, 3]);
    });

    test("commit leaves no temporary file behind", async () => {
        await cache.commit("ruby", Uint8Array.from([7]));

        const files = await fs.readdir(path.join(baseDir, "plugins", "ruby"));
        expect(files).toEqual(["runtime.wasm"]);
    });

    test("language directory without a module is a miss", async () => {
        await fs.mkdir(path.join(baseDir, "plugins", "python"), {
            recursive: true,
        });

        expect(await cache.lookup("python")).toBeUndefined();
        expect(await cache.listInstalled()).toEqual([]);
    });

    test("interrupted commit never exposes a partial module", async () => {
        jest.spyOn(fs, "rename").mockRejectedValueOnce(
            Object.assign(new Error("crash before rename"), { code: "EIO" }),
        );

        await expect(
            cache.commit("python", Uint8Array.from([1, 2, 3, 4])),
        ).rejects.toBeInstanceOf(WriteError);

        expect(await cache.lookup("python")).toBeUndefined();
        const files = await fs.readdir(path.join(baseDir, "plugins", "python"));
        expect(files).toEqual([]);
    });

    test("leftover temporary file from a crash is not a cache entry", async () => {
        const dir = path.join(baseDir, "plugins", "python");
        await fs.mkdir(dir, { recursive: true });
        await fs.writeFile(path.join(dir, ".runtime.wasm.1234.abcdef.tmp"), "par");

        expect(await cache.lookup("python")).toBeUndefined();
        expect(await cache.listInstalled()).toEqual([]);
    });

    test("commit reports unwritable targets as WriteError", async () => {
        // A file where the plugins directory should be
        await fs.writeFile(path.join(baseDir, "plugins"), "");

        const commit = cache.commit("python", Uint8Array.from([1]));

        await expect(commit).rejects.toBeInstanceOf(WriteError);
        await expect(commit).rejects.toThrow(
            `Failed to write ${cache.pathFor("python")}`,
        );
    });

    test("listInstalled returns languages that hold a module", async () => {
        await cache.commit("python", Uint8Array.from([1]));
        await cache.commit("ruby", Uint8Array.from([1]));
        await fs.mkdir(path.join(baseDir, "plugins", "empty"));
        await fs.writeFile(path.join(baseDir, "plugins", "stray.txt"), "");

        expect((await cache.listInstalled()).sort()).toEqual([
            "python",
            "ruby",
        ]);
    });

    test("listInstalled is empty when the base directory is missing", async () => {
        expect(await cache.listInstalled()).toEqual([]);
    });

    test.each(["", ".", "..", "../escape", "a/b", "a\\b"])(
        "rejects language identifier %j",
        async (language) => {
            await expect(cache.lookup(language)).rejects.toBeInstanceOf(
                InvalidLanguageError,
            );
        },
    );
});
