import { entryPointType, validateModule } from "../src/installer/ModuleValidator";
import { InvalidModuleError, MissingEntryPointError } from "../src/utils/Error";
import {
    helloModule,
    noEntryPointModule,
    trapModule,
    wrongSignatureModule,
} from "./helpers/wasm";

describe("ModuleValidator", () => {
    test("accepts a WASI command module", async () => {
        await expect(validateModule(helloModule("hi\n"))).resolves.toBeDefined();
    });

    test("rejects bytes that are not WebAssembly", async () => {
        await expect(
            validateModule(Buffer.from("#!/bin/sh\necho hi\n")),
        ).rejects.toBeInstanceOf(InvalidModuleError);
    });

    test("rejects a truncated module", async () => {
        const bytes = helloModule("hi\n");
        await expect(
            validateModule(bytes.subarray(0, bytes.length - 5)),
        ).rejects.toBeInstanceOf(InvalidModuleError);
    });

    test("rejects a module without _start", async () => {
        await expect(
            validateModule(noEntryPointModule()),
        ).rejects.toBeInstanceOf(MissingEntryPointError);
    });

    test("rejects a _start that takes arguments", async () => {
        await expect(validateModule(wrongSignatureModule())).rejects.toThrow(
            "Invalid WASI entry point: '_start' must take no parameters and return nothing (takes 1, returns 1)",
        );
    });

    describe("entryPointType", () => {
        test("accounts for imported functions in the index space", () => {
            expect(entryPointType(helloModule("hi\n"))).toEqual({
                params: 0,
                results: 0,
            });
        });

        test("reads modules without imports", () => {
            expect(entryPointType(trapModule())).toEqual({
                params: 0,
                results: 0,
            });
            expect(entryPointType(wrongSignatureModule())).toEqual({
                params: 1,
                results: 1,
            });
        });

        test("is undefined when _start is not exported", () => {
            expect(entryPointType(noEntryPointModule())).toBeUndefined();
        });
    });
});
