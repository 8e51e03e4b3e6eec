import {
    InvalidModuleError,
    MissingEntryPointError,
    errorMessage,
} from "../utils/Error";

/** Export WASI hosts call to start a command module */
export const ENTRY_POINT = "_start";

export interface FunctionType {
    params: number;
    results: number;
}

const SECTION_TYPE = 1;
const SECTION_IMPORT = 2;
const SECTION_FUNCTION = 3;
const SECTION_EXPORT = 7;

const KIND_FUNCTION = 0;
const KIND_TABLE = 1;
const KIND_MEMORY = 2;
const KIND_GLOBAL = 3;
const KIND_TAG = 4;

/**
 * Check that `bytes` is a well-formed module exporting a WASI entry point:
 * a function named `_start` taking no parameters and returning nothing.
 */
export async function validateModule(
    bytes: Uint8Array,
): Promise<WebAssembly.Module> {
    // WebAssembly wants a view backed by a plain ArrayBuffer
    const source = new Uint8Array(bytes);
    if (!WebAssembly.validate(source)) {
        throw new InvalidModuleError("validation failed");
    }

    let module: WebAssembly.Module;
    try {
        module = await WebAssembly.compile(source);
    } catch (e) {
        throw new InvalidModuleError(errorMessage(e), e);
    }

    const hasEntryPoint = WebAssembly.Module.exports(module).some(
        (descriptor) =>
            descriptor.name === ENTRY_POINT && descriptor.kind === "function",
    );
    if (!hasEntryPoint) {
        throw new MissingEntryPointError(
            `no exported function '${ENTRY_POINT}'`,
        );
    }

    const type = entryPointType(bytes);
    if (type && (type.params !== 0 || type.results !== 0)) {
        throw new MissingEntryPointError(
            `'${ENTRY_POINT}' must take no parameters and return nothing ` +
                `(takes ${type.params}, returns ${type.results})`,
        );
    }

    return module;
}

/**
 * Read the signature of the exported entry point from the type, import,
 * function and export sections. Returns undefined when it is not exported.
 */
export function entryPointType(bytes: Uint8Array): FunctionType | undefined {
    const reader = new ByteReader(bytes);
    reader.skip(8); // magic + version

    const types: FunctionType[] = [];
    // Type index of every function, imported ones first
    const functions: number[] = [];
    let entryIndex: number | undefined;

    while (!reader.done()) {
        const id = reader.byte();
        const size = reader.u32();
        const end = reader.offset + size;

        if (id === SECTION_TYPE) {
            const count = reader.u32();
            for (let i = 0; i < count; i++) {
                reader.byte(); // 0x60
                const params = reader.u32();
                reader.skip(params);
                const results = reader.u32();
                reader.skip(results);
                types.push({ params, results });
            }
        } else if (id === SECTION_IMPORT) {
            const count = reader.u32();
            for (let i = 0; i < count; i++) {
                reader.name();
                reader.name();
                readImport(reader, functions);
            }
        } else if (id === SECTION_FUNCTION) {
            const count = reader.u32();
            for (let i = 0; i < count; i++) {
                functions.push(reader.u32());
            }
        } else if (id === SECTION_EXPORT) {
            const count = reader.u32();
            for (let i = 0; i < count; i++) {
                const name = reader.name();
                const kind = reader.byte();
                const index = reader.u32();
                if (name === ENTRY_POINT && kind === KIND_FUNCTION) {
                    entryIndex = index;
                }
            }
        }

        reader.seek(end);
    }

    if (entryIndex === undefined) return undefined;
    const typeIndex = functions[entryIndex];
    return typeIndex === undefined ? undefined : types[typeIndex];
}

function readImport(reader: ByteReader, functions: number[]): void {
    const kind = reader.byte();
    switch (kind) {
        case KIND_FUNCTION:
            functions.push(reader.u32());
            break;
        case KIND_TABLE:
            reader.byte(); // reftype
            readLimits(reader);
            break;
        case KIND_MEMORY:
            readLimits(reader);
            break;
        case KIND_GLOBAL:
            reader.byte(); // valtype
            reader.byte(); // mutability
            break;
        case KIND_TAG:
            reader.byte(); // attribute
            reader.u32();
            break;
        default:
            throw new InvalidModuleError(`unknown import kind ${kind}`);
    }
}

function readLimits(reader: ByteReader): void {
    const flags = reader.byte();
    reader.u32();
    if (flags & 1) reader.u32();
}

class ByteReader {
    public offset = 0;
    private decoder = new TextDecoder();

    constructor(private bytes: Uint8Array) {}

    done(): boolean {
        return this.offset >= this.bytes.length;
    }

    byte(): number {
        const value = this.bytes[this.offset];
        if (value === undefined) {
            throw new InvalidModuleError("unexpected end of module");
        }
        this.offset++;
        return value;
    }

    // unsigned LEB128
    u32(): number {
        let result = 0;
        let shift = 0;
        for (;;) {
            const byte = this.byte();
            result += (byte & 0x7f) * 2 ** shift;
            if ((byte & 0x80) === 0) return result;
            shift += 7;
        }
    }

    name(): string {
        const length = this.u32();
        const start = this.offset;
        this.seek(start + length);
        return this.decoder.decode(this.bytes.subarray(start, start + length));
    }

    skip(count: number): void {
        this.seek(this.offset + count);
    }

    seek(offset: number): void {
        if (offset > this.bytes.length) {
            throw new InvalidModuleError("unexpected end of module");
        }
        this.offset = offset;
    }
}
