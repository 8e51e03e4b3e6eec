import { IPackageSource } from "../../src/installer/PackageSource";
import { FetchFn, FetchResponse } from "../../src/installer/Installer";

/**
 * In-memory registry keyed by package name
 */
export class FakePackageSource implements IPackageSource {
    public requested: string[] = [];

    constructor(private packages: Record<string, Uint8Array | Error> = {}) {}

    async fetchPackage(packageName: string): Promise<Uint8Array> {
        this.requested.push(packageName);
        const found = this.packages[packageName];
        if (found === undefined) {
            throw new Error(`unknown package ${packageName}`);
        }
        if (found instanceof Error) throw found;
        return found;
    }
}

export function response(
    body: Uint8Array,
    status = 200,
    statusText = "OK",
): FetchResponse {
    return {
        ok: status >= 200 && status < 300,
        status,
        statusText,
        arrayBuffer: async () => Uint8Array.from(body).buffer,
    };
}

export function fakeFetch(
    routes: Record<string, FetchResponse | Error>,
): jest.Mock<ReturnType<FetchFn>, Parameters<FetchFn>> {
    return jest.fn<ReturnType<FetchFn>, Parameters<FetchFn>>(async (url) => {
        const route = routes[url];
        if (route === undefined) throw new Error(`no route for ${url}`);
        if (route instanceof Error) throw route;
        return route;
    });
}
