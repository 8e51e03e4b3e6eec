/**
 * Acquires prebuilt runtime modules from a package registry
 */
export interface IPackageSource {
    /**
     * Fetch the module of a registry package
     * @param packageName registry reference, e.g. "wasmer/python"
     * @returns module bytes
     */
    fetchPackage(packageName: string): Promise<Uint8Array>;
}
