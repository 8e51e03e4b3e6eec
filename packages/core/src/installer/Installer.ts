import { RuntimeCache, CacheEntry } from "../cache/RuntimeCache";
import { RuntimeSource } from "../resolver/LanguageResolver";
import { IPackageSource } from "./PackageSource";
import { validateModule } from "./ModuleValidator";
import { Logger, createLogger } from "../utils/Logger";
import { DownloadError, errorMessage } from "../utils/Error";

export interface FetchResponse {
    ok: boolean;
    status: number;
    statusText: string;
    arrayBuffer(): Promise<ArrayBuffer>;
}

/**
 * The part of `fetch` the installer relies on
 */
export type FetchFn = (
    url: string,
    init?: { signal?: AbortSignal },
) => Promise<FetchResponse>;

export interface InstallerOptions {
    cache: RuntimeCache;
    packageSource: IPackageSource;
    fetch?: FetchFn;
    /** 0 disables the timeout */
    downloadTimeoutMs?: number;
    logger?: Logger;
}

/**
 * Acquires runtime modules, validates them and publishes them to the cache
 */
export class Installer {
    private cache: RuntimeCache;
    private packageSource: IPackageSource;
    private fetch: FetchFn;
    private downloadTimeoutMs: number;
    private logger: Logger;

    constructor(options: InstallerOptions) {
        this.cache = options.cache;
        this.packageSource = options.packageSource;
        this.fetch = options.fetch ?? ((url, init) => fetch(url, init));
        this.downloadTimeoutMs = options.downloadTimeoutMs ?? 0;
        this.logger = options.logger ?? createLogger();
    }

    async install(
        language: string,
        source: RuntimeSource,
    ): Promise<CacheEntry> {
        const startTime = Date.now();
        const bytes = await this.acquire(language, source);

        // Nothing reaches the cache before this passes
        await validateModule(bytes);

        const entry = await this.cache.commit(language, bytes);

        const tookSec = ((Date.now() - startTime) / 1000).toFixed(1);
        this.logger.success(
            language,
            `Installed runtime to ${entry.path}, took ${tookSec}s`,
        );
        return entry;
    }

    private acquire(
        language: string,
        source: RuntimeSource,
    ): Promise<Uint8Array> {
        switch (source.kind) {
            case "registry":
                this.logger.info(
                    language,
                    `Installing ${source.packageName} via Wasmer...`,
                );
                return this.packageSource.fetchPackage(source.packageName);
            case "url":
                this.logger.info(language, `Downloading ${source.url}...`);
                return this.download(source.url);
        }
    }

    private async download(url: string): Promise<Uint8Array> {
        const init =
            this.downloadTimeoutMs > 0
                ? { signal: AbortSignal.timeout(this.downloadTimeoutMs) }
                : undefined;

        let bytes: ArrayBuffer;
        try {
            const response = await this.fetch(url, init);
            if (!response.ok) {
                throw new DownloadError(
                    url,
                    `HTTP ${response.status} ${response.statusText}`.trim(),
                );
            }
            bytes = await response.arrayBuffer();
        } catch (e) {
            if (e instanceof DownloadError) throw e;
            throw new DownloadError(url, errorMessage(e), e);
        }

        if (bytes.byteLength === 0) {
            throw new DownloadError(url, "empty response body");
        }
        return new Uint8Array(bytes);
    }
}
