import { RuntimeCache } from "../cache/RuntimeCache";
import { Installer } from "../installer/Installer";
import { resolveLanguage, RemoteUrl } from "../resolver/LanguageResolver";
import { Prompt, isAffirmative } from "./prompt";
import { Logger, createLogger } from "../utils/Logger";
import { InstallationAbortedError, InvalidUrlError } from "../utils/Error";

export interface ConfirmationGateOptions {
    cache: RuntimeCache;
    installer: Installer;
    prompt: Prompt;
    logger?: Logger;
}

/**
 * Makes sure a runtime is installed before running, asking the user first
 */
export class ConfirmationGate {
    private cache: RuntimeCache;
    private installer: Installer;
    private prompt: Prompt;
    private logger: Logger;

    constructor(options: ConfirmationGateOptions) {
        this.cache = options.cache;
        this.installer = options.installer;
        this.prompt = options.prompt;
        this.logger = options.logger ?? createLogger();
    }

    /**
     * @returns path of the cached runtime module
     */
    async ensureAvailable(language: string): Promise<string> {
        const cached = await this.cache.lookup(language);
        if (cached) return cached;

        this.logger.info(language, `No runtime found for '${language}'.`);

        const resolution = resolveLanguage(language);
        if (resolution.kind === "registry") {
            const answer = await this.prompt(
                `Install '${language}' via Wasmer (${resolution.packageName})? (y/n): `,
            );
            if (!isAffirmative(answer)) {
                throw new InstallationAbortedError(language);
            }
            const entry = await this.installer.install(language, resolution);
            return entry.path;
        }

        const answer = await this.prompt(
            "Language not predefined. Provide a URL to the WASM runtime: ",
        );
        const entry = await this.installer.install(
            language,
            parseRuntimeUrl(answer),
        );
        return entry.path;
    }
}

export function parseRuntimeUrl(input: string): RemoteUrl {
    const trimmed = input.trim();
    if (!trimmed) {
        throw new InvalidUrlError(input, "no URL given");
    }

    let url: URL;
    try {
        url = new URL(trimmed);
    } catch {
        throw new InvalidUrlError(trimmed, "not a URL");
    }

    if (url.protocol !== "http:" && url.protocol !== "https:") {
        throw new InvalidUrlError(trimmed, "only http and https are supported");
    }
    return { kind: "url", url: url.href };
}
