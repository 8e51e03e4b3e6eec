export interface RegistryReference {
    kind: "registry";
    packageName: string;
}

export interface RemoteUrl {
    kind: "url";
    url: string;
}

/**
 * Where a runtime module comes from
 */
export type RuntimeSource = RegistryReference | RemoteUrl;

/**
 * Language without a predefined package, its URL has to be asked for
 */
export interface CustomLanguage {
    kind: "custom";
}

export type LanguageResolution = RegistryReference | CustomLanguage;

// Adding a predefined language is an edit of this table
const LANGUAGE_PACKAGES: ReadonlyMap<string, string> = new Map([
    ["python", "wasmer/python"],
    ["javascript", "wasmer/quickjs"],
    ["ruby", "wasmer/ruby"],
]);

export function resolveLanguage(language: string): LanguageResolution {
    const packageName = LANGUAGE_PACKAGES.get(language);
    if (packageName === undefined) {
        return { kind: "custom" };
    }
    return { kind: "registry", packageName };
}

export function supportedLanguages(): { language: string; packageName: string }[] {
    return [...LANGUAGE_PACKAGES].map(([language, packageName]) => ({
        language,
        packageName,
    }));
}
