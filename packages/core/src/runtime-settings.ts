/**
 * Process-wide runtime settings for the banner engine.
 *
 * Defaults come from the environment and can be overridden by the CLI
 * (`--verbose`) or by library callers.
 */
export interface BannerRuntimeSettings {
    /** Enables info-level/timing logs. Warnings/errors are always logged. */
    infoLogs: boolean;
}

let runtimeSettings: BannerRuntimeSettings = {
    infoLogs: process.env['ASCII_BANNER_DEBUG'] === '1',
};

/**
 * Updates runtime settings.
 */
export function setRuntimeSettings(next: Partial<BannerRuntimeSettings>): void {
    runtimeSettings = {
        ...runtimeSettings,
        ...next,
    };
}

/**
 * Returns current runtime settings.
 */
export function getRuntimeSettings(): BannerRuntimeSettings {
    return runtimeSettings;
}
