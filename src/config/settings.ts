/**
 * @file Output Settings
 *
 * Resolution of terminal output settings with deterministic precedence
 * (explicit option > env > defaults).
 *
 * @module config
 */

export type ColorMode = 'auto' | 'always' | 'never';

export type SettingSource = 'option' | 'env' | 'default';

export interface ResolvedColorMode {
    mode: ColorMode;
    source: SettingSource;
}

/** Environment variable overriding the colour mode. */
export const COLOR_ENV_KEY: string = 'PARAMFORGE_COLOR';

const DEFAULT_COLOR_MODE: ColorMode = 'auto';

function colorMode_parse(raw: string | undefined): ColorMode | undefined {
    const normalized: string = (raw ?? '').trim().toLowerCase();
    if (normalized === 'auto' || normalized === 'always' || normalized === 'never') {
        return normalized;
    }
    return undefined;
}

/**
 * Resolve the effective colour mode and where it came from.
 *
 * Unrecognized environment values are ignored rather than rejected, so a
 * typo falls back to the default instead of breaking the program.
 *
 * @param option - Mode passed explicitly by the caller, if any.
 * @param env - Environment to read (defaults to `process.env`).
 */
export function colorMode_resolve(
    option?: ColorMode,
    env: Record<string, string | undefined> = process.env
): ResolvedColorMode {
    if (option) {
        return { mode: option, source: 'option' };
    }

    const envMode: ColorMode | undefined = colorMode_parse(env[COLOR_ENV_KEY]);
    if (envMode) {
        return { mode: envMode, source: 'env' };
    }

    return { mode: DEFAULT_COLOR_MODE, source: 'default' };
}
