/**
 * @file Ini Codec
 *
 * Persists every parameter value as ini text and restores it:
 *
 * ```
 * [Basic Types]
 *
 * Bool Param = true
 *
 * [Special]
 *
 * Slider = 0.333
 * ```
 *
 * Values are the records' canonical text, so a save followed by a load
 * reproduces every value (text with leading or trailing blanks aside,
 * since both sides of `=` are trimmed).
 *
 * Keys the registry does not know are rejected: the line is skipped and
 * reported, and nothing is created.
 *
 * @module ini
 */

import type { ParamRecord } from '../params/ParamRecord.js';
import type { ParamRegistry } from '../params/ParamRegistry.js';
import { errorMessage_get } from '../shared/errors.js';
import type { TextStore } from './TextStore.js';

/** Section assumed for keys that appear before any `[Section]` line. */
export const INI_DEFAULT_SECTION: string = 'Global';

/**
 * An ini line whose section/key is not in the registry.
 *
 * @property line - 1-based line number in the parsed text
 */
export interface IniUnknownKey {
    section: string;
    key: string;
    line: number;
}

/**
 * @property applied - Number of values decoded into records
 * @property unknown - Lines naming undeclared parameters (skipped)
 */
export interface IniParseReport {
    applied: number;
    unknown: IniUnknownKey[];
}

export type IniLoadResult =
    | { ok: true; report: IniParseReport }
    | { ok: false; error: string };

export type IniSaveResult =
    | { ok: true }
    | { ok: false; error: string };

/**
 * Serialize every record, section by section, in registry order.
 */
export function ini_serialize(registry: ParamRegistry): string {
    let text: string = '';
    for (const section of registry.sections_list()) {
        text += `[${section}]\n\n`;
        for (const key of registry.keys_list(section)) {
            const record: ParamRecord | null = registry.record_get(section, key);
            if (record) {
                text += `${key} = ${record.text_get()}\n`;
            }
        }
        text += '\n';
    }
    return text;
}

/**
 * Decode ini text into the registry's records.
 *
 * Lines shorter than two characters and lines starting with `#` are
 * skipped. `[Name]` switches the current section. Any other line is split
 * at its first `=`; a line without `=` names a key with an empty value.
 */
export function ini_parse(registry: ParamRegistry, text: string): IniParseReport {
    const report: IniParseReport = { applied: 0, unknown: [] };
    let section: string = INI_DEFAULT_SECTION;

    const lines: string[] = text.split(/\r?\n/);
    for (let index: number = 0; index < lines.length; index++) {
        const line: string = lines[index];
        if (line.length < 2 || line.startsWith('#')) continue;

        if (line.startsWith('[')) {
            section = line.trimEnd().slice(1, -1);
            continue;
        }

        const separator: number = line.indexOf('=');
        const key: string = (separator === -1 ? line : line.slice(0, separator)).trim();
        const value: string = separator === -1 ? '' : line.slice(separator + 1).trim();

        const record: ParamRecord | null = registry.record_get(section, key);
        if (!record) {
            report.unknown.push({ section, key, line: index + 1 });
            continue;
        }
        record.text_set(value);
        report.applied++;
    }

    return report;
}

/**
 * Load an ini file into the registry.
 *
 * @returns `{ ok: false }` with the registry untouched if the file cannot
 *          be read.
 */
export function iniFile_load(registry: ParamRegistry, store: TextStore, path: string): IniLoadResult {
    const text: string | null = store.text_read(path);
    if (text === null) {
        return { ok: false, error: `Cannot read ini file: ${path}` };
    }
    return { ok: true, report: ini_parse(registry, text) };
}

/**
 * Save every parameter to an ini file.
 */
export function iniFile_save(registry: ParamRegistry, store: TextStore, path: string): IniSaveResult {
    try {
        store.text_write(path, ini_serialize(registry));
        return { ok: true };
    } catch (error: unknown) {
        return { ok: false, error: `Cannot write ini file ${path}: ${errorMessage_get(error)}` };
    }
}

