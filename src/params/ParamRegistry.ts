/**
 * @file Parameter Registry
 *
 * Owns every parameter record, indexed by section and key. Both levels
 * keep first-insertion order; that order drives manifest, ini and help
 * output as well as the listing of positional parameters.
 *
 * The registry is a plain value: construct one per application and pass
 * it to whatever needs it. Nothing here is process-global.
 *
 * @module params
 */

import { ParamRecord } from './ParamRecord.js';
import type { ParamEntry } from './types.js';

export class ParamRegistry {
    private readonly sections: Map<string, Map<string, ParamRecord>> = new Map();

    /**
     * Look up a record. Never creates one.
     *
     * @returns The record, or null if the section/key pair is unknown.
     */
    public record_get(section: string, key: string): ParamRecord | null {
        return this.sections.get(section)?.get(key) ?? null;
    }

    public record_has(section: string, key: string): boolean {
        return this.record_get(section, key) !== null;
    }

    /**
     * Insert a record, or replace the one already installed at the pair.
     *
     * A replaced record's text is carried over: it is captured before the
     * swap and, when non-empty, decoded into the incoming record under the
     * incoming record's kind. The pair keeps its position in iteration
     * order.
     *
     * @returns The installed record.
     */
    public record_install(section: string, key: string, record: ParamRecord): ParamRecord {
        let keys: Map<string, ParamRecord> | undefined = this.sections.get(section);
        if (!keys) {
            keys = new Map();
            this.sections.set(section, keys);
        }

        const previous: ParamRecord | undefined = keys.get(key);
        const carried: string = previous ? previous.text_get() : '';
        keys.set(key, record);
        if (carried !== '') {
            record.text_set(carried);
        }
        return record;
    }

    /** Section names in first-insertion order. */
    public sections_list(): string[] {
        return Array.from(this.sections.keys());
    }

    /** Keys of one section in first-insertion order; empty if unknown. */
    public keys_list(section: string): string[] {
        const keys: Map<string, ParamRecord> | undefined = this.sections.get(section);
        return keys ? Array.from(keys.keys()) : [];
    }

    /**
     * Every record, section by section, in registry order.
     */
    public entries_list(): ParamEntry[] {
        const entries: ParamEntry[] = [];
        for (const [section, keys] of this.sections) {
            for (const [key, record] of keys) {
                entries.push({ section, key, record });
            }
        }
        return entries;
    }

    public size_get(): number {
        let count: number = 0;
        for (const keys of this.sections.values()) {
            count += keys.size;
        }
        return count;
    }

    /** Drop every record. */
    public clear(): void {
        this.sections.clear();
    }
}
