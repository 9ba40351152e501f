/**
 * @file Parameter Record
 *
 * The value-holding unit owned by the registry for one section/key pair.
 * A record keeps a tagged value of a fixed kind plus three open metadata
 * maps that the manifest generator and synopsis render:
 *
 * - `tags`: child elements (`description`, `label`, `longflag`, ...)
 * - `attributes`: element attributes (`fileExtensions`, `coordinateSystem`)
 * - `constraints`: `<constraints>` children (`minimum`, `maximum`, `step`)
 *
 * @module params
 */

import type { ParamKind, ParamValue } from './kinds.js';
import { paramValue_decode, paramValue_encode, paramValue_initial } from './codec.js';

export class ParamRecord {
    private current: ParamValue;
    public readonly tags: Map<string, string> = new Map();
    public readonly attributes: Map<string, string> = new Map();
    public readonly constraints: Map<string, string> = new Map();

    constructor(kind: ParamKind) {
        this.current = paramValue_initial(kind);
    }

    /**
     * Kind label, fixed for the lifetime of the record.
     */
    public kind_get(): ParamKind {
        return this.current.kind;
    }

    public value_get(): ParamValue {
        return this.current;
    }

    /**
     * Replace the tagged value. The variant must carry the record's kind;
     * it is stored normalized (integers clamped, floats at single
     * precision), so `value_get` and `text_get` always agree.
     *
     * @throws If the variant's kind differs from the record's kind.
     */
    public value_set(next: ParamValue): void {
        if (next.kind !== this.current.kind) {
            throw new Error(`Cannot store a ${next.kind} value in a ${this.current.kind} parameter`);
        }
        this.current = paramValue_decode(next.kind, paramValue_encode(next));
    }

    /**
     * Canonical text of the current value.
     */
    public text_get(): string {
        return paramValue_encode(this.current);
    }

    /**
     * Decode text under the record's own kind and store the result.
     */
    public text_set(text: string): void {
        this.current = paramValue_decode(this.current.kind, text);
    }

    /**
     * Read a tag, returning an empty string when absent.
     */
    public tag_get(name: string): string {
        return this.tags.get(name) ?? '';
    }
}
