/**
 * @file Value Codec
 *
 * Bidirectional conversion between native parameter values and their
 * canonical text form. Text is the common currency of the framework:
 * command-line values, ini lines and manifest defaults all pass through
 * here.
 *
 * Decoding never fails. Text that does not parse as the target kind
 * yields that kind's zero value (`0`, `false`, empty string, empty list),
 * which mirrors stream extraction semantics of the execution-model hosts.
 *
 * @module params/codec
 */

import type { KindValueMap, ParamKind, ParamValue } from './kinds.js';

// ─── Codec Contract ─────────────────────────────────────────────

/**
 * Encode/decode pair for one native value type.
 */
export interface KindCodec<T> {
    encode(value: T): string;
    decode(text: string): T;
    /** Zero value of a freshly created record. */
    initial(): T;
}

const INT32_MIN: number = -2147483648;
const INT32_MAX: number = 2147483647;
const SEQUENCE_DELIMITER: string = ',';

// ─── Scalars ────────────────────────────────────────────────────

function int32_clamp(value: number): number {
    if (Number.isNaN(value)) return 0;
    return Math.max(INT32_MIN, Math.min(INT32_MAX, Math.trunc(value))) | 0;
}

/**
 * Parse the leading integer of a string, clamped to the int32 range.
 *
 * `"3.7"` → 3, `"  12x"` → 12, `"abc"` → 0.
 */
export function integer_decode(text: string): number {
    return int32_clamp(Number.parseInt(text, 10));
}

export function integer_encode(value: number): string {
    return String(int32_clamp(value));
}

/**
 * Parse the leading floating point number of a string.
 * The literal `NaN` survives; any other unparsable text is 0.
 */
export function double_decode(text: string): number {
    const trimmed: string = text.trim();
    if (trimmed === 'NaN') return Number.NaN;
    const parsed: number = Number.parseFloat(trimmed);
    return Number.isNaN(parsed) ? 0 : parsed;
}

/**
 * Shortest decimal text that parses back to the same double.
 */
export function double_encode(value: number): string {
    if (Object.is(value, -0)) return '-0';
    return String(value);
}

export function float_decode(text: string): number {
    return Math.fround(double_decode(text));
}

/**
 * Shortest decimal text that parses back to the same float32.
 *
 * `String()` on a float32 widened to double prints noise digits
 * (`0.333` → `0.33300000429153442`), so precision is searched upward
 * until the float32 is reproduced.
 */
export function float_encode(value: number): string {
    const single: number = Math.fround(value);
    if (Number.isNaN(single)) return 'NaN';
    if (Object.is(single, -0)) return '-0';
    if (!Number.isFinite(single)) return String(single);

    for (let precision: number = 1; precision <= 9; precision++) {
        const candidate: number = Number(single.toPrecision(precision));
        if (Math.fround(candidate) === single) {
            return String(candidate);
        }
    }
    return String(single);
}

/**
 * Accepts `true`/`yes` and `false`/`no`; anything else is true when its
 * leading integer is positive.
 */
export function boolean_decode(text: string): boolean {
    if (text === 'true' || text === 'yes') return true;
    if (text === 'false' || text === 'no') return false;
    return integer_decode(text) > 0;
}

export function boolean_encode(value: boolean): string {
    return value ? 'true' : 'false';
}

// ─── Sequences ──────────────────────────────────────────────────

/**
 * Split comma-joined text into element texts. A single trailing empty
 * element is dropped, so `""` is the empty list and `"1,2,"` has two
 * elements.
 */
export function sequence_split(text: string): string[] {
    if (text === '') return [];
    const items: string[] = text.split(SEQUENCE_DELIMITER);
    if (items[items.length - 1] === '') items.pop();
    return items;
}

function sequenceCodec_create<T>(element: KindCodec<T>): KindCodec<T[]> {
    return {
        encode: (values: T[]): string => values.map((value: T): string => element.encode(value)).join(SEQUENCE_DELIMITER),
        decode: (text: string): T[] => sequence_split(text).map((item: string): T => element.decode(item)),
        initial: (): T[] => []
    };
}

// ─── Per-Kind Table ─────────────────────────────────────────────

const booleanCodec: KindCodec<boolean> = {
    encode: boolean_encode,
    decode: boolean_decode,
    initial: (): boolean => false
};

const integerCodec: KindCodec<number> = {
    encode: integer_encode,
    decode: integer_decode,
    initial: (): number => 0
};

const floatCodec: KindCodec<number> = {
    encode: float_encode,
    decode: float_decode,
    initial: (): number => 0
};

const doubleCodec: KindCodec<number> = {
    encode: double_encode,
    decode: double_decode,
    initial: (): number => 0
};

const stringCodec: KindCodec<string> = {
    encode: (value: string): string => value,
    decode: (text: string): string => text,
    initial: (): string => ''
};

const stringSequenceCodec: KindCodec<string[]> = sequenceCodec_create(stringCodec);

const KIND_CODECS: { [K in ParamKind]: KindCodec<KindValueMap[K]> } = {
    'boolean': booleanCodec,
    'integer': integerCodec,
    'float': floatCodec,
    'double': doubleCodec,
    'string': stringCodec,
    'integer-vector': sequenceCodec_create(integerCodec),
    'float-vector': sequenceCodec_create(floatCodec),
    'double-vector': sequenceCodec_create(doubleCodec),
    'string-vector': stringSequenceCodec,
    'integer-enumeration': integerCodec,
    'float-enumeration': floatCodec,
    'double-enumeration': doubleCodec,
    'string-enumeration': stringCodec,
    'file': stringCodec,
    'directory': stringCodec,
    'image': stringCodec,
    'geometry': stringCodec,
    'point': stringSequenceCodec,
    'region': stringSequenceCodec
};

/**
 * Resolve the codec for a kind, typed by that kind's native value.
 */
export function kindCodec_get<K extends ParamKind>(kind: K): KindCodec<KindValueMap[K]> {
    return KIND_CODECS[kind];
}

// ─── Tagged Variant ─────────────────────────────────────────────

function kind_unreachable(value: never): never {
    throw new Error(`Unhandled parameter kind: ${JSON.stringify(value)}`);
}

/**
 * Canonical text of a tagged value.
 */
export function paramValue_encode(param: ParamValue): string {
    switch (param.kind) {
        case 'boolean':
            return kindCodec_get(param.kind).encode(param.value);
        case 'integer':
        case 'float':
        case 'double':
        case 'integer-enumeration':
        case 'float-enumeration':
        case 'double-enumeration':
            return kindCodec_get(param.kind).encode(param.value);
        case 'string':
        case 'string-enumeration':
        case 'file':
        case 'directory':
        case 'image':
        case 'geometry':
            return kindCodec_get(param.kind).encode(param.value);
        case 'integer-vector':
        case 'float-vector':
        case 'double-vector':
            return kindCodec_get(param.kind).encode(param.value);
        case 'string-vector':
        case 'point':
        case 'region':
            return kindCodec_get(param.kind).encode(param.value);
        default:
            return kind_unreachable(param);
    }
}

/**
 * Decode text into a tagged value of the given kind.
 */
export function paramValue_decode(kind: ParamKind, text: string): ParamValue {
    switch (kind) {
        case 'boolean':
            return { kind, value: kindCodec_get(kind).decode(text) };
        case 'integer':
        case 'float':
        case 'double':
        case 'integer-enumeration':
        case 'float-enumeration':
        case 'double-enumeration':
            return { kind, value: kindCodec_get(kind).decode(text) };
        case 'string':
        case 'string-enumeration':
        case 'file':
        case 'directory':
        case 'image':
        case 'geometry':
            return { kind, value: kindCodec_get(kind).decode(text) };
        case 'integer-vector':
        case 'float-vector':
        case 'double-vector':
            return { kind, value: kindCodec_get(kind).decode(text) };
        case 'string-vector':
        case 'point':
        case 'region':
            return { kind, value: kindCodec_get(kind).decode(text) };
        default:
            return kind_unreachable(kind);
    }
}

/**
 * Zero value of a kind, as held by a freshly created record.
 */
export function paramValue_initial(kind: ParamKind): ParamValue {
    switch (kind) {
        case 'boolean':
            return { kind, value: kindCodec_get(kind).initial() };
        case 'integer':
        case 'float':
        case 'double':
        case 'integer-enumeration':
        case 'float-enumeration':
        case 'double-enumeration':
            return { kind, value: kindCodec_get(kind).initial() };
        case 'string':
        case 'string-enumeration':
        case 'file':
        case 'directory':
        case 'image':
        case 'geometry':
            return { kind, value: kindCodec_get(kind).initial() };
        case 'integer-vector':
        case 'float-vector':
        case 'double-vector':
            return { kind, value: kindCodec_get(kind).initial() };
        case 'string-vector':
        case 'point':
        case 'region':
            return { kind, value: kindCodec_get(kind).initial() };
        default:
            return kind_unreachable(kind);
    }
}
