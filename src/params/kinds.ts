/**
 * @file Parameter Kind Definitions
 *
 * The closed set of parameter kinds and the tagged value variant that
 * every record holds. A kind label doubles as the element name of the
 * parameter in the XML manifest, so the labels follow the execution-model
 * schema spelling (`integer-vector`, `string-enumeration`, ...).
 *
 * @module params
 */

// ─── Native Value Map ───────────────────────────────────────────

/**
 * Native TypeScript value carried by each kind.
 *
 * Integer kinds hold int32 numbers, float kinds hold float32-rounded
 * numbers; the codec enforces both on decode.
 */
export interface KindValueMap {
    'boolean': boolean;
    'integer': number;
    'float': number;
    'double': number;
    'string': string;
    'integer-vector': number[];
    'float-vector': number[];
    'double-vector': number[];
    'string-vector': string[];
    'integer-enumeration': number;
    'float-enumeration': number;
    'double-enumeration': number;
    'string-enumeration': string;
    'file': string;
    'directory': string;
    'image': string;
    'geometry': string;
    'point': string[];
    'region': string[];
}

export type ParamKind = keyof KindValueMap;

/** Every kind label, in manifest schema order. */
export const PARAM_KINDS: readonly ParamKind[] = [
    'boolean',
    'integer',
    'float',
    'double',
    'string',
    'integer-vector',
    'float-vector',
    'double-vector',
    'string-vector',
    'integer-enumeration',
    'float-enumeration',
    'double-enumeration',
    'string-enumeration',
    'file',
    'directory',
    'image',
    'geometry',
    'point',
    'region'
];

// ─── Kind Families ──────────────────────────────────────────────

export type EnumerationKind =
    | 'integer-enumeration'
    | 'float-enumeration'
    | 'double-enumeration'
    | 'string-enumeration';

/** Kinds that accept a `fileExtensions` attribute. */
export type FileLikeKind = 'file' | 'image' | 'geometry';

/** Kinds that accept a `type` attribute (image/geometry flavour). */
export type TypedAssetKind = 'image' | 'geometry';

/** Kinds that accept `multiple` and `coordinateSystem` attributes. */
export type CoordinateKind = 'point' | 'region';

// ─── Tagged Value Variant ───────────────────────────────────────

/**
 * A parameter value tagged with its kind.
 *
 * The union is distributive over `ParamKind`, so narrowing on `kind`
 * narrows `value` to the matching native type.
 */
export type ParamValue<K extends ParamKind = ParamKind> = {
    [P in K]: { kind: P; value: KindValueMap[P] };
}[K];

/**
 * Check whether an arbitrary string names a known kind.
 */
export function kind_isKnown(label: string): label is ParamKind {
    return PARAM_KINDS.some((kind: ParamKind): boolean => kind === label);
}
