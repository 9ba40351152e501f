/**
 * @file Parameter Declarations
 *
 * Functions and a chained builder that declare and access parameters
 * through an explicit context (registry + flag binder). A builder stores
 * no value of its own: every call resolves the record for its
 * section/key pair in the context's registry.
 *
 * @example
 * ```typescript
 * param_define(app, 'boolean', 'Basic Types', 'Bool Param')
 *     .declare('Just a test', 'b')
 *     .value_set(true);
 *
 * param_define(app, 'double', 'Special', 'Slider').range_set(0, 1).value_set(0.333);
 * const slider: number = param_access(app, 'double', 'Special', 'Slider').value_get();
 * ```
 *
 * @module params
 */

import type { FlagBinder } from '../cli/FlagBinder.js';
import { double_encode, kindCodec_get } from './codec.js';
import type {
    CoordinateKind,
    EnumerationKind,
    FileLikeKind,
    KindValueMap,
    ParamKind,
    TypedAssetKind
} from './kinds.js';
import { ParamRecord } from './ParamRecord.js';
import type { ParamRegistry } from './ParamRegistry.js';
import type { ParamAddress } from './types.js';

/**
 * What declarations operate on. The application satisfies this, and so
 * does any plain `{ registry, binder }` pair.
 */
export interface ParamContext {
    readonly registry: ParamRegistry;
    readonly binder: FlagBinder;
}

/**
 * Long flag name of a section/key pair: `"Basic Types"` + `"Bool Param"`
 * → `basic-types-bool-param`.
 */
export function paramName_normalize(section: string, key: string): string {
    return `${section}-${key}`.toLowerCase().replace(/ /g, '-');
}

/**
 * Declare a parameter of a kind.
 *
 * Unknown pairs get a fresh record whose long flag is bound at once. A
 * pair already holding a record of the same kind is looked up unchanged.
 * A pair holding another kind is replaced with a record of `kind`; its
 * text value carries over (see `ParamRegistry.record_install`) but its
 * metadata starts empty.
 */
export function param_define<K extends ParamKind>(
    context: ParamContext,
    kind: K,
    section: string,
    key: string
): ParamBuilder<K> {
    const builder: ParamBuilder<K> = new ParamBuilder(context, kind, section, key);
    const existing: ParamRecord | null = context.registry.record_get(section, key);
    if (!existing || existing.kind_get() !== kind) {
        builder.record_create();
    }
    return builder;
}

/**
 * Access a parameter through a kind without replacing it.
 *
 * Creates the record only when the pair is unknown. If the record holds
 * another kind, values are converted through its text.
 */
export function param_access<K extends ParamKind>(
    context: ParamContext,
    kind: K,
    section: string,
    key: string
): ParamBuilder<K> {
    const builder: ParamBuilder<K> = new ParamBuilder(context, kind, section, key);
    if (!context.registry.record_has(section, key)) {
        builder.record_create();
    }
    return builder;
}

export class ParamBuilder<K extends ParamKind> {
    constructor(
        private readonly context: ParamContext,
        public readonly kind: K,
        public readonly section: string,
        public readonly key: string
    ) {}

    public address_get(): ParamAddress {
        return { section: this.section, key: this.key };
    }

    /** Normalized long flag name (without dashes). */
    public name_get(): string {
        return paramName_normalize(this.section, this.key);
    }

    /**
     * Install a fresh record of the builder's kind and bind its long flag.
     */
    public record_create(): ParamRecord {
        const record: ParamRecord = this.context.registry.record_install(
            this.section,
            this.key,
            new ParamRecord(this.kind)
        );
        this.longFlag_register(record);
        return record;
    }

    /**
     * Resolve the record. A registry that was cleared behind the builder's
     * back gets the record recreated.
     */
    public record_get(): ParamRecord {
        return this.context.registry.record_get(this.section, this.key) ?? this.record_create();
    }

    // ─── Values ─────────────────────────────────────────────────

    /**
     * Read the value as the builder's kind, decoding the record's text.
     */
    public value_get(): KindValueMap[K] {
        return kindCodec_get(this.kind).decode(this.record_get().text_get());
    }

    /**
     * Write the value as the builder's kind; the record decodes the text
     * under its own kind.
     */
    public value_set(value: KindValueMap[K]): this {
        this.record_get().text_set(kindCodec_get(this.kind).encode(value));
        return this;
    }

    public text_get(): string {
        return this.record_get().text_get();
    }

    public text_set(text: string): this {
        this.record_get().text_set(text);
        return this;
    }

    // ─── Command Line ───────────────────────────────────────────

    /**
     * Declare a command-line flag for this parameter.
     *
     * With a string (or nothing) as second argument the long flag
     * `--<section>-<key>` is bound, plus `-<shortFlag>` when given.
     *
     * With a number the parameter becomes positional: the token
     * `String(index)` is bound and the `index` tag is set. Flags bound
     * earlier stay bound, and their `flag`/`longflag` tags stay beside
     * `index` in the manifest.
     *
     * @throws If the short flag starts with `-` or the index is not a
     *         non-negative integer.
     */
    public declare(description: string, shortFlag?: string): this;
    public declare(description: string, index: number): this;
    public declare(description: string, flagOrIndex: string | number = ''): this {
        const record: ParamRecord = this.record_get();

        if (typeof flagOrIndex === 'number') {
            if (!Number.isInteger(flagOrIndex) || flagOrIndex < 0) {
                throw new Error(`Positional index must be a non-negative integer, got ${flagOrIndex}`);
            }
            const index: string = String(flagOrIndex);
            this.context.binder.flag_bind(index, this.address_get());
            record.tags.set('index', index);
            record.tags.set('description', description);
            return this;
        }

        if (flagOrIndex.startsWith('-')) {
            throw new Error(`Short flag '${flagOrIndex}' must be given without leading dashes`);
        }
        this.longFlag_register(record);
        record.tags.set('description', description);
        if (flagOrIndex) {
            this.context.binder.flag_bind(`-${flagOrIndex}`, this.address_get());
            record.tags.set('flag', flagOrIndex);
        }
        return this;
    }

    private longFlag_register(record: ParamRecord): void {
        const name: string = this.name_get();
        this.context.binder.flag_bind(`--${name}`, this.address_get());
        record.tags.set('longflag', name);
    }

    // ─── Free-text Metadata ─────────────────────────────────────

    public description_set(description: string): this {
        return this.tag_set('description', description);
    }

    public label_set(label: string): this {
        return this.tag_set('label', label);
    }

    /**
     * Mark the parameter as an input or output of the program.
     */
    public channel_set(input: boolean): this {
        return this.tag_set('channel', input ? 'input' : 'output');
    }

    public tag_set(name: string, value: string): this {
        this.record_get().tags.set(name, value);
        return this;
    }

    public attribute_set(name: string, value: string): this {
        this.record_get().attributes.set(name, value);
        return this;
    }

    public constraint_set(name: string, value: string): this {
        this.record_get().constraints.set(name, value);
        return this;
    }

    // ─── Kind Decorations ───────────────────────────────────────

    /**
     * Possible values of an enumeration, rendered as `<element>` items.
     */
    public enumeration_set<E extends EnumerationKind>(
        this: ParamBuilder<E>,
        items: string | readonly string[]
    ): ParamBuilder<E> {
        return this.tag_set('enumeration', typeof items === 'string' ? items : items.join(','));
    }

    public fileExtensions_set<F extends FileLikeKind>(
        this: ParamBuilder<F>,
        extensions: string | readonly string[]
    ): ParamBuilder<F> {
        return this.attribute_set('fileExtensions', typeof extensions === 'string' ? extensions : extensions.join(','));
    }

    /** Image/geometry flavour, e.g. `scalar`, `label`, `model`. */
    public type_set<T extends TypedAssetKind>(this: ParamBuilder<T>, type: string): ParamBuilder<T> {
        return this.attribute_set('type', type);
    }

    public multiple_set<C extends CoordinateKind>(this: ParamBuilder<C>, multiple: boolean): ParamBuilder<C> {
        return this.attribute_set('multiple', multiple ? 'true' : 'false');
    }

    /** Coordinate frame of points/regions, e.g. `ras`, `lps`, `ijk`. */
    public coordinateSystem_set<C extends CoordinateKind>(this: ParamBuilder<C>, system: string): ParamBuilder<C> {
        return this.attribute_set('coordinateSystem', system);
    }

    /**
     * Slider range of a double parameter.
     */
    public range_set(this: ParamBuilder<'double'>, minimum: number, maximum: number, step: number = 0.01): ParamBuilder<'double'> {
        return this
            .constraint_set('minimum', double_encode(minimum))
            .constraint_set('maximum', double_encode(maximum))
            .constraint_set('step', double_encode(step));
    }
}
