/**
 * @file Application Metadata
 *
 * Free-text facts about the program (title, version, license, ...) that
 * the XML manifest and the synopsis print. Field names are the manifest
 * element names.
 *
 * @module app
 */

/** Metadata fields in the order the manifest schema requires. */
export const METADATA_FIELDS = [
    'category',
    'title',
    'description',
    'version',
    'documentation-url',
    'license',
    'contributor',
    'acknowledgements'
] as const;

export type MetadataField = typeof METADATA_FIELDS[number];

export type MetadataInit = Partial<Record<MetadataField, string>>;

export class AppMetadata {
    private readonly fields: Map<MetadataField, string> = new Map();

    constructor(init: MetadataInit = {}) {
        for (const field of METADATA_FIELDS) {
            const value: string | undefined = init[field];
            if (value !== undefined) {
                this.fields.set(field, value);
            }
        }
    }

    /**
     * Read a field; empty string when unset.
     */
    public field_get(field: MetadataField): string {
        return this.fields.get(field) ?? '';
    }

    public field_set(field: MetadataField, value: string): this {
        this.fields.set(field, value);
        return this;
    }

    /**
     * Non-empty fields in manifest order.
     */
    public entries_list(): Array<[MetadataField, string]> {
        const entries: Array<[MetadataField, string]> = [];
        for (const field of METADATA_FIELDS) {
            const value: string = this.field_get(field);
            if (value) entries.push([field, value]);
        }
        return entries;
    }
}
