/**
 * @file Parameter Descriptor Loader
 *
 * Builds an application from a YAML document instead of code: the
 * top-level fields become application metadata, each `parameters` entry
 * becomes a declaration. The YAML is validated against `DescriptorSchema`
 * before any field is used.
 *
 * @module descriptor
 */

import yaml from 'js-yaml';
import { Application, type ApplicationOptions } from '../app/Application.js';
import { METADATA_FIELDS } from '../app/metadata.js';
import { boolean_encode } from '../params/codec.js';
import type { ParamKind } from '../params/kinds.js';
import type { ParamBuilder } from '../params/ParamBuilder.js';
import { DescriptorSchema, type Descriptor, type DescriptorParameter } from './schemas.js';

export type DescriptorLoadOptions = Omit<ApplicationOptions, 'title' | 'description' | 'metadata'>;

/**
 * Parse and validate descriptor YAML.
 *
 * @throws On YAML syntax errors or schema violations.
 */
export function descriptor_parse(yamlStr: string): Descriptor {
    const raw: unknown = yaml.load(yamlStr);

    const result = DescriptorSchema.safeParse(raw);
    if (!result.success) {
        const issues: string = result.error.issues
            .map((issue) => `[${issue.path.join('.')}] ${issue.message}`)
            .join('; ');
        throw new Error(`Invalid descriptor: ${issues}`);
    }
    return result.data;
}

/**
 * Canonical text of a YAML default value.
 */
export function defaultText_resolve(raw: NonNullable<DescriptorParameter['default']>): string {
    if (typeof raw === 'boolean') return boolean_encode(raw);
    if (Array.isArray(raw)) return raw.map((item: string | number): string => String(item)).join(',');
    return String(raw);
}

/**
 * Declare one descriptor parameter on an application.
 */
export function parameter_apply(app: Application, param: DescriptorParameter): ParamBuilder<ParamKind> {
    const builder: ParamBuilder<ParamKind> = app.param_define(param.kind, param.section, param.key);

    if (param.index !== undefined) {
        builder.declare(param.description, param.index);
    } else {
        builder.declare(param.description, param.flag ?? '');
    }

    if (param.label !== undefined) builder.label_set(param.label);
    if (param.channel !== undefined) builder.channel_set(param.channel === 'input');
    if (param.enumeration !== undefined) builder.tag_set('enumeration', param.enumeration.join(','));

    for (const [name, value] of Object.entries(param.tags)) builder.tag_set(name, value);
    for (const [name, value] of Object.entries(param.attributes)) builder.attribute_set(name, value);
    for (const [name, value] of Object.entries(param.constraints)) builder.constraint_set(name, value);

    if (param.default !== undefined) {
        builder.text_set(defaultText_resolve(param.default));
    }
    return builder;
}

/**
 * Create an application from a validated descriptor.
 */
export function application_fromDescriptor(descriptor: Descriptor, options: DescriptorLoadOptions = {}): Application {
    const app: Application = new Application({
        ...options,
        title: descriptor.title,
        description: descriptor.description
    });

    for (const field of METADATA_FIELDS) {
        const value: string | undefined = descriptor[field];
        if (value) app.metadata.field_set(field, value);
    }
    for (const param of descriptor.parameters) {
        parameter_apply(app, param);
    }
    return app;
}

/**
 * Parse descriptor YAML and create the application it describes.
 */
export function application_fromYaml(yamlStr: string, options: DescriptorLoadOptions = {}): Application {
    return application_fromDescriptor(descriptor_parse(yamlStr), options);
}
