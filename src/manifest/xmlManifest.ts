/**
 * @file XML Manifest Generator
 *
 * Renders the registry and application metadata as an execution-model
 * XML description, the document GUI hosts read to build a panel for the
 * program. Read-only: nothing here touches parameter values.
 *
 * Layout:
 * - metadata elements in schema order, non-empty only
 * - one `<parameters>` group per section, in registry order
 * - one element per parameter, named by its kind, with attributes from
 *   the record's `attributes`, then `<name>`, `<default>` (the current
 *   value), one child per non-empty tag and an optional `<constraints>`
 *
 * Tags, attributes and constraints are emitted sorted by name so output
 * does not depend on the order decorations were applied in.
 *
 * @module manifest
 */

import type { AppMetadata } from '../app/metadata.js';
import { sequence_split } from '../params/codec.js';
import type { ParamRegistry } from '../params/ParamRegistry.js';
import type { ParamRecord } from '../params/ParamRecord.js';

const XML_DECLARATION: string = '<?xml version="1.0" encoding="utf-8"?>';

/**
 * Escape text for element content and double-quoted attribute values.
 */
export function xml_escape(text: string): string {
    return text
        .replace(/&/g, '&amp;')
        .replace(/</g, '&lt;')
        .replace(/>/g, '&gt;')
        .replace(/"/g, '&quot;');
}

function entries_sorted(map: Map<string, string>): Array<[string, string]> {
    return Array.from(map.entries()).sort(
        (a: [string, string], b: [string, string]): number => (a[0] < b[0] ? -1 : a[0] > b[0] ? 1 : 0)
    );
}

function element_line(indent: string, name: string, text: string): string {
    return `${indent}<${name}>${xml_escape(text)}</${name}>`;
}

/**
 * Lines of one parameter element.
 */
function parameter_render(key: string, record: ParamRecord): string[] {
    const kind: string = record.kind_get();
    const attributes: string = entries_sorted(record.attributes)
        .filter(([, value]: [string, string]): boolean => value !== '')
        .map(([name, value]: [string, string]): string => ` ${name}="${xml_escape(value)}"`)
        .join('');

    const lines: string[] = [
        `    <${kind}${attributes}>`,
        element_line('      ', 'name', key),
        element_line('      ', 'default', record.text_get())
    ];

    for (const [name, value] of entries_sorted(record.tags)) {
        if (!value) continue;
        if (name === 'enumeration') {
            const items: string[] = sequence_split(value);
            if (items.length === 0) continue;
            lines.push('      <enumeration>');
            for (const item of items) {
                lines.push(element_line('        ', 'element', item));
            }
            lines.push('      </enumeration>');
            continue;
        }
        lines.push(element_line('      ', name, value));
    }

    if (record.constraints.size > 0) {
        lines.push('      <constraints>');
        for (const [name, value] of entries_sorted(record.constraints)) {
            lines.push(element_line('        ', name, value));
        }
        lines.push('      </constraints>');
    }

    lines.push(`    </${kind}>`);
    return lines;
}

/**
 * Render the full manifest document.
 */
export function manifest_render(registry: ParamRegistry, metadata: AppMetadata): string {
    const lines: string[] = [XML_DECLARATION, '<executable>'];

    for (const [field, value] of metadata.entries_list()) {
        lines.push(element_line('  ', field, value));
    }

    for (const section of registry.sections_list()) {
        lines.push('  <parameters>');
        lines.push(element_line('    ', 'label', section));
        lines.push(element_line('    ', 'description', `${section} - Section`));
        for (const key of registry.keys_list(section)) {
            const record: ParamRecord | null = registry.record_get(section, key);
            if (record) {
                lines.push(...parameter_render(key, record));
            }
        }
        lines.push('  </parameters>');
    }

    lines.push('</executable>');
    return `${lines.join('\n')}\n`;
}
