/**
 * @file Synopsis Renderer
 *
 * Man-page style help text: a usage block listing the built-in tokens,
 * every flagged parameter and the positional parameters, then one block
 * per section with the flag forms and descriptions, then the positional
 * parameters, then the program description and credits.
 *
 * @module cli
 */

import type { AppMetadata } from '../app/metadata.js';
import type { ParamRegistry } from '../params/ParamRegistry.js';
import type { ParamAddress, ParamEntry } from '../params/types.js';
import type { FlagBinder } from './FlagBinder.js';

/**
 * Tokens bound to one parameter, dashes included.
 */
interface FlagForms {
    short: string | null;
    long: string | null;
    index: string | null;
}

interface SynopsisEntry {
    entry: ParamEntry;
    forms: FlagForms;
}

function flagForms_get(binder: FlagBinder, entry: ParamEntry): FlagForms {
    const address: ParamAddress = { section: entry.section, key: entry.key };
    return {
        short: binder.token_get(address, 'short'),
        long: binder.token_get(address, 'long'),
        index: binder.token_get(address, 'index')
    };
}

/** Flag-driven parameters; positional ones are listed by index instead. */
function entry_isFlagged(item: SynopsisEntry): boolean {
    return item.forms.index === null && Boolean(item.forms.short ?? item.forms.long);
}

/**
 * Usage-line form: the short flag when there is one, else the long flag.
 */
function usageOption_render(item: SynopsisEntry): string {
    return `[${item.forms.short ?? item.forms.long} <${item.entry.record.kind_get()}>]`;
}

/**
 * Verbose form: ` [-s|--long <kind>]` plus the indented description.
 */
function verboseOption_render(item: SynopsisEntry): string {
    const flags: string[] = [];
    if (item.forms.short) flags.push(item.forms.short);
    if (item.forms.long) flags.push(item.forms.long);

    let text: string = ` [${flags.join('|')} <${item.entry.record.kind_get()}>]\n`;
    const description: string = item.entry.record.tag_get('description');
    if (description) {
        text += `    ${description}\n`;
    }
    return text;
}

/**
 * Render the synopsis text.
 */
export function synopsis_render(registry: ParamRegistry, binder: FlagBinder, metadata: AppMetadata): string {
    const title: string = metadata.field_get('title');
    const indent: string = ' '.repeat(6 + title.length);
    const items: SynopsisEntry[] = registry.entries_list().map((entry: ParamEntry): SynopsisEntry => ({
        entry,
        forms: flagForms_get(binder, entry)
    }));
    const flagged: SynopsisEntry[] = items.filter(entry_isFlagged);

    const positional: SynopsisEntry[] = items
        .filter((item: SynopsisEntry): boolean => item.forms.index !== null)
        .sort((a: SynopsisEntry, b: SynopsisEntry): number => Number(a.forms.index) - Number(b.forms.index));

    let usage: string = 'USAGE:\n\n';
    usage += `   ./${title} [-h] [--xml]\n`;
    usage += `${indent}[--ctk-save-ini <file>] [--ctk-load-ini <file>]\n`;
    for (const item of flagged) {
        usage += `${indent}${usageOption_render(item)}\n`;
    }
    if (positional.length > 0) {
        usage += `${indent}${positional.map((item: SynopsisEntry): string => `<${item.entry.record.kind_get()}>`).join(' ')}\n`;
    }

    const blocks: string[] = [usage];

    for (const section of registry.sections_list()) {
        const options: string[] = flagged
            .filter((item: SynopsisEntry): boolean => item.entry.section === section)
            .map(verboseOption_render);
        if (options.length > 0) {
            blocks.push(`${section}:\n${options.join('')}`);
        }
    }

    for (const item of positional) {
        blocks.push(
            `${item.entry.record.kind_get()}(${item.forms.index}):\n` +
            `    ${item.entry.record.tag_get('description')}\n`
        );
    }

    const description: string = metadata.field_get('description');
    const contributor: string = metadata.field_get('contributor');
    const acknowledgements: string = metadata.field_get('acknowledgements');
    if (description) blocks.push(`${description}\n`);
    if (contributor) blocks.push(`Author: ${contributor}\n`);
    if (acknowledgements) blocks.push(`Acknowledgements: ${acknowledgements}\n`);

    return blocks.join('\n');
}
