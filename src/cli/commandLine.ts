/**
 * @file Command-Line Parser
 *
 * Single left-to-right scan over an argument list. Matched tokens update
 * their parameter records in place and are removed from the list; tokens
 * nobody claims stay where they are, in their original relative order,
 * for downstream consumers.
 *
 * Token handling:
 * - `--xml` / `-h` / `--help`: render manifest / synopsis to stdout.
 * - `--ctk-save-ini <file>` / `--ctk-load-ini <file>`: persist or restore
 *   every parameter.
 * - `-s` / `--long`: bound flags. Booleans toggle and take no value; any
 *   other kind consumes the next token.
 * - anything else: positional. The n-th non-flag token is matched against
 *   index `n`; a token whose index is unbound stays in the list.
 *
 * Malformed input never aborts the program: problems are written to
 * stderr and reported in the result.
 *
 * @module cli
 */

import type { ParamContext } from '../params/ParamBuilder.js';
import type { ParamRecord } from '../params/ParamRecord.js';
import type { ParamValue } from '../params/kinds.js';
import type { ParamAddress } from '../params/types.js';
import type { OutputSink } from './output.js';

export const XML_TOKEN: string = '--xml';
export const HELP_TOKENS: readonly string[] = ['-h', '--help'];
export const SAVE_INI_TOKEN: string = '--ctk-save-ini';
export const LOAD_INI_TOKEN: string = '--ctk-load-ini';

/**
 * Services the parser calls back into. The application implements this.
 */
export interface CommandLineHost extends ParamContext {
    readonly sink: OutputSink;
    manifest_render(): string;
    synopsis_render(): string;
    ini_save(path: string): boolean;
    ini_load(path: string): boolean;
}

/**
 * @property argc - Number of tokens left in the argument list
 * @property handled - Number of tokens consumed and removed
 * @property diagnostics - Messages written to stderr, in order
 */
export interface CommandLineResult {
    argc: number;
    handled: number;
    diagnostics: string[];
}

/**
 * Whether a token carries a flag marker. A lone `-` is an operand.
 */
export function argIsFlag_check(token: string): boolean {
    return token.startsWith('-') && token !== '-';
}

/**
 * Flip a boolean record. Records of other kinds are left alone.
 */
function boolean_toggle(record: ParamRecord): void {
    const current: ParamValue = record.value_get();
    if (current.kind === 'boolean') {
        record.value_set({ kind: 'boolean', value: !current.value });
    }
}

function record_resolve(host: CommandLineHost, token: string): ParamRecord | null {
    const address: ParamAddress | null = host.binder.flag_resolve(token);
    if (!address) return null;
    return host.registry.record_get(address.section, address.key);
}

/**
 * Parse an argument list against the host's parameters.
 *
 * `argv` is mutated: handled tokens are compacted out and its length is
 * set to the number of remaining tokens. Pass the arguments without the
 * program path (e.g. `process.argv.slice(2)`).
 */
export function commandLine_parse(host: CommandLineHost, argv: string[]): CommandLineResult {
    const handled: boolean[] = argv.map((): boolean => false);
    const diagnostics: string[] = [];
    let position: number = 0;

    const diagnostic_emit = (message: string): void => {
        diagnostics.push(message);
        host.sink.stderr_write(`${message}\n`);
    };
    const valueMissing_report = (token: string): void => {
        diagnostic_emit('Expected value but found end of argument list.');
        diagnostic_emit(`Ignored command line argument ${token}`);
    };

    let i: number = 0;
    while (i < argv.length) {
        const token: string = argv[i];
        const isLast: boolean = i === argv.length - 1;

        if (token === XML_TOKEN) {
            host.sink.stdout_write(host.manifest_render());
            handled[i++] = true;
            continue;
        }

        if (HELP_TOKENS.includes(token)) {
            host.sink.stdout_write(host.synopsis_render());
            handled[i++] = true;
            continue;
        }

        if (token === SAVE_INI_TOKEN || token === LOAD_INI_TOKEN) {
            if (isLast) {
                valueMissing_report(token);
                break;
            }
            const path: string = argv[i + 1];
            handled[i] = true;
            handled[i + 1] = true;
            if (token === SAVE_INI_TOKEN) {
                if (!host.ini_save(path)) {
                    diagnostic_emit(`Could not save ini file ${path}`);
                }
            } else if (!host.ini_load(path)) {
                diagnostic_emit(`Could not load ini file ${path}`);
            }
            i += 2;
            continue;
        }

        if (argIsFlag_check(token)) {
            const record: ParamRecord | null = record_resolve(host, token);
            if (record && record.kind_get() === 'boolean') {
                boolean_toggle(record);
                handled[i++] = true;
                continue;
            }
            if (isLast) {
                valueMissing_report(token);
                break;
            }
            if (!record) {
                diagnostic_emit(`Ignored command line argument ${token}`);
                i++;
                continue;
            }
            record.text_set(argv[i + 1]);
            handled[i] = true;
            handled[i + 1] = true;
            i += 2;
            continue;
        }

        // Positional: every non-flag token uses up an ordinal, bound or not.
        const record: ParamRecord | null = record_resolve(host, String(position++));
        if (record) {
            if (record.kind_get() === 'boolean') {
                boolean_toggle(record);
            } else {
                record.text_set(token);
            }
            handled[i] = true;
        }
        i++;
    }

    let kept: number = 0;
    for (let read: number = 0; read < argv.length; read++) {
        if (!handled[read]) {
            argv[kept++] = argv[read];
        }
    }
    const handledCount: number = argv.length - kept;
    argv.length = kept;

    return { argc: kept, handled: handledCount, diagnostics };
}
