/**
 * @file Command-Line Parser Property Tests
 *
 * Whatever the token mix, parsing only ever removes tokens: the survivors
 * keep their relative order and the counts add up.
 */

import { describe, it } from 'vitest';
import * as fc from 'fast-check';
import { Application } from '../app/Application.js';
import { MemoryTextStore } from '../ini/TextStore.js';
import type { CommandLineResult } from './commandLine.js';
import { CaptureSink } from './output.js';

const TOKEN_POOL: string[] = ['-b', '--s-value', '1.5', 'in.nrrd', '--unknown', 'x', '-', '--xml', '--ctk-load-ini', 'p.ini'];

function app_create(): Application {
    const app: Application = new Application({
        title: 'tool',
        sink: new CaptureSink(),
        store: new MemoryTextStore({ 'p.ini': '[S]\nValue = 3\n' })
    });
    app.param_define('boolean', 'S', 'Toggle').declare('', 'b');
    app.param_define('double', 'S', 'Value').declare('');
    app.param_define('file', 'S', 'Input').declare('', 0);
    return app;
}

function subsequence_check(sub: readonly string[], full: readonly string[]): boolean {
    let cursor: number = 0;
    for (const token of full) {
        if (cursor < sub.length && sub[cursor] === token) cursor++;
    }
    return cursor === sub.length;
}

describe('commandLine_parse — properties', (): void => {
    it('leaves an ordered subsequence and consistent counts', (): void => {
        fc.assert(
            fc.property(fc.array(fc.constantFrom(...TOKEN_POOL), { maxLength: 12 }), (tokens: string[]): boolean => {
                const argv: string[] = [...tokens];
                const result: CommandLineResult = app_create().commandLine_parse(argv);

                return subsequence_check(argv, tokens) &&
                    result.argc === argv.length &&
                    result.handled === tokens.length - argv.length;
            })
        );
    });
});
