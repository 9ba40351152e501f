import { describe, it, expect } from 'vitest';
import { Application } from '../app/Application.js';
import { demoApplication_create } from '../app/demoApplication.js';
import { CaptureSink } from './output.js';

describe('synopsis_render', (): void => {
    it('renders the demo program', (): void => {
        const indent: string = ' '.repeat(18);
        const expected: string = [
            'USAGE:\n\n' +
            '   ./The Big Test [-h] [--xml]\n' +
            `${indent}[--ctk-save-ini <file>] [--ctk-load-ini <file>]\n` +
            `${indent}[-b <boolean>]\n` +
            `${indent}[--enumtypes-double-enum <double-enumeration>]\n` +
            `${indent}[--vector-types-double-vec <double-vector>]\n` +
            `${indent}[--special-slider <double>]\n` +
            `${indent}<file>\n`,
            'Basic Types:\n [-b|--basic-types-bool-param <boolean>]\n    Just a test\n',
            'EnumTypes:\n [--enumtypes-double-enum <double-enumeration>]\n',
            'Vector Types:\n [--vector-types-double-vec <double-vector>]\n',
            'Special:\n [--special-slider <double>]\n',
            'file(0):\n    Input File\n',
            'Does absolutely nothing.\n',
            'Author: Santa\n'
        ].join('\n');

        expect(demoApplication_create({ sink: new CaptureSink() }).synopsis_render()).toBe(expected);
    });

    it('orders positional parameters by index', (): void => {
        const app: Application = new Application({ title: 'cp', sink: new CaptureSink() });
        app.param_define('string', 'IO', 'Target').declare('Where to', 1);
        app.param_define('string', 'IO', 'Source').declare('What', 0);

        expect(app.synopsis_render()).toBe([
            'USAGE:\n\n' +
            '   ./cp [-h] [--xml]\n' +
            '        [--ctk-save-ini <file>] [--ctk-load-ini <file>]\n' +
            '        <string> <string>\n',
            'string(0):\n    What\n',
            'string(1):\n    Where to\n'
        ].join('\n'));
    });

    it('lists a moved short flag under its current parameter', (): void => {
        const app: Application = new Application({ title: 't', sink: new CaptureSink() });
        app.param_define('string', 'S', 'A').declare('', 'x');
        app.param_define('string', 'S', 'B').declare('', 'x');

        expect(app.synopsis_render()).toBe([
            'USAGE:\n\n' +
            '   ./t [-h] [--xml]\n' +
            '       [--ctk-save-ini <file>] [--ctk-load-ini <file>]\n' +
            '       [--s-a <string>]\n' +
            '       [-x <string>]\n',
            'S:\n [--s-a <string>]\n [-x|--s-b <string>]\n'
        ].join('\n'));
    });

    it('adds acknowledgements when present', (): void => {
        const app: Application = new Application({
            title: 'x',
            sink: new CaptureSink(),
            metadata: { acknowledgements: 'Thanks' }
        });

        expect(app.synopsis_render()).toBe([
            'USAGE:\n\n   ./x [-h] [--xml]\n       [--ctk-save-ini <file>] [--ctk-load-ini <file>]\n',
            'Acknowledgements: Thanks\n'
        ].join('\n'));
    });
});
